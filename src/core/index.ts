/**
 * @module core
 * @description Core framework shared by the solver and its tasks
 *
 * ## Modules
 * - `logging`: structured iteration/run logging
 * - `repro`: seeded RNG and config hashing
 * - `errors`: unified error types and codes
 */

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    IterationLogEntry,
    RunLogEntry,
    LogEntry,
    IterationLogInput,
    RunLogInput,
    Logger,
    LoggerConfig,
} from './logging';

export {
    MultiLogger,
    ConsoleLogger,
    MemoryLogger,
    createLogger,
    DEFAULT_SCHEMA_VERSION,
    progressToLogger,
} from './logging';

// ==================== Repro ====================

export type {
    ValidationResult,
} from './repro';

export {
    canonicalJson,
    computeConfigHash,
    SeededRandom,
    createRng,
} from './repro';

// ==================== Errors ====================

export {
    ErrorCodes,
    PursuitError,
    InvalidInputError,
    NumericalError,
    ValidationError,
    isPursuitError,
    hasErrorCode,
    wrapError,
} from './errors';

export type {
    ErrorCode,
} from './errors';
