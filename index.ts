/**
 * @packageDocumentation
 * @module l1-pursuit
 *
 * l1-pursuit: minimum l1-norm solutions of underdetermined linear systems
 *
 * Solves basis pursuit, min ‖x‖₁ s.t. A·x = b, by the projected subgradient
 * method with an exact affine projection backed by a cached Cholesky factor
 * of AAᵗ.
 *
 * ## Modules
 * - `numeric` - Linear algebra, Gram factorization, projection, optimizer, certificate
 * - `core` - Errors, logging, seeded RNG
 * - `tasks` - Random instance generation, run report, CLI
 *
 * ## Usage Example
 * ```typescript
 * import { numeric } from 'l1-pursuit';
 *
 * const result = numeric.minimizeL1({ A: [[1, 1]], b: [1] });
 * console.log(result.objective); // 1
 * ```
 *
 * @license MIT
 */

export * as core from './src/core';
export * as numeric from './src/models/numeric';
export * as tasks from './src/tasks';

// Direct exports for the common entry points
export {
    projectedSubgradient,
    minimizeL1,
    projectAffine,
    createAffineProjector,
    factorizeGram,
    dualCertificate,
    SubgradientStatus,
    DEFAULT_SUBGRADIENT_CONFIG,
} from './src/models/numeric/optimization';

export type {
    BasisPursuitProblem,
    SubgradientConfig,
    SubgradientResult,
    ProgressFunction,
} from './src/models/numeric/optimization';

export {
    PursuitError,
    InvalidInputError,
    NumericalError,
    ValidationError,
    ErrorCodes,
} from './src/core/errors';

// ==================== Version ====================
export const VERSION = '1.0.0';
