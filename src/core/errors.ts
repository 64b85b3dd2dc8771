/**
 * @module core/errors
 * @description Unified error types and error codes for the solver and its tasks
 *
 * Every failure the library raises is a PursuitError carrying one of the codes
 * below, so callers can branch on `code` instead of parsing messages.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes
 */
export const ErrorCodes = {
    // Input Errors
    /** Dimension mismatch, ragged matrix, non-finite entry, or m >= n */
    INVALID_INPUT: 'INVALID_INPUT',
    /** Optimizer or task configuration failed validation */
    INVALID_CONFIG: 'INVALID_CONFIG',

    // Numerical Errors
    /** Gram matrix AAᵗ is not numerically positive definite */
    NUMERICAL_ERROR: 'NUMERICAL_ERROR',
    /** Objective became NaN or infinite during iteration */
    NON_FINITE_ITERATE: 'NON_FINITE_ITERATE',

    // Runtime Errors
    /** Internal framework error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for the library
 */
export class PursuitError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'PursuitError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, PursuitError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Malformed problem instance or starting point
 */
export class InvalidInputError extends PursuitError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.INVALID_INPUT, message, details);
        this.name = 'InvalidInputError';
    }
}

/**
 * Numerical breakdown: failed factorization or a non-finite iterate
 */
export class NumericalError extends PursuitError {
    constructor(
        message: string,
        details?: unknown,
        code: typeof ErrorCodes.NUMERICAL_ERROR | typeof ErrorCodes.NON_FINITE_ITERATE = ErrorCodes.NUMERICAL_ERROR
    ) {
        super(code, message, details);
        this.name = 'NumericalError';
    }
}

/**
 * Configuration validation error
 */
export class ValidationError extends PursuitError {
    readonly errors: string[];

    constructor(message: string, errors: string[] = []) {
        super(ErrorCodes.INVALID_CONFIG, message, errors);
        this.name = 'ValidationError';
        this.errors = errors;
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a PursuitError
 */
export function isPursuitError(error: unknown): error is PursuitError {
    return error instanceof PursuitError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isPursuitError(error) && error.code === code;
}

/**
 * Wrap any error into a PursuitError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): PursuitError {
    if (isPursuitError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new PursuitError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new PursuitError(defaultCode, String(error));
}
