/**
 * @module tasks/basis-pursuit/config
 * @description Basis pursuit task configuration
 */

import type { LogLevel } from '../../core/logging';
import type { ValidationResult } from '../../core/repro';

export const TASK_NAME = 'basis-pursuit';

// ==================== Configuration ====================

/**
 * How the planted solution x_true (b = A·x_true) is drawn
 * - 'ones': all-ones vector, so ‖x_true‖₁ = n bounds the optimum
 * - 'sparse': `sparsity` nonzero N(0,1) entries at random positions
 */
export type PlantKind = 'ones' | 'sparse';

/**
 * Basis pursuit run configuration
 */
export interface BasisPursuitRunConfig {
    /** Random seed for reproducibility */
    seed: number;
    /** Number of constraints m */
    rows: number;
    /** Number of unknowns n (> rows) */
    cols: number;
    /** Planted solution kind */
    plant: PlantKind;
    /** Nonzeros in the planted solution when plant = 'sparse' */
    sparsity: number;
    /** Optimizer iteration ceiling */
    maxIterations: number;
    /** Optimizer stall tolerance */
    tolerance: number;
    /** Iterations between progress log entries */
    progressInterval: number;
    /** Console verbosity for the CLI */
    logLevel: LogLevel;
}

/**
 * Default configuration
 */
export const DEFAULT_RUN_CONFIG: BasisPursuitRunConfig = {
    seed: 42,
    rows: 5,
    cols: 20,
    plant: 'ones',
    sparsity: 2,
    maxIterations: 1_000_000,
    tolerance: 1e-6,
    progressInterval: 100_000,
    logLevel: 'info',
};

/**
 * Iteration ceilings above this only earn a warning
 */
const LONG_RUN_ITERATIONS = 10_000_000;

// ==================== Validation ====================

function isPositiveInteger(value: number): boolean {
    return Number.isInteger(value) && value > 0;
}

/**
 * Validate a run configuration
 */
export function validateRunConfig(config: BasisPursuitRunConfig): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!Number.isInteger(config.seed)) {
        errors.push('seed must be an integer');
    }
    if (!isPositiveInteger(config.rows)) {
        errors.push('rows must be a positive integer');
    }
    if (!isPositiveInteger(config.cols)) {
        errors.push('cols must be a positive integer');
    }
    if (isPositiveInteger(config.rows) && isPositiveInteger(config.cols) && config.rows >= config.cols) {
        errors.push(`rows (${config.rows}) must be less than cols (${config.cols})`);
    }

    if (config.plant !== 'ones' && config.plant !== 'sparse') {
        errors.push(`plant must be 'ones' or 'sparse', got '${String(config.plant)}'`);
    }
    if (config.plant === 'sparse') {
        if (!isPositiveInteger(config.sparsity) || config.sparsity > config.cols) {
            errors.push('sparsity must be an integer between 1 and cols');
        } else if (2 * config.sparsity > config.rows) {
            warnings.push(
                `sparsity ${config.sparsity} exceeds half the rows (${config.rows}); ` +
                'the planted vector is unlikely to be the l1 minimizer'
            );
        }
    }

    if (!isPositiveInteger(config.maxIterations)) {
        errors.push('maxIterations must be a positive integer');
    } else if (config.maxIterations > LONG_RUN_ITERATIONS) {
        warnings.push(`maxIterations ${config.maxIterations} may take a long time`);
    }
    if (!Number.isFinite(config.tolerance) || config.tolerance < 0) {
        errors.push('tolerance must be a finite non-negative number');
    }
    if (!isPositiveInteger(config.progressInterval)) {
        errors.push('progressInterval must be a positive integer');
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
    };
}
