/**
 * @module optimization/types
 * @description Type definitions for the projected subgradient solver
 */

/**
 * Basis pursuit instance: minimize ‖x‖₁ subject to A·x = b.
 * A is m×n with m < n and full row rank, b lies in range(A).
 */
export interface BasisPursuitProblem {
    /** Constraint matrix, m rows of length n */
    readonly A: number[][];
    /** Right-hand side, length m */
    readonly b: number[];
}

/**
 * Terminal states of the subgradient loop
 */
export enum SubgradientStatus {
    /** Successive iterates stopped moving (‖xk − xk+1‖∞ < tolerance) */
    CONVERGED = 0,
    /** Iteration ceiling reached; best iterate so far is returned */
    ITERATION_LIMIT = 1,
    /** Cancellation predicate returned true between iterations */
    CANCELED = 2,
}

export type SubgradientStatusName = keyof typeof SubgradientStatus;

/**
 * Progress observer: purely diagnostic, must not affect the run
 * @param iteration Number of completed iterations (1-based)
 * @param objective ‖x‖₁ of the iterate just produced
 */
export type ProgressFunction = (iteration: number, objective: number) => void;

/**
 * Projected subgradient configuration
 */
export interface SubgradientConfig {
    /** Maximum number of iterations */
    maxIterations: number;
    /** Stall threshold on ‖xk − xk+1‖∞ */
    tolerance: number;
    /** Call onProgress after every this many iterations */
    progressInterval?: number;
    /** Diagnostic observer */
    onProgress?: ProgressFunction;
    /** Checked before each iteration; true stops the run */
    isCancelled?: () => boolean;
}

export const DEFAULT_SUBGRADIENT_CONFIG: SubgradientConfig = {
    maxIterations: 1_000_000,
    tolerance: 1e-6,
};

/**
 * Projected subgradient result
 */
export interface SubgradientResult {
    /** Best iterate seen (lowest ‖x‖₁) */
    solution: number[];
    /** ‖solution‖₁ */
    objective: number;
    /** Number of iterations performed */
    iterations: number;
    /** Why the loop stopped */
    status: SubgradientStatus;
    /** Objective of every iterate, in order; length equals iterations */
    objectiveHistory: number[];
}
