/**
 * @module optimization/subgradient
 * @description Projected subgradient method for basis pursuit:
 *
 *     minimize ‖x‖₁  subject to  A·x = b
 *
 * Each iteration steps along −sign(xk) with the diminishing step 1/(1+k),
 * then projects back onto {x : A·x = b}. The objective is not monotone along
 * the trajectory, so the best iterate is tracked separately and returned.
 *
 * Reference: N. Z. Shor, "Minimization Methods for Non-Differentiable
 * Functions", Springer, 1985; S. Boyd, "Subgradient Methods", Stanford EE364b
 * lecture notes, 2014.
 */

import { InvalidInputError, NumericalError, ErrorCodes, ValidationError } from '../../../core/errors';
import type { CholeskyFactor } from '../math/cholesky';
import { axpy, copyVector, infDistance, l1Norm, signVector, zeros } from '../math/linear-algebra';
import { factorizeGram } from './factorization';
import { validateProblem } from './problem';
import { projectAffine } from './projection';
import {
    DEFAULT_SUBGRADIENT_CONFIG,
    SubgradientStatus,
    type BasisPursuitProblem,
    type SubgradientConfig,
    type SubgradientResult,
    type SubgradientStatusName,
} from './types';

// ==================== Parameters ====================

/**
 * Merge overrides onto the defaults and validate
 *
 * @throws ValidationError listing every invalid option
 */
export function createSubgradientParameters(config?: Partial<SubgradientConfig>): SubgradientConfig {
    const params: SubgradientConfig = { ...DEFAULT_SUBGRADIENT_CONFIG, ...config };
    const errors: string[] = [];

    if (!Number.isInteger(params.maxIterations) || params.maxIterations < 1) {
        errors.push(`maxIterations must be a positive integer, got ${params.maxIterations}`);
    }
    // 0 disables the stall check
    if (!Number.isFinite(params.tolerance) || params.tolerance < 0) {
        errors.push(`tolerance must be a finite non-negative number, got ${params.tolerance}`);
    }
    if (params.progressInterval !== undefined &&
        (!Number.isInteger(params.progressInterval) || params.progressInterval < 1)) {
        errors.push(`progressInterval must be a positive integer, got ${params.progressInterval}`);
    }

    if (errors.length > 0) {
        throw new ValidationError(`Invalid subgradient configuration: ${errors.join('; ')}`, errors);
    }

    return params;
}

// ==================== Building Blocks ====================

/**
 * Diminishing step size αk = 1/(1+k): αk → 0 and Σ αk = ∞
 */
export function stepSize(k: number): number {
    return 1 / (1 + k);
}

/**
 * Subgradient of ‖·‖₁ at x, using sign(0) = 0
 */
export function l1Subgradient(x: number[]): number[] {
    return signVector(x);
}

// ==================== Main Loop ====================

/**
 * Projected subgradient optimization.
 *
 * @param x0 Starting point (not modified; need not be feasible)
 * @param A Constraint matrix, m×n with m < n and full row rank
 * @param b Right-hand side in range(A)
 * @param config Overrides for DEFAULT_SUBGRADIENT_CONFIG
 * @param factor Precomputed factor of AAᵗ; computed here when omitted
 * @throws InvalidInputError before any iteration on malformed input
 * @throws ValidationError on an invalid configuration
 * @throws NumericalError if AAᵗ does not factor, or the objective stops being finite
 */
export function projectedSubgradient(
    x0: number[],
    A: number[][],
    b: number[],
    config?: Partial<SubgradientConfig>,
    factor?: CholeskyFactor
): SubgradientResult {
    const { m } = validateProblem({ A, b }, x0);
    const p = createSubgradientParameters(config);

    if (factor !== undefined && factor.size !== m) {
        throw new InvalidInputError(
            `Factor has size ${factor.size}, expected ${m}`,
            { size: factor.size, expected: m }
        );
    }
    const gram = factor ?? factorizeGram(A);

    let x = copyVector(x0);
    let bestX = copyVector(x0);
    let bestF = Infinity;
    const objectiveHistory: number[] = [];

    let status = SubgradientStatus.ITERATION_LIMIT;
    let k = 0;

    for (; k < p.maxIterations; k++) {
        if (p.isCancelled?.()) {
            status = SubgradientStatus.CANCELED;
            break;
        }

        const g = l1Subgradient(x);
        const y = axpy(x, -stepSize(k), g);
        const next = projectAffine(y, A, b, gram);

        const f = l1Norm(next);
        if (!Number.isFinite(f)) {
            throw new NumericalError(
                `Objective became non-finite at iteration ${k}`,
                { iteration: k, objective: f },
                ErrorCodes.NON_FINITE_ITERATE
            );
        }
        objectiveHistory.push(f);

        // Strict: ties keep the earliest best iterate
        if (f < bestF) {
            bestF = f;
            bestX = next;
        }

        if (p.onProgress && p.progressInterval !== undefined && (k + 1) % p.progressInterval === 0) {
            p.onProgress(k + 1, f);
        }

        const moved = infDistance(x, next);
        x = next;

        if (moved < p.tolerance) {
            status = SubgradientStatus.CONVERGED;
            k++;
            break;
        }
    }

    return {
        solution: copyVector(bestX),
        objective: bestF,
        iterations: k,
        status,
        objectiveHistory,
    };
}

/**
 * Solve basis pursuit with the basic interface, starting from the zero vector
 * unless x0 is given.
 */
export function minimizeL1(
    problem: BasisPursuitProblem,
    config?: Partial<SubgradientConfig>,
    x0?: number[]
): SubgradientResult {
    const n = problem.A.length > 0 ? problem.A[0].length : 0;
    return projectedSubgradient(x0 ?? zeros(n), problem.A, problem.b, config);
}

/**
 * Name of a terminal status, as used in logs and reports
 */
export function subgradientStatusName(status: SubgradientStatus): SubgradientStatusName {
    switch (status) {
        case SubgradientStatus.CONVERGED:
            return 'CONVERGED';
        case SubgradientStatus.ITERATION_LIMIT:
            return 'ITERATION_LIMIT';
        case SubgradientStatus.CANCELED:
            return 'CANCELED';
    }
}

/**
 * Get human-readable description of the terminal status
 */
export function subgradientStatusMessage(status: SubgradientStatus): string {
    switch (status) {
        case SubgradientStatus.CONVERGED:
            return 'Stopped: successive iterates stalled below tolerance.';
        case SubgradientStatus.ITERATION_LIMIT:
            return 'Stopped: maximum iterations reached; returning best iterate.';
        case SubgradientStatus.CANCELED:
            return 'Canceled by caller.';
    }
}
