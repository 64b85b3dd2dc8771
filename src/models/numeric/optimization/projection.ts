/**
 * @module optimization/projection
 * @description Euclidean projection onto the affine set {x : A·x = b}.
 *
 * Closed form from the Lagrangian of min ‖x − y‖₂ s.t. A·x = b:
 *
 *     x = y − Aᵗ (AAᵗ)⁻¹ (A·y − b)
 *
 * (AAᵗ)⁻¹ is applied through a cached Cholesky factor, so each projection
 * costs O(mn + m²).
 */

import { choleskySolve, type CholeskyFactor } from '../math/cholesky';
import { mulMatTransposeVec, mulMatVec, subtract } from '../math/linear-algebra';
import { factorizeGram } from './factorization';
import { validateProblem } from './problem';
import type { BasisPursuitProblem } from './types';

/**
 * Project y onto {x : A·x = b}.
 *
 * Pure; `factor` must be the factor of AAᵗ for this same A.
 */
export function projectAffine(
    y: number[],
    A: number[][],
    b: number[],
    factor: CholeskyFactor
): number[] {
    const residual = subtract(mulMatVec(A, y), b);
    const multipliers = choleskySolve(factor, residual);
    return subtract(y, mulMatTransposeVec(A, multipliers));
}

/**
 * Projector bound to one problem instance
 */
export interface AffineProjector {
    readonly problem: BasisPursuitProblem;
    readonly factor: CholeskyFactor;
    project(y: number[]): number[];
}

/**
 * Validate the instance, factor AAᵗ once and bind the projection to it
 *
 * @throws InvalidInputError on malformed input
 * @throws NumericalError if AAᵗ does not factor
 */
export function createAffineProjector(problem: BasisPursuitProblem): AffineProjector {
    validateProblem(problem);
    const factor = factorizeGram(problem.A);

    return {
        problem,
        factor,
        project: (y) => projectAffine(y, problem.A, problem.b, factor),
    };
}
