/**
 * @module optimization/problem
 * @description Shape checks for basis pursuit instances
 */

import { InvalidInputError } from '../../../core/errors';
import { isFiniteVector, mulMatVec, norm, subtract } from '../math/linear-algebra';
import type { BasisPursuitProblem } from './types';

/**
 * Problem dimensions
 */
export interface ProblemShape {
    /** Number of constraints (rows of A) */
    m: number;
    /** Number of unknowns (columns of A) */
    n: number;
}

/**
 * Validate an instance and an optional starting point.
 *
 * Checks shape only (rank is left to the factorization).
 *
 * @throws InvalidInputError on empty or ragged A, m >= n, wrong lengths,
 *         or non-finite entries
 */
export function validateProblem(problem: BasisPursuitProblem, x0?: number[]): ProblemShape {
    const { A, b } = problem;
    const m = A.length;

    if (m === 0) {
        throw new InvalidInputError('Constraint matrix A has no rows');
    }

    const n = A[0].length;
    if (n === 0) {
        throw new InvalidInputError('Constraint matrix A has no columns');
    }

    for (let i = 0; i < m; i++) {
        if (A[i].length !== n) {
            throw new InvalidInputError(
                `Row ${i} of A has length ${A[i].length}, expected ${n}`,
                { row: i, length: A[i].length, expected: n }
            );
        }
        if (!isFiniteVector(A[i])) {
            throw new InvalidInputError(`Row ${i} of A contains a non-finite entry`, { row: i });
        }
    }

    if (m >= n) {
        throw new InvalidInputError(
            `System must be underdetermined: A is ${m}x${n}`,
            { m, n }
        );
    }

    if (b.length !== m) {
        throw new InvalidInputError(
            `b has length ${b.length}, expected ${m}`,
            { length: b.length, expected: m }
        );
    }
    if (!isFiniteVector(b)) {
        throw new InvalidInputError('b contains a non-finite entry');
    }

    if (x0 !== undefined) {
        if (x0.length !== n) {
            throw new InvalidInputError(
                `x0 has length ${x0.length}, expected ${n}`,
                { length: x0.length, expected: n }
            );
        }
        if (!isFiniteVector(x0)) {
            throw new InvalidInputError('x0 contains a non-finite entry');
        }
    }

    return { m, n };
}

/**
 * Feasibility residual ‖A·x − b‖₂
 */
export function constraintResidual(x: number[], A: number[][], b: number[]): number {
    return norm(subtract(mulMatVec(A, x), b));
}
