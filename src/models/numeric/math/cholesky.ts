/**
 * @module math/cholesky
 * @description Dense Cholesky factorization G = L·Lᵗ of a symmetric positive
 * definite matrix, with forward/backward substitution against the cached factor.
 */

import { NumericalError } from '../../../core/errors';

/**
 * Pivots at or below this fraction of the largest diagonal entry are
 * treated as zero (matrix not numerically positive definite).
 */
export const PIVOT_TOLERANCE = 1e-12;

/**
 * Cholesky factor of an m×m symmetric positive definite matrix.
 * Frozen on creation; safe to share between runs on the same matrix.
 */
export interface CholeskyFactor {
    /** Dimension m of the factored matrix */
    readonly size: number;
    /** Lower triangular L (row-major, zeros above the diagonal) */
    readonly lower: ReadonlyArray<ReadonlyArray<number>>;
}

/**
 * Cholesky decomposition of a symmetric positive definite matrix.
 *
 * Only the lower triangle of G is read.
 *
 * @throws NumericalError if a pivot is non-finite or not numerically positive
 */
export function cholesky(G: number[][], pivotTolerance: number = PIVOT_TOLERANCE): CholeskyFactor {
    const n = G.length;

    let maxDiag = 0;
    for (let i = 0; i < n; i++) {
        maxDiag = Math.max(maxDiag, Math.abs(G[i][i]));
    }
    const threshold = pivotTolerance * maxDiag;

    const L: number[][] = [];
    for (let i = 0; i < n; i++) {
        L.push(new Array<number>(n).fill(0));
    }

    for (let j = 0; j < n; j++) {
        let pivot = G[j][j];
        for (let k = 0; k < j; k++) {
            pivot -= L[j][k] * L[j][k];
        }

        if (!Number.isFinite(pivot) || pivot <= threshold) {
            throw new NumericalError(
                `Matrix is not positive definite: pivot ${j} is ${pivot}`,
                { pivotIndex: j, pivot, threshold, size: n }
            );
        }

        const ljj = Math.sqrt(pivot);
        L[j][j] = ljj;

        for (let i = j + 1; i < n; i++) {
            let sum = G[i][j];
            for (let k = 0; k < j; k++) {
                sum -= L[i][k] * L[j][k];
            }
            L[i][j] = sum / ljj;
        }
    }

    for (const row of L) {
        Object.freeze(row);
    }

    return Object.freeze({ size: n, lower: Object.freeze(L) });
}

/**
 * Solve L·y = r for lower triangular L
 */
export function forwardSubstitution(L: ReadonlyArray<ReadonlyArray<number>>, r: number[]): number[] {
    const n = L.length;
    const y: number[] = new Array<number>(n).fill(0);
    for (let i = 0; i < n; i++) {
        const row = L[i];
        let sum = r[i];
        for (let k = 0; k < i; k++) {
            sum -= row[k] * y[k];
        }
        y[i] = sum / row[i];
    }
    return y;
}

/**
 * Solve Lᵗ·z = y for lower triangular L (reads L column-wise)
 */
export function backSubstitution(L: ReadonlyArray<ReadonlyArray<number>>, y: number[]): number[] {
    const n = L.length;
    const z: number[] = new Array<number>(n).fill(0);
    for (let i = n - 1; i >= 0; i--) {
        let sum = y[i];
        for (let k = i + 1; k < n; k++) {
            sum -= L[k][i] * z[k];
        }
        z[i] = sum / L[i][i];
    }
    return z;
}

/**
 * Solve G·z = r using a cached factor of G, O(m²) per call
 */
export function choleskySolve(factor: CholeskyFactor, r: number[]): number[] {
    return backSubstitution(factor.lower, forwardSubstitution(factor.lower, r));
}
