/**
 * @module optimization/certificate
 * @description Duality-gap certificate for basis pursuit.
 *
 * The dual of min ‖x‖₁ s.t. A·x = b is
 *
 *     maximize bᵗν  subject to  ‖Aᵗν‖∞ ≤ 1
 *
 * so any dual-feasible ν gives bᵗν ≤ f* ≤ ‖x‖₁ for every feasible x.
 *
 * At an optimum x with support S, optimality asks for Aᵗν = sign(x) on S only;
 * off the support any value in [−1, 1] will do. The candidate ν is therefore
 * fitted to sign(x) on S alone, then scaled back into the dual feasible set.
 */

import { NumericalError } from '../../../core/errors';
import { cholesky, choleskySolve, type CholeskyFactor } from '../math/cholesky';
import {
    dot,
    gramMatrix,
    infNorm,
    l1Norm,
    mulMatTransposeVec,
    mulMatVec,
    scale,
    sign,
    transpose,
} from '../math/linear-algebra';

/**
 * Entries with magnitude at or below this count as zero in the support
 */
export const SUPPORT_THRESHOLD = 1e-6;

export interface DualCertificate {
    /** Dual-feasible point ν (‖Aᵗν‖∞ ≤ 1) */
    dual: number[];
    /** bᵗν, a lower bound on the optimal ‖x‖₁ */
    lowerBound: number;
    /** ‖x‖₁ */
    primalObjective: number;
    /** ‖x‖₁ − bᵗν; bounds the suboptimality of a feasible x */
    gap: number;
}

/**
 * Indices i with |xᵢ| > SUPPORT_THRESHOLD
 */
export function supportOf(x: number[]): number[] {
    const support: number[] = [];
    for (let i = 0; i < x.length; i++) {
        if (Math.abs(x[i]) > SUPPORT_THRESHOLD) support.push(i);
    }
    return support;
}

/**
 * Least-squares ν for A_Sᵗν ≈ s.
 *
 * With |S| ≥ m this solves the normal equations (A_S A_Sᵗ)ν = A_S s; with
 * |S| < m it takes the minimum-norm ν = A_S w, (A_Sᵗ A_S)w = s, which meets
 * A_Sᵗν = s exactly.
 *
 * @param columns A_Sᵗ, one row per support index
 * @throws NumericalError if the Gram matrix of A_S is singular
 */
function fitOnSupport(columns: number[][], s: number[], m: number): number[] {
    if (columns.length >= m) {
        const AS = transpose(columns);
        return choleskySolve(cholesky(gramMatrix(AS)), mulMatVec(AS, s));
    }
    const w = choleskySolve(cholesky(gramMatrix(columns)), s);
    return mulMatTransposeVec(columns, w);
}

/**
 * Build a dual-feasible point from x and report the duality gap.
 * Only meaningful for feasible x.
 *
 * When the support columns of A are linearly dependent the fit falls back to
 * the full system, ν = (AAᵗ)⁻¹A·s through the cached factor, where s is
 * sign(x) with the entries off the support set to 0.
 */
export function dualCertificate(
    x: number[],
    A: number[][],
    b: number[],
    factor: CholeskyFactor
): DualCertificate {
    const m = A.length;
    const support = supportOf(x);
    const s = support.map(i => sign(x[i]));

    let nu: number[];
    if (support.length === 0) {
        nu = new Array<number>(m).fill(0);
    } else {
        const columns = support.map(i => A.map(row => row[i]));
        try {
            nu = fitOnSupport(columns, s, m);
        } catch (error) {
            if (!(error instanceof NumericalError)) throw error;
            const masked = new Array<number>(x.length).fill(0);
            support.forEach((i, k) => { masked[i] = s[k]; });
            nu = choleskySolve(factor, mulMatVec(A, masked));
        }
    }

    const dualNorm = infNorm(mulMatTransposeVec(A, nu));
    const dual = dualNorm > 1 ? scale(nu, 1 / dualNorm) : nu;

    const lowerBound = dot(b, dual);
    const primalObjective = l1Norm(x);

    return {
        dual,
        lowerBound,
        primalObjective,
        gap: primalObjective - lowerBound,
    };
}
