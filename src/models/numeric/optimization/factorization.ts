/**
 * @module optimization/factorization
 * @description Cholesky factor of the constraint Gram matrix AAᵗ, computed
 * once per run and reused by every projection.
 */

import { NumericalError } from '../../../core/errors';
import { cholesky, type CholeskyFactor } from '../math/cholesky';
import { gramMatrix } from '../math/linear-algebra';

/**
 * Factor AAᵗ = L·Lᵗ.
 *
 * O(m²n) to form the Gram matrix plus O(m³) for the factorization.
 *
 * @throws NumericalError if AAᵗ is not numerically positive definite,
 *         i.e. A is rank deficient or severely ill-conditioned
 */
export function factorizeGram(A: number[][]): CholeskyFactor {
    try {
        return cholesky(gramMatrix(A));
    } catch (error) {
        if (error instanceof NumericalError) {
            throw new NumericalError(
                `Gram matrix AAᵗ is not positive definite (A is rank deficient or ill-conditioned): ${error.message}`,
                error.details
            );
        }
        throw error;
    }
}
