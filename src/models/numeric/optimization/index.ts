/**
 * @module optimization
 * @description Basis pursuit by projected subgradient
 *
 * Provides:
 * - Gram factorization: Cholesky factor of AAᵗ, computed once per run
 * - Affine projection onto {x : A·x = b}
 * - Projected subgradient loop with best-iterate tracking
 * - Duality-gap certificate for a candidate solution
 */

export * from './types';
export * from './problem';
export * from './factorization';
export * from './projection';
export * from './subgradient';
export * from './certificate';
