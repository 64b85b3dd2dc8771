/**
 * @module math
 * @description Dense linear algebra and Cholesky factorization
 */

export * from './linear-algebra';
export * from './cholesky';
