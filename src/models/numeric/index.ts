/**
 * @module src/models/numeric
 * @description Numerical Methods and Optimization
 *
 * Contains:
 * - Linear algebra: dense vector/matrix operations, Cholesky factorization
 * - Optimization: projected subgradient for basis pursuit
 */

import * as math from './math';
import * as optimization from './optimization';

// Re-export as namespaces
export { math, optimization };

// Direct exports for common functions
export * from './optimization';
