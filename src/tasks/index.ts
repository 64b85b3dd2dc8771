/**
 * @module tasks
 * @description Experiment tasks built on the solver
 *
 * - Basis pursuit: random instance generation, solve, report
 */

export * as basisPursuit from './basis-pursuit';
export * from './basis-pursuit';
