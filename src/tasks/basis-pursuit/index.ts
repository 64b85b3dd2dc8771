/**
 * @module tasks/basis-pursuit
 * @description Basis pursuit experiment task
 *
 * ## Key Features
 * - Seeded random instances with a planted feasible (optionally sparse) solution
 * - Projected subgradient solve with logger-backed progress
 * - Run report with feasibility residual, support size and duality gap
 *
 * ## Usage
 * ```typescript
 * import { runBasisPursuit, formatReport } from 'l1-pursuit/tasks';
 *
 * const { report } = runBasisPursuit({ seed: 42 });
 * console.log(formatReport(report));
 * ```
 */

export * from './config';
export * from './scenario';
export * from './report';
export { runBasisPursuit, type BasisPursuitRunResult } from './task';
