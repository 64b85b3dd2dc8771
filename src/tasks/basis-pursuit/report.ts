/**
 * @module tasks/basis-pursuit/report
 * @description Report generation for basis pursuit runs
 */

import type { CholeskyFactor } from '../../models/numeric/math/cholesky';
import { infDistance } from '../../models/numeric/math/linear-algebra';
import { dualCertificate, supportOf } from '../../models/numeric/optimization/certificate';
import { constraintResidual } from '../../models/numeric/optimization/problem';
import { subgradientStatusMessage, subgradientStatusName } from '../../models/numeric/optimization/subgradient';
import type {
    BasisPursuitProblem,
    SubgradientResult,
    SubgradientStatusName,
} from '../../models/numeric/optimization/types';

// ==================== Types ====================

/**
 * Summary statistics of the objective history
 */
export interface HistoryStats {
    mean: number;
    std: number;
    min: number;
    max: number;
}

/**
 * Run report
 */
export interface RunReport {
    /** Number of constraints */
    rows: number;
    /** Number of unknowns */
    cols: number;
    /** Terminal status name */
    status: SubgradientStatusName;
    statusMessage: string;
    iterations: number;
    /** ‖x_best‖₁ */
    bestObjective: number;
    /** Objective of the last iterate */
    finalObjective: number;
    history: HistoryStats;
    /** ‖A·x_best − b‖₂ */
    residual: number;
    /** Entries of x_best above SUPPORT_THRESHOLD */
    supportSize: number;
    /** ‖x_best − x_true‖∞, when the planted vector is known */
    recoveryError?: number;
    /** bᵗν for the dual-feasible ν built from x_best */
    lowerBound: number;
    /** ‖x_best‖₁ − lowerBound */
    dualityGap: number;
}

// ==================== Report Generation ====================

/**
 * Calculate summary statistics; all zero for an empty history
 */
export function historyStats(values: number[]): HistoryStats {
    if (values.length === 0) return { mean: 0, std: 0, min: 0, max: 0 };
    let min = Infinity;
    let max = -Infinity;
    let sum = 0;
    for (const v of values) {
        sum += v;
        if (v < min) min = v;
        if (v > max) max = v;
    }
    const mean = sum / values.length;
    const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / values.length;
    return { mean, std: Math.sqrt(variance), min, max };
}

/**
 * Summarize a finished run
 *
 * @param factor Factor of AAᵗ used for the duality certificate
 * @param planted x_true, when the instance was generated from one
 */
export function summarizeRun(
    problem: BasisPursuitProblem,
    result: SubgradientResult,
    factor: CholeskyFactor,
    planted?: number[]
): RunReport {
    const { A, b } = problem;
    const x = result.solution;
    const history = result.objectiveHistory;
    const certificate = dualCertificate(x, A, b, factor);

    return {
        rows: A.length,
        cols: x.length,
        status: subgradientStatusName(result.status),
        statusMessage: subgradientStatusMessage(result.status),
        iterations: result.iterations,
        bestObjective: result.objective,
        finalObjective: history.length > 0 ? history[history.length - 1] : result.objective,
        history: historyStats(history),
        residual: constraintResidual(x, A, b),
        supportSize: supportOf(x).length,
        recoveryError: planted ? infDistance(x, planted) : undefined,
        lowerBound: certificate.lowerBound,
        dualityGap: certificate.gap,
    };
}

/**
 * Format a report as a fixed multi-line text block
 */
export function formatReport(report: RunReport): string {
    const lines = [
        `Basis pursuit ${report.rows}x${report.cols}`,
        `  status:         ${report.status}`,
        `  iterations:     ${report.iterations}`,
        `  best l1 norm:   ${report.bestObjective.toFixed(6)}`,
        `  final l1 norm:  ${report.finalObjective.toFixed(6)}`,
        `  residual:       ${report.residual.toExponential(2)}`,
        `  support size:   ${report.supportSize}/${report.cols}`,
    ];
    if (report.recoveryError !== undefined) {
        lines.push(`  recovery error: ${report.recoveryError.toExponential(2)}`);
    }
    lines.push(
        `  lower bound:    ${report.lowerBound.toFixed(6)}`,
        `  duality gap:    ${report.dualityGap.toExponential(2)}`,
    );
    return lines.join('\n');
}
