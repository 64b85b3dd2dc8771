/**
 * @module tasks/basis-pursuit/task
 * @description End-to-end basis pursuit run: generate an instance, solve it
 * from the zero vector, log progress and summarize.
 *
 * ## Usage
 * ```typescript
 * import { runBasisPursuit } from 'l1-pursuit/tasks';
 *
 * const { report } = runBasisPursuit({ seed: 7, rows: 10, cols: 40, plant: 'sparse', sparsity: 3 });
 * console.log(report.bestObjective, report.dualityGap);
 * ```
 */

import { ValidationError } from '../../core/errors';
import { MultiLogger, progressToLogger, type Logger } from '../../core/logging';
import { computeConfigHash } from '../../core/repro';
import { zeros } from '../../models/numeric/math/linear-algebra';
import { createAffineProjector } from '../../models/numeric/optimization/projection';
import { projectedSubgradient, subgradientStatusName } from '../../models/numeric/optimization/subgradient';
import type { BasisPursuitProblem, SubgradientResult } from '../../models/numeric/optimization/types';
import { DEFAULT_RUN_CONFIG, validateRunConfig, type BasisPursuitRunConfig } from './config';
import { summarizeRun, type RunReport } from './report';
import { generateProblem } from './scenario';

// ==================== Types ====================

export interface BasisPursuitRunResult {
    config: BasisPursuitRunConfig;
    /** Hash of the resolved config without `logLevel`, for tagging stored runs */
    configHash: string;
    /** Warnings from config validation */
    warnings: string[];
    problem: BasisPursuitProblem;
    planted: number[];
    result: SubgradientResult;
    report: RunReport;
}

// ==================== Main Function ====================

/**
 * Run one basis pursuit experiment
 *
 * @param runConfig Overrides for DEFAULT_RUN_CONFIG
 * @param logger Receives progress and the run summary; nothing is logged when omitted
 * @throws ValidationError if the resolved configuration is invalid
 * @throws NumericalError if the generated A is numerically rank deficient
 */
export function runBasisPursuit(
    runConfig: Partial<BasisPursuitRunConfig> = {},
    logger: Logger = new MultiLogger([])
): BasisPursuitRunResult {
    const config: BasisPursuitRunConfig = { ...DEFAULT_RUN_CONFIG, ...runConfig };

    const validation = validateRunConfig(config);
    if (!validation.valid) {
        throw new ValidationError(
            `Invalid basis pursuit configuration: ${validation.errors.join('; ')}`,
            validation.errors
        );
    }

    const { problem, planted } = generateProblem(config);
    const projector = createAffineProjector(problem);

    const result = projectedSubgradient(
        zeros(config.cols),
        problem.A,
        problem.b,
        {
            maxIterations: config.maxIterations,
            tolerance: config.tolerance,
            progressInterval: config.progressInterval,
            onProgress: progressToLogger(logger),
        },
        projector.factor
    );

    const report = summarizeRun(problem, result, projector.factor, planted);

    logger.logRun({
        run: 0,
        status: subgradientStatusName(result.status),
        iterations: result.iterations,
        bestObjective: result.objective,
        residual: report.residual,
        dualityGap: report.dualityGap,
        config: { ...config },
    });
    logger.flush();

    return {
        config,
        // Console verbosity does not change the run
        configHash: computeConfigHash({ ...config, logLevel: undefined }),
        warnings: validation.warnings,
        problem,
        planted,
        result,
        report,
    };
}
