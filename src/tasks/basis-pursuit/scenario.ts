/**
 * @module tasks/basis-pursuit/scenario
 * @description Random basis pursuit instances with a planted feasible point
 */

import { createRng } from '../../core/repro';
import { mulMatVec, ones, zeros } from '../../models/numeric/math/linear-algebra';
import type { BasisPursuitProblem } from '../../models/numeric/optimization/types';
import type { BasisPursuitRunConfig } from './config';

// ==================== Types ====================

/**
 * Generated instance and the vector it was built from
 */
export interface GeneratedProblem {
    problem: BasisPursuitProblem;
    /** x_true with A·x_true = b */
    planted: number[];
}

export type ScenarioConfig = Pick<BasisPursuitRunConfig, 'seed' | 'rows' | 'cols' | 'plant' | 'sparsity'>;

// ==================== Generation ====================

/**
 * Draw A with i.i.d. N(0,1) entries, plant x_true and set b = A·x_true.
 *
 * A Gaussian A has full row rank with probability one. The same seed always
 * yields the same instance.
 */
export function generateProblem(config: ScenarioConfig): GeneratedProblem {
    const rng = createRng(config.seed);

    const A: number[][] = [];
    for (let i = 0; i < config.rows; i++) {
        const row: number[] = new Array(config.cols);
        for (let j = 0; j < config.cols; j++) {
            row[j] = rng.normal();
        }
        A.push(row);
    }

    let planted: number[];
    if (config.plant === 'ones') {
        planted = ones(config.cols);
    } else {
        planted = zeros(config.cols);
        const indices = Array.from({ length: config.cols }, (_, j) => j);
        for (const j of rng.sample(indices, config.sparsity)) {
            planted[j] = rng.normal();
        }
    }

    return {
        problem: { A, b: mulMatVec(A, planted) },
        planted,
    };
}
