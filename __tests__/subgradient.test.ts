/**
 * Projected Subgradient Tests
 * Tests for the basis pursuit optimizer loop, its parameters and its statuses
 */

import { describe, it, expect } from 'vitest';
import {
    projectedSubgradient,
    minimizeL1,
    createSubgradientParameters,
    stepSize,
    l1Subgradient,
    subgradientStatusName,
    subgradientStatusMessage,
    factorizeGram,
    SubgradientStatus,
    DEFAULT_SUBGRADIENT_CONFIG,
} from '../src/models/numeric/optimization';
import {
    ErrorCodes,
    InvalidInputError,
    NumericalError,
    ValidationError,
} from '../src/core/errors';
import { arraysClose, isClose, maxResidual } from './test-utils';

// A = [2 0], b = 2: feasible set is x₀ = 1, AAᵗ = 4 factors exactly,
// so every iterate below is exact in floating point.
const A_EXACT = [[2, 0]];
const B_EXACT = [2];

describe('Building Blocks', () => {
    it('should use the diminishing step 1/(1+k)', () => {
        expect(stepSize(0)).toBe(1);
        expect(stepSize(3)).toBe(0.25);
    });

    it('should take sign(0) = 0 in the l1 subgradient', () => {
        expect(l1Subgradient([2, -0, -3, 0])).toEqual([1, 0, -1, 0]);
    });
});

describe('Subgradient Parameters', () => {
    it('should fall back to the defaults', () => {
        expect(createSubgradientParameters()).toEqual(DEFAULT_SUBGRADIENT_CONFIG);
        expect(DEFAULT_SUBGRADIENT_CONFIG.maxIterations).toBe(1_000_000);
        expect(DEFAULT_SUBGRADIENT_CONFIG.tolerance).toBe(1e-6);
    });

    it('should merge overrides', () => {
        const p = createSubgradientParameters({ maxIterations: 10, progressInterval: 2 });
        expect(p.maxIterations).toBe(10);
        expect(p.tolerance).toBe(1e-6);
        expect(p.progressInterval).toBe(2);
    });

    it('should accept a zero tolerance', () => {
        expect(createSubgradientParameters({ tolerance: 0 }).tolerance).toBe(0);
    });

    it('should list every invalid option', () => {
        try {
            createSubgradientParameters({ maxIterations: 0, tolerance: -1, progressInterval: 1.5 });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ValidationError);
            if (error instanceof ValidationError) {
                expect(error.code).toBe(ErrorCodes.INVALID_CONFIG);
                expect(error.errors).toEqual([
                    'maxIterations must be a positive integer, got 0',
                    'tolerance must be a finite non-negative number, got -1',
                    'progressInterval must be a positive integer, got 1.5',
                ]);
            }
        }
    });

    it('should reject a non-finite tolerance', () => {
        expect(() => createSubgradientParameters({ tolerance: NaN })).toThrow(ValidationError);
        expect(() => createSubgradientParameters({ tolerance: Infinity })).toThrow(ValidationError);
    });
});

describe('projectedSubgradient', () => {
    it('should project the first step from zero onto the feasible set', () => {
        const result = projectedSubgradient([0, 0], A_EXACT, B_EXACT);
        // k=0: g = 0, x₁ = P(0) = [1, 0]; k=1: g = [1, 0], y = [0.5, 0], P(y) = [1, 0]
        expect(result.status).toBe(SubgradientStatus.CONVERGED);
        expect(result.iterations).toBe(2);
        expect(result.objectiveHistory).toEqual([1, 1]);
        expect(result.solution).toEqual([1, 0]);
        expect(result.objective).toBe(1);
    });

    it('should solve the two-variable example', () => {
        const result = projectedSubgradient([0, 0], [[1, 1]], [1]);
        expect(result.status).toBe(SubgradientStatus.CONVERGED);
        expect(result.iterations).toBe(2);
        expect(result.objectiveHistory).toHaveLength(2);
        expect(result.objective).toBeCloseTo(1, 12);
        expect(arraysClose(result.solution, [0.5, 0.5], 1e-12, 1e-12)).toBe(true);
    });

    it('should stop after one iteration from an optimal feasible start', () => {
        const result = projectedSubgradient([1, 0], A_EXACT, B_EXACT);
        expect(result.status).toBe(SubgradientStatus.CONVERGED);
        expect(result.iterations).toBe(1);
        expect(result.objectiveHistory).toEqual([1]);
        expect(result.solution).toEqual([1, 0]);
    });

    it('should return the earliest iterate on an objective tie', () => {
        // x₁ = [1, -0.25] and x₂ = [1, 0.25] both have ‖x‖₁ = 1.25
        const result = projectedSubgradient([1, 0.75], A_EXACT, B_EXACT, {
            maxIterations: 2,
            tolerance: 0,
        });
        expect(result.status).toBe(SubgradientStatus.ITERATION_LIMIT);
        expect(result.iterations).toBe(2);
        expect(result.objectiveHistory).toEqual([1.25, 1.25]);
        expect(result.solution).toEqual([1, -0.25]);
        expect(result.objective).toBe(1.25);
    });

    it('should stop at the iteration limit with the best iterate', () => {
        const result = projectedSubgradient([0, 0], [[1, 2]], [2], {
            maxIterations: 3,
            tolerance: 0,
        });
        expect(result.status).toBe(SubgradientStatus.ITERATION_LIMIT);
        expect(result.iterations).toBe(3);
        expect(result.objectiveHistory).toHaveLength(3);
        expect(result.objectiveHistory[0]).toBeCloseTo(1.2, 12);
        expect(result.objectiveHistory[1]).toBeCloseTo(1.1, 12);
        expect(result.objectiveHistory[2]).toBeCloseTo(31 / 30, 12);
        expect(result.objective).toBeCloseTo(31 / 30, 12);
        expect(arraysClose(result.solution, [1 / 15, 29 / 30], 1e-10, 1e-12)).toBe(true);
    });

    it('should run a single iteration when maxIterations is 1', () => {
        const result = projectedSubgradient([1, 0.75], A_EXACT, B_EXACT, { maxIterations: 1 });
        expect(result.status).toBe(SubgradientStatus.ITERATION_LIMIT);
        expect(result.iterations).toBe(1);
        expect(result.objectiveHistory).toEqual([1.25]);
        expect(result.solution).toEqual([1, -0.25]);
    });

    it('should approach the l1 minimum of x + 2y = 2', () => {
        const result = projectedSubgradient([0, 0], [[1, 2]], [2], {
            maxIterations: 1000,
            tolerance: 1e-3,
        });
        // A step of 0.4·αk stays near 1e-3 or above until k + 1 reaches 400
        expect(result.status).toBe(SubgradientStatus.CONVERGED);
        expect(result.iterations).toBeGreaterThanOrEqual(400);
        expect(result.iterations).toBeLessThan(1000);
        expect(Math.abs(result.objective - 1)).toBeLessThan(1e-2);
        expect(maxResidual([[1, 2]], result.solution, [2])).toBeLessThan(1e-12);
    });

    it('should run to the ceiling when the tolerance is 0', () => {
        const result = projectedSubgradient([1, 0], A_EXACT, B_EXACT, {
            maxIterations: 5,
            tolerance: 0,
        });
        expect(result.status).toBe(SubgradientStatus.ITERATION_LIMIT);
        expect(result.iterations).toBe(5);
        expect(result.objectiveHistory).toEqual([1, 1, 1, 1, 1]);
    });

    it('should keep the history length equal to the iteration count', () => {
        const result = projectedSubgradient([0, 0, 0], [[1, 2, 3]], [6], { maxIterations: 50 });
        expect(result.objectiveHistory).toHaveLength(result.iterations);
        expect(result.objective).toBe(Math.min(...result.objectiveHistory));
    });

    it('should not modify x0', () => {
        const x0 = [1, 0.75];
        projectedSubgradient(x0, A_EXACT, B_EXACT, { maxIterations: 3 });
        expect(x0).toEqual([1, 0.75]);
    });

    it('should accept a precomputed factor', () => {
        const factor = factorizeGram([[1, 2]]);
        const withFactor = projectedSubgradient([0, 0], [[1, 2]], [2], { maxIterations: 20 }, factor);
        const without = projectedSubgradient([0, 0], [[1, 2]], [2], { maxIterations: 20 });
        expect(withFactor.objectiveHistory).toEqual(without.objectiveHistory);
        expect(withFactor.solution).toEqual(without.solution);
    });

    it('should reject a factor of the wrong size', () => {
        const factor = factorizeGram([[1, 0, 0], [0, 1, 0]]);
        expect(() => projectedSubgradient([0, 0], A_EXACT, B_EXACT, undefined, factor))
            .toThrow(InvalidInputError);
    });

    describe('Progress', () => {
        it('should report every progressInterval iterations', () => {
            const calls: Array<[number, number]> = [];
            projectedSubgradient([1, 0], A_EXACT, B_EXACT, {
                maxIterations: 10,
                tolerance: 0,
                progressInterval: 3,
                onProgress: (iteration, objective) => calls.push([iteration, objective]),
            });
            expect(calls).toEqual([[3, 1], [6, 1], [9, 1]]);
        });

        it('should not report without an interval', () => {
            const calls: number[] = [];
            projectedSubgradient([1, 0], A_EXACT, B_EXACT, {
                maxIterations: 10,
                tolerance: 0,
                onProgress: (iteration) => calls.push(iteration),
            });
            expect(calls).toEqual([]);
        });

        it('should not change the result', () => {
            const quiet = projectedSubgradient([0, 0], [[1, 2]], [2], { maxIterations: 30 });
            const observed = projectedSubgradient([0, 0], [[1, 2]], [2], {
                maxIterations: 30,
                progressInterval: 1,
                onProgress: () => undefined,
            });
            expect(observed).toEqual(quiet);
        });
    });

    describe('Cancellation', () => {
        it('should return x0 when cancelled before the first iteration', () => {
            const result = projectedSubgradient([1, 0.75], A_EXACT, B_EXACT, {
                isCancelled: () => true,
            });
            expect(result.status).toBe(SubgradientStatus.CANCELED);
            expect(result.iterations).toBe(0);
            expect(result.objectiveHistory).toEqual([]);
            expect(result.solution).toEqual([1, 0.75]);
            expect(result.objective).toBe(Infinity);
        });

        it('should stop between iterations', () => {
            let checks = 0;
            const result = projectedSubgradient([1, 0.75], A_EXACT, B_EXACT, {
                tolerance: 0,
                isCancelled: () => ++checks > 2,
            });
            expect(result.status).toBe(SubgradientStatus.CANCELED);
            expect(result.iterations).toBe(2);
            expect(result.objectiveHistory).toEqual([1.25, 1.25]);
            expect(checks).toBe(3);
        });
    });

    describe('Errors', () => {
        it('should reject an overdetermined or square system', () => {
            expect(() => projectedSubgradient([0, 0], [[1, 0], [0, 1]], [1, 1]))
                .toThrow('System must be underdetermined: A is 2x2');
        });

        it('should reject an empty matrix', () => {
            expect(() => projectedSubgradient([], [], [])).toThrow(InvalidInputError);
            expect(() => projectedSubgradient([], [[]], [0])).toThrow(InvalidInputError);
        });

        it('should reject a ragged matrix', () => {
            expect(() => projectedSubgradient([0, 0, 0], [[1, 2, 3], [1, 2]], [1, 1]))
                .toThrow('Row 1 of A has length 2, expected 3');
        });

        it('should reject mismatched b and x0 lengths', () => {
            expect(() => projectedSubgradient([0, 0], A_EXACT, [1, 2]))
                .toThrow('b has length 2, expected 1');
            expect(() => projectedSubgradient([0, 0, 0], A_EXACT, B_EXACT))
                .toThrow('x0 has length 3, expected 2');
        });

        it('should reject non-finite input', () => {
            expect(() => projectedSubgradient([0, 0], [[NaN, 1]], [1])).toThrow(InvalidInputError);
            expect(() => projectedSubgradient([0, 0], A_EXACT, [Infinity])).toThrow(InvalidInputError);
            expect(() => projectedSubgradient([0, NaN], A_EXACT, B_EXACT)).toThrow(InvalidInputError);
        });

        it('should check input before configuration', () => {
            expect(() => projectedSubgradient([0], A_EXACT, B_EXACT, { maxIterations: 0 }))
                .toThrow(InvalidInputError);
        });

        it('should reject a rank-deficient matrix', () => {
            try {
                projectedSubgradient([0, 0, 0], [[1, 2, 3], [2, 4, 6]], [1, 2]);
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(NumericalError);
                if (error instanceof NumericalError) {
                    expect(error.code).toBe(ErrorCodes.NUMERICAL_ERROR);
                    expect(error.message).toMatch(/^Gram matrix AAᵗ is not positive definite/);
                }
            }
        });

        it('should fail when the objective overflows', () => {
            // Feasible start whose l1 norm exceeds the largest double
            try {
                projectedSubgradient([1.5e308, 0.5e308], [[1, -1]], [1e308]);
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(NumericalError);
                if (error instanceof NumericalError) {
                    expect(error.code).toBe(ErrorCodes.NON_FINITE_ITERATE);
                    expect(error.details).toEqual({ iteration: 0, objective: Infinity });
                }
            }
        });
    });
});

describe('minimizeL1', () => {
    it('should start from zero by default', () => {
        const result = minimizeL1({ A: A_EXACT, b: B_EXACT });
        expect(result.solution).toEqual([1, 0]);
        expect(result.iterations).toBe(2);
    });

    it('should take a starting point and configuration', () => {
        const result = minimizeL1({ A: A_EXACT, b: B_EXACT }, { maxIterations: 1 }, [1, 0.75]);
        expect(result.objectiveHistory).toEqual([1.25]);
    });

    it('should stay within n on a planted all-ones instance', () => {
        const A = [
            [1, 0, 0.5, -1],
            [0, 1, 2, 0.25],
        ];
        const b = [0.5, 3.25];
        const result = minimizeL1({ A, b }, { maxIterations: 2000 });
        expect(result.objective).toBeLessThanOrEqual(4);
        expect(maxResidual(A, result.solution, b)).toBeLessThan(1e-10);
        expect(isClose(result.objective, Math.min(...result.objectiveHistory))).toBe(true);
    });
});

describe('Status Helpers', () => {
    it('should name every status', () => {
        expect(subgradientStatusName(SubgradientStatus.CONVERGED)).toBe('CONVERGED');
        expect(subgradientStatusName(SubgradientStatus.ITERATION_LIMIT)).toBe('ITERATION_LIMIT');
        expect(subgradientStatusName(SubgradientStatus.CANCELED)).toBe('CANCELED');
    });

    it('should keep the numeric codes stable', () => {
        expect(SubgradientStatus.CONVERGED).toBe(0);
        expect(SubgradientStatus.ITERATION_LIMIT).toBe(1);
        expect(SubgradientStatus.CANCELED).toBe(2);
    });

    it('should describe every status', () => {
        expect(subgradientStatusMessage(SubgradientStatus.CONVERGED))
            .toBe('Stopped: successive iterates stalled below tolerance.');
        expect(subgradientStatusMessage(SubgradientStatus.ITERATION_LIMIT))
            .toBe('Stopped: maximum iterations reached; returning best iterate.');
        expect(subgradientStatusMessage(SubgradientStatus.CANCELED)).toBe('Canceled by caller.');
    });
});
