/**
 * @module math/linear-algebra
 * @description Lightweight dense linear algebra for the projected subgradient solver.
 * Vectors are plain `number[]`, matrices are row-major `number[][]`.
 * No function here mutates its arguments.
 */

// ==================== Vector Operations ====================

/**
 * Compute the dot product of two vectors
 */
export function dot(a: number[], b: number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        sum += a[i] * b[i];
    }
    return sum;
}

/**
 * Compute the Euclidean norm (L2 norm) of a vector
 */
export function norm(v: number[]): number {
    return Math.sqrt(squaredNorm(v));
}

/**
 * Compute the squared Euclidean norm of a vector
 */
export function squaredNorm(v: number[]): number {
    let sum = 0;
    for (let i = 0; i < v.length; i++) {
        sum += v[i] * v[i];
    }
    return sum;
}

/**
 * Compute the L1 norm (sum of absolute values) of a vector
 */
export function l1Norm(v: number[]): number {
    let sum = 0;
    for (let i = 0; i < v.length; i++) {
        sum += Math.abs(v[i]);
    }
    return sum;
}

/**
 * Compute the infinity norm (max absolute value) of a vector
 */
export function infNorm(v: number[]): number {
    let maxVal = 0;
    for (let i = 0; i < v.length; i++) {
        const absVal = Math.abs(v[i]);
        if (absVal > maxVal) maxVal = absVal;
    }
    return maxVal;
}

/**
 * Infinity-norm distance ‖a - b‖∞ without allocating the difference
 */
export function infDistance(a: number[], b: number[]): number {
    let maxVal = 0;
    for (let i = 0; i < a.length; i++) {
        const absVal = Math.abs(a[i] - b[i]);
        if (absVal > maxVal) maxVal = absVal;
    }
    return maxVal;
}

/**
 * Add two vectors: a + b
 */
export function add(a: number[], b: number[]): number[] {
    const result: number[] = new Array(a.length);
    for (let i = 0; i < a.length; i++) {
        result[i] = a[i] + b[i];
    }
    return result;
}

/**
 * Subtract two vectors: a - b
 */
export function subtract(a: number[], b: number[]): number[] {
    const result: number[] = new Array(a.length);
    for (let i = 0; i < a.length; i++) {
        result[i] = a[i] - b[i];
    }
    return result;
}

/**
 * Scale a vector by a scalar: s * v
 */
export function scale(v: number[], s: number): number[] {
    const result: number[] = new Array(v.length);
    for (let i = 0; i < v.length; i++) {
        result[i] = v[i] * s;
    }
    return result;
}

/**
 * Linear combination: a + s * b
 */
export function axpy(a: number[], s: number, b: number[]): number[] {
    const result: number[] = new Array(a.length);
    for (let i = 0; i < a.length; i++) {
        result[i] = a[i] + s * b[i];
    }
    return result;
}

/**
 * Create a copy of a vector
 */
export function copyVector(v: number[]): number[] {
    return [...v];
}

/**
 * Create a zero vector of given size
 */
export function zeros(n: number): number[] {
    return new Array<number>(n).fill(0);
}

/**
 * Create a vector of given size filled with ones
 */
export function ones(n: number): number[] {
    return new Array<number>(n).fill(1);
}

/**
 * Sign of a scalar with sign(0) = 0.
 *
 * Math.sign would map -0 to -0; this returns a plain 0 so the subgradient
 * at a zero coordinate is exactly zero.
 */
export function sign(x: number): number {
    if (x > 0) return 1;
    if (x < 0) return -1;
    return 0;
}

/**
 * Element-wise sign, the canonical subgradient of ‖·‖₁
 */
export function signVector(v: number[]): number[] {
    const result: number[] = new Array(v.length);
    for (let i = 0; i < v.length; i++) {
        result[i] = sign(v[i]);
    }
    return result;
}

/**
 * Check that every entry is a finite number
 */
export function isFiniteVector(v: number[]): boolean {
    for (let i = 0; i < v.length; i++) {
        if (!Number.isFinite(v[i])) return false;
    }
    return true;
}

// ==================== Matrix Operations ====================

/**
 * Create a 2D array (matrix) filled with zeros
 */
export function zerosMatrix(rows: number, cols: number): number[][] {
    const result: number[][] = [];
    for (let i = 0; i < rows; i++) {
        result.push(new Array<number>(cols).fill(0));
    }
    return result;
}

/**
 * Matrix-vector multiplication: M · v
 */
export function mulMatVec(M: number[][], v: number[]): number[] {
    const rows = M.length;
    const result: number[] = new Array<number>(rows).fill(0);
    for (let i = 0; i < rows; i++) {
        const row = M[i];
        let sum = 0;
        for (let j = 0; j < v.length; j++) {
            sum += row[j] * v[j];
        }
        result[i] = sum;
    }
    return result;
}

/**
 * Transposed matrix-vector multiplication: Mᵗ · v
 *
 * Walks M row by row, so the transpose is never materialized.
 */
export function mulMatTransposeVec(M: number[][], v: number[]): number[] {
    const cols = M.length > 0 ? M[0].length : 0;
    const result: number[] = new Array<number>(cols).fill(0);
    for (let i = 0; i < M.length; i++) {
        const row = M[i];
        const vi = v[i];
        if (vi === 0) continue;
        for (let j = 0; j < cols; j++) {
            result[j] += row[j] * vi;
        }
    }
    return result;
}

/**
 * Transpose a general matrix
 */
export function transpose(M: number[][]): number[][] {
    const rows = M.length;
    const cols = rows > 0 ? M[0].length : 0;
    const result = zerosMatrix(cols, rows);
    for (let i = 0; i < rows; i++) {
        for (let j = 0; j < cols; j++) {
            result[j][i] = M[i][j];
        }
    }
    return result;
}

/**
 * Gram matrix of the rows of M: M · Mᵗ (symmetric, rows × rows)
 */
export function gramMatrix(M: number[][]): number[][] {
    const rows = M.length;
    const G = zerosMatrix(rows, rows);
    for (let i = 0; i < rows; i++) {
        for (let j = 0; j <= i; j++) {
            const value = dot(M[i], M[j]);
            G[i][j] = value;
            G[j][i] = value;
        }
    }
    return G;
}
