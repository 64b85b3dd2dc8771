/**
 * @module core/repro
 * @description Reproducibility helpers for solver experiments
 *
 * Seeded random numbers for instance generation, and a stable hash of a run
 * configuration for tagging logged runs.
 */

// ==================== Types ====================

/**
 * Validation result for a configuration
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

// ==================== Serialization ====================

function canonicalize(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(canonicalize);
    }
    if (value === null || typeof value !== 'object') {
        return value;
    }

    const keys = Object.keys(value).sort();
    const out: Record<string, unknown> = {};
    for (const key of keys) {
        const entry: unknown = Reflect.get(value, key);
        if (entry === undefined || typeof entry === 'function') continue;
        out[key] = canonicalize(entry);
    }
    return out;
}

/**
 * Serialize a configuration to canonical JSON: keys sorted at every depth,
 * functions and undefined values dropped
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(canonicalize(value));
}

// ==================== Hash ====================

/** djb2-xor over the UTF-16 code units, starting from `seed` */
function djb2(text: string, seed: number): number {
    let hash = seed >>> 0;
    for (let i = 0; i < text.length; i++) {
        hash = (Math.imul(hash, 33) ^ text.charCodeAt(i)) >>> 0;
    }
    return hash;
}

const HASH_ROUNDS = 4;

/**
 * 32-hex-digit hash of a configuration. Key order does not affect the result.
 *
 * Not cryptographic; only meant to tell stored runs apart.
 */
export function computeConfigHash(config: object): string {
    const text = canonicalJson(config);
    let digest = '';
    let state = 5381;
    for (let round = 0; round < HASH_ROUNDS; round++) {
        state = djb2(text, state + round);
        digest += state.toString(16).padStart(8, '0');
    }
    return digest;
}

// ==================== Seeded Random ====================

/**
 * Seeded random number generator (Mulberry32 core, Box-Muller normals).
 *
 * Instance generation draws from this instead of Math.random() so that a
 * seed fully determines A and the planted vector.
 */
export class SeededRandom {
    private state: number;
    /** Second Box-Muller draw, handed out on the next normal() call */
    private spare: number | null = null;

    constructor(seed: number) {
        this.state = seed >>> 0;
    }

    /** Uniform float in [0, 1) */
    random(): number {
        this.state = (this.state + 0x6D2B79F5) >>> 0;
        let t = Math.imul(this.state ^ (this.state >>> 15), this.state | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
    }

    /** Uniform integer in [min, max) */
    randint(min: number, max: number): number {
        return min + Math.floor(this.random() * (max - min));
    }

    /** Uniform float in [min, max) */
    uniform(min: number, max: number): number {
        return min + this.random() * (max - min);
    }

    /**
     * Normal sample. Draws come in Box-Muller pairs; the sine half is kept
     * for the following call.
     */
    normal(mean: number = 0, std: number = 1): number {
        if (this.spare !== null) {
            const z = this.spare;
            this.spare = null;
            return mean + std * z;
        }
        // 1 - u keeps the log argument in (0, 1]
        const radius = Math.sqrt(-2 * Math.log(1 - this.random()));
        const angle = 2 * Math.PI * this.random();
        this.spare = radius * Math.sin(angle);
        return mean + std * radius * Math.cos(angle);
    }

    /** Fisher-Yates shuffle, in place */
    shuffle<T>(array: T[]): T[] {
        for (let i = array.length - 1; i > 0; i--) {
            const j = this.randint(0, i + 1);
            const tmp = array[i];
            array[i] = array[j];
            array[j] = tmp;
        }
        return array;
    }

    /**
     * n distinct elements chosen uniformly, in draw order.
     * Partial Fisher-Yates on a copy; the input is left untouched.
     */
    sample<T>(array: T[], n: number): T[] {
        const pool = [...array];
        const count = Math.min(n, pool.length);
        for (let i = 0; i < count; i++) {
            const j = this.randint(i, pool.length);
            const tmp = pool[i];
            pool[i] = pool[j];
            pool[j] = tmp;
        }
        return pool.slice(0, count);
    }

    /** Generator state, for saving and restoring */
    getState(): number {
        return this.state;
    }

    /** Restore a saved state; drops any pending normal draw */
    setState(state: number): void {
        this.state = state >>> 0;
        this.spare = null;
    }
}

/**
 * Create a seeded random number generator
 */
export function createRng(seed: number): SeededRandom {
    return new SeededRandom(seed);
}
