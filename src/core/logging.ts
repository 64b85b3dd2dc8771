/**
 * @module core/logging
 * @description Structured logging for solver runs
 *
 * Entries follow fixed field schemas (versioned, append-only): one entry per
 * reported iteration and one summary entry per run. The numerical core never
 * logs; a Logger is attached to it through `progressToLogger`.
 */

// ==================== Types ====================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Fields stamped on every entry by the logger itself
 */
export interface BaseLogEntry {
    /** Entry schema version */
    schemaVersion: string;
    /** Task that produced the run */
    task: string;
    /** Seed the instance was generated from */
    seed: number;
    /** Milliseconds since the epoch */
    timestamp: number;
}

/**
 * One reported optimizer iteration
 */
export interface IterationLogEntry extends BaseLogEntry {
    logType: 'iteration';
    run: number;
    /** Completed iterations (1-based) */
    iteration: number;
    objective: number;
    /**
     * Lowest objective among the reported iterations so far. Iterations
     * between reports are not seen, so this can sit above the optimizer's
     * running best; the run entry carries that one.
     */
    bestReportedObjective: number;
}

/**
 * Summary of a finished run
 */
export interface RunLogEntry extends BaseLogEntry {
    logType: 'run';
    run: number;
    status: string;
    iterations: number;
    bestObjective: number;
    /** ‖A·x − b‖₂ at the returned solution */
    residual: number;
    dualityGap: number;
    config?: Record<string, unknown>;
}

export type LogEntry = IterationLogEntry | RunLogEntry;

type EntryInput<T extends LogEntry> = Omit<T, keyof BaseLogEntry | 'logType'>;

export type IterationLogInput = EntryInput<IterationLogEntry>;
export type RunLogInput = EntryInput<RunLogEntry>;

export interface Logger {
    logIteration(entry: IterationLogInput): void;
    logRun(entry: RunLogInput): void;
    /** Flush pending writes */
    flush(): void;
    close(): void;
}

export interface LoggerConfig {
    task: string;
    seed: number;
    /** Defaults to DEFAULT_SCHEMA_VERSION */
    schemaVersion?: string;
    /** Console verbosity (ConsoleLogger only), 'info' by default */
    level?: LogLevel;
}

// ==================== Constants ====================

export const DEFAULT_SCHEMA_VERSION = '1.0.0';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

function stamp(config: LoggerConfig): BaseLogEntry {
    return {
        schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
        task: config.task,
        seed: config.seed,
        timestamp: Date.now(),
    };
}

// ==================== Console Logger ====================

/**
 * Prints one line per entry. Iteration lines need level 'info' or lower,
 * run summaries anything below 'error'.
 */
export class ConsoleLogger implements Logger {
    private readonly config: LoggerConfig;
    private readonly rank: number;

    constructor(config: LoggerConfig) {
        this.config = config;
        this.rank = LEVEL_RANK[config.level ?? 'info'];
    }

    logIteration(entry: IterationLogInput): void {
        if (this.rank > LEVEL_RANK.info) return;
        console.log(
            `[ITER] ${this.config.task} R${entry.run} K${entry.iteration}: ` +
            `f=${entry.objective.toFixed(6)}, reported best=${entry.bestReportedObjective.toFixed(6)}`
        );
    }

    logRun(entry: RunLogInput): void {
        if (this.rank > LEVEL_RANK.warn) return;
        console.log(
            `[RUN] ${this.config.task} R${entry.run} seed=${this.config.seed}: ` +
            `status=${entry.status}, iterations=${entry.iterations}, ` +
            `best=${entry.bestObjective.toFixed(6)}, residual=${entry.residual.toExponential(2)}, ` +
            `gap=${entry.dualityGap.toExponential(2)}`
        );
    }

    flush(): void { /* console writes are unbuffered */ }
    close(): void { /* nothing to release */ }
}

// ==================== Memory Logger ====================

/**
 * Keeps every entry in memory, for tests and for callers that plot the
 * history afterwards
 */
export class MemoryLogger implements Logger {
    private readonly config: LoggerConfig;
    public iterations: IterationLogEntry[] = [];
    public runs: RunLogEntry[] = [];

    constructor(config: LoggerConfig) {
        this.config = config;
    }

    logIteration(entry: IterationLogInput): void {
        this.iterations.push({ ...stamp(this.config), logType: 'iteration', ...entry });
    }

    logRun(entry: RunLogInput): void {
        this.runs.push({ ...stamp(this.config), logType: 'run', ...entry });
    }

    /** Iteration entries first, then run summaries */
    getAllLogs(): LogEntry[] {
        return [...this.iterations, ...this.runs];
    }

    toJSON(): string {
        return JSON.stringify({ iterations: this.iterations, runs: this.runs }, null, 2);
    }

    /** One entry per line */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.iterations = [];
        this.runs = [];
    }

    flush(): void { /* entries are already stored */ }
    close(): void { /* entries stay readable after close */ }
}

// ==================== Multi-Logger ====================

/**
 * Fans every call out to a list of loggers. An empty list discards everything.
 */
export class MultiLogger implements Logger {
    constructor(private readonly loggers: Logger[]) { }

    logIteration(entry: IterationLogInput): void {
        this.loggers.forEach(logger => logger.logIteration(entry));
    }

    logRun(entry: RunLogInput): void {
        this.loggers.forEach(logger => logger.logRun(entry));
    }

    flush(): void {
        this.loggers.forEach(logger => logger.flush());
    }

    close(): void {
        this.loggers.forEach(logger => logger.close());
    }
}

// ==================== Factory Functions ====================

export function createLogger(format: 'console' | 'memory', config: LoggerConfig): Logger {
    return format === 'console' ? new ConsoleLogger(config) : new MemoryLogger(config);
}

/**
 * Adapt a Logger into the optimizer's progress observer
 */
export function progressToLogger(
    logger: Logger,
    run: number = 0
): (iteration: number, objective: number) => void {
    let bestReportedObjective = Infinity;
    return (iteration, objective) => {
        bestReportedObjective = Math.min(bestReportedObjective, objective);
        logger.logIteration({ run, iteration, objective, bestReportedObjective });
    };
}
