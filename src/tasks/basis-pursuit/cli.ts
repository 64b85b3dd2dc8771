#!/usr/bin/env npx tsx
/**
 * @module tasks/basis-pursuit/cli
 * @description Command-line interface for basis pursuit runs
 *
 * Usage:
 *   npx tsx src/tasks/basis-pursuit/cli.ts
 *   npx tsx src/tasks/basis-pursuit/cli.ts --seed 7 --rows 10 --cols 40 --sparsity 3
 *   npm run task:pursuit
 */

import { ConsoleLogger } from '../../core/logging';
import { isPursuitError } from '../../core/errors';
import { DEFAULT_RUN_CONFIG, TASK_NAME, type BasisPursuitRunConfig } from './config';
import { formatReport } from './report';
import { runBasisPursuit } from './task';

// ==================== Argument Parsing ====================

interface CliArgs {
    overrides: Partial<BasisPursuitRunConfig>;
    help: boolean;
}

function parseIntArg(value: string | undefined, fallback: number): number {
    const parsed = parseInt(value ?? '', 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

function parseFloatArg(value: string | undefined, fallback: number): number {
    const parsed = parseFloat(value ?? '');
    return Number.isNaN(parsed) ? fallback : parsed;
}

export function parseArgs(argv: string[]): CliArgs {
    const args: CliArgs = { overrides: {}, help: false };
    const d = DEFAULT_RUN_CONFIG;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '--help' || arg === '-h') {
            args.help = true;
        } else if (arg === '--seed' || arg === '-s') {
            args.overrides.seed = parseIntArg(argv[++i], d.seed);
        } else if (arg === '--rows' || arg === '-m') {
            args.overrides.rows = parseIntArg(argv[++i], d.rows);
        } else if (arg === '--cols' || arg === '-n') {
            args.overrides.cols = parseIntArg(argv[++i], d.cols);
        } else if (arg === '--sparsity' || arg === '-k') {
            // A sparsity implies a sparse planted solution
            args.overrides.plant = 'sparse';
            args.overrides.sparsity = parseIntArg(argv[++i], d.sparsity);
        } else if (arg === '--max-iterations' || arg === '-i') {
            args.overrides.maxIterations = parseIntArg(argv[++i], d.maxIterations);
        } else if (arg === '--tolerance' || arg === '-t') {
            args.overrides.tolerance = parseFloatArg(argv[++i], d.tolerance);
        } else if (arg === '--interval') {
            args.overrides.progressInterval = parseIntArg(argv[++i], d.progressInterval);
        } else if (arg === '--quiet' || arg === '-q') {
            args.overrides.logLevel = 'warn';
        }
    }

    return args;
}

function printHelp(): void {
    console.log(`
Basis pursuit - minimum l1-norm solution of A x = b by projected subgradient

Usage:
  npx tsx src/tasks/basis-pursuit/cli.ts [options]

Options:
  -h, --help               Show this help message
  -s, --seed N             Random seed (default: ${DEFAULT_RUN_CONFIG.seed})
  -m, --rows N             Constraints m (default: ${DEFAULT_RUN_CONFIG.rows})
  -n, --cols N             Unknowns n (default: ${DEFAULT_RUN_CONFIG.cols})
  -k, --sparsity N         Plant a sparse solution with N nonzeros (default: all ones)
  -i, --max-iterations N   Iteration ceiling (default: ${DEFAULT_RUN_CONFIG.maxIterations})
  -t, --tolerance X        Stall tolerance (default: ${DEFAULT_RUN_CONFIG.tolerance})
      --interval N         Iterations between progress lines (default: ${DEFAULT_RUN_CONFIG.progressInterval})
  -q, --quiet              Only print the final report

Examples:
  npx tsx src/tasks/basis-pursuit/cli.ts
  npx tsx src/tasks/basis-pursuit/cli.ts --seed 7 --rows 10 --cols 40 --sparsity 3
`);
}

// ==================== Main ====================

function main(): void {
    const args = parseArgs(process.argv.slice(2));

    if (args.help) {
        printHelp();
        process.exit(0);
    }

    const seed = args.overrides.seed ?? DEFAULT_RUN_CONFIG.seed;
    const logger = new ConsoleLogger({
        task: TASK_NAME,
        seed,
        level: args.overrides.logLevel ?? DEFAULT_RUN_CONFIG.logLevel,
    });

    try {
        const { report, warnings, configHash } = runBasisPursuit(args.overrides, logger);

        for (const warning of warnings) {
            console.warn(`[WARN] ${warning}`);
        }
        console.log('');
        console.log(formatReport(report));
        console.log(`  config hash:    ${configHash}`);
        console.log('');
    } catch (error) {
        console.error('');
        console.error('[FAILED] Run failed:');
        if (isPursuitError(error)) {
            console.error(`  ${error.code}: ${error.message}`);
        } else {
            console.error(`  ${error instanceof Error ? error.message : String(error)}`);
        }
        console.error('');
        process.exit(1);
    }
}

// Run only when executed directly, not when imported by tests
if (process.argv[1] !== undefined && /basis-pursuit[\\/]cli\.[cm]?[jt]s$/.test(process.argv[1])) {
    main();
}
