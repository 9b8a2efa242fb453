import minimist from "minimist";

import {
    type BoundaryPolicy,
    DEFAULT_SEARCH_CONFIG,
    isBoundaryPolicy,
    isSeedStrategyName,
    type SeedStrategyName,
} from "../src/config.ts";
import { type Candidate, parseCandidate } from "../src/search/candidate.ts";

export type Command = "fit" | "climb" | "bench";

export interface CliOptions {
    command: Command;
    help: boolean;
    shape: string;
    input?: string;
    output?: string;
    points?: number;
    strategy: SeedStrategyName;
    boundary: BoundaryPolicy;
    seed?: string;
    maxTrials?: number;
    deadlineMs?: number;
    workers: number;
    runs: number;
    start?: Candidate;
    verbose: boolean;
}

export const USAGE = `
polyfit - fit a closed polygon to a raster by restart hillclimbing

Usage:
  polyfit fit   [options]           Search until an exact fit is found
  polyfit climb --start <points>    Hillclimb once from the given polygon
  polyfit bench [options]           Compare baseline and seeded restarts

Options:
  --shape <name>       Reference target: star, triangle, square (default: star)
  --input <file>       Target PNG instead of a reference shape
  --points <k>         Points per candidate (default: shape's vertex count, or ${DEFAULT_SEARCH_CONFIG.pointCount})
  --strategy <name>    uniform, screened or seeded (default: seeded)
  --boundary <policy>  allow, clamp or reject (default: ${DEFAULT_SEARCH_CONFIG.boundary})
  --seed <value>       Seed for reproducible runs
  --max-trials <n>     Give up after n hillclimbs
  --deadline <ms>      Give up after this many milliseconds
  --workers <n>        Run restarts on n worker threads (default: 1)
  --runs <n>           Searches per strategy for bench (default: 8)
  --start <points>     Start polygon for climb, e.g. "6,1 3,11 11,5 1,5 9,11"
  --output <file>      Write the best candidate's raster as PNG
  --verbose            Log every trial / step
  --help               Show this help

Examples:
  polyfit fit --shape star --seed 7
  polyfit fit --input target.png --points 4 --strategy uniform
  polyfit bench --runs 8
`;

function positiveInt(name: string, value: unknown): number | undefined {
    if (value === undefined) return undefined;
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1) {
        throw new Error(`--${name} must be a positive integer, got "${String(value)}"`);
    }
    return n;
}

function optionalString(name: string, value: unknown): string | undefined {
    if (value === undefined) return undefined;
    if (typeof value !== "string" || value.length === 0) {
        throw new Error(`--${name} needs a value`);
    }
    return value;
}

export function parseCliArgs(argv: string[]): CliOptions {
    const args = minimist(argv, {
        string: ["shape", "input", "output", "strategy", "boundary", "seed", "start"],
        boolean: ["help", "verbose"],
        default: {
            shape: "star",
            strategy: "seeded",
            boundary: DEFAULT_SEARCH_CONFIG.boundary,
        },
    });

    const command = String(args._[0] ?? "fit");
    if (command !== "fit" && command !== "climb" && command !== "bench") {
        throw new Error(`Unknown command "${command}"`);
    }

    const strategy = String(args.strategy);
    if (!isSeedStrategyName(strategy)) {
        throw new Error(`Unknown strategy "${strategy}"`);
    }
    const boundary = String(args.boundary);
    if (!isBoundaryPolicy(boundary)) {
        throw new Error(`Unknown boundary policy "${boundary}"`);
    }

    const points = positiveInt("points", args.points);
    const start = optionalString("start", args.start);
    if (command === "climb" && start === undefined && !args.help) {
        throw new Error("climb needs --start");
    }

    return {
        command,
        help: Boolean(args.help),
        shape: String(args.shape),
        input: optionalString("input", args.input),
        output: optionalString("output", args.output),
        points,
        strategy,
        boundary,
        seed: optionalString("seed", args.seed),
        maxTrials: positiveInt("max-trials", args["max-trials"]),
        deadlineMs: positiveInt("deadline", args.deadline),
        workers: positiveInt("workers", args.workers) ?? 1,
        runs: positiveInt("runs", args.runs) ?? 8,
        start: start === undefined ? undefined : parseCandidate(start, points),
        verbose: Boolean(args.verbose),
    };
}

/**
 * The climb start must have one point per polygon vertex of the session
 */
export function checkStartLength(start: Candidate, pointCount: number): Candidate {
    if (start.length !== pointCount) {
        throw new Error(`--start has ${start.length} points, expected ${pointCount}`);
    }
    return start;
}
