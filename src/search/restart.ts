import type { SeedStrategyName } from "../config.ts";
import type { Candidate } from "./candidate.ts";
import type { CountingFitness } from "./fitness.ts";
import { hillclimb, type HillclimbResult } from "./hillclimb.ts";
import type { NeighborhoodOptions } from "./neighborhood.ts";
import { createRandom, type RandomSource } from "./random.ts";
import { createSeeder, type SeedStrategy } from "./seeding.ts";
import type { SearchSession } from "./session.ts";

export interface TrialInfo {
  trial: number;
  start: Candidate;
  result: HillclimbResult;
}

export interface RestartOptions {
  /** Give up after this many hillclimbs (default: unbounded) */
  maxTrials?: number;
  /** Give up once this many milliseconds have passed (checked between trials) */
  deadlineMs?: number;
  /** Called after every hillclimb */
  onTrial?: (info: TrialInfo) => void;
  neighborhood?: NeighborhoodOptions;
}

export interface RestartResult {
  found: boolean;
  /** Best candidate seen; the exact solution when found */
  candidate: Candidate;
  score: number;
  trials: number;
  /** Renders performed, seeding included */
  evaluations: number;
  elapsedMs: number;
}

/**
 * Hillclimb from seeds until one converges to score 0.
 *
 * Only the seed strategy differs between variants; the hillclimber and the
 * neighborhood stay the same. Without maxTrials or deadlineMs this loops
 * until it finds an exact match.
 */
export function restartSearch(
  evaluator: CountingFitness,
  seeder: SeedStrategy,
  options: RestartOptions = {},
): RestartResult {
  const { maxTrials = Infinity, deadlineMs = Infinity, onTrial, neighborhood = {} } = options;

  const startedAt = performance.now();
  const startEvaluations = evaluator.evaluations;
  let best: HillclimbResult | null = null;
  let trials = 0;

  while (trials < maxTrials && performance.now() - startedAt < deadlineMs) {
    const start = seeder.next();
    const result = hillclimb(start, evaluator, neighborhood);
    trials++;
    onTrial?.({ trial: trials, start, result });

    if (!best || result.score < best.score) best = result;
    if (result.score === 0) break;
  }

  if (!best) {
    throw new Error("Restart search stopped before running a single trial");
  }

  return {
    found: best.score === 0,
    candidate: best.candidate,
    score: best.score,
    trials,
    evaluations: evaluator.evaluations - startEvaluations,
    elapsedMs: performance.now() - startedAt,
  };
}

export interface FindSolutionOptions extends RestartOptions {
  /** Seed for reproducible runs */
  seed?: number | string;
  random?: RandomSource;
}

function runWithStrategy(
  session: SearchSession,
  strategy: SeedStrategyName,
  options: FindSolutionOptions,
): RestartResult {
  const { seed, random = createRandom(seed), ...restart } = options;
  const evaluator = session.createEvaluator();
  const seeder = createSeeder(strategy, {
    random,
    fitness: evaluator,
    target: session.target,
    config: session.config,
  });
  return restartSearch(evaluator, seeder, {
    ...restart,
    neighborhood: {
      boundary: session.config.boundary,
      width: session.config.width,
      height: session.config.height,
      ...restart.neighborhood,
    },
  });
}

/**
 * Baseline random-restart search: uniform random starting candidates
 */
export function findSolution(
  session: SearchSession,
  options: FindSolutionOptions = {},
): RestartResult {
  return runWithStrategy(session, "uniform", options);
}

/**
 * Restart search seeded from the target's ink hull
 */
export function findSolutionSeeded(
  session: SearchSession,
  options: FindSolutionOptions = {},
): RestartResult {
  return runWithStrategy(session, "seeded", options);
}

export function findSolutionWith(
  session: SearchSession,
  strategy: SeedStrategyName,
  options: FindSolutionOptions = {},
): RestartResult {
  return runWithStrategy(session, strategy, options);
}
