import type { Candidate } from "./candidate.ts";
import type { Fitness } from "./fitness.ts";
import { neighbors, type NeighborhoodOptions } from "./neighborhood.ts";

export type ClimbState = "SEARCHING" | "CONVERGED";

export interface HillclimbOptions extends NeighborhoodOptions {
  /** Stop after this many accepted moves (default: unbounded) */
  maxSteps?: number;
  /** Called after every accepted move */
  onStep?: (candidate: Candidate, score: number, step: number) => void;
}

export interface HillclimbResult {
  candidate: Candidate;
  score: number;
  /** Accepted moves */
  steps: number;
  /** Scores requested from the fitness, initial score included */
  evaluations: number;
  /** Score after each accepted move, starting with the initial score; strictly decreasing */
  trace: number[];
  /** False only when maxSteps cut the walk short */
  converged: boolean;
}

/**
 * First-improvement hillclimbing.
 *
 * Starting from `initial`, repeatedly scan the neighborhood in its fixed
 * order and move to the first neighbor with a strictly lower score. Stops
 * when no neighbor improves; the returned candidate is then a local optimum.
 * Deterministic for a given start, neighborhood order and fitness.
 */
export function hillclimb(
  initial: Candidate,
  fitness: Fitness,
  options: HillclimbOptions = {},
): HillclimbResult {
  const { maxSteps = Infinity, onStep, ...neighborhood } = options;

  let current = initial;
  let currentScore = fitness.score(current);
  let evaluations = 1;
  let steps = 0;
  const trace = [currentScore];
  let state: ClimbState = "SEARCHING";

  while (state === "SEARCHING") {
    if (currentScore === 0) {
      // Nothing can beat an exact match
      state = "CONVERGED";
      break;
    }
    if (steps >= maxSteps) break;

    let improved = false;
    for (const next of neighbors(current, neighborhood)) {
      const score = fitness.score(next);
      evaluations++;
      if (score < currentScore) {
        current = next;
        currentScore = score;
        steps++;
        trace.push(score);
        onStep?.(current, currentScore, steps);
        improved = true;
        break;
      }
    }

    if (!improved) state = "CONVERGED";
  }

  return {
    candidate: current,
    score: currentScore,
    steps,
    evaluations,
    trace,
    converged: state === "CONVERGED",
  };
}
