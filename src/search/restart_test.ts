import assert from "node:assert/strict";
import { test } from "node:test";

import { createNapiCanvasBackend } from "../render/napi_canvas.ts";
import { summarize } from "../stats/timing.ts";
import { createCandidate, type Candidate } from "./candidate.ts";
import type { CountingFitness } from "./fitness.ts";
import { inDomain } from "./geometry.ts";
import {
  findSolution,
  findSolutionSeeded,
  findSolutionWith,
  restartSearch,
  type RestartResult,
  type TrialInfo,
} from "./restart.ts";
import type { SeedStrategy } from "./seeding.ts";
import { createSession, type SearchSession } from "./session.ts";
import { REFERENCE_SHAPES } from "./shapes.ts";

function starSession(): SearchSession {
  return createSession({
    backend: createNapiCanvasBackend(),
    target: { kind: "polygon", polygon: REFERENCE_SHAPES.star.polygon },
  });
}

// Every candidate scores 1: each hillclimb converges on its start
function flatFitness(): CountingFitness {
  const fitness = {
    evaluations: 0,
    score(_candidate: Candidate): number {
      fitness.evaluations++;
      return 1;
    },
  };
  return fitness;
}

function fixedSeeder(candidate: Candidate): SeedStrategy {
  return { name: "uniform", next: () => candidate };
}

function assertExact(session: SearchSession, result: RestartResult): void {
  assert.ok(result.found, `best score ${result.score} after ${result.trials} trials`);
  assert.equal(result.score, 0);
  assert.equal(session.createEvaluator().score(result.candidate), 0);
}

test("restartSearch - gives up after maxTrials with the best result", () => {
  const trials: TrialInfo[] = [];
  const start = createCandidate([{ x: 4, y: 4 }]);

  const result = restartSearch(flatFitness(), fixedSeeder(start), {
    maxTrials: 3,
    onTrial: (info) => trials.push(info),
  });

  assert.equal(result.found, false);
  assert.equal(result.trials, 3);
  assert.equal(result.score, 1);
  assert.equal(result.candidate, start);
  // Per trial: the start plus its 8 neighbors
  assert.equal(result.evaluations, 27);
  assert.deepEqual(trials.map((t) => t.trial), [1, 2, 3]);
  assert.ok(trials.every((t) => t.start === start && t.result.converged));
});

test("restartSearch - a deadline that has already passed runs nothing", () => {
  assert.throws(
    () => restartSearch(flatFitness(), fixedSeeder(createCandidate([{ x: 0, y: 0 }])), { deadlineMs: 0 }),
    /Restart search stopped before running a single trial/,
  );
});

test("restartSearch - stops at the first exact match", () => {
  const session = starSession();
  const result = restartSearch(session.createEvaluator(), fixedSeeder(REFERENCE_SHAPES.star.polygon), {
    maxTrials: 10,
  });

  assert.equal(result.trials, 1);
  assert.equal(result.evaluations, 1);
  assertExact(session, result);
});

test("findSolution - uniform restarts find the star", () => {
  const session = starSession();
  const result = findSolution(session, { seed: "baseline", maxTrials: 1000 });

  assertExact(session, result);
  assert.ok(result.trials <= 1000);
});

test("findSolutionSeeded - hull seeding finds the star", () => {
  const session = starSession();
  const result = findSolutionSeeded(session, { seed: "seeded", maxTrials: 1000 });

  assertExact(session, result);
});

test("findSolution - caller's neighborhood policy reaches the hillclimber", () => {
  const session = starSession();
  const optima: Candidate[] = [];

  findSolution(session, {
    seed: 1,
    maxTrials: 20,
    neighborhood: { boundary: "reject" },
    onTrial: ({ result }) => optima.push(result.candidate),
  });

  assert.ok(optima.length > 0);
  const outside = optima.filter((c) => !c.every((p) => inDomain(p, 12, 12)));
  assert.equal(outside.length, 0);
});

test("findSolutionWith - same seed, same search", () => {
  const session = starSession();

  const first = findSolutionWith(session, "screened", { seed: 11, maxTrials: 5 });
  const second = findSolutionWith(session, "screened", { seed: 11, maxTrials: 5 });

  assert.equal(second.trials, first.trials);
  assert.equal(second.evaluations, first.evaluations);
  assert.deepEqual(second.candidate, first.candidate);
});

test("findSolutionSeeded - mean time over 8 runs is under half the baseline's", () => {
  const session = starSession();
  const baseline: number[] = [];
  const seeded: number[] = [];

  for (let i = 0; i < 8; i++) {
    baseline.push(findSolution(session, { seed: `compare:${i}` }).elapsedMs);
    seeded.push(findSolutionSeeded(session, { seed: `compare:${i}` }).elapsedMs);
  }

  const ratio = summarize(seeded).mean / summarize(baseline).mean;
  assert.ok(ratio < 0.5, `seeded/baseline mean time ratio ${ratio.toFixed(3)}`);
});
