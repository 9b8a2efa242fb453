/**
 * Lazy candidate streams. Nothing here materializes the candidate space;
 * each generator yields one candidate per pull.
 */

import { createCandidate, type Candidate } from "./candidate.ts";
import type { Point } from "./geometry.ts";
import { randomInt, type RandomSource } from "./random.ts";

export function randomPoint(random: RandomSource, width: number, height: number): Point {
  return { x: randomInt(random, 0, width - 1), y: randomInt(random, 0, height - 1) };
}

/**
 * Candidate whose points are drawn independently and uniformly from the grid
 */
export function randomCandidate(
  random: RandomSource,
  pointCount: number,
  width: number,
  height: number,
): Candidate {
  const points: Point[] = [];
  for (let i = 0; i < pointCount; i++) {
    points.push(randomPoint(random, width, height));
  }
  return createCandidate(points);
}

/**
 * Infinite stream of uniform random candidates
 */
export function* randomCandidates(
  random: RandomSource,
  pointCount: number,
  width: number,
  height: number,
): Generator<Candidate, never, undefined> {
  while (true) {
    yield randomCandidate(random, pointCount, width, height);
  }
}

/**
 * Every candidate on the grid, in odometer order: the last point advances
 * fastest, each point runs row-major over the grid. Yields (W*H)^K candidates.
 */
export function* enumerateCandidates(
  pointCount: number,
  width: number,
  height: number,
): Generator<Candidate, void, undefined> {
  const cells = width * height;
  const digits: number[] = new Array<number>(pointCount).fill(0);

  while (true) {
    yield createCandidate(digits.map((d) => ({ x: d % width, y: Math.floor(d / width) })));

    let position = pointCount - 1;
    while (position >= 0 && digits[position] === cells - 1) {
      digits[position] = 0;
      position--;
    }
    if (position < 0) return;
    digits[position]++;
  }
}
