import { add, isLatticePoint, type Point } from "./geometry.ts";

/**
 * A closed polygon: K integer vertices traversed in order, implicitly
 * closing back to the first. Never mutated; transformations return a copy.
 */
export type Candidate = readonly Point[];

/**
 * Validate and freeze a point list as a candidate.
 * Throws if the point count differs from `expectedLength` (when given) or a
 * coordinate is not an integer.
 */
export function createCandidate(
  points: readonly Point[],
  expectedLength?: number,
): Candidate {
  if (points.length === 0) {
    throw new Error("Candidate needs at least one point");
  }
  if (expectedLength !== undefined && points.length !== expectedLength) {
    throw new Error(
      `Candidate has ${points.length} points, expected ${expectedLength}`,
    );
  }
  for (const p of points) {
    if (!isLatticePoint(p)) {
      throw new Error(`Candidate point (${p.x}, ${p.y}) is not on the integer grid`);
    }
  }
  return Object.freeze(points.map((p) => Object.freeze({ x: p.x, y: p.y })));
}

/**
 * Copy of `candidate` with the point at `index` moved by `delta`
 */
export function translatePoint(
  candidate: Candidate,
  index: number,
  delta: Point,
): Candidate {
  return replacePoint(candidate, index, add(candidate[index], delta));
}

export function replacePoint(
  candidate: Candidate,
  index: number,
  point: Point,
): Candidate {
  if (index < 0 || index >= candidate.length) {
    throw new Error(`Point index ${index} out of range (0-${candidate.length - 1})`);
  }
  const next = candidate.slice();
  next[index] = Object.freeze({ x: point.x, y: point.y });
  return Object.freeze(next);
}

/**
 * Stable string key, used for caching and de-duplication
 */
export function candidateKey(candidate: Candidate): string {
  return candidate.map((p) => `${p.x},${p.y}`).join(" ");
}

export function candidatesEqual(a: Candidate, b: Candidate): boolean {
  return a.length === b.length && a.every((p, i) => p.x === b[i].x && p.y === b[i].y);
}

export function formatCandidate(candidate: Candidate): string {
  return `[${candidate.map((p) => `(${p.x},${p.y})`).join(",")}]`;
}

/**
 * Parse "x,y x,y ..." (also accepts "(x,y),(x,y)" and ";" separators)
 */
export function parseCandidate(text: string, expectedLength?: number): Candidate {
  const matches = Array.from(text.matchAll(/(-?\d+)\s*,\s*(-?\d+)/g));
  const leftover = text.replace(/(-?\d+)\s*,\s*(-?\d+)/g, "").replace(/[\s(),;[\]]/g, "");
  if (matches.length === 0 || leftover.length > 0) {
    throw new Error(`Cannot parse point list "${text}"`);
  }
  return createCandidate(
    matches.map((m) => ({ x: Number(m[1]), y: Number(m[2]) })),
    expectedLength,
  );
}
