import type { BoundaryPolicy } from "../config.ts";
import { candidateKey, replacePoint, type Candidate } from "./candidate.ts";
import { add, clampPoint, inDomain, type Point } from "./geometry.ts";

/**
 * The 8 unit moves, row by row: up-left, up, up-right, left, right,
 * down-left, down, down-right. This order decides which improving neighbor
 * hillclimbing finds first.
 */
export const NEIGHBOR_DELTAS: readonly Point[] = Object.freeze([
  { x: -1, y: -1 },
  { x: 0, y: -1 },
  { x: 1, y: -1 },
  { x: -1, y: 0 },
  { x: 1, y: 0 },
  { x: -1, y: 1 },
  { x: 0, y: 1 },
  { x: 1, y: 1 },
]);

export interface NeighborhoodOptions {
  boundary?: BoundaryPolicy;
  /** Grid size; required by "clamp" and "reject" */
  width?: number;
  height?: number;
}

/**
 * Lazily yield every candidate that differs from `candidate` by one point
 * moved one step. Point index ascending, then NEIGHBOR_DELTAS order.
 *
 * With the default "allow" policy this yields exactly 8 * K candidates,
 * some possibly outside the grid.
 */
export function* neighbors(
  candidate: Candidate,
  options: NeighborhoodOptions = {},
): Generator<Candidate, void, undefined> {
  const { boundary = "allow", width, height } = options;

  if (boundary === "allow") {
    for (let i = 0; i < candidate.length; i++) {
      for (const delta of NEIGHBOR_DELTAS) {
        yield replacePoint(candidate, i, add(candidate[i], delta));
      }
    }
    return;
  }

  if (width === undefined || height === undefined) {
    throw new Error(`Boundary policy "${boundary}" needs the grid width and height`);
  }

  const seen = new Set<string>([candidateKey(candidate)]);
  for (let i = 0; i < candidate.length; i++) {
    for (const delta of NEIGHBOR_DELTAS) {
      let moved = add(candidate[i], delta);

      if (!inDomain(moved, width, height)) {
        if (boundary === "reject") continue;
        moved = clampPoint(moved, width, height);
      }

      const next = replacePoint(candidate, i, moved);
      const key = candidateKey(next);
      if (seen.has(key)) continue;
      seen.add(key);
      yield next;
    }
  }
}

/**
 * Neighborhood size under the "allow" policy
 */
export function neighborhoodSize(pointCount: number): number {
  return NEIGHBOR_DELTAS.length * pointCount;
}
