/**
 * Reference shapes, reusable by tests, the CLI and the benchmark.
 */

import { createCandidate, type Candidate } from "./candidate.ts";

export interface ReferenceShape {
  name: string;
  width: number;
  height: number;
  polygon: Candidate;
}

export const REFERENCE_SHAPES = {
  star: {
    name: "star",
    width: 12,
    height: 12,
    // Pentagram: consecutive vertices skip one tip, so edges cross
    polygon: createCandidate([
      { x: 6, y: 1 },
      { x: 3, y: 11 },
      { x: 11, y: 5 },
      { x: 1, y: 5 },
      { x: 9, y: 11 },
    ]),
  },
  triangle: {
    name: "triangle",
    width: 12,
    height: 12,
    polygon: createCandidate([
      { x: 0, y: 0 },
      { x: 12, y: 0 },
      { x: 12, y: 12 },
    ]),
  },
  square: {
    name: "square",
    width: 12,
    height: 12,
    polygon: createCandidate([
      { x: 3, y: 3 },
      { x: 9, y: 3 },
      { x: 9, y: 9 },
      { x: 3, y: 9 },
    ]),
  },
} satisfies Record<string, ReferenceShape>;

export type ShapeName = keyof typeof REFERENCE_SHAPES;

export function isShapeName(value: string): value is ShapeName {
  return Object.hasOwn(REFERENCE_SHAPES, value);
}

export function getShape(name: string): ReferenceShape {
  if (!isShapeName(name)) {
    throw new Error(
      `Unknown shape "${name}" (available: ${Object.keys(REFERENCE_SHAPES).join(", ")})`,
    );
  }
  return REFERENCE_SHAPES[name];
}
