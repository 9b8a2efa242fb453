import assert from "node:assert/strict";
import { test } from "node:test";

import { candidateKey, createCandidate, type Candidate } from "./candidate.ts";
import { inDomain } from "./geometry.ts";
import { NEIGHBOR_DELTAS, neighborhoodSize, neighbors } from "./neighborhood.ts";
import { REFERENCE_SHAPES } from "./shapes.ts";

function changedIndices(a: Candidate, b: Candidate): number[] {
  const changed: number[] = [];
  a.forEach((p, i) => {
    if (p.x !== b[i].x || p.y !== b[i].y) changed.push(i);
  });
  return changed;
}

test("neighbors - star has 40 distinct neighbors", () => {
  const star = REFERENCE_SHAPES.star.polygon;
  const all = Array.from(neighbors(star));

  assert.equal(all.length, 40);
  assert.equal(neighborhoodSize(5), 40);
  assert.equal(new Set(all.map(candidateKey)).size, 40);
  assert.ok(!all.some((n) => candidateKey(n) === candidateKey(star)));
});

test("neighbors - each neighbor moves exactly one point by one unit step", () => {
  const star = REFERENCE_SHAPES.star.polygon;

  for (const next of neighbors(star)) {
    const changed = changedIndices(star, next);
    assert.equal(changed.length, 1);

    const i = changed[0];
    const dx = next[i].x - star[i].x;
    const dy = next[i].y - star[i].y;
    assert.ok(NEIGHBOR_DELTAS.some((d) => d.x === dx && d.y === dy));
  }
});

test("neighbors - fixed order: point index, then delta order", () => {
  const candidate = createCandidate([{ x: 5, y: 5 }, { x: 0, y: 0 }]);
  const keys = Array.from(neighbors(candidate), candidateKey);

  assert.deepEqual(keys.slice(0, 8), [
    "4,4 0,0",
    "5,4 0,0",
    "6,4 0,0",
    "4,5 0,0",
    "6,5 0,0",
    "4,6 0,0",
    "5,6 0,0",
    "6,6 0,0",
  ]);
  assert.equal(keys[8], "5,5 -1,-1");
});

test("neighbors - 'allow' leaves points outside the grid", () => {
  const corner = createCandidate([{ x: 0, y: 0 }, { x: 11, y: 11 }, { x: 6, y: 6 }]);
  const all = Array.from(neighbors(corner, { width: 12, height: 12 }));

  assert.equal(all.length, 24);
  assert.ok(all.some((n) => !n.every((p) => inDomain(p, 12, 12))));
});

test("neighbors - 'reject' drops moves that leave the grid", () => {
  const corner = createCandidate([{ x: 0, y: 0 }, { x: 6, y: 6 }]);
  const all = Array.from(neighbors(corner, { boundary: "reject", width: 12, height: 12 }));

  // (0,0) keeps only (1,0), (0,1) and (1,1)
  assert.equal(all.length, 3 + 8);
  assert.ok(all.every((n) => n.every((p) => inDomain(p, 12, 12))));
});

test("neighbors - 'clamp' pins moves to the edge and drops duplicates", () => {
  const corner = createCandidate([{ x: 0, y: 0 }, { x: 6, y: 6 }]);
  const keys = Array.from(
    neighbors(corner, { boundary: "clamp", width: 12, height: 12 }),
    candidateKey,
  );

  // Moves of (0,0): (-1,-1)(0,-1)(-1,0) clamp back to the start and are
  // skipped; (1,-1)->(1,0), (-1,1)->(0,1), and the plain moves repeat those.
  assert.deepEqual(keys.slice(0, 3), ["1,0 6,6", "0,1 6,6", "1,1 6,6"]);
  assert.equal(keys.length, 3 + 8);
});

test("neighbors - bounded policies need the grid size", () => {
  const candidate = createCandidate([{ x: 1, y: 1 }]);
  assert.throws(
    () => Array.from(neighbors(candidate, { boundary: "clamp" })),
    /Boundary policy "clamp" needs the grid width and height/,
  );
});
