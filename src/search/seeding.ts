/**
 * Initial-candidate selection for restart search.
 *
 * Every strategy hands the hillclimber one starting candidate per trial. The
 * baseline draws uniformly; the others spend a few cheap evaluations to
 * start closer to the target.
 */

import type { SearchConfig, SeedStrategyName } from "../config.ts";
import type { GrayImage } from "../formats/gray_image.ts";
import { extractInk } from "../raster/ink.ts";
import { createCandidate, type Candidate } from "./candidate.ts";
import { randomCandidate, randomPoint } from "./candidate_stream.ts";
import type { Fitness } from "./fitness.ts";
import { clampPoint, convexHull, latticePointsOnHull, type Point } from "./geometry.ts";
import { shuffled, type RandomSource } from "./random.ts";

export interface SeedStrategy {
  readonly name: SeedStrategyName;
  /** Starting candidate for the next trial */
  next(): Candidate;
}

/**
 * Baseline: each point independent and uniform over the grid
 */
export class UniformSeeder implements SeedStrategy {
  readonly name = "uniform";

  constructor(
    private readonly random: RandomSource,
    private readonly pointCount: number,
    private readonly width: number,
    private readonly height: number,
  ) {}

  next(): Candidate {
    return randomCandidate(this.random, this.pointCount, this.width, this.height);
  }
}

/**
 * Score `count` uniform candidates and keep the best
 */
export class ScreenedSeeder implements SeedStrategy {
  readonly name = "screened";
  private readonly uniform: UniformSeeder;

  constructor(
    random: RandomSource,
    private readonly fitness: Fitness,
    private readonly count: number,
    pointCount: number,
    width: number,
    height: number,
  ) {
    this.uniform = new UniformSeeder(random, pointCount, width, height);
  }

  next(): Candidate {
    return pickBest(
      Array.from({ length: Math.max(1, this.count) }, () => this.uniform.next()),
      this.fitness,
    );
  }
}

function pickBest(candidates: readonly Candidate[], fitness: Fitness): Candidate {
  let best = candidates[0];
  let bestScore = fitness.score(best);
  for (let i = 1; i < candidates.length; i++) {
    const score = fitness.score(candidates[i]);
    if (score < bestScore) {
      best = candidates[i];
      bestScore = score;
    }
  }
  return best;
}

export interface InkHull {
  /** Corners of the convex hull of the ink */
  vertices: Point[];
  /** Other lattice points on the hull boundary */
  edges: Point[];
}

/**
 * Convex hull of the target's ink in pixel-corner coordinates, clamped to
 * the grid. The vertices of a convex shape (and the tips of a star) are at
 * or next to the hull's corners.
 */
export function inkHull(target: GrayImage): InkHull {
  const corners: Point[] = [];
  for (const { x, y } of extractInk(target)) {
    corners.push({ x, y }, { x: x + 1, y }, { x, y: y + 1 }, { x: x + 1, y: y + 1 });
  }

  const clampUnique = (points: Point[]): Map<string, Point> => {
    const unique = new Map<string, Point>();
    for (const p of points) {
      const clamped = clampPoint(p, target.width, target.height);
      unique.set(`${clamped.x},${clamped.y}`, clamped);
    }
    return unique;
  };

  const vertices = clampUnique(convexHull(corners));
  const edges = Array.from(clampUnique(latticePointsOnHull(corners)))
    .filter(([key]) => !vertices.has(key))
    .map(([, p]) => p);

  return { vertices: Array.from(vertices.values()), edges };
}

/**
 * Point orders of a closed polygon that give distinct outlines: the first
 * point stays first (rotations are equivalent) and a reversed traversal is
 * skipped (second index below the last). (K-1)!/2 orders for K >= 3.
 */
export function distinctCyclicOrders(pointCount: number): number[][] {
  if (pointCount <= 3) {
    return [Array.from({ length: pointCount }, (_, i) => i)];
  }

  const orders: number[][] = [];
  const rest = Array.from({ length: pointCount - 1 }, (_, i) => i + 1);

  const permute = (prefix: number[], remaining: number[]) => {
    if (remaining.length === 0) {
      if (prefix[1] < prefix[prefix.length - 1]) orders.push(prefix);
      return;
    }
    for (let i = 0; i < remaining.length; i++) {
      permute(
        [...prefix, remaining[i]],
        [...remaining.slice(0, i), ...remaining.slice(i + 1)],
      );
    }
  };
  permute([0], rest);

  return orders;
}

function distinctOrderCount(pointCount: number): number {
  let count = 1;
  for (let i = 2; i < pointCount; i++) count *= i;
  return pointCount <= 3 ? 1 : count / 2;
}

export interface HullSeederOptions {
  pointCount: number;
  /** Point sets drawn per trial */
  sets: number;
  /** Orderings screened per point set */
  maxOrderings: number;
  /** Probability of drawing a point uniformly instead of from the hull */
  uniformMix: number;
}

/**
 * Structural seeding from the target's ink hull.
 *
 * Each trial draws `sets` point sets, screens their distinct cyclic orders,
 * and returns the best-scoring candidate. Points come from the hull corners
 * first, then the other hull lattice points, without repeats within a set;
 * after that, or with probability `uniformMix`, they are uniform. A blank
 * target therefore gets uniform seeds.
 */
export class HullSeeder implements SeedStrategy {
  readonly name = "seeded";
  private readonly hull: InkHull;
  private readonly orders: number[][] | null;

  constructor(
    private readonly random: RandomSource,
    private readonly fitness: Fitness,
    private readonly target: GrayImage,
    private readonly options: HullSeederOptions,
  ) {
    this.hull = inkHull(target);
    this.orders = distinctOrderCount(options.pointCount) <= options.maxOrderings
      ? distinctCyclicOrders(options.pointCount)
      : null;
  }

  /** Hull points the seeder draws from */
  get hullPoints(): Readonly<InkHull> {
    return this.hull;
  }

  next(): Candidate {
    const screened: Candidate[] = [];
    for (let s = 0; s < Math.max(1, this.options.sets); s++) {
      const points = this.drawPointSet();
      for (const order of this.ordersFor(points.length)) {
        screened.push(createCandidate(order.map((i) => points[i])));
      }
    }
    return pickBest(screened, this.fitness);
  }

  private drawPointSet(): Point[] {
    const { width, height } = this.target;
    // popped from the end: corners first
    const available = [
      ...shuffled(this.hull.edges, this.random),
      ...shuffled(this.hull.vertices, this.random),
    ];
    const points: Point[] = [];

    for (let i = 0; i < this.options.pointCount; i++) {
      const fromHull = available.length > 0 && this.random() >= this.options.uniformMix;
      const next = fromHull ? available.pop() : undefined;
      points.push(next ?? randomPoint(this.random, width, height));
    }
    return points;
  }

  private ordersFor(pointCount: number): number[][] {
    if (this.orders) return this.orders;

    const identity = Array.from({ length: pointCount }, (_, i) => i);
    const sampled: number[][] = [identity];
    for (let i = 1; i < this.options.maxOrderings; i++) {
      sampled.push([0, ...shuffled(identity.slice(1), this.random)]);
    }
    return sampled;
  }
}

export interface SeederContext {
  random: RandomSource;
  fitness: Fitness;
  target: GrayImage;
  config: SearchConfig;
}

export function createSeeder(name: SeedStrategyName, context: SeederContext): SeedStrategy {
  const { random, fitness, target, config } = context;

  switch (name) {
    case "uniform":
      return new UniformSeeder(random, config.pointCount, config.width, config.height);
    case "screened":
      return new ScreenedSeeder(
        random,
        fitness,
        config.screenCount,
        config.pointCount,
        config.width,
        config.height,
      );
    case "seeded":
      return new HullSeeder(random, fitness, target, {
        pointCount: config.pointCount,
        sets: config.seedSets,
        maxOrderings: config.maxOrderings,
        uniformMix: config.uniformMix,
      });
  }
}

