import type { GrayImage } from "../formats/gray_image.ts";
import { sameSize } from "../formats/gray_image.ts";
import type { Rasterizer } from "../render/polygon_rasterizer.ts";
import type { ScoreCache } from "./cache.ts";
import type { Candidate } from "./candidate.ts";

/**
 * Anything that can score a candidate. Lower is better, 0 is an exact match.
 */
export interface Fitness {
  score(candidate: Candidate): number;
}

/**
 * A fitness that counts how many candidates it actually scored
 */
export interface CountingFitness extends Fitness {
  readonly evaluations: number;
}

/**
 * Mean squared per-pixel intensity difference of two same-sized rasters
 */
export function meanSquaredError(a: GrayImage, b: GrayImage): number {
  if (!sameSize(a, b)) {
    throw new Error(
      `Raster size mismatch: ${a.width}x${a.height} vs ${b.width}x${b.height}`,
    );
  }

  let sum = 0;
  for (let i = 0; i < a.data.length; i++) {
    const d = a.data[i] - b.data[i];
    sum += d * d;
  }
  return sum / a.data.length;
}

/**
 * Renders candidates and scores them against a fixed target.
 * Rasterizer failures propagate; they are never scored.
 */
export class FitnessEvaluator implements CountingFitness {
  private readonly rasterizer: Rasterizer;
  private readonly target: GrayImage;
  private readonly cache: ScoreCache | null;
  /** Number of renders performed (cache hits excluded) */
  evaluations = 0;

  constructor(rasterizer: Rasterizer, target: GrayImage, cache: ScoreCache | null = null) {
    if (rasterizer.width !== target.width || rasterizer.height !== target.height) {
      throw new Error(
        `Rasterizer is ${rasterizer.width}x${rasterizer.height} but target is ${target.width}x${target.height}`,
      );
    }
    this.rasterizer = rasterizer;
    this.target = target;
    this.cache = cache;
  }

  score(candidate: Candidate): number {
    const cached = this.cache?.get(candidate);
    if (cached !== undefined) return cached;

    const score = this.error(candidate);
    this.cache?.set(candidate, score);
    return score;
  }

  /**
   * Uncached error of a candidate against the target
   */
  error(candidate: Candidate): number {
    this.evaluations++;
    return meanSquaredError(this.rasterizer.render(candidate), this.target);
  }
}
