import { candidateKey, type Candidate } from "./candidate.ts";

/**
 * A bounded cache of candidate scores.
 * Hillclimbing re-scores many of the same neighbors from one step to the
 * next; this avoids re-rendering them. When full, the cache is cleared
 * rather than evicted entry by entry.
 */
export class ScoreCache {
  private cache: Map<string, number> = new Map();
  private readonly maxEntries: number;
  hits = 0;
  misses = 0;

  constructor(maxEntries: number) {
    this.maxEntries = maxEntries;
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Retrieves the cached score for a candidate, or undefined if not found.
   */
  get(candidate: Candidate): number | undefined {
    const score = this.cache.get(candidateKey(candidate));
    if (score === undefined) {
      this.misses++;
    } else {
      this.hits++;
    }
    return score;
  }

  set(candidate: Candidate, score: number): void {
    if (this.maxEntries <= 0) return;
    if (this.cache.size >= this.maxEntries) {
      this.cache.clear();
    }
    this.cache.set(candidateKey(candidate), score);
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }
}
