import Prando from "prando";

/** Uniform draw in [0, 1) */
export type RandomSource = () => number;

/**
 * Seeded source when a seed is given (reproducible runs), Math.random otherwise
 */
export function createRandom(seed?: number | string): RandomSource {
  if (seed === undefined) return Math.random;
  const rng = new Prando(seed);
  return () => rng.next();
}

/**
 * Integer in [min, max] inclusive
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffled<T>(items: readonly T[], random: RandomSource): T[] {
  const result = items.slice();
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomInt(random, 0, i);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
