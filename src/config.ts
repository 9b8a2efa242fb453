/**
 * Search configuration shared by the library, the CLI and the workers
 */

/**
 * How the neighborhood treats a moved point that leaves the grid.
 * - "allow": keep it; the rasterizer clips geometry outside the grid (default)
 * - "clamp": clamp it back into the grid, dropping duplicate neighbors
 * - "reject": skip that neighbor
 */
export type BoundaryPolicy = "allow" | "clamp" | "reject";

export type SeedStrategyName = "uniform" | "screened" | "seeded";

export interface SearchConfig {
  /** Raster width in pixels (default: 12) */
  width: number;

  /** Raster height in pixels (default: 12) */
  height: number;

  /** Points per candidate (default: 5) */
  pointCount: number;

  /** Neighborhood boundary policy (default: "allow") */
  boundary: BoundaryPolicy;

  /** Maximum memoized scores before the cache is cleared; 0 disables it (default: 50000) */
  scoreCacheSize: number;

  /** Uniform candidates screened per trial by the "screened" strategy (default: 16) */
  screenCount: number;

  /** Point sets drawn per trial by the "seeded" strategy (default: 20) */
  seedSets: number;

  /** Orderings screened per point set before falling back to random sampling (default: 24) */
  maxOrderings: number;

  /** Probability that a seeded point is drawn uniformly instead of from the ink hull (default: 0.1) */
  uniformMix: number;
}

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  width: 12,
  height: 12,
  pointCount: 5,
  boundary: "allow",
  scoreCacheSize: 50_000,
  screenCount: 16,
  seedSets: 20,
  maxOrderings: 24,
  uniformMix: 0.1,
};

export const BOUNDARY_POLICIES: readonly BoundaryPolicy[] = ["allow", "clamp", "reject"];
export const SEED_STRATEGIES: readonly SeedStrategyName[] = ["uniform", "screened", "seeded"];

export function isBoundaryPolicy(value: string): value is BoundaryPolicy {
  return BOUNDARY_POLICIES.some((p) => p === value);
}

export function isSeedStrategyName(value: string): value is SeedStrategyName {
  return SEED_STRATEGIES.some((s) => s === value);
}

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveConfig(overrides: Partial<SearchConfig> = {}): SearchConfig {
  const config: SearchConfig = { ...DEFAULT_SEARCH_CONFIG, ...overrides };

  for (const key of ["width", "height", "pointCount"] as const) {
    if (!Number.isInteger(config[key]) || config[key] < 1) {
      throw new Error(`${key} must be a positive integer, got ${config[key]}`);
    }
  }
  for (const key of ["scoreCacheSize", "screenCount", "seedSets", "maxOrderings"] as const) {
    if (!Number.isInteger(config[key]) || config[key] < 0) {
      throw new Error(`${key} must be a non-negative integer, got ${config[key]}`);
    }
  }
  if (!(config.uniformMix >= 0 && config.uniformMix <= 1)) {
    throw new Error(`uniformMix must be within [0, 1], got ${config.uniformMix}`);
  }
  if (!isBoundaryPolicy(config.boundary)) {
    throw new Error(`Unknown boundary policy "${config.boundary}"`);
  }

  return config;
}
