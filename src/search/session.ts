import { resolveConfig, type SearchConfig } from "../config.ts";
import type { GrayImage } from "../formats/gray_image.ts";
import { cloneGrayImage } from "../formats/gray_image.ts";
import type { CanvasBackend } from "../render/canvas_backend.ts";
import { PolygonRasterizer } from "../render/polygon_rasterizer.ts";
import { ScoreCache } from "./cache.ts";
import type { Candidate } from "./candidate.ts";
import { FitnessEvaluator } from "./fitness.ts";

/**
 * Everything one search run shares: configuration, the rasterizer and the
 * target raster. The target is rendered (or copied) once here and never
 * written to afterwards.
 */
export interface SearchSession {
  readonly config: SearchConfig;
  readonly rasterizer: PolygonRasterizer;
  readonly target: Readonly<GrayImage>;
  /** Fresh evaluator with its own cache and evaluation counter */
  createEvaluator(): FitnessEvaluator;
}

export type TargetSource =
  | { kind: "polygon"; polygon: Candidate }
  | { kind: "raster"; raster: GrayImage };

export interface SessionOptions {
  backend: CanvasBackend;
  target: TargetSource;
  config?: Partial<SearchConfig>;
}

export function createSession(options: SessionOptions): SearchSession {
  const overrides: Partial<SearchConfig> = { ...options.config };
  if (options.target.kind === "raster") {
    overrides.width = options.target.raster.width;
    overrides.height = options.target.raster.height;
  }
  const config = resolveConfig(overrides);

  const rasterizer = new PolygonRasterizer(options.backend, {
    width: config.width,
    height: config.height,
  });

  const target = options.target.kind === "polygon"
    ? rasterizer.render(options.target.polygon)
    : cloneGrayImage(options.target.raster);
  Object.freeze(target);

  return {
    config,
    rasterizer,
    target,
    createEvaluator: () =>
      new FitnessEvaluator(
        rasterizer,
        target,
        config.scoreCacheSize > 0 ? new ScoreCache(config.scoreCacheSize) : null,
      ),
  };
}
