import { availableParallelism } from "node:os";
import { Worker } from "node:worker_threads";

import { isSeedStrategyName, type SearchConfig, type SeedStrategyName } from "../config.ts";
import type { GrayImage } from "../formats/gray_image.ts";
import type { Point } from "./geometry.ts";
import type { RestartResult } from "./restart.ts";

export interface WorkerTask {
  worker: number;
  target: GrayImage;
  config: Partial<SearchConfig>;
  strategy: SeedStrategyName;
  seed?: string;
  maxTrials?: number;
  deadlineMs?: number;
}

export type WorkerMessage =
  | { type: "RESULT"; worker: number; result: RestartResult & { candidate: Point[] } }
  | { type: "ERROR"; worker: number; message: string };

export function isWorkerTask(value: unknown): value is WorkerTask {
  if (typeof value !== "object" || value === null) return false;
  if (!("worker" in value) || typeof value.worker !== "number") return false;
  if (!("strategy" in value) || typeof value.strategy !== "string" || !isSeedStrategyName(value.strategy)) {
    return false;
  }
  if (!("target" in value) || typeof value.target !== "object" || value.target === null) return false;
  return "data" in value.target && value.target.data instanceof Uint8ClampedArray;
}

export interface ParallelSearchOptions {
  target: GrayImage;
  config?: Partial<SearchConfig>;
  strategy?: SeedStrategyName;
  /** Worker count (default: available parallelism, at most 4) */
  workers?: number;
  /** Base seed; worker i uses `${seed}:${i}` */
  seed?: number | string;
  /** Trial budget per worker (default: unbounded) */
  maxTrialsPerWorker?: number;
  deadlineMs?: number;
}

export interface ParallelSearchResult extends RestartResult {
  /** Index of the worker that produced `candidate` */
  worker: number;
  /** Trials run by the workers that reported back */
  totalTrials: number;
}

// Plain .mjs entry that registers tsx, then loads search_worker.ts
const WORKER_URL = new URL("./search_worker.mjs", import.meta.url);

/**
 * Fan independent restart searches out over worker threads.
 *
 * The first worker to report an exact solution wins and every worker is
 * terminated. If all workers exhaust their budgets, the best result is
 * returned with `found: false`. A worker error rejects the search.
 */
export function parallelSearch(options: ParallelSearchOptions): Promise<ParallelSearchResult> {
  const {
    target,
    config = {},
    strategy = "seeded",
    workers = Math.min(4, availableParallelism()),
    seed = Math.floor(Math.random() * 2 ** 31),
    maxTrialsPerWorker,
    deadlineMs,
  } = options;

  if (!Number.isInteger(workers) || workers < 1) {
    return Promise.reject(new Error(`Worker count must be a positive integer, got ${workers}`));
  }

  const startedAt = performance.now();

  return new Promise((resolve, reject) => {
    const pool: Worker[] = [];
    const results: ParallelSearchResult[] = [];
    let settled = false;

    const finish = (outcome: { result: ParallelSearchResult } | { error: Error }) => {
      if (settled) return;
      settled = true;
      Promise.all(pool.map((w) => w.terminate())).then(
        () => {
          if ("error" in outcome) reject(outcome.error);
          else resolve(outcome.result);
        },
        reject,
      );
    };

    const summarize = (): ParallelSearchResult => {
      const best = results.reduce((a, b) => (b.score < a.score ? b : a));
      return {
        ...best,
        totalTrials: results.reduce((sum, r) => sum + r.trials, 0),
        elapsedMs: performance.now() - startedAt,
      };
    };

    for (let i = 0; i < workers; i++) {
      const task: WorkerTask = {
        worker: i,
        target: { width: target.width, height: target.height, data: new Uint8ClampedArray(target.data) },
        config: { ...config, width: target.width, height: target.height },
        strategy,
        seed: `${seed}:${i}`,
        maxTrials: maxTrialsPerWorker,
        deadlineMs,
      };
      const worker = new Worker(WORKER_URL, { workerData: task });
      pool.push(worker);

      worker.on("message", (message: WorkerMessage) => {
        if (message.type === "ERROR") {
          finish({ error: new Error(`Worker ${message.worker} failed: ${message.message}`) });
          return;
        }

        results.push({ ...message.result, worker: message.worker, totalTrials: message.result.trials });
        if (message.result.found) {
          finish({ result: summarize() });
        } else if (results.length === workers) {
          finish({ result: summarize() });
        }
      });

      worker.on("error", (error) => finish({ error }));
      worker.on("exit", (code) => {
        if (!settled && code !== 0) {
          finish({ error: new Error(`Worker ${i} exited with code ${code}`) });
        }
      });
    }
  });
}
