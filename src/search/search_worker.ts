import { parentPort, workerData } from "node:worker_threads";

import { createNapiCanvasBackend } from "../render/napi_canvas.ts";
import { isWorkerTask, type WorkerMessage, type WorkerTask } from "./parallel.ts";
import { findSolutionWith } from "./restart.ts";
import { createSession } from "./session.ts";

/**
 * One independent restart search. Each worker owns its canvas and random
 * stream; the target raster arrives as a copy.
 */
function run(task: WorkerTask): WorkerMessage {
  const session = createSession({
    backend: createNapiCanvasBackend(),
    target: { kind: "raster", raster: task.target },
    config: task.config,
  });

  const result = findSolutionWith(session, task.strategy, {
    seed: task.seed,
    maxTrials: task.maxTrials,
    deadlineMs: task.deadlineMs,
  });

  return {
    type: "RESULT",
    worker: task.worker,
    result: { ...result, candidate: result.candidate.map((p) => ({ x: p.x, y: p.y })) },
  };
}

if (parentPort) {
  const port = parentPort;
  const task: unknown = workerData;
  if (!isWorkerTask(task)) {
    throw new Error("Search worker started without a valid task");
  }
  try {
    port.postMessage(run(task));
  } catch (error) {
    const message: WorkerMessage = {
      type: "ERROR",
      worker: task.worker,
      message: error instanceof Error ? `${error.name}: ${error.message}` : String(error),
    };
    port.postMessage(message);
  }
}
