import { existsSync } from "node:fs";
import { availableParallelism } from "node:os";
import { fileURLToPath } from "node:url";
import { Worker } from "node:worker_threads";
import { createLogger } from "../runtime/logger.js";
import { sampleOcclusion, type OcclusionInput, type OcclusionTask } from "./occlusion.js";

const log = createLogger("occlusion");

const workerUrl = new URL("./occlusionWorker.js", import.meta.url);

// Only the compiled tree ships the worker module; running from sources samples in-thread.
const workerAvailable = (() => {
  try {
    return workerUrl.protocol === "file:" && existsSync(fileURLToPath(workerUrl));
  } catch (err) {
    log.debug({ err }, "occlusion worker unavailable");
    return false;
  }
})();

export interface OcclusionPoolOptions {
  /** Number of batches; defaults to the machine's available parallelism. */
  parallelism?: number;
  /** Fewer candidates than this are always sampled in-thread. */
  workerThreshold?: number;
}

export function defaultParallelism(): number {
  return Math.max(1, Math.min(8, availableParallelism() - 1));
}

/** Contiguous [start, end) ranges covering `total`, at most `parts` of them. */
export function partition(total: number, parts: number): Array<[number, number]> {
  const n = Math.max(1, Math.min(parts, total));
  const step = Math.ceil(total / n);
  const out: Array<[number, number]> = [];
  for (let start = 0; start < total; start += step) out.push([start, Math.min(total, start + step)]);
  return out;
}

/**
 * Buriedness for every candidate voxel. Candidates are split into contiguous
 * batches sampled independently and merged in batch order, so the result does
 * not depend on the degree of parallelism or on whether workers were used.
 */
export async function computeBuriedness(input: OcclusionInput, options: OcclusionPoolOptions = {}): Promise<Float32Array> {
  const total = input.candidates.length;
  const out = new Float32Array(total);
  if (total === 0) return out;
  const batches = partition(total, options.parallelism ?? defaultParallelism());
  const useWorkers = workerAvailable && batches.length > 1 && total >= (options.workerThreshold ?? 50_000);

  if (useWorkers) {
    const results = await runAllBatches(batches, ([start, end]) => runWorker({ input, start, end }));
    results.forEach((part, b) => out.set(part, batches[b][0]));
    log.debug({ candidates: total, workers: batches.length }, "occlusion sampled in workers");
  } else {
    // Fallback to local processing in this thread, batch by batch
    for (const [start, end] of batches) out.set(sampleOcclusion(input, start, end), start);
  }
  return out;
}

/** A batch in flight that can be stopped before it settles. */
export interface BatchRun {
  result: Promise<Float32Array>;
  terminate(): void;
}

/** Starts every batch; when one fails the others are stopped and the failure propagates. */
export async function runAllBatches(
  batches: ReadonlyArray<[number, number]>,
  start: (range: [number, number]) => BatchRun
): Promise<Float32Array[]> {
  const runs = batches.map(start);
  try {
    return await Promise.all(runs.map((r) => r.result));
  } catch (err) {
    for (const r of runs) r.terminate();
    throw err;
  }
}

function runWorker(task: OcclusionTask): BatchRun {
  const worker = new Worker(workerUrl, { workerData: task });
  const result = new Promise<Float32Array>((resolve, reject) => {
    worker.once("message", (msg: unknown) => {
      if (msg instanceof Float32Array && msg.length === task.end - task.start) resolve(msg);
      else reject(new Error("occlusion worker returned an unexpected payload"));
    });
    worker.once("error", reject);
    worker.once("exit", (code) => {
      if (code !== 0) reject(new Error(`occlusion worker exited with code ${code}`));
    });
  });
  return {
    result,
    terminate: () => {
      worker.terminate().catch((err: unknown) => log.warn({ err, start: task.start }, "failed to stop occlusion worker"));
    }
  };
}
