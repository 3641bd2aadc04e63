import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { v4 as uuidv4 } from "uuid";
import type { DockingConfig } from "../runtime/config.js";
import {
  AppError,
  CancelledError,
  DockingEngineError,
  DockingTimeoutError,
  ProcessSpawnError,
  ProcessTimeoutError,
  ValidationError,
  errorMessage
} from "../runtime/errors.js";
import { createLogger } from "../runtime/logger.js";
import { runBounded, spawnProcess, type ProcessLauncher } from "../runtime/process.js";
import { Semaphore } from "../runtime/queue.js";
import { withScratchDir } from "../runtime/scratch.js";
import type { DockingBox, DockingJob, DockingJobStatus, DockingRequest, Pose } from "../types/docking.js";
import type { Structure, Vec3 } from "../types/structure.js";
import { prepareLigand } from "./ligand.js";
import { prepareReceptor } from "./receptor.js";
import { parseSmiles } from "./smiles.js";
import { parseVinaModels, parseVinaTable, rankPoses, vinaArgs } from "./vina.js";

const log = createLogger("docking");

export const MAX_HALF_EXTENT = 63;
export const MAX_POSES = 20;

export interface DockingPipelineOptions {
  config: DockingConfig;
  scratchRoot: string;
  launcher?: ProcessLauncher;
  /** Finished jobs kept for lookup. */
  historyLimit?: number;
  now?: () => number;
}

interface JobRecord {
  id: string;
  receptorId: string;
  ligand: string;
  status: DockingJobStatus;
  createdAt: number;
  startedAt: number | null;
  finishedAt: number | null;
  poses: Pose[];
  error: { code: string; message: string } | null;
  warnings: string[];
}

type Stage = "receptor" | "ligand" | "vina" | "parse";

/**
 * Receptor + SMILES → ranked poses through Open Babel and AutoDock Vina.
 * Jobs queue FIFO behind a concurrency cap; each runs in its own scratch
 * directory, removed on every exit path.
 */
export class DockingPipeline {
  private readonly config: DockingConfig;
  private readonly scratchRoot: string;
  private readonly launcher: ProcessLauncher;
  private readonly slots: Semaphore;
  private readonly historyLimit: number;
  private readonly now: () => number;
  private readonly jobs = new Map<string, JobRecord>();

  constructor(options: DockingPipelineOptions) {
    this.config = options.config;
    this.scratchRoot = options.scratchRoot;
    this.launcher = options.launcher ?? spawnProcess;
    this.slots = new Semaphore(options.config.maxConcurrent);
    this.historyLimit = options.historyLimit ?? 100;
    this.now = options.now ?? Date.now;
  }

  get running(): number {
    return this.slots.running;
  }

  get queued(): number {
    return this.slots.waiting;
  }

  /** Poses best-first. See `run` for the job record. */
  async dock(
    receptor: Structure,
    ligand: string,
    boxCenter: Vec3,
    boxHalfExtents: Vec3,
    numPoses: number,
    options: Pick<DockingRequest, "exhaustiveness" | "seed" | "signal"> = {}
  ): Promise<Pose[]> {
    const job = await this.run(receptor, { ligand, box: { center: boxCenter, halfExtents: boxHalfExtents }, numPoses, ...options });
    return [...job.poses];
  }

  /**
   * Validates the request (nothing is spawned for a bad one), then queues the
   * job. Resolves with the finished job; rejects with the job's error.
   */
  async run(receptor: Structure, request: DockingRequest): Promise<DockingJob> {
    const ligand = request.ligand.trim();
    parseSmiles(ligand);
    validateBox(request.box);
    if (!Number.isInteger(request.numPoses) || request.numPoses < 1 || request.numPoses > MAX_POSES) {
      throw new ValidationError(`numPoses must be an integer between 1 and ${MAX_POSES}`, { details: { numPoses: request.numPoses } });
    }
    const exhaustiveness = request.exhaustiveness ?? this.config.exhaustiveness;
    if (!Number.isInteger(exhaustiveness) || exhaustiveness < 1 || exhaustiveness > 64) {
      throw new ValidationError("exhaustiveness must be an integer between 1 and 64", { details: { exhaustiveness } });
    }
    const seed = request.seed ?? this.config.seed;
    if (!Number.isInteger(seed)) throw new ValidationError("seed must be an integer", { details: { seed } });
    if (request.signal?.aborted) throw new CancelledError("docking cancelled before it was queued");

    const job = this.register(receptor.id, ligand);
    const jobLog = log.child({ job: job.id, receptor: receptor.id });
    jobLog.info({ queued: this.slots.waiting, running: this.slots.running }, "docking job queued");

    try {
      const poses = await this.slots.use(async () => {
        if (request.signal?.aborted) throw new CancelledError("docking cancelled while queued");
        job.status = "preparing";
        job.startedAt = this.now();
        return withScratchDir(this.scratchRoot, "dock-", (dir) =>
          this.execute(job, dir, receptor, { ...request, ligand, exhaustiveness, seed })
        );
      });
      job.poses = poses;
      this.finish(job, "succeeded");
      jobLog.info({ poses: poses.length, best: poses[0]?.affinity, ms: this.elapsed(job) }, "docking job succeeded");
      return snapshot(job);
    } catch (err) {
      const mapped = err instanceof CancelledError ? err : toDockingError(err);
      job.error = { code: mapped.code, message: mapped.message };
      this.finish(job, mapped instanceof CancelledError ? "cancelled" : "failed");
      jobLog.warn({ err: mapped.toJSON(), ms: this.elapsed(job) }, "docking job failed");
      throw mapped;
    }
  }

  getJob(id: string): DockingJob | undefined {
    const job = this.jobs.get(id);
    return job ? snapshot(job) : undefined;
  }

  listJobs(): DockingJob[] {
    return Array.from(this.jobs.values(), snapshot);
  }

  private async execute(
    job: JobRecord,
    dir: string,
    receptor: Structure,
    request: DockingRequest & { exhaustiveness: number; seed: number }
  ): Promise<Pose[]> {
    let stage: Stage = "receptor";
    try {
      const prepared = prepareReceptor(receptor);
      const receptorPath = join(dir, "receptor.pdbqt");
      await writeFile(receptorPath, prepared.pdbqt, "utf8");
      if (prepared.dropped.hetero + prepared.dropped.waters > 0) {
        job.warnings.push(`receptor: dropped ${prepared.dropped.waters} water and ${prepared.dropped.hetero} hetero atoms`);
      }

      stage = "ligand";
      const ligand = await prepareLigand(request.ligand, dir, {
        launcher: this.launcher,
        obabelBin: this.config.obabelBin,
        timeoutMs: this.config.prepTimeoutMs,
        graceMs: this.config.shutdownGraceMs,
        signal: request.signal
      });

      stage = "vina";
      job.status = "running";
      const outPath = join(dir, "out.pdbqt");
      const result = await runBounded(
        this.launcher,
        {
          command: this.config.vinaBin,
          args: vinaArgs({
            receptorPath,
            ligandPath: ligand.path,
            outPath,
            box: request.box,
            numPoses: request.numPoses,
            exhaustiveness: request.exhaustiveness,
            seed: request.seed
          }),
          cwd: dir
        },
        { timeoutMs: this.config.timeoutMs, graceMs: this.config.shutdownGraceMs, signal: request.signal }
      );
      if (result.code !== 0) {
        throw new DockingEngineError(`vina exited with ${result.code ?? result.signal}`, result.stderr, { details: { stage } });
      }

      stage = "parse";
      let output: string;
      try {
        output = await readFile(outPath, "utf8");
      } catch (err) {
        throw new DockingEngineError(`vina wrote no output: ${errorMessage(err)}`, result.stderr, { cause: err, details: { stage } });
      }
      const ranked = rankPoses(parseVinaModels(output), parseVinaTable(result.stdout), { receptorId: receptor.id, ligand: request.ligand });
      for (const w of ranked.warnings) log.warn({ job: job.id }, w);
      job.warnings.push(...ranked.warnings);
      if (ranked.poses.length === 0) {
        throw new DockingEngineError("vina produced no poses", result.stderr, { details: { stage } });
      }
      return ranked.poses.slice(0, request.numPoses);
    } catch (err) {
      if (err instanceof AppError && err.details.stage === undefined) err.details.stage = stage;
      throw err;
    }
  }

  private register(receptorId: string, ligand: string): JobRecord {
    const job: JobRecord = {
      id: uuidv4(),
      receptorId,
      ligand,
      status: "queued",
      createdAt: this.now(),
      startedAt: null,
      finishedAt: null,
      poses: [],
      error: null,
      warnings: []
    };
    this.jobs.set(job.id, job);
    return job;
  }

  private finish(job: JobRecord, status: DockingJobStatus): void {
    job.status = status;
    job.finishedAt = this.now();
    let excess = this.jobs.size - this.historyLimit;
    for (const [id, j] of this.jobs) {
      if (excess <= 0) break;
      if (j.finishedAt !== null) {
        this.jobs.delete(id);
        excess--;
      }
    }
  }

  private elapsed(job: JobRecord): number | null {
    return job.startedAt === null ? null : this.now() - job.startedAt;
  }
}

function validateBox(box: DockingBox): void {
  if (!box.center.every(Number.isFinite)) {
    throw new ValidationError("box center must be three finite numbers", { details: { center: [...box.center] } });
  }
  if (!box.halfExtents.every((h) => Number.isFinite(h) && h > 0 && h <= MAX_HALF_EXTENT)) {
    throw new ValidationError(`box half-extents must be in (0, ${MAX_HALF_EXTENT}] Å`, { details: { halfExtents: [...box.halfExtents] } });
  }
}

/** Process-level failures become docking errors; anything already typed passes through. */
function toDockingError(err: unknown): AppError {
  if (err instanceof ProcessTimeoutError) {
    return new DockingTimeoutError(err.message, { cause: err, details: err.details });
  }
  if (err instanceof ProcessSpawnError) {
    return new DockingEngineError(err.message, "", { cause: err, details: err.details });
  }
  if (err instanceof AppError) return err;
  return new DockingEngineError(`docking failed: ${errorMessage(err)}`, "", { cause: err });
}

function snapshot(job: JobRecord): DockingJob {
  return Object.freeze({ ...job, poses: [...job.poses], warnings: [...job.warnings], error: job.error && { ...job.error } });
}
