import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { mkdtempSync, readdirSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parsePdb } from "../src/pdb/parse.js";
import type { DockingConfig } from "../src/runtime/config.js";
import { CancelledError, DockingEngineError, DockingTimeoutError, InvalidLigandError, ValidationError } from "../src/runtime/errors.js";
import { DockingPipeline } from "../src/docking/pipeline.js";
import type { DockingRequest } from "../src/types/docking.js";
import { fakeLauncher, type FakeProcess } from "./helpers/fakeProcess.js";
import { argAfter, fakeDockingTools, obabelOk, vinaOk } from "./helpers/fakeDocking.js";

const receptor = parsePdb(readFileSync(new URL("./fixtures/mini.pdb", import.meta.url), "utf8"));

const config: DockingConfig = {
  vinaBin: "vina",
  obabelBin: "obabel",
  timeoutMs: 5_000,
  prepTimeoutMs: 5_000,
  maxConcurrent: 2,
  exhaustiveness: 8,
  seed: 42,
  shutdownGraceMs: 50
};

const request: DockingRequest = { ligand: "CCO", box: { center: [5, 2, 0], halfExtents: [10, 10, 10] }, numPoses: 9 };

let scratchRoot: string;

beforeEach(() => {
  scratchRoot = mkdtempSync(join(tmpdir(), "pocketdock-dock-"));
});

afterEach(() => {
  rmSync(scratchRoot, { recursive: true, force: true });
});

function createPipeline(launcher: ReturnType<typeof fakeLauncher>["launcher"], overrides: Partial<DockingConfig> = {}) {
  return new DockingPipeline({ config: { ...config, ...overrides }, scratchRoot, launcher });
}

describe("DockingPipeline", () => {
  it("prepares both partners, runs the engine and ranks poses", async () => {
    let receptorText = "";
    const { launcher, processes } = fakeLauncher((proc) => {
      if (proc.spec.command === "obabel") return obabelOk(proc);
      proc.onStdinEnd(() => {
        receptorText = readFileSync(argAfter(proc, "--receptor"), "utf8");
        vinaOk(proc, [-7.1, -6.4]);
      });
    });
    const pipeline = createPipeline(launcher);

    const job = await pipeline.run(receptor, { ...request, ligand: " CCO " });

    expect(processes.map((p) => p.spec.command)).toEqual(["obabel", "vina"]);
    expect(processes[0].spec.args[0]).toBe("-:CCO");
    expect(argAfter(processes[1], "--seed")).toBe("42");
    expect(argAfter(processes[1], "--size_x")).toBe("20");
    expect(receptorText.split("\n")[0]).toBe("REMARK  receptor 1ABC");
    expect(job.status).toBe("succeeded");
    expect(job.ligand).toBe("CCO");
    expect(job.poses.map((p) => [p.rank, p.affinity])).toEqual([[1, -7.1], [2, -6.4]]);
    expect(job.poses[0].atoms).toHaveLength(2);
    expect(job.warnings).toEqual(["receptor: dropped 1 water and 2 hetero atoms"]);
    expect(pipeline.getJob(job.id)?.status).toBe("succeeded");
    expect(readdirSync(scratchRoot)).toEqual([]);
  });

  it("returns at most the requested number of poses from dock", async () => {
    const { launcher } = fakeDockingTools([-6.2, -8.3, -7.5]);
    const poses = await createPipeline(launcher).dock(receptor, "CCO", [0, 0, 0], [8, 8, 8], 2, { seed: 7 });
    expect(poses.map((p) => p.affinity)).toEqual([-8.3, -7.5]);
    expect(poses.map((p) => p.engineRank)).toEqual([2, 3]);
  });

  it("rejects malformed notation before launching anything", async () => {
    const { launcher, processes } = fakeLauncher(() => undefined);
    const pipeline = createPipeline(launcher);
    await expect(pipeline.run(receptor, { ...request, ligand: "C1CC(" })).rejects.toThrow(InvalidLigandError);
    expect(processes).toEqual([]);
    expect(pipeline.listJobs()).toEqual([]);
  });

  it("validates the box and pose count", async () => {
    const { launcher, processes } = fakeLauncher(() => undefined);
    const pipeline = createPipeline(launcher);
    await expect(pipeline.run(receptor, { ...request, box: { center: [0, 0, 0], halfExtents: [0, 5, 5] } })).rejects.toThrow(ValidationError);
    await expect(pipeline.run(receptor, { ...request, numPoses: 0 })).rejects.toThrow(ValidationError);
    await expect(pipeline.run(receptor, { ...request, exhaustiveness: 100 })).rejects.toThrow(ValidationError);
    expect(processes).toEqual([]);
  });

  it("stops an engine that runs past the timeout and leaves nothing behind", async () => {
    const { launcher, processes } = fakeLauncher((proc) => {
      if (proc.spec.command === "obabel") return obabelOk(proc);
      // never answers
    });
    const pipeline = createPipeline(launcher, { timeoutMs: 30 });

    await expect(pipeline.run(receptor, request)).rejects.toThrow(DockingTimeoutError);

    expect(processes).toHaveLength(2);
    expect(processes.every((p) => p.hasExited)).toBe(true);
    expect(processes[1].signals).toEqual(["SIGTERM"]);
    expect(readdirSync(scratchRoot)).toEqual([]);
    const [job] = pipeline.listJobs();
    expect(job.status).toBe("failed");
    expect(job.error?.code).toBe("DOCKING_TIMEOUT");
  });

  it("reports engine failures with their diagnostic output", async () => {
    const { launcher } = fakeLauncher((proc) => {
      if (proc.spec.command === "obabel") return obabelOk(proc);
      proc.onStdinEnd(() => {
        proc.printErr("ERROR: search space too large");
        proc.exit(1);
      });
    });
    await expect(createPipeline(launcher).run(receptor, request)).rejects.toMatchObject({
      code: "DOCKING_ENGINE",
      message: "vina exited with 1",
      stderr: "ERROR: search space too large\n"
    });
  });

  it("fails at ligand preparation when no conformer is written", async () => {
    const { launcher, processes } = fakeLauncher((proc) => proc.onStdinEnd(() => proc.exit(0)));
    const err = await createPipeline(launcher).run(receptor, request).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DockingEngineError);
    expect(err).toMatchObject({ details: { stage: "ligand" } });
    expect(processes).toHaveLength(1);
  });

  it("queues jobs beyond the concurrency cap in arrival order", async () => {
    const waiting: FakeProcess[] = [];
    const { launcher } = fakeLauncher((proc) => {
      if (proc.spec.command === "obabel") return obabelOk(proc);
      proc.onStdinEnd(() => waiting.push(proc));
    });
    const pipeline = createPipeline(launcher, { maxConcurrent: 1 });
    const finished: string[] = [];

    const first = pipeline.run(receptor, request).then((job) => finished.push(job.ligand));
    const second = pipeline.run(receptor, { ...request, ligand: "CCN" }).then((job) => finished.push(job.ligand));

    await vi.waitFor(() => expect(waiting).toHaveLength(1));
    expect(pipeline.running).toBe(1);
    expect(pipeline.queued).toBe(1);
    vinaOk(waiting[0], [-5]);
    await first;
    await vi.waitFor(() => expect(waiting).toHaveLength(2));
    vinaOk(waiting[1], [-6]);
    await second;

    expect(finished).toEqual(["CCO", "CCN"]);
    expect(pipeline.running).toBe(0);
  });

  it("cancels a running job and records it", async () => {
    const controller = new AbortController();
    const { launcher, processes } = fakeLauncher((proc) => {
      if (proc.spec.command === "obabel") return obabelOk(proc);
      proc.onStdinEnd(() => controller.abort());
    });
    const pipeline = createPipeline(launcher);

    await expect(pipeline.run(receptor, { ...request, signal: controller.signal })).rejects.toThrow(CancelledError);

    expect(processes[1].hasExited).toBe(true);
    expect(pipeline.listJobs()[0].status).toBe("cancelled");
    expect(readdirSync(scratchRoot)).toEqual([]);
  });

  it("does not queue an already cancelled request", async () => {
    const { launcher, processes } = fakeLauncher(() => undefined);
    const controller = new AbortController();
    controller.abort();
    await expect(createPipeline(launcher).run(receptor, { ...request, signal: controller.signal })).rejects.toThrow(CancelledError);
    expect(processes).toEqual([]);
  });
});
