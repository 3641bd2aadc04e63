import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtempSync, readdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { RenderConfig } from "../src/runtime/config.js";
import { CapacityError, RenderError, SessionStartError, ValidationError } from "../src/runtime/errors.js";
import { RenderSessionManager } from "../src/render/manager.js";
import { RenderSession } from "../src/render/session.js";
import { parseResidueLabel, residueListSpec } from "../src/render/commands.js";
import { fakeViewer, PNG_BYTES, type FakeLauncher, type FakeViewerOptions } from "./helpers/fakeProcess.js";

let scratchRoot: string;

beforeEach(() => {
  scratchRoot = mkdtempSync(join(tmpdir(), "pocketdock-render-"));
});

afterEach(() => {
  rmSync(scratchRoot, { recursive: true, force: true });
});

function createSession(viewer: FakeLauncher, overrides: { readyTimeoutMs?: number; commandTimeoutMs?: number } = {}): RenderSession {
  return new RenderSession({
    key: "conv-1",
    launcher: viewer.launcher,
    command: "chimerax",
    args: ["--nogui"],
    scratchRoot,
    readyTimeoutMs: overrides.readyTimeoutMs ?? 1_000,
    commandTimeoutMs: overrides.commandTimeoutMs ?? 1_000,
    shutdownGraceMs: 30
  });
}

const commandsOnly = (lines: readonly string[]) => lines.filter((l) => !l.startsWith("echo __"));

describe("RenderSession", () => {
  it("starts lazily and runs commands one at a time in order", async () => {
    const viewer = fakeViewer();
    const session = createSession(viewer);
    expect(session.state).toBe("uninitialized");

    const [first, second] = await Promise.all([session.execute("turn y 10\necho one"), session.execute("turn x 5")]);

    expect(first).toEqual(["one"]);
    expect(second).toEqual([]);
    expect(session.state).toBe("ready");
    expect(viewer.processes).toHaveLength(1);
    expect(viewer.processes[0].spec).toMatchObject({ command: "chimerax", args: ["--nogui"] });
    expect(commandsOnly(viewer.processes[0].received)).toEqual(["turn y 10", "echo one", "turn x 5"]);
  });

  it("reports rejected commands and stays usable", async () => {
    const viewer = fakeViewer({ rejectCommand: "swapaa" });
    const session = createSession(viewer);

    const err = await session.execute("swapaa /A:1 ALA").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RenderError);
    expect(err).toMatchObject({ message: "Unknown command: swapaa /A:1 ALA", recoverable: true });
    expect(session.state).toBe("ready");
    expect(await session.execute("echo fine")).toEqual(["fine"]);
    expect(viewer.processes).toHaveLength(1);
  });

  it("closes after a crash and reopens on the next command", async () => {
    const viewer = fakeViewer({ crashOn: "boom" });
    const session = createSession(viewer);

    await expect(session.execute("boom")).rejects.toMatchObject({ code: "RENDER", recoverable: false });
    expect(session.state).toBe("closed");
    expect(readdirSync(scratchRoot)).toEqual([]);

    expect(await session.execute("echo again")).toEqual(["again"]);
    expect(viewer.processes).toHaveLength(2);
    expect(session.view.structureId).toBeNull();
  });

  it("gives up on a command that never finishes", async () => {
    const viewer = fakeViewer({ hangOn: "wait" });
    const session = createSession(viewer, { commandTimeoutMs: 30 });

    await expect(session.execute("wait forever")).rejects.toThrow("render command timed out after 30 ms");
    expect(session.state).toBe("closed");
    expect(viewer.processes[0].signals).toEqual(["SIGTERM"]);
  });

  it("fails to start when the viewer never answers", async () => {
    const viewer = fakeViewer({ neverReady: true });
    const session = createSession(viewer, { readyTimeoutMs: 30 });

    await expect(session.execute("turn y 10")).rejects.toThrow(SessionStartError);
    expect(session.state).toBe("closed");
    expect(viewer.processes[0].hasExited).toBe(true);
    expect(readdirSync(scratchRoot)).toEqual([]);
  });

  it("returns snapshot bytes and removes the image file", async () => {
    const viewer = fakeViewer();
    const session = createSession(viewer);

    const { image, files } = await session.run(async (ctx) => {
      const bytes = await ctx.snapshot({ width: 320, height: 200 });
      return { image: bytes, files: readdirSync(ctx.workDir) };
    });

    expect(image.equals(PNG_BYTES)).toBe(true);
    expect(files).toEqual([]);
    const save = commandsOnly(viewer.processes[0].received).find((l) => l.startsWith("save "));
    expect(save).toMatch(/ width 320 height 200 supersample 3 transparentBackground false$/);
  });

  it("fails a snapshot the viewer did not write", async () => {
    const session = createSession(fakeViewer({ skipSave: true }));
    const err = await session.snapshot().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RenderError);
    expect(err).toMatchObject({ recoverable: true });
    await expect(session.snapshot({ width: 8 })).rejects.toThrow(ValidationError);
  });

  it("asks the viewer to exit on close and cleans its directory", async () => {
    const viewer = fakeViewer();
    const session = createSession(viewer);
    await session.execute("turn y 1");

    await session.close();

    expect(session.state).toBe("closed");
    expect(viewer.processes[0].received).toContain("exit");
    expect(viewer.processes[0].signals).toEqual([]);
    expect(readdirSync(scratchRoot)).toEqual([]);
  });

  it("refuses work once disposed", async () => {
    const session = createSession(fakeViewer());
    await session.dispose();
    await expect(session.execute("turn y 1")).rejects.toThrow("session 'conv-1' is closed");
  });

  it("only stages plain file names", async () => {
    const session = createSession(fakeViewer());
    await expect(session.run((ctx) => ctx.stageFile("../escape.pdb", "END\n"))).rejects.toThrow(ValidationError);
  });
});

const renderConfig: RenderConfig = {
  bin: "chimerax",
  args: ["--nogui", "--offscreen"],
  readyTimeoutMs: 1_000,
  commandTimeoutMs: 1_000,
  idleTimeoutMs: 1_000,
  reapIntervalMs: 60_000,
  shutdownGraceMs: 30,
  maxSessions: 2
};

describe("RenderSessionManager", () => {
  function createManager(options: FakeViewerOptions & { maxSessions?: number; now?: () => number } = {}) {
    const viewer = fakeViewer(options);
    const manager = new RenderSessionManager({
      config: { ...renderConfig, maxSessions: options.maxSessions ?? renderConfig.maxSessions },
      scratchRoot,
      launcher: viewer.launcher,
      now: options.now
    });
    return { manager, viewer };
  }

  it("keeps one session per key", async () => {
    const { manager, viewer } = createManager();
    await manager.execute("a", "turn y 1");
    await manager.execute("a", "turn y 2");
    await manager.execute("b", "turn y 3");
    expect(viewer.processes).toHaveLength(2);
    expect(manager.list().map((s) => [s.key, s.state])).toEqual([["a", "ready"], ["b", "ready"]]);
    await manager.closeAll();
  });

  it("refuses a session beyond the live limit until one closes", async () => {
    const { manager } = createManager({ maxSessions: 1 });
    await manager.execute("a", "turn y 1");

    await expect(manager.execute("b", "turn y 1")).rejects.toThrow(CapacityError);
    expect(manager.liveCount()).toBe(1);

    expect(await manager.closeSession("a")).toBe(true);
    expect(await manager.closeSession("a")).toBe(false);
    await expect(manager.execute("b", "echo ok")).resolves.toEqual(["ok"]);
    await manager.closeAll();
  });

  it("reaps idle sessions and reopens them on the next request", async () => {
    let clock = 0;
    const { manager, viewer } = createManager({ now: () => clock });
    await manager.execute("a", "turn y 1");

    clock = 500;
    expect(await manager.reapIdle()).toEqual([]);
    clock = 1_500;
    expect(await manager.reapIdle()).toEqual(["a"]);
    expect(viewer.processes[0].hasExited).toBe(true);
    expect(manager.has("a")).toBe(false);
    expect(manager.list()).toEqual([]);

    await manager.execute("a", "turn y 1");
    expect(viewer.processes).toHaveLength(2);
    expect(manager.has("a")).toBe(true);
    expect(manager.session("a").state).toBe("ready");
    await manager.closeAll();
  });

  it("validates session keys", () => {
    const { manager } = createManager();
    expect(() => manager.session("no spaces allowed")).toThrow(ValidationError);
  });
});

describe("viewer command helpers", () => {
  it("parses residue labels with or without a residue name", () => {
    expect(parseResidueLabel("A:25")).toEqual({ chainId: "A", seq: 25, iCode: "" });
    expect(parseResidueLabel("B:ASP100C")).toEqual({ chainId: "B", seq: 100, iCode: "C" });
    expect(() => parseResidueLabel("25")).toThrow(ValidationError);
  });

  it("groups residues by chain in first-seen order", () => {
    const residues = ["A:1", "B:7", "A:30"].map(parseResidueLabel);
    expect(residueListSpec(residues)).toBe("/A:1,30/B:7");
  });
});
