import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { NotFoundError, ValidationError } from "../src/runtime/errors.js";
import { parseResidueLabel } from "../src/render/commands.js";
import { RenderSessionManager } from "../src/render/manager.js";
import { RenderController } from "../src/render/view.js";
import { RcsbProvider } from "../src/store/providers.js";
import { StructureStore } from "../src/store/structureStore.js";
import type { Pose } from "../src/types/docking.js";
import { fakeHttp } from "./helpers/fakeHttp.js";
import { fakeViewer, PNG_BYTES, type FakeLauncher } from "./helpers/fakeProcess.js";

const RCSB = "https://files.test/download";
const pdbText = readFileSync(new URL("./fixtures/mini.pdb", import.meta.url), "utf8");

let scratchRoot: string;
let viewer: FakeLauncher;
let manager: RenderSessionManager;
let controller: RenderController;

beforeEach(() => {
  scratchRoot = mkdtempSync(join(tmpdir(), "pocketdock-view-"));
  viewer = fakeViewer();
  manager = new RenderSessionManager({
    config: {
      bin: "chimerax",
      args: ["--nogui"],
      readyTimeoutMs: 1_000,
      commandTimeoutMs: 1_000,
      idleTimeoutMs: 60_000,
      reapIntervalMs: 60_000,
      shutdownGraceMs: 30,
      maxSessions: 4
    },
    scratchRoot,
    launcher: viewer.launcher
  });
  const { http } = fakeHttp({ [`${RCSB}/1ABC.pdb`]: { data: pdbText } });
  controller = new RenderController(manager, new StructureStore({ providers: [new RcsbProvider(http, RCSB)] }));
});

afterEach(async () => {
  await manager.closeAll();
  rmSync(scratchRoot, { recursive: true, force: true });
});

const sent = () => viewer.processes.flatMap((p) => p.received).filter((l) => !l.startsWith("echo __"));

function pose(receptorId: string): Pose {
  return {
    receptorId,
    ligand: "CCO",
    rank: 1,
    engineRank: 1,
    affinity: -6.1,
    rmsdLowerBound: 0,
    rmsdUpperBound: 0,
    atoms: [
      { serial: 1, name: "C1", element: "C", type: "C", x: 1, y: 2, z: 3 },
      { serial: 2, name: "O1", element: "O", type: "OA", x: 2, y: 2, z: 3 }
    ]
  };
}

describe("RenderController", () => {
  it("opens a structure from the store and returns an image", async () => {
    const result = await controller.openStructure("s1", "1abc");

    expect(result.image.equals(PNG_BYTES)).toBe(true);
    expect(result.view).toMatchObject({ structureId: "1ABC", representation: "cartoon", highlighted: [] });
    expect(sent().some((l) => /^open \S+\/1ABC\.pdb format pdb$/.test(l))).toBe(true);
    expect(sent()[0]).toBe("close all");
  });

  it("reports a missing accession before touching the viewer", async () => {
    await expect(controller.openStructure("s1", "9ZZZ")).rejects.toThrow(NotFoundError);
    expect(viewer.processes).toEqual([]);
  });

  it("needs an open structure for view changes", async () => {
    await expect(controller.rotate("s2", "y", 90)).rejects.toThrow("no structure is open in session 's2'");
  });

  it("tracks rotation, representation, mutations and highlights", async () => {
    await controller.openStructure("s1", "1ABC");

    await controller.rotate("s1", "y", 90);
    expect((await controller.rotate("s1", "y", -180)).view.rotation).toEqual({ x: 0, y: 270, z: 0 });

    const surface = await controller.setRepresentation("s1", "surface", 0.3);
    expect(surface.view).toMatchObject({ representation: "surface", transparency: 0.3 });
    expect((await controller.setRepresentation("s1", "stick")).view.transparency).toBe(0);

    const mutated = await controller.mutateResidue("s1", parseResidueLabel("A:3"), "ala");
    expect(mutated.view.mutations).toEqual(["A:3->ALA"]);

    const highlighted = await controller.highlightResidues("s1", ["A:1", "A:2", "B:1"].map(parseResidueLabel), "Blue");
    expect(highlighted.view.highlighted).toEqual(["A:1", "A:2", "B:1"]);

    expect(sent()).toEqual(
      expect.arrayContaining(["turn y 90", "turn y -180", "transparency 30", "style stick", "swapaa /A:3 ALA", "color /A:1,2/B:1 blue"])
    );
  });

  it("rejects invalid view changes", async () => {
    await controller.openStructure("s1", "1ABC");
    await expect(controller.mutateResidue("s1", parseResidueLabel("A:3"), "XYZ")).rejects.toThrow(ValidationError);
    await expect(controller.highlightResidues("s1", [])).rejects.toThrow("at least one residue is required");
    await expect(controller.highlightResidues("s1", [parseResidueLabel("A:1")], "not a color")).rejects.toThrow(ValidationError);
  });

  it("shows a docking pose beside its receptor", async () => {
    await controller.openStructure("s1", "1ABC");
    const result = await controller.showPose("s1", "job-1", pose("1ABC"));
    expect(result.view.pose).toEqual({ jobId: "job-1", rank: 1 });
    expect(sent()).toContain("style :LIG stick");
    await expect(controller.showPose("s1", "job-2", pose("2XYZ"))).rejects.toThrow(ValidationError);
  });

  it("forgets the scene after the session closes", async () => {
    await controller.openStructure("s1", "1ABC");
    expect(await controller.close("s1")).toBe(true);
    const { view } = await controller.snapshot("s1");
    expect(view.structureId).toBeNull();
  });
});
