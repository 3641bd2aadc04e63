import { describe, it, expect } from "vitest";
import { elementForType, parseVinaModels, parseVinaTable, rankPoses, vinaArgs, type VinaModel } from "../src/docking/vina.js";
import { obabelArgs } from "../src/docking/ligand.js";
import { pdbqtAtom, vinaOutput, vinaTable } from "./helpers/pdbqt.js";

const context = { receptorId: "1ABC", ligand: "CCO" };

function model(n: number, affinity: number | null): VinaModel {
  return { model: n, affinity, rmsdLowerBound: null, rmsdUpperBound: null, atoms: [] };
}

describe("engine command lines", () => {
  it("passes the box as center and full size", () => {
    const args = vinaArgs({
      receptorPath: "/tmp/r.pdbqt",
      ligandPath: "/tmp/l.pdbqt",
      outPath: "/tmp/o.pdbqt",
      box: { center: [1.5, -2, 0], halfExtents: [10, 10, 7.5] },
      numPoses: 9,
      exhaustiveness: 8,
      seed: 42
    });
    expect(args).toEqual([
      "--receptor", "/tmp/r.pdbqt",
      "--ligand", "/tmp/l.pdbqt",
      "--out", "/tmp/o.pdbqt",
      "--center_x", "1.5",
      "--center_y", "-2",
      "--center_z", "0",
      "--size_x", "20",
      "--size_y", "20",
      "--size_z", "15",
      "--num_modes", "9",
      "--exhaustiveness", "8",
      "--seed", "42"
    ]);
  });

  it("asks Open Babel for a charged 3D conformer", () => {
    expect(obabelArgs("CCO", "/tmp/l.pdbqt")).toEqual(["-:CCO", "--gen3d", "-h", "--partialcharge", "gasteiger", "-opdbqt", "-O", "/tmp/l.pdbqt"]);
  });
});

describe("engine output", () => {
  it("parses the stdout result table", () => {
    expect(parseVinaTable(vinaTable([-7.1, -6.4]))).toEqual([
      { mode: 1, affinity: -7.1, rmsdLowerBound: 0, rmsdUpperBound: 0 },
      { mode: 2, affinity: -6.4, rmsdLowerBound: 1.5, rmsdUpperBound: 2 }
    ]);
  });

  it("parses models with their affinities and typed atoms", () => {
    const models = parseVinaModels(vinaOutput([-7.1, -6.4]));
    expect(models).toHaveLength(2);
    expect(models[1]).toMatchObject({ model: 2, affinity: -6.4, rmsdLowerBound: 1.5, rmsdUpperBound: 2 });
    expect(models[0].atoms[1]).toEqual({ serial: 2, name: "O1", element: "O", type: "OA", x: 2, y: 2, z: 3 });
  });

  it("treats a file without MODEL records as one model", () => {
    const text = [pdbqtAtom(1, "C1", 0, 0, 0, 0, "A"), pdbqtAtom(2, "N1", 1, 0, 0, -0.3, "NA")].join("\n");
    const models = parseVinaModels(text);
    expect(models).toHaveLength(1);
    expect(models[0].affinity).toBeNull();
    expect(models[0].atoms.map((a) => a.element)).toEqual(["C", "N"]);
  });

  it("maps AutoDock types to elements", () => {
    expect(elementForType("A")).toBe("C");
    expect(elementForType("HD")).toBe("H");
    expect(elementForType("Cl")).toBe("CL");
    expect(elementForType("F")).toBe("F");
  });
});

describe("rankPoses", () => {
  it("sorts by affinity and reports an engine order that disagrees", () => {
    const { poses, warnings } = rankPoses([model(1, -6.5), model(2, -7.2)], [], context);
    expect(poses.map((p) => [p.rank, p.engineRank, p.affinity])).toEqual([[1, 2, -7.2], [2, 1, -6.5]]);
    expect(warnings).toEqual(["engine order 1,2 differs from affinity order 2,1"]);
  });

  it("keeps engine order for ties", () => {
    const { poses, warnings } = rankPoses([model(1, -7), model(2, -7)], [], context);
    expect(poses.map((p) => p.engineRank)).toEqual([1, 2]);
    expect(warnings).toEqual([]);
  });

  it("prefers file affinities and fills gaps from the table", () => {
    const table = [
      { mode: 1, affinity: -6, rmsdLowerBound: 0, rmsdUpperBound: 0 },
      { mode: 2, affinity: -5.5, rmsdLowerBound: 1, rmsdUpperBound: 2 },
      { mode: 3, affinity: -5, rmsdLowerBound: 2, rmsdUpperBound: 3 }
    ];
    const { poses, warnings } = rankPoses([model(1, -6.5), model(2, null), model(4, null)], table, context);
    expect(poses.map((p) => p.affinity)).toEqual([-6.5, -5.5]);
    expect(poses[1]).toMatchObject({ rmsdLowerBound: 1, rmsdUpperBound: 2, receptorId: "1ABC", ligand: "CCO" });
    expect(warnings).toEqual([
      "model 1: output file reports -6.5, stdout table reports -6; using -6.5",
      "model 4 has no affinity and was skipped",
      "table mode 3 has no coordinates in the output file"
    ]);
  });
});
