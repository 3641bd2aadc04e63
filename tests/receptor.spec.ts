import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parsePdb } from "../src/pdb/parse.js";
import { ValidationError } from "../src/runtime/errors.js";
import { autodockType, estimateCharge, prepareReceptor } from "../src/docking/receptor.js";
import { createStructure } from "../src/utils/structure.js";

const structure = parsePdb(readFileSync(fileURLToPath(new URL("./fixtures/mini.pdb", import.meta.url)), "utf8"));

describe("prepareReceptor", () => {
  const prepared = prepareReceptor(structure);
  const lines = prepared.pdbqt.trimEnd().split("\n");

  it("keeps polymer atoms and polar hydrogens only", () => {
    expect(prepared.atomCount).toBe(21);
    expect(prepared.dropped).toEqual({ waters: 1, hetero: 2, hydrogens: 1 });
  });

  it("writes typed, charged PDBQT records chain by chain", () => {
    expect(lines.slice(0, 2)).toEqual(["REMARK  receptor 1ABC", "REMARK  estimated partial charges"]);
    expect(lines[2]).toBe("ATOM      1  N   ALA A   1       0.000   0.000   0.000  1.00  0.00    -0.348 N ");
    expect(lines[12]).toBe("ATOM     11  H   SER A   3       5.700   4.700   0.000  1.00  0.00     0.272 HD");
    expect(lines[18]).toBe("TER");
    expect(lines[lines.length - 2]).toBe("TER");
    expect(lines[lines.length - 1]).toBe("END");
    expect(lines).toHaveLength(26);
  });

  it("assigns AutoDock types per atom", () => {
    const ser = lines.filter((l) => l.slice(17, 20) === "SER").map((l) => l.slice(77).trim());
    expect(ser).toEqual(["N", "HD", "C", "C", "OA", "C", "OA"]);
  });

  it("refuses a structure without polymer atoms", () => {
    const water = createStructure("WAT1", "experimental", [
      { serial: 1, name: "O", element: "O", x: 0, y: 0, z: 0, resName: "HOH", resSeq: 1, iCode: "", chainId: "A", hetero: true, occupancy: 1, bFactor: 0 }
    ]);
    expect(() => prepareReceptor(water)).toThrow(ValidationError);
  });
});

describe("atom typing", () => {
  it("distinguishes acceptor nitrogens and aromatic carbons", () => {
    expect(autodockType({ element: "N", name: "ND1", resName: "HIS" })).toBe("NA");
    expect(autodockType({ element: "N", name: "NZ", resName: "LYS" })).toBe("N");
    expect(autodockType({ element: "C", name: "CZ", resName: "PHE" })).toBe("A");
    expect(autodockType({ element: "C", name: "CZ", resName: "ARG" })).toBe("C");
    expect(autodockType({ element: "S", name: "SD", resName: "MET" })).toBe("SA");
    expect(autodockType({ element: "H", name: "HA", resName: "SER" })).toBe("H");
  });

  it.each([
    ["ARG", "NE", "N"],
    ["ARG", "NH1", "N"],
    ["ARG", "NH2", "N"],
    ["ASN", "ND2", "N"],
    ["GLN", "NE2", "N"],
    ["HIS", "ND1", "NA"],
    ["HIS", "NE2", "NA"],
    ["LYS", "NZ", "N"],
    ["TRP", "NE1", "N"]
  ])("types %s %s as %s", (resName, name, type) => {
    expect(autodockType({ element: "N", name, resName })).toBe(type);
  });

  it("types every sulfur as an acceptor", () => {
    expect(autodockType({ element: "S", name: "SG", resName: "CYS" })).toBe("SA");
    expect(autodockType({ element: "S", name: "SD", resName: "MET" })).toBe("SA");
  });

  it("prefers backbone charges over element estimates", () => {
    expect(estimateCharge({ element: "O", name: "O" })).toBe(-0.5679);
    expect(estimateCharge({ element: "O", name: "OG" })).toBe(-0.5);
    expect(estimateCharge({ element: "ZN", name: "ZN" })).toBe(0);
  });
});
