import type { DockingBox, Pose, PoseAtom } from "../types/docking.js";
import { parseFloatSafe, parseIntSafe, slice } from "../pdb/parse.js";

export interface VinaRun {
  receptorPath: string;
  ligandPath: string;
  outPath: string;
  box: DockingBox;
  numPoses: number;
  exhaustiveness: number;
  seed: number;
}

export function vinaArgs(run: VinaRun): string[] {
  const [cx, cy, cz] = run.box.center;
  const [hx, hy, hz] = run.box.halfExtents;
  return [
    "--receptor", run.receptorPath,
    "--ligand", run.ligandPath,
    "--out", run.outPath,
    "--center_x", fmt(cx),
    "--center_y", fmt(cy),
    "--center_z", fmt(cz),
    "--size_x", fmt(2 * hx),
    "--size_y", fmt(2 * hy),
    "--size_z", fmt(2 * hz),
    "--num_modes", String(run.numPoses),
    "--exhaustiveness", String(run.exhaustiveness),
    "--seed", String(run.seed)
  ];
}

function fmt(n: number): string {
  return String(Math.round(n * 1000) / 1000);
}

export interface VinaTableRow {
  mode: number;
  affinity: number;
  rmsdLowerBound: number;
  rmsdUpperBound: number;
}

const TABLE_ROW = /^\s*(\d+)\s+(-?\d+(?:\.\d+)?)\s+(\d+(?:\.\d+)?)\s+(\d+(?:\.\d+)?)\s*$/;

/** The mode / affinity / rmsd table Vina prints on stdout. */
export function parseVinaTable(stdout: string): VinaTableRow[] {
  const rows: VinaTableRow[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    const m = TABLE_ROW.exec(line);
    if (!m) continue;
    rows.push({ mode: Number(m[1]), affinity: Number(m[2]), rmsdLowerBound: Number(m[3]), rmsdUpperBound: Number(m[4]) });
  }
  return rows;
}

export interface VinaModel {
  model: number;
  affinity: number | null;
  rmsdLowerBound: number | null;
  rmsdUpperBound: number | null;
  atoms: PoseAtom[];
}

const TYPE_ELEMENTS: Readonly<Record<string, string>> = { A: "C", OA: "O", NA: "N", NS: "N", HD: "H", HS: "H", SA: "S", CL: "CL", BR: "BR" };

/** AutoDock type to element symbol (A → C, OA → O, HD → H, ...). */
export function elementForType(type: string): string {
  const t = type.toUpperCase();
  return TYPE_ELEMENTS[t] ?? t.replace(/[^A-Z]/g, "").slice(0, 2);
}

/**
 * Models of a Vina output PDBQT. A file without MODEL records is one model.
 * Affinities come from `REMARK VINA RESULT` lines when present.
 */
export function parseVinaModels(pdbqt: string): VinaModel[] {
  const models: VinaModel[] = [];
  let current: VinaModel | null = null;
  const start = (n: number): VinaModel => {
    const m: VinaModel = { model: n, affinity: null, rmsdLowerBound: null, rmsdUpperBound: null, atoms: [] };
    models.push(m);
    return m;
  };

  for (const line of pdbqt.split(/\r?\n/)) {
    if (line.startsWith("MODEL")) {
      current = start(parseIntSafe(line.slice(5)) ?? models.length + 1);
    } else if (line.startsWith("ENDMDL")) {
      current = null;
    } else if (line.startsWith("REMARK VINA RESULT:")) {
      const model: VinaModel = current ?? start(models.length + 1);
      current = model;
      const [affinity, lb, ub] = line.slice("REMARK VINA RESULT:".length).trim().split(/\s+/).map(parseFloatSafe);
      model.affinity = affinity ?? null;
      model.rmsdLowerBound = lb ?? null;
      model.rmsdUpperBound = ub ?? null;
    } else if (line.startsWith("ATOM") || line.startsWith("HETATM")) {
      const model: VinaModel = current ?? start(models.length + 1);
      current = model;
      const x = parseFloatSafe(slice(line, 30, 38));
      const y = parseFloatSafe(slice(line, 38, 46));
      const z = parseFloatSafe(slice(line, 46, 54));
      if (x === null || y === null || z === null) continue;
      const type = slice(line, 77, 79).trim() || slice(line, 12, 16).trim().replace(/\d/g, "").slice(0, 1);
      model.atoms.push({
        serial: parseIntSafe(slice(line, 6, 11)) ?? model.atoms.length + 1,
        name: slice(line, 12, 16).trim(),
        element: elementForType(type),
        type,
        x,
        y,
        z
      });
    }
  }
  return models.filter((m) => m.atoms.length > 0);
}

export interface RankedPoses {
  poses: Pose[];
  warnings: string[];
}

/**
 * Joins output models with the stdout table and ranks them. Affinities
 * attached to coordinates win over the table; disagreements are reported.
 * Poses are sorted by affinity ascending, ties kept in engine order.
 */
export function rankPoses(models: readonly VinaModel[], table: readonly VinaTableRow[], context: { receptorId: string; ligand: string }): RankedPoses {
  const warnings: string[] = [];
  const rows = new Map(table.map((r) => [r.mode, r]));
  const scored: Array<Omit<Pose, "rank">> = [];

  for (const m of models) {
    const row = rows.get(m.model);
    let affinity = m.affinity;
    if (affinity === null) {
      if (!row) {
        warnings.push(`model ${m.model} has no affinity and was skipped`);
        continue;
      }
      affinity = row.affinity;
    } else if (row && Math.abs(row.affinity - affinity) > 0.05) {
      warnings.push(`model ${m.model}: output file reports ${affinity}, stdout table reports ${row.affinity}; using ${affinity}`);
    }
    scored.push({
      receptorId: context.receptorId,
      ligand: context.ligand,
      engineRank: m.model,
      affinity,
      rmsdLowerBound: m.rmsdLowerBound ?? row?.rmsdLowerBound ?? 0,
      rmsdUpperBound: m.rmsdUpperBound ?? row?.rmsdUpperBound ?? 0,
      atoms: m.atoms
    });
  }
  for (const row of table) {
    if (!models.some((m) => m.model === row.mode)) warnings.push(`table mode ${row.mode} has no coordinates in the output file`);
  }

  const engineOrder = scored.map((p) => p.engineRank);
  const sorted = scored.slice().sort((a, b) => a.affinity - b.affinity || a.engineRank - b.engineRank);
  if (sorted.some((p, i) => p.engineRank !== engineOrder[i])) {
    warnings.push(`engine order ${engineOrder.join(",")} differs from affinity order ${sorted.map((p) => p.engineRank).join(",")}`);
  }
  return { poses: sorted.map((p, i) => ({ ...p, rank: i + 1 })), warnings };
}
