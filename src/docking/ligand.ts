import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { DockingEngineError, errorMessage } from "../runtime/errors.js";
import { runBounded, type ProcessLauncher } from "../runtime/process.js";

export interface LigandPrepOptions {
  launcher: ProcessLauncher;
  obabelBin: string;
  timeoutMs: number;
  graceMs: number;
  signal?: AbortSignal;
}

export interface PreparedLigand {
  path: string;
  atomCount: number;
}

export function obabelArgs(smiles: string, outPath: string): string[] {
  return [`-:${smiles}`, "--gen3d", "-h", "--partialcharge", "gasteiger", "-opdbqt", "-O", outPath];
}

/** 3D conformer with hydrogens and Gasteiger charges, written by Open Babel as ligand.pdbqt in `dir`. */
export async function prepareLigand(smiles: string, dir: string, options: LigandPrepOptions): Promise<PreparedLigand> {
  const path = join(dir, "ligand.pdbqt");
  const result = await runBounded(
    options.launcher,
    { command: options.obabelBin, args: obabelArgs(smiles, path), cwd: dir },
    { timeoutMs: options.timeoutMs, graceMs: options.graceMs, signal: options.signal }
  );
  if (result.code !== 0) {
    throw new DockingEngineError(`ligand preparation failed (exit ${result.code ?? result.signal})`, result.stderr, {
      details: { stage: "ligand" }
    });
  }
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new DockingEngineError(`ligand preparation wrote no file: ${errorMessage(err)}`, result.stderr, { cause: err, details: { stage: "ligand" } });
  }
  const atomCount = text.split(/\r?\n/).filter((line) => line.startsWith("ATOM") || line.startsWith("HETATM")).length;
  if (atomCount === 0) {
    throw new DockingEngineError("ligand preparation produced no atoms", result.stderr, { details: { stage: "ligand" } });
  }
  return { path, atomCount };
}
