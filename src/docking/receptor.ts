import { formatAtomPrefix } from "../pdb/write.js";
import { ValidationError } from "../runtime/errors.js";
import type { Atom, Residue, Structure } from "../types/structure.js";
import { isWater } from "../utils/elements.js";

// Atom-name charges for the polypeptide backbone; side chains fall back to per-element estimates.
const NAME_CHARGES: Readonly<Record<string, number>> = {
  CA: -0.0178,
  CB: -0.0312,
  N: -0.3479,
  O: -0.5679,
  OXT: -0.8014,
  H: 0.2719,
  HN: 0.2719
};

const ELEMENT_CHARGES: Readonly<Record<string, number>> = {
  C: 0.0,
  N: -0.35,
  O: -0.5,
  S: -0.12,
  H: 0.15,
  P: 0.4
};

const AROMATIC_RESIDUES = new Set(["PHE", "TYR", "TRP", "HIS"]);
const AROMATIC_CARBONS = new Set(["CG", "CD1", "CD2", "CE1", "CE2", "CZ", "CE3", "CZ2", "CZ3", "CH2"]);
// N-H nitrogens donate but do not accept; HIS ring nitrogens are handled separately.
const DONOR_ONLY_NITROGENS = new Set(["N", "NZ", "NH1", "NH2", "NE", "ND2", "NE2", "NE1"]);

const POLAR_H_BOND = 1.3;

/** AutoDock atom type for a receptor atom. `polarH` is decided from geometry by the caller. */
export function autodockType(atom: Pick<Atom, "element" | "name" | "resName">, polarH = false): string {
  const name = atom.name.toUpperCase();
  switch (atom.element) {
    case "H":
      return polarH ? "HD" : "H";
    case "O":
      return "OA";
    case "N":
      if (atom.resName === "HIS" && (name === "ND1" || name === "NE2")) return "NA";
      return DONOR_ONLY_NITROGENS.has(name) ? "N" : "NA";
    case "S":
      return "SA";
    case "C":
      return AROMATIC_RESIDUES.has(atom.resName) && AROMATIC_CARBONS.has(name) ? "A" : "C";
    case "CL":
      return "Cl";
    case "BR":
      return "Br";
    default:
      return atom.element;
  }
}

export function estimateCharge(atom: Pick<Atom, "element" | "name">): number {
  return NAME_CHARGES[atom.name.toUpperCase()] ?? ELEMENT_CHARGES[atom.element] ?? 0;
}

/** Columns 1-66 from PDB, charge in 71-76, AutoDock type in 78-79. */
export function formatPdbqtLine(atom: Atom, serial: number, charge: number, type: string): string {
  return `${formatAtomPrefix(atom, serial)}    ${charge.toFixed(3).padStart(6)} ${type.padEnd(2)}`;
}

export interface PreparedReceptor {
  pdbqt: string;
  atomCount: number;
  dropped: { waters: number; hetero: number; hydrogens: number };
}

/**
 * Receptor PDBQT: polymer atoms only, without waters, hetero groups and
 * non-polar hydrogens, typed and charged per atom. A hydrogen counts as polar
 * when its nearest heavy atom in the same residue is N or O.
 */
export function prepareReceptor(structure: Structure): PreparedReceptor {
  const lines = [`REMARK  receptor ${structure.id}`, "REMARK  estimated partial charges"];
  const dropped = { waters: 0, hetero: 0, hydrogens: 0 };
  let serial = 0;

  for (const chain of structure.chains) {
    let wrote = false;
    for (const residue of chain.residues) {
      if (isWater(residue.name)) {
        dropped.waters += residue.atoms.length;
        continue;
      }
      for (const atom of residue.atoms) {
        if (atom.hetero) {
          dropped.hetero++;
          continue;
        }
        let polarH = false;
        if (atom.element === "H") {
          polarH = isPolarHydrogen(atom, residue);
          if (!polarH) {
            dropped.hydrogens++;
            continue;
          }
        }
        lines.push(formatPdbqtLine(atom, ++serial, estimateCharge(atom), autodockType(atom, polarH)));
        wrote = true;
      }
    }
    if (wrote) lines.push("TER");
  }

  if (serial === 0) {
    throw new ValidationError(`structure ${structure.id} has no polymer atoms to dock against`, { details: { structure: structure.id, dropped } });
  }
  lines.push("END");
  return { pdbqt: `${lines.join("\n")}\n`, atomCount: serial, dropped };
}

function isPolarHydrogen(h: Atom, residue: Residue): boolean {
  let best: Atom | null = null;
  let bestD2 = POLAR_H_BOND * POLAR_H_BOND;
  for (const other of residue.atoms) {
    if (other === h || other.element === "H") continue;
    const dx = other.x - h.x, dy = other.y - h.y, dz = other.z - h.z;
    const d2 = dx * dx + dy * dy + dz * dz;
    if (d2 <= bestD2) {
      bestD2 = d2;
      best = other;
    }
  }
  return best !== null && (best.element === "N" || best.element === "O");
}
