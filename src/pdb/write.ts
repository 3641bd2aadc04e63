import type { Atom, Structure } from "../types/structure.js";
import { iterateAtoms } from "../utils/structure.js";

/** PDB name column: one-letter elements start in column 14, others in column 13. */
export function formatAtomName(name: string, element: string): string {
  if (name.length >= 4) return name.slice(0, 4);
  return element.length === 1 ? ` ${name.padEnd(3)}` : name.padEnd(4);
}

function num(value: number, width: number, digits: number): string {
  return value.toFixed(digits).padStart(width).slice(-width);
}

/**
 * Columns 1-66 of an ATOM/HETATM record: everything through the temperature
 * factor. Callers append the element column (PDB) or charge and type (PDBQT).
 */
export function formatAtomPrefix(atom: Atom, serial: number = atom.serial): string {
  return (
    (atom.hetero ? "HETATM" : "ATOM  ") +
    String(serial % 100000).padStart(5) +
    " " +
    formatAtomName(atom.name, atom.element) +
    " " +
    atom.resName.slice(0, 3).padStart(3) +
    " " +
    (atom.chainId || " ").slice(0, 1) +
    String(atom.resSeq).padStart(4).slice(-4) +
    (atom.iCode || " ").slice(0, 1) +
    "   " +
    num(atom.x, 8, 3) +
    num(atom.y, 8, 3) +
    num(atom.z, 8, 3) +
    num(atom.occupancy ?? 1, 6, 2) +
    num(atom.bFactor ?? 0, 6, 2)
  );
}

export function formatAtomLine(atom: Atom, serial?: number): string {
  return `${formatAtomPrefix(atom, serial)}          ${atom.element.slice(0, 2).padStart(2)}`;
}

export interface WriteOptions {
  /** Renumber serials from 1 in output order. */
  renumber?: boolean;
  /** Atom filter; every atom by default. */
  filter?: (atom: Atom) => boolean;
}

/** Serializes a Structure (or a loose atom list) as PDB text with TER records between chains. */
export function writePdb(input: Structure | readonly Atom[], options: WriteOptions = {}): string {
  const atoms = "chains" in input ? Array.from(iterateAtoms(input)) : input;
  const lines: string[] = [];
  let serial = 0;
  let lastChain: string | null = null;
  let lastPolymer: Atom | null = null;
  for (const atom of atoms) {
    if (options.filter && !options.filter(atom)) continue;
    if (lastChain !== null && atom.chainId !== lastChain && lastPolymer) {
      lines.push(terLine(lastPolymer, ++serial));
      lastPolymer = null;
    }
    serial++;
    lines.push(formatAtomLine(atom, options.renumber ? serial : atom.serial));
    lastChain = atom.chainId;
    if (!atom.hetero) lastPolymer = atom;
  }
  if (lastPolymer) lines.push(terLine(lastPolymer, ++serial));
  lines.push("END");
  return `${lines.join("\n")}\n`;
}

function terLine(atom: Atom, serial: number): string {
  return `TER   ${String(serial % 100000).padStart(5)}      ${atom.resName.slice(0, 3).padStart(3)} ${(atom.chainId || " ").slice(0, 1)}${String(atom.resSeq).padStart(4).slice(-4)}${(atom.iCode || " ").slice(0, 1)}`;
}
