import { EmptyPocketError, InvalidLigandError, ValidationError } from "../runtime/errors.js";
import type { ResidueRef } from "../types/structure.js";
import { parseSmiles, type SmilesMolecule } from "./smiles.js";

export const FRAGMENT_LIBRARY_VERSION = "1";
export const MAX_CANDIDATES = 50;

export type PocketCharacter = "charged" | "aromatic" | "polar" | "hydrophobic";

// Tie order when two characters count the same.
const CHARACTERS: readonly PocketCharacter[] = ["charged", "aromatic", "polar", "hydrophobic"];

const RESIDUE_CLASSES: Readonly<Record<PocketCharacter, ReadonlySet<string>>> = {
  charged: new Set(["ASP", "GLU", "LYS", "ARG", "HIS"]),
  aromatic: new Set(["PHE", "TYR", "TRP", "HIS"]),
  polar: new Set(["SER", "THR", "ASN", "GLN", "CYS"]),
  hydrophobic: new Set(["ALA", "VAL", "LEU", "ILE", "MET", "PRO"])
};

/**
 * A fragment joins the chain through its first atom (head) and its last
 * main-chain atom (tail); a flag is false where that atom has no free valence.
 */
export interface Fragment {
  readonly smiles: string;
  readonly character: PocketCharacter;
  readonly head: boolean;
  readonly tail: boolean;
}

const frag = (smiles: string, character: PocketCharacter, head = true, tail = true): Fragment => ({ smiles, character, head, tail });

export const FRAGMENTS: readonly Fragment[] = [
  frag("C(=O)[O-]", "charged", true, false),
  frag("C(=O)O", "charged"),
  frag("[NH3+]", "charged", true, false),
  frag("C(=N)N", "charged"),
  frag("c1cc[nH]c1", "charged"),
  frag("c1ccccc1", "aromatic"),
  frag("c1ccncc1", "aromatic"),
  frag("c1ccc2[nH]ccc2c1", "aromatic"),
  frag("c1ccoc1", "aromatic"),
  frag("c1ccsc1", "aromatic"),
  frag("O", "polar"),
  frag("N", "polar"),
  frag("C(=O)N", "polar"),
  frag("CO", "polar"),
  frag("CS", "polar"),
  frag("C(=O)", "polar"),
  frag("NC(=O)", "polar"),
  frag("C", "hydrophobic"),
  frag("CC", "hydrophobic"),
  frag("C(C)C", "hydrophobic"),
  frag("C1CCCCC1", "hydrophobic"),
  frag("C1CCC1", "hydrophobic")
];

// The dominant character's fragments come first, then the classes that pair well with it.
const POOLS: Readonly<Record<PocketCharacter, readonly PocketCharacter[]>> = {
  charged: ["charged", "polar"],
  aromatic: ["aromatic", "polar"],
  polar: ["polar", "charged", "aromatic"],
  hydrophobic: ["hydrophobic", "aromatic"]
};

export const LIPINSKI = { maxMolecularWeight: 500, maxDonors: 5, maxAcceptors: 10 } as const;

export interface Candidate {
  smiles: string;
  fragments: string[];
  molecularWeight: number;
  hBondDonors: number;
  hBondAcceptors: number;
  heavyAtomCount: number;
}

export interface CandidateSet {
  libraryVersion: string;
  seed: number;
  character: Record<PocketCharacter, number>;
  dominant: PocketCharacter;
  attempts: number;
  candidates: Candidate[];
}

/** FNV-1a, 32 bit. */
export function hashString(text: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/** mulberry32: small seeded PRNG with uniform output in [0, 1). */
export function createRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Residue name from a pocket label such as `A:ASP25`, `ASP25` or a bare `ASP`. */
export function residueNameFromLabel(label: string): string {
  const m = /^(?:[A-Za-z0-9]{1,4}:)?([A-Za-z]{3})-?\d*[A-Za-z]?$/.exec(label.trim());
  if (!m) throw new ValidationError(`unrecognized residue label '${label}'`);
  return m[1].toUpperCase();
}

export function classifyResidues(names: readonly string[]): Record<PocketCharacter, number> {
  const counts: Record<PocketCharacter, number> = { charged: 0, aromatic: 0, polar: 0, hydrophobic: 0 };
  for (const name of names) {
    for (const c of CHARACTERS) if (RESIDUE_CLASSES[c].has(name)) counts[c]++;
  }
  return counts;
}

/** Ties go to the earlier class; a pocket with no classified residues counts as charged. */
export function dominantCharacter(counts: Readonly<Record<PocketCharacter, number>>): PocketCharacter {
  let best: PocketCharacter = "charged";
  let max = 0;
  for (const c of CHARACTERS) {
    if (counts[c] > max) {
      max = counts[c];
      best = c;
    }
  }
  return best;
}

function passesLipinski(m: SmilesMolecule): boolean {
  return m.molecularWeight <= LIPINSKI.maxMolecularWeight && m.hBondDonors <= LIPINSKI.maxDonors && m.hBondAcceptors <= LIPINSKI.maxAcceptors;
}

/**
 * Fragment-based ligand suggestions for a pocket. Pure and deterministic:
 * the PRNG seed is a hash of the library version and the sorted residue
 * names, so the same residues give the same candidates in the same order.
 */
export function generateCandidates(residues: ReadonlyArray<string | ResidueRef>, count = 10): CandidateSet {
  if (residues.length === 0) throw new EmptyPocketError("cannot generate candidates for a pocket without residues");
  const n = Math.max(1, Math.min(MAX_CANDIDATES, Math.floor(Number.isFinite(count) ? count : 10)));
  const names = residues.map((r) => (typeof r === "string" ? residueNameFromLabel(r) : r.name.toUpperCase()));
  const sorted = [...names].sort();
  const seed = hashString(`${FRAGMENT_LIBRARY_VERSION}|${sorted.join(",")}`);
  const random = createRandom(seed);
  const pick = <T>(items: readonly T[]): T => items[Math.floor(random() * items.length)];

  const character = classifyResidues(names);
  const dominant = dominantCharacter(character);
  const pool = POOLS[dominant].flatMap((c) => FRAGMENTS.filter((f) => f.character === c));

  const seen = new Set<string>();
  const candidates: Candidate[] = [];
  const maxAttempts = n * 20;
  let attempts = 0;
  while (candidates.length < n && attempts < maxAttempts) {
    attempts++;
    const length = 2 + Math.floor(random() * 4);
    const parts: Fragment[] = [];
    for (let p = 0; p < length; p++) {
      const eligible = pool.filter((f) => (p === 0 || f.head) && (p === length - 1 || f.tail));
      parts.push(pick(eligible));
    }
    const smiles = parts.map((f) => f.smiles).join("");
    if (seen.has(smiles)) continue;
    seen.add(smiles);

    let molecule: SmilesMolecule;
    try {
      molecule = parseSmiles(smiles);
    } catch (err) {
      if (err instanceof InvalidLigandError) continue;
      throw err;
    }
    if (!passesLipinski(molecule)) continue;
    candidates.push({
      smiles,
      fragments: parts.map((f) => f.smiles),
      molecularWeight: Math.round(molecule.molecularWeight * 100) / 100,
      hBondDonors: molecule.hBondDonors,
      hBondAcceptors: molecule.hBondAcceptors,
      heavyAtomCount: molecule.heavyAtomCount
    });
  }

  return { libraryVersion: FRAGMENT_LIBRARY_VERSION, seed, character, dominant, attempts, candidates };
}
