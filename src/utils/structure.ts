import type { Atom, Chain, Residue, ResidueRef, Structure, StructureMetadata, StructureSource } from "../types/structure.js";
import { NotFoundError, ValidationError } from "../runtime/errors.js";
import { isStandardResidue, isWater } from "./elements.js";

export function residueKey(r: { chainId: string; seq: number; iCode: string }): string {
  return `${r.chainId}|${r.seq}|${r.iCode}`;
}

export function toResidueRef(r: { chainId: string; seq: number; iCode: string; name: string }): ResidueRef {
  return { chainId: r.chainId, seq: r.seq, iCode: r.iCode, name: r.name };
}

/** Chain id, then sequence number, then insertion code. */
export function compareResidueRefs(a: ResidueRef, b: ResidueRef): number {
  if (a.chainId !== b.chainId) return a.chainId < b.chainId ? -1 : 1;
  if (a.seq !== b.seq) return a.seq - b.seq;
  if (a.iCode !== b.iCode) return a.iCode < b.iCode ? -1 : 1;
  return 0;
}

/** e.g. "A:ASP25" or "A:GLY52B" */
export function formatResidueLabel(r: ResidueRef): string {
  return `${r.chainId}:${r.name}${r.seq}${r.iCode}`;
}

/**
 * Groups atoms into chains and residues in order of first appearance and
 * freezes the result. Residue numbers that go backwards within a chain are
 * reported as warnings.
 */
export function createStructure(
  id: string,
  source: StructureSource,
  atoms: readonly Atom[],
  metadata: Omit<StructureMetadata, "warnings"> & { warnings?: readonly string[] } = {}
): Structure {
  const warnings = [...(metadata.warnings ?? [])];
  const chainOrder: string[] = [];
  const residuesByChain = new Map<string, Array<{ ref: ResidueRef; hetero: boolean; atoms: Atom[] }>>();
  const residueByKey = new Map<string, { ref: ResidueRef; hetero: boolean; atoms: Atom[] }>();

  for (const atom of atoms) {
    let chainResidues = residuesByChain.get(atom.chainId);
    if (!chainResidues) {
      chainResidues = [];
      residuesByChain.set(atom.chainId, chainResidues);
      chainOrder.push(atom.chainId);
    }
    const key = `${residueKey({ chainId: atom.chainId, seq: atom.resSeq, iCode: atom.iCode })}|${atom.resName}`;
    let residue = residueByKey.get(key);
    if (!residue) {
      residue = { ref: { chainId: atom.chainId, seq: atom.resSeq, iCode: atom.iCode, name: atom.resName }, hetero: atom.hetero, atoms: [] };
      residueByKey.set(key, residue);
      const prev = chainResidues[chainResidues.length - 1];
      if (prev && atom.resSeq < prev.ref.seq) {
        warnings.push(`Chain ${atom.chainId}: residue ${atom.resName}${atom.resSeq} follows ${prev.ref.name}${prev.ref.seq}`);
      }
      chainResidues.push(residue);
    }
    residue.atoms.push(Object.isFrozen(atom) ? atom : Object.freeze({ ...atom }));
  }

  const chains: Chain[] = chainOrder.map((chainId) => {
    const residues: Residue[] = (residuesByChain.get(chainId) ?? []).map((r) =>
      Object.freeze({ ...r.ref, hetero: r.hetero, atoms: Object.freeze(r.atoms) })
    );
    return Object.freeze({ id: chainId, residues: Object.freeze(residues) });
  });

  return Object.freeze({
    id,
    source,
    chains: Object.freeze(chains),
    atomCount: atoms.length,
    metadata: Object.freeze({ ...metadata, warnings: Object.freeze(Array.from(new Set(warnings))) })
  });
}

export function* iterateAtoms(structure: Structure): Generator<Atom> {
  for (const chain of structure.chains) for (const residue of chain.residues) yield* residue.atoms;
}

export function allAtoms(structure: Structure): Atom[] {
  return Array.from(iterateAtoms(structure));
}

/**
 * "*" or "all" selects every chain; otherwise a chain id, a comma/space
 * separated list, or an array of ids. Returns null for "every chain".
 */
export type ChainSelector = string | readonly string[];

export function parseChainSelector(selector: ChainSelector): ReadonlySet<string> | null {
  const parts = typeof selector === "string" ? selector.split(/[,\s]+/) : [...selector];
  const ids = parts.map((p) => p.trim()).filter((p) => p.length > 0);
  if (ids.some((id) => id === "*" || id.toLowerCase() === "all")) return null;
  return new Set(ids);
}

export interface SelectOptions {
  includeHetero?: boolean;
  includeWater?: boolean;
}

export function selectAtoms(structure: Structure, selector: ChainSelector, options: SelectOptions = {}): Atom[] {
  const chains = parseChainSelector(selector);
  const out: Atom[] = [];
  for (const chain of structure.chains) {
    if (chains && !chains.has(chain.id)) continue;
    for (const residue of chain.residues) {
      if (isWater(residue.name)) {
        if (!options.includeWater) continue;
      } else if (residue.hetero && !options.includeHetero) continue;
      for (const atom of residue.atoms) out.push(atom);
    }
  }
  return out;
}

export function findResidue(structure: Structure, chainId: string, seq: number, iCode = ""): Residue | undefined {
  const chain = structure.chains.find((c) => c.id === chainId);
  return chain?.residues.find((r) => r.seq === seq && r.iCode === iCode);
}

export type ResidueKind = "standard" | "hetero" | "water";

export interface ResidueSummary extends ResidueRef {
  kind: ResidueKind;
  atomCount: number;
}

export interface ChainResidues {
  chainId: string;
  residues: ResidueSummary[];
  counts: Record<ResidueKind, number>;
}

export function residueKind(residue: Residue): ResidueKind {
  if (isWater(residue.name)) return "water";
  return residue.hetero || !isStandardResidue(residue.name) ? "hetero" : "standard";
}

/** Residue inventory per chain; an unknown chain id is a NotFoundError. */
export function listResidues(structure: Structure, chainId?: string): ChainResidues[] {
  const chains = chainId == null ? structure.chains : structure.chains.filter((c) => c.id === chainId);
  if (chainId != null && chains.length === 0) {
    throw new NotFoundError(`chain ${chainId} not found in ${structure.id}`, {
      details: { available: structure.chains.map((c) => c.id) }
    });
  }
  return chains.map((chain) => {
    const counts: Record<ResidueKind, number> = { standard: 0, hetero: 0, water: 0 };
    const residues = chain.residues.map((r) => {
      const kind = residueKind(r);
      counts[kind]++;
      return { ...toResidueRef(r), kind, atomCount: r.atoms.length };
    });
    return { chainId: chain.id, residues, counts };
  });
}

const BACKBONE_KEEP = new Set(["N", "CA", "C", "O", "OXT", "H", "H1", "H2", "H3", "HA"]);

/**
 * Point substitution: returns a new Structure in which the residue carries
 * `newName` and keeps only the atoms both residues share (backbone and CB,
 * no CB for glycine). The input structure is untouched.
 */
export function substituteResidue(structure: Structure, chainId: string, seq: number, newName: string, iCode = ""): Structure {
  const name = newName.trim().toUpperCase();
  if (!isStandardResidue(name)) throw new ValidationError(`${newName} is not a standard amino acid`);
  const target = findResidue(structure, chainId, seq, iCode);
  if (!target) throw new NotFoundError(`residue ${chainId}:${seq}${iCode} not found in ${structure.id}`);
  if (target.hetero || !isStandardResidue(target.name)) {
    throw new ValidationError(`residue ${formatResidueLabel(target)} is not an amino acid`);
  }

  const atoms: Atom[] = [];
  for (const atom of iterateAtoms(structure)) {
    if (atom.chainId !== chainId || atom.resSeq !== seq || atom.iCode !== iCode) {
      atoms.push(atom);
      continue;
    }
    const keep = BACKBONE_KEEP.has(atom.name) || (atom.name === "CB" && name !== "GLY");
    if (keep) atoms.push(Object.freeze({ ...atom, resName: name }));
  }
  const note = `substituted ${formatResidueLabel(target)} -> ${name}`;
  return createStructure(structure.id, structure.source, atoms, {
    ...structure.metadata,
    warnings: [...structure.metadata.warnings, note]
  });
}
