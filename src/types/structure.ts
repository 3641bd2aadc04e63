export type Vec3 = readonly [number, number, number];

export type StructureSource = "experimental" | "predicted";

export interface Atom {
  readonly serial: number;
  readonly name: string; // trimmed, e.g. CA, OG1
  readonly element: string; // upper-case symbol, e.g. C, FE
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly resName: string;
  readonly resSeq: number;
  readonly iCode: string; // "" when absent
  readonly chainId: string;
  readonly hetero: boolean;
  readonly occupancy: number | null;
  readonly bFactor: number | null;
}

export interface Residue {
  readonly chainId: string;
  readonly seq: number;
  readonly iCode: string;
  readonly name: string;
  readonly hetero: boolean;
  readonly atoms: readonly Atom[];
}

export interface Chain {
  readonly id: string;
  readonly residues: readonly Residue[];
}

/** Identifies a residue without carrying its atoms. */
export interface ResidueRef {
  readonly chainId: string;
  readonly seq: number;
  readonly iCode: string;
  readonly name: string;
}

export interface StructureMetadata {
  readonly title?: string;
  readonly method?: string;
  /** Å, experimental entries only. */
  readonly resolution?: number;
  /** Mean per-residue confidence (pLDDT, 0-100), predicted entries only. */
  readonly confidence?: number;
  readonly modelId?: string;
  readonly organism?: string;
  readonly gene?: string;
  readonly modelCount?: number;
  readonly warnings: readonly string[];
}

export interface Structure {
  readonly id: string;
  readonly source: StructureSource;
  readonly chains: readonly Chain[];
  readonly atomCount: number;
  readonly metadata: StructureMetadata;
}
