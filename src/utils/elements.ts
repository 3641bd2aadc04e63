interface ElementInfo {
  mass: number; // g/mol
  vdw: number; // Å
}

// Common biochem elements only; anything else falls back to carbon-ish values.
const ELEMENTS: Record<string, ElementInfo> = {
  H: { mass: 1.008, vdw: 1.2 },
  B: { mass: 10.81, vdw: 1.92 },
  C: { mass: 12.011, vdw: 1.7 },
  N: { mass: 14.007, vdw: 1.55 },
  O: { mass: 15.999, vdw: 1.52 },
  F: { mass: 18.998, vdw: 1.47 },
  NA: { mass: 22.99, vdw: 2.27 },
  MG: { mass: 24.305, vdw: 1.73 },
  SI: { mass: 28.085, vdw: 2.1 },
  P: { mass: 30.974, vdw: 1.8 },
  S: { mass: 32.06, vdw: 1.8 },
  CL: { mass: 35.45, vdw: 1.75 },
  K: { mass: 39.098, vdw: 2.75 },
  CA: { mass: 40.078, vdw: 2.31 },
  MN: { mass: 54.938, vdw: 2.0 },
  FE: { mass: 55.845, vdw: 1.8 },
  CO: { mass: 58.933, vdw: 2.0 },
  NI: { mass: 58.693, vdw: 1.63 },
  CU: { mass: 63.546, vdw: 1.4 },
  ZN: { mass: 65.38, vdw: 1.39 },
  SE: { mass: 78.971, vdw: 1.9 },
  BR: { mass: 79.904, vdw: 1.85 },
  I: { mass: 126.904, vdw: 1.98 }
};

export function isKnownElement(symbol: string): boolean {
  return ELEMENTS[symbol.toUpperCase()] != null;
}

export function inferElementSymbol(elementField: string | undefined, atomNameField: string | undefined): string {
  // Prefer the explicit element column when present
  const ef = (elementField || "").trim().replace(/[^A-Za-z]/g, "");
  if (ef.length === 1 || ef.length === 2) return ef.toUpperCase();

  // Otherwise infer from the atom name: digits and leading junk stripped, two-letter symbols first
  const an = (atomNameField || "").trim().replace(/^[0-9]+/, "");
  if (!an) return "C";
  const two = an.slice(0, 2).toUpperCase();
  // Names like "CA"/"CD" in polymers are carbons, not calcium/cadmium; a two-letter
  // symbol is only trusted when the name is that symbol alone (ions, e.g. "ZN").
  if (an.length === 2 && ELEMENTS[two] != null && atomNameField != null && /^\S\S/.test(atomNameField)) return two;
  const one = an[0]?.toUpperCase() ?? "C";
  return ELEMENTS[one] != null ? one : "C";
}

export function vdwRadius(symbol: string): number {
  return ELEMENTS[symbol.toUpperCase()]?.vdw ?? 1.7;
}

export function atomicMass(symbol: string): number {
  return ELEMENTS[symbol.toUpperCase()]?.mass ?? 12.011;
}

export const STANDARD_AMINO_ACIDS: ReadonlySet<string> = new Set([
  "ALA", "ARG", "ASN", "ASP", "CYS", "GLN", "GLU", "GLY", "HIS", "ILE",
  "LEU", "LYS", "MET", "PHE", "PRO", "SER", "THR", "TRP", "TYR", "VAL"
]);

export const WATER_NAMES: ReadonlySet<string> = new Set(["HOH", "WAT", "H2O", "DOD", "TIP", "TIP3", "SOL"]);

export const HYDROPHOBIC_RESIDUES: ReadonlySet<string> = new Set(["ALA", "VAL", "LEU", "ILE", "MET", "PHE", "TRP", "PRO", "CYS"]);

export function isWater(resName: string): boolean {
  return WATER_NAMES.has(resName.toUpperCase());
}

export function isStandardResidue(resName: string): boolean {
  return STANDARD_AMINO_ACIDS.has(resName.toUpperCase());
}
