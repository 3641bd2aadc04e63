import { InvalidLigandError } from "../runtime/errors.js";
import { atomicMass, isKnownElement } from "../utils/elements.js";

export const MAX_SMILES_LENGTH = 500;

export type BondOrder = 1 | 1.5 | 2 | 3 | 4;

export interface SmilesAtom {
  readonly index: number;
  /** Upper-case element symbol (C, CL, SE). */
  readonly element: string;
  readonly aromatic: boolean;
  readonly bracket: boolean;
  readonly charge: number;
  readonly isotope: number | null;
  /** Explicit for bracket atoms, implied by valence otherwise. */
  readonly hydrogens: number;
  /** Offset of the atom in the input. */
  readonly position: number;
}

export interface SmilesBond {
  readonly a: number;
  readonly b: number;
  readonly order: BondOrder;
  readonly position: number;
}

export interface SmilesMolecule {
  readonly smiles: string;
  readonly atoms: readonly SmilesAtom[];
  readonly bonds: readonly SmilesBond[];
  readonly ringClosures: number;
  readonly heavyAtomCount: number;
  /** g/mol, standard atomic weights. */
  readonly molecularWeight: number;
  /** Hydrogens on N and O. */
  readonly hBondDonors: number;
  /** N and O atoms. */
  readonly hBondAcceptors: number;
}

interface AtomDraft {
  element: string;
  aromatic: boolean;
  bracket: boolean;
  charge: number;
  isotope: number | null;
  hcount: number;
  position: number;
}

interface PendingBond {
  order: BondOrder;
  position: number;
}

interface OpenRing {
  atom: number;
  bond: PendingBond | null;
  position: number;
}

const BOND_ORDERS: Readonly<Record<string, BondOrder>> = { "-": 1, "=": 2, "#": 3, $: 4, ":": 1.5, "/": 1, "\\": 1 };

// Allowed valences of the organic subset, lowest first.
const ORGANIC_VALENCES: Readonly<Record<string, readonly number[]>> = {
  B: [3],
  C: [4],
  N: [3, 5],
  O: [2],
  P: [3, 5],
  S: [2, 4, 6],
  F: [1],
  CL: [1],
  BR: [1],
  I: [1]
};

// Bonds an unbracketed aromatic atom may carry; one valence unit goes to the ring's pi system for b, c, n and p.
const AROMATIC_MAX_BONDS: Readonly<Record<string, number>> = { B: 2, C: 3, N: 3, O: 2, P: 3, S: 2 };

const BASE_VALENCE: Readonly<Record<string, number>> = {
  H: 1, B: 3, C: 4, SI: 4, N: 3, P: 3, O: 2, S: 2, SE: 2, F: 1, CL: 1, BR: 1, I: 1
};

const AROMATIC_BRACKET = ["se", "b", "c", "n", "o", "p", "s"];

function fail(message: string, position: number | null): never {
  throw new InvalidLigandError(message, position);
}

/**
 * Parses and validates a SMILES string: syntax (atoms, bracket atoms, bonds,
 * branches, ring closures including %nn), aromatic atoms confined to rings,
 * valence limits and a single connected component. Throws
 * InvalidLigandError with the offending offset.
 */
export function parseSmiles(input: string): SmilesMolecule {
  if (typeof input !== "string" || input.length === 0) fail("ligand notation is empty", null);
  if (input.length > MAX_SMILES_LENGTH) fail(`ligand notation exceeds ${MAX_SMILES_LENGTH} characters`, MAX_SMILES_LENGTH);

  const atoms: AtomDraft[] = [];
  const bonds: SmilesBond[] = [];
  const branches: Array<{ atom: number; position: number }> = [];
  const rings = new Map<number, OpenRing>();
  const bonded = new Set<string>();
  let prev: number | null = null;
  let pending: PendingBond | null = null;
  let ringClosures = 0;
  let i = 0;

  const addBond = (a: number, b: number, order: BondOrder, position: number) => {
    const key = a < b ? `${a}-${b}` : `${b}-${a}`;
    if (bonded.has(key)) fail("duplicate bond between the same atoms", position);
    bonded.add(key);
    bonds.push({ a, b, order, position });
  };

  const addAtom = (atom: AtomDraft) => {
    const index = atoms.length;
    atoms.push(atom);
    if (prev !== null) {
      const order = pending?.order ?? (atoms[prev].aromatic && atom.aromatic ? 1.5 : 1);
      addBond(prev, index, order, pending?.position ?? atom.position);
    }
    pending = null;
    prev = index;
  };

  while (i < input.length) {
    const ch = input[i];
    if (/\s/.test(ch)) fail("whitespace is not allowed", i);

    if (ch === "(") {
      if (prev === null) fail("branch without a preceding atom", i);
      if (pending) fail("bond before a branch", pending.position);
      if (input[i + 1] === ")") fail("empty branch", i);
      branches.push({ atom: prev, position: i });
      i++;
      continue;
    }
    if (ch === ")") {
      const open = branches.pop();
      if (!open) fail("unmatched ')'", i);
      if (pending) fail("bond without a following atom", pending.position);
      prev = open.atom;
      i++;
      continue;
    }
    if (ch in BOND_ORDERS) {
      if (prev === null) fail("bond without a preceding atom", i);
      if (pending) fail("consecutive bonds", i);
      pending = { order: BOND_ORDERS[ch], position: i };
      i++;
      continue;
    }
    if (ch === ".") fail("disconnected components are not supported", i);
    if (ch === "*") fail("wildcard atoms are not supported", i);

    if (ch === "%" || (ch >= "0" && ch <= "9")) {
      const position = i;
      if (prev === null) fail("ring closure without a preceding atom", i);
      let label: number;
      if (ch === "%") {
        const digits = input.slice(i + 1, i + 3);
        if (!/^\d\d$/.test(digits)) fail("'%' must be followed by two digits", i);
        label = Number(digits);
        i += 3;
      } else {
        label = Number(ch);
        i++;
      }
      const open = rings.get(label);
      if (open) {
        if (open.atom === prev) fail("ring closure to the same atom", position);
        if (open.bond && pending && open.bond.order !== pending.order) fail("conflicting ring closure bonds", position);
        const explicit = pending ?? open.bond;
        const order = explicit?.order ?? (atoms[open.atom].aromatic && atoms[prev].aromatic ? 1.5 : 1);
        addBond(open.atom, prev, order, position);
        rings.delete(label);
        ringClosures++;
      } else {
        rings.set(label, { atom: prev, bond: pending, position });
      }
      pending = null;
      continue;
    }

    if (ch === "[") {
      const { atom, next } = parseBracketAtom(input, i);
      addAtom(atom);
      i = next;
      continue;
    }

    const organic = readOrganic(input, i);
    if (!organic) fail(`unexpected character '${ch}'`, i);
    addAtom({ element: organic.element, aromatic: organic.aromatic, bracket: false, charge: 0, isotope: null, hcount: 0, position: i });
    i += organic.length;
  }

  if (atoms.length === 0) fail("ligand notation contains no atoms", 0);
  if (pending !== null) fail("bond without a following atom", pending.position);
  const unclosedBranch = branches.pop();
  if (unclosedBranch) fail("unclosed branch", unclosedBranch.position);
  for (const [label, open] of rings) fail(`unclosed ring ${label}`, open.position);

  return finish(input, atoms, bonds, ringClosures);
}

export function isValidSmiles(input: string): boolean {
  try {
    parseSmiles(input);
    return true;
  } catch (err) {
    if (err instanceof InvalidLigandError) return false;
    throw err;
  }
}

function readOrganic(input: string, i: number): { element: string; aromatic: boolean; length: number } | null {
  const two = input.slice(i, i + 2);
  if (two === "Cl" || two === "Br") return { element: two.toUpperCase(), aromatic: false, length: 2 };
  const ch = input[i];
  if ("BCNOPSFI".includes(ch)) return { element: ch, aromatic: false, length: 1 };
  if ("bcnops".includes(ch)) return { element: ch.toUpperCase(), aromatic: true, length: 1 };
  return null;
}

function parseBracketAtom(input: string, start: number): { atom: AtomDraft; next: number } {
  const close = input.indexOf("]", start);
  if (close < 0) fail("unterminated bracket atom", start);
  const body = input.slice(start + 1, close);
  let j = 0;
  const at = () => start + 1 + j;

  const iso = /^\d+/.exec(body);
  const isotope = iso ? Number(iso[0]) : null;
  if (iso) j += iso[0].length;

  let element: string | null = null;
  let aromatic = false;
  for (const sym of AROMATIC_BRACKET) {
    if (body.startsWith(sym, j)) {
      element = sym.toUpperCase();
      aromatic = true;
      j += sym.length;
      break;
    }
  }
  if (!element) {
    const symbolAt = at();
    const m = /^[A-Z][a-z]?/.exec(body.slice(j));
    if (!m) fail("bracket atom without an element symbol", symbolAt);
    if (m[0].length === 2 && isKnownElement(m[0])) {
      element = m[0].toUpperCase();
      j += 2;
    } else {
      element = m[0][0];
      j += 1;
    }
    if (!isKnownElement(element)) fail(`unknown element '${m[0]}'`, symbolAt);
  }

  const chiral = /^@+/.exec(body.slice(j));
  if (chiral) j += chiral[0].length;

  let hcount = 0;
  const h = /^H(\d?)/.exec(body.slice(j));
  if (h) {
    hcount = h[1] ? Number(h[1]) : 1;
    j += h[0].length;
  }

  let charge = 0;
  const c = /^([+-])(\d+|\1*)/.exec(body.slice(j));
  if (c) {
    const sign = c[1] === "+" ? 1 : -1;
    const magnitude = /^\d+$/.test(c[2]) ? Number(c[2]) : c[2].length + 1;
    charge = sign * magnitude;
    j += c[0].length;
  }

  const cls = /^:\d+/.exec(body.slice(j));
  if (cls) j += cls[0].length;

  if (j !== body.length) fail(`unexpected '${body[j]}' in bracket atom`, at());
  return { atom: { element, aromatic, bracket: true, charge, isotope, hcount, position: start }, next: close + 1 };
}

function bracketMaxValence(element: string, charge: number): number | null {
  const base = BASE_VALENCE[element];
  if (base === undefined) return null;
  if (element === "C" || element === "SI") return 4 - Math.abs(charge);
  if (element === "B") return base - charge;
  // hypervalent P, S and Se may expand beyond their base valence
  const expanded = element === "P" ? 5 : element === "S" || element === "SE" ? 6 : base;
  return expanded + charge;
}

function finish(smiles: string, drafts: AtomDraft[], bonds: SmilesBond[], ringClosures: number): SmilesMolecule {
  const bondSum = new Array<number>(drafts.length).fill(0);
  // double bonds from an aromatic atom to a non-aromatic one (ring carbonyls such as 2-pyridone)
  const exocyclicDouble = new Array<number>(drafts.length).fill(0);
  for (const b of bonds) {
    const units = b.order === 1.5 ? 1 : b.order;
    bondSum[b.a] += units;
    bondSum[b.b] += units;
    if (b.order === 2 && drafts[b.a].aromatic !== drafts[b.b].aromatic) {
      exocyclicDouble[drafts[b.a].aromatic ? b.a : b.b]++;
    }
  }

  const inRing = ringMembership(drafts.length, bonds);
  const atoms: SmilesAtom[] = drafts.map((d, index) => {
    if (d.aromatic && !inRing[index]) fail("aromatic atom outside a ring", d.position);
    const sum = bondSum[index];
    let hydrogens: number;
    if (d.bracket) {
      const max = bracketMaxValence(d.element, d.charge);
      if (max !== null && sum + d.hcount > max) fail(`valence exceeded on ${d.element}`, d.position);
      hydrogens = d.hcount;
    } else if (d.aromatic) {
      // one exocyclic double bond takes the pi unit
      const exo = exocyclicDouble[index] > 0 ? 1 : 0;
      const max = (AROMATIC_MAX_BONDS[d.element] ?? 0) + exo;
      if (sum > max) fail(`valence exceeded on aromatic ${d.element.toLowerCase()}`, d.position);
      hydrogens = d.element === "C" ? Math.max(0, 3 + exo - sum) : 0;
    } else {
      const allowed = ORGANIC_VALENCES[d.element] ?? [];
      const valence = allowed.find((v) => v >= sum);
      if (valence === undefined) fail(`valence exceeded on ${d.element}`, d.position);
      hydrogens = valence - sum;
    }
    return {
      index,
      element: d.element,
      aromatic: d.aromatic,
      bracket: d.bracket,
      charge: d.charge,
      isotope: d.isotope,
      hydrogens,
      position: d.position
    };
  });

  let mass = 0;
  let donors = 0;
  let acceptors = 0;
  let heavy = 0;
  for (const a of atoms) {
    mass += atomicMass(a.element) + a.hydrogens * atomicMass("H");
    if (a.element !== "H") heavy++;
    if (a.element === "N" || a.element === "O") {
      acceptors++;
      donors += a.hydrogens;
    }
  }

  return {
    smiles,
    atoms,
    bonds,
    ringClosures,
    heavyAtomCount: heavy,
    molecularWeight: Math.round(mass * 1000) / 1000,
    hBondDonors: donors,
    hBondAcceptors: acceptors
  };
}

/** An atom is in a ring when at least one of its bonds is not a bridge. */
function ringMembership(count: number, bonds: readonly SmilesBond[]): boolean[] {
  const adj: Array<Array<{ to: number; bond: number }>> = Array.from({ length: count }, () => []);
  bonds.forEach((b, k) => {
    adj[b.a].push({ to: b.b, bond: k });
    adj[b.b].push({ to: b.a, bond: k });
  });
  const disc = new Array<number>(count).fill(-1);
  const low = new Array<number>(count).fill(0);
  const bridge = new Array<boolean>(bonds.length).fill(false);
  let time = 0;

  // iterative DFS; the graph is connected by construction
  const stack: Array<{ v: number; parentBond: number; next: number }> = [{ v: 0, parentBond: -1, next: 0 }];
  disc[0] = low[0] = time++;
  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    if (top.next < adj[top.v].length) {
      const { to, bond } = adj[top.v][top.next++];
      if (bond === top.parentBond) continue;
      if (disc[to] === -1) {
        disc[to] = low[to] = time++;
        stack.push({ v: to, parentBond: bond, next: 0 });
      } else {
        low[top.v] = Math.min(low[top.v], disc[to]);
      }
    } else {
      stack.pop();
      const parent = stack[stack.length - 1];
      if (parent) {
        low[parent.v] = Math.min(low[parent.v], low[top.v]);
        if (low[top.v] > disc[parent.v]) bridge[top.parentBond] = true;
      }
    }
  }

  const inRing = new Array<boolean>(count).fill(false);
  bonds.forEach((b, k) => {
    if (!bridge[k]) inRing[b.a] = inRing[b.b] = true;
  });
  return inRing;
}
