import type { Atom, Structure, StructureMetadata, StructureSource } from "../types/structure.js";
import { ParseError } from "../runtime/errors.js";
import { WarningCollector } from "../utils/warnings.js";
import { inferElementSymbol } from "../utils/elements.js";
import { createStructure } from "../utils/structure.js";

export interface ParseOptions {
  id?: string;
  source?: StructureSource;
  // When multiple altLocs exist for the same atom site:
  // 'all' => keep all sites as independent atoms; 'occupancy' => keep only the highest-occupancy site
  altLocPolicy?: "all" | "occupancy";
  // Select which MODEL to parse (1-based). If no MODEL records are present, the whole file is considered model 1.
  modelSelection?: number;
  /** Metadata supplied by the caller (e.g. from an API) wins over header records. */
  metadata?: Omit<StructureMetadata, "warnings">;
}

interface AtomRecord extends Atom {
  altLoc: string;
}

/**
 * Parses fixed-column PDB text into an immutable Structure. Throws ParseError
 * when the text holds no ATOM/HETATM record with coordinates.
 */
export function parsePdb(pdbText: string, options: ParseOptions = {}): Structure {
  const { altLocPolicy = "occupancy", modelSelection } = options;
  const W = new WarningCollector();

  const atoms: AtomRecord[] = [];
  const titleParts: string[] = [];
  let method: string | undefined;
  let resolution: number | undefined;
  let headerId: string | undefined;

  let modelCount = 0;
  let currentModel: number | null = null;
  let effectiveModelSelection: number | null | undefined = undefined; // undefined until first MODEL seen
  let seenModelRecords = false;
  let lineNum = 0;

  // Single-pass line scanner (avoid split and second pass)
  for (let i = 0, n = pdbText.length; i <= n; ) {
    let j = pdbText.indexOf("\n", i);
    if (j === -1) j = n;
    let line = pdbText.substring(i, j);
    if (line.endsWith("\r")) line = line.slice(0, -1);
    i = j + 1;
    lineNum++;
    if (line.length < 3) continue;
    const rec = slice(line, 0, 6).toUpperCase();

    if (rec.startsWith("MODEL")) {
      seenModelRecords = true;
      modelCount++;
      const m = parseIntSafe(slice(line, 10, 14)) ?? modelCount; // fallback to ordinal order
      currentModel = m;
      if (effectiveModelSelection === undefined) effectiveModelSelection = modelSelection == null ? m : modelSelection;
      continue;
    }
    if (rec.startsWith("ENDMDL")) {
      currentModel = null;
      continue;
    }

    if (rec === "ATOM  " || rec === "HETATM") {
      if (seenModelRecords) {
        if (currentModel === null) continue;
        if (effectiveModelSelection != null && currentModel !== effectiveModelSelection) continue;
      }
      const x = parseFloatSafe(slice(line, 30, 38));
      const y = parseFloatSafe(slice(line, 38, 46));
      const z = parseFloatSafe(slice(line, 46, 54));
      if (x == null || y == null || z == null) {
        W.add(`Line ${lineNum}: missing coordinates in ATOM/HETATM`);
        continue;
      }
      const rawName = slice(line, 12, 16);
      atoms.push({
        serial: parseIntSafe(slice(line, 6, 11)) ?? atoms.length + 1,
        name: rawName.trim(),
        altLoc: slice(line, 16, 17).trim(),
        resName: slice(line, 17, 20).trim() || "UNK",
        chainId: slice(line, 21, 22).trim() || " ",
        resSeq: parseIntSafe(slice(line, 22, 26)) ?? 0,
        iCode: slice(line, 26, 27).trim(),
        x,
        y,
        z,
        occupancy: parseFloatSafe(slice(line, 54, 60)),
        bFactor: parseFloatSafe(slice(line, 60, 66)),
        element: inferElementSymbol(slice(line, 76, 78), rawName),
        hetero: rec === "HETATM"
      });
      continue;
    }

    if (rec === "HEADER") {
      headerId = slice(line, 62, 66).trim() || undefined;
    } else if (rec === "TITLE ") {
      const part = slice(line, 10, 80).trim();
      if (part) titleParts.push(part);
    } else if (rec === "EXPDTA") {
      method = slice(line, 10, 79).trim() || method;
    } else if (rec === "REMARK" && slice(line, 7, 10).trim() === "2") {
      const m = /RESOLUTION\.\s+([0-9.]+)\s+ANGSTROM/i.exec(line);
      if (m?.[1]) resolution = parseFloatSafe(m[1]) ?? resolution;
    }
  }

  if (atoms.length === 0) {
    throw new ParseError(`no coordinate records found${options.id ? ` in ${options.id}` : ""}`, {
      details: { lines: lineNum, warnings: W.toArray().slice(0, 10) }
    });
  }

  const finalAtoms = resolveAltLocs(atoms, altLocPolicy, W);
  const given: Omit<StructureMetadata, "warnings"> = options.metadata ?? {};
  return createStructure(options.id ?? headerId ?? "UNKNOWN", options.source ?? "experimental", finalAtoms.map(stripAltLoc), {
    ...given,
    title: given.title ?? (titleParts.length ? titleParts.join(" ").replace(/\s+/g, " ") : undefined),
    method: given.method ?? method,
    resolution: given.resolution ?? resolution,
    modelCount: Math.max(1, modelCount),
    warnings: W.toArray()
  });
}

function stripAltLoc(a: AtomRecord): Atom {
  const { altLoc: _altLoc, ...atom } = a;
  return atom;
}

function resolveAltLocs(atoms: AtomRecord[], policy: "all" | "occupancy", W: WarningCollector): AtomRecord[] {
  if (atoms.length === 0 || policy === "all") return atoms;
  const bestByKey = new Map<string, AtomRecord>();
  for (const a of atoms) {
    const k = `${a.chainId}|${a.resSeq}|${a.iCode}|${a.name}`;
    const prev = bestByKey.get(k);
    // Map keeps first-insertion order, so the surviving site stays where the atom first appeared
    if (prev == null || (a.occupancy ?? 1.0) > (prev.occupancy ?? 1.0)) bestByKey.set(k, a);
  }
  const out = Array.from(bestByKey.values());
  const dropped = atoms.length - out.length;
  if (dropped > 0) W.add(`AltLoc resolution: kept highest-occupancy sites, dropped ${dropped} atoms`);
  return out;
}

export function parseFloatSafe(s: string): number | null {
  const t = s.trim();
  if (!t) return null;
  const v = Number(t);
  return Number.isFinite(v) ? v : null;
}

export function parseIntSafe(s: string): number | null {
  const t = s.trim();
  if (!t) return null;
  // Some files may use non-standard notations; best-effort parse
  const v = parseInt(t, 10);
  return Number.isFinite(v) ? v : null;
}

export function slice(line: string, start: number, end: number): string {
  // start and end are 0-based, end-exclusive. Handles short lines gracefully.
  return line.length > start ? line.substring(start, Math.min(end, line.length)) : "";
}
