import { z } from "zod";
import { detectPockets, type Pocket } from "../pockets/detect.js";
import { searchBoxForPocket } from "../pockets/searchBox.js";
import type { Structure } from "../types/structure.js";
import { formatResidueLabel, listResidues } from "../utils/structure.js";
import { defineTool } from "./toolDefinition.js";

export const Accession = z.string().min(1).max(64).describe('PDB id (e.g. "1HSG") or UniProt accession for predicted models (e.g. "P69905").');

export const Source = z
  .enum(["experimental", "predicted"])
  .default("experimental")
  .describe("experimental: RCSB PDB entry. predicted: AlphaFold DB model.");

export const ChainSelection = z
  .string()
  .default("*")
  .describe('Chains to include: "*" for all, or ids separated by commas (e.g. "A,B").');

export const SensitivitySchema = z
  .enum(["low", "normal", "high"])
  .default("normal")
  .describe("Grid resolution preset: low (1.5 Å, fast), normal (1.0 Å), high (0.5 Å, slow).");

export function summarizeStructure(structure: Structure) {
  return {
    id: structure.id,
    source: structure.source,
    atomCount: structure.atomCount,
    chains: structure.chains.map((c) => ({ id: c.id, residues: c.residues.length })),
    metadata: structure.metadata
  };
}

export function summarizePocket(pocket: Pocket) {
  return {
    rank: pocket.rank,
    center: pocket.center,
    volume: pocket.volume,
    druggability: pocket.druggability,
    meanBuriedness: pocket.meanBuriedness,
    hydrophobicFraction: pocket.hydrophobicFraction,
    residues: pocket.residues.map(formatResidueLabel),
    searchBox: searchBoxForPocket(pocket)
  };
}

export const fetchStructureTool = defineTool({
  name: "fetch_structure",
  title: "Fetch Structure",
  description: "Loads an experimental (RCSB) or predicted (AlphaFold) structure into the cache and summarizes its chains and metadata.",
  inputSchema: z.object({ accession: Accession, source: Source }),
  annotations: { readOnlyHint: true, idempotentHint: true, openWorldHint: true },
  async logic({ accession, source }, { store }) {
    return { data: summarizeStructure(await store.get(accession, source)) };
  }
});

export const listResiduesTool = defineTool({
  name: "list_residues",
  title: "List Residues",
  description: "Lists the residues of a structure per chain with their kind (standard, hetero, water) and atom count.",
  inputSchema: z.object({
    accession: Accession,
    source: Source,
    chain: z.string().min(1).max(4).optional().describe("Restrict to one chain id.")
  }),
  annotations: { readOnlyHint: true, idempotentHint: true, openWorldHint: true },
  async logic({ accession, source, chain }, { store }) {
    const structure = await store.get(accession, source);
    const chains = listResidues(structure, chain).map((c) => ({
      chainId: c.chainId,
      counts: c.counts,
      residues: c.residues.map((r) => ({ label: formatResidueLabel(r), kind: r.kind, atoms: r.atomCount }))
    }));
    return { data: { id: structure.id, chains } };
  }
});

export const findPocketsTool = defineTool({
  name: "find_pockets",
  title: "Find Pockets",
  description:
    "Detects buried cavities on a grid and ranks them by druggability. Each pocket lists its lining residues and a docking search box.",
  inputSchema: z.object({
    accession: Accession,
    source: Source,
    chains: ChainSelection,
    sensitivity: SensitivitySchema,
    limit: z.number().int().min(1).max(50).default(10).describe("Pockets returned, best first.")
  }),
  annotations: { readOnlyHint: true, idempotentHint: true, openWorldHint: true },
  async logic({ accession, source, chains, sensitivity, limit }, { store, pocketParallelism }) {
    const structure = await store.get(accession, source);
    const pockets = await detectPockets(structure, chains, sensitivity, { parallelism: pocketParallelism });
    return { data: { id: structure.id, sensitivity, total: pockets.length, pockets: pockets.slice(0, limit).map(summarizePocket) } };
  }
});
