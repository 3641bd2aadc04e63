import { z } from "zod";
import { generateCandidates, MAX_CANDIDATES } from "../docking/candidates.js";
import { MAX_POSES } from "../docking/pipeline.js";
import { parseSmiles } from "../docking/smiles.js";
import { detectPockets } from "../pockets/detect.js";
import { searchBoxForPocket } from "../pockets/searchBox.js";
import { parseResidueLabel } from "../render/commands.js";
import { NotFoundError } from "../runtime/errors.js";
import type { DockingBox, DockingJob } from "../types/docking.js";
import { substituteResidue } from "../utils/structure.js";
import { Accession, ChainSelection, SensitivitySchema, Source } from "./structure.tools.js";
import { defineTool } from "./toolDefinition.js";

const Vec3Schema = z.tuple([z.number(), z.number(), z.number()]);

const DockLigandInput = z
  .object({
    accession: Accession,
    source: Source,
    smiles: z.string().describe("Ligand as a SMILES string, one connected molecule."),
    center: Vec3Schema.optional().describe("Search box center in Å (x, y, z). Give together with halfExtents."),
    halfExtents: Vec3Schema.optional().describe("Search box half-size per axis in Å, each in (0, 63]."),
    pocketRank: z.number().int().min(1).optional().describe("Dock into this pocket from find_pockets instead of an explicit box."),
    chains: ChainSelection,
    sensitivity: SensitivitySchema,
    numPoses: z.number().int().default(9).describe(`Poses to return, 1-${MAX_POSES}.`),
    exhaustiveness: z.number().int().optional().describe("Search effort, 1-64. Defaults to the server setting."),
    seed: z.number().int().optional().describe("Random seed. Defaults to the server setting."),
    mutations: z
      .array(
        z.object({
          residue: z.string().describe("Residue to replace, e.g. A:25 or A:ASP25."),
          newResidue: z.string().length(3).describe("Three-letter code of the replacement amino acid.")
        })
      )
      .max(20)
      .default([])
      .describe("Point substitutions applied to the receptor before docking.")
  })
  .refine((input) => (input.center !== undefined && input.halfExtents !== undefined) !== (input.pocketRank !== undefined), {
    message: "give either center and halfExtents, or pocketRank"
  });

export function summarizeJob(job: DockingJob) {
  return {
    jobId: job.id,
    receptor: job.receptorId,
    ligand: job.ligand,
    status: job.status,
    warnings: job.warnings,
    poses: job.poses.map((p) => ({
      rank: p.rank,
      engineRank: p.engineRank,
      affinity: p.affinity,
      rmsdLowerBound: p.rmsdLowerBound,
      rmsdUpperBound: p.rmsdUpperBound,
      atoms: p.atoms.length
    }))
  };
}

export const dockLigandTool = defineTool({
  name: "dock_ligand",
  title: "Dock Ligand",
  description:
    "Docks a SMILES ligand into a receptor with AutoDock Vina, inside an explicit box or around a detected pocket. Returns poses ranked by affinity (kcal/mol, lower is better).",
  inputSchema: DockLigandInput,
  annotations: { readOnlyHint: false, idempotentHint: true, openWorldHint: true },
  async logic(input, { store, pipeline, pocketParallelism }) {
    // Reject a bad ligand before fetching or scanning anything.
    parseSmiles(input.smiles.trim());
    let receptor = await store.get(input.accession, input.source);
    for (const m of input.mutations) {
      const target = parseResidueLabel(m.residue);
      receptor = substituteResidue(receptor, target.chainId, target.seq, m.newResidue, target.iCode);
    }

    let box: DockingBox;
    if (input.center !== undefined && input.halfExtents !== undefined) {
      box = { center: input.center, halfExtents: input.halfExtents };
    } else {
      const pockets = await detectPockets(receptor, input.chains, input.sensitivity, { parallelism: pocketParallelism });
      const pocket = pockets.find((p) => p.rank === input.pocketRank);
      if (!pocket) {
        throw new NotFoundError(`pocket ${input.pocketRank} not found in ${receptor.id} (${pockets.length} detected)`, {
          details: { pocketRank: input.pocketRank, pockets: pockets.length }
        });
      }
      box = searchBoxForPocket(pocket);
    }

    const job = await pipeline.run(receptor, {
      ligand: input.smiles,
      box,
      numPoses: input.numPoses,
      exhaustiveness: input.exhaustiveness,
      seed: input.seed
    });
    return { data: { ...summarizeJob(job), box } };
  }
});

export const generateCandidatesTool = defineTool({
  name: "generate_candidates",
  title: "Generate Candidate Ligands",
  description:
    "Suggests drug-like SMILES candidates for a pocket from its lining residues (labels such as A:ASP25). Deterministic for the same residues.",
  inputSchema: z.object({
    residues: z.array(z.string()).describe('Pocket residues, e.g. ["A:ASP25", "A:ILE50"].'),
    count: z.number().int().default(10).describe(`Candidates wanted, clamped to 1-${MAX_CANDIDATES}.`)
  }),
  annotations: { readOnlyHint: true, idempotentHint: true, openWorldHint: false },
  async logic({ residues, count }) {
    return { data: generateCandidates(residues, count) };
  }
});
