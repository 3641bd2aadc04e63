import { z } from "zod";
import { parseResidueLabel, REPRESENTATIONS } from "../render/commands.js";
import type { SnapshotOptions } from "../render/session.js";
import type { ViewResult } from "../render/view.js";
import { NotFoundError } from "../runtime/errors.js";
import { Accession, Source } from "./structure.tools.js";
import { defineTool, type ToolOutput } from "./toolDefinition.js";

const SessionKey = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[\w.:-]+$/, "letters, digits, '_', '.', ':' and '-' only")
  .describe("Render session id, usually the conversation id. A session keeps one viewer process.");

const ImageOptions = {
  width: z.number().int().min(16).max(4096).optional().describe("Image width in pixels (default 1024)."),
  height: z.number().int().min(16).max(4096).optional().describe("Image height in pixels (default 768)."),
  transparent: z.boolean().optional().describe("Transparent background.")
};

function snapshotOptions(input: SnapshotOptions): SnapshotOptions {
  return { width: input.width, height: input.height, transparent: input.transparent };
}

function viewOutput(session: string, result: ViewResult): ToolOutput {
  return { data: { session, view: result.view }, images: [result.image] };
}

export const openStructureTool = defineTool({
  name: "open_structure",
  title: "Open Structure in Viewer",
  description: "Loads a structure into the session's viewer (replacing what it showed) and returns a PNG of the scene.",
  inputSchema: z.object({ session: SessionKey, accession: Accession, source: Source, ...ImageOptions }),
  annotations: { readOnlyHint: false, idempotentHint: true, openWorldHint: true },
  async logic(input, { viewer }) {
    return viewOutput(input.session, await viewer.openStructure(input.session, input.accession, input.source, snapshotOptions(input)));
  }
});

export const rotateViewTool = defineTool({
  name: "rotate_view",
  title: "Rotate View",
  description: "Rotates the scene about a screen axis and returns a PNG.",
  inputSchema: z.object({
    session: SessionKey,
    axis: z.enum(["x", "y", "z"]).default("y"),
    angle: z.number().min(-360).max(360).default(90).describe("Degrees."),
    ...ImageOptions
  }),
  annotations: { readOnlyHint: false, idempotentHint: false, openWorldHint: false },
  async logic(input, { viewer }) {
    return viewOutput(input.session, await viewer.rotate(input.session, input.axis, input.angle, snapshotOptions(input)));
  }
});

export const setRepresentationTool = defineTool({
  name: "set_representation",
  title: "Set Representation",
  description: "Switches the molecular representation (surface, cartoon, stick, sphere) and returns a PNG.",
  inputSchema: z.object({
    session: SessionKey,
    representation: z.enum(["surface", "cartoon", "stick", "sphere"]).describe(REPRESENTATIONS.join(" | ")),
    transparency: z.number().min(0).max(1).default(0.5).describe("Surface transparency, 0 (opaque) to 1."),
    ...ImageOptions
  }),
  annotations: { readOnlyHint: false, idempotentHint: true, openWorldHint: false },
  async logic(input, { viewer }) {
    return viewOutput(
      input.session,
      await viewer.setRepresentation(input.session, input.representation, input.transparency, snapshotOptions(input))
    );
  }
});

export const mutateResidueTool = defineTool({
  name: "mutate_residue",
  title: "Mutate Residue",
  description: "Substitutes one residue in the viewer (rotamer placement by the viewer), marks it and returns a PNG.",
  inputSchema: z.object({
    session: SessionKey,
    residue: z.string().describe('Residue to replace, e.g. "A:25" or "A:ASP25".'),
    newResidue: z.string().length(3).describe('Three-letter code of the replacement, e.g. "ALA".'),
    ...ImageOptions
  }),
  annotations: { readOnlyHint: false, idempotentHint: true, openWorldHint: false },
  async logic(input, { viewer }) {
    const residue = parseResidueLabel(input.residue);
    return viewOutput(input.session, await viewer.mutateResidue(input.session, residue, input.newResidue, snapshotOptions(input)));
  }
});

export const highlightResiduesTool = defineTool({
  name: "highlight_residues",
  title: "Highlight Residues",
  description: "Shows residues as colored, labelled sticks and returns a PNG. Pocket labels from find_pockets are accepted.",
  inputSchema: z.object({
    session: SessionKey,
    residues: z.array(z.string()).min(1).describe('e.g. ["A:ASP25", "A:50"]'),
    color: z.string().default("red").describe('Color name or "#rrggbb".'),
    ...ImageOptions
  }),
  annotations: { readOnlyHint: false, idempotentHint: true, openWorldHint: false },
  async logic(input, { viewer }) {
    const residues = input.residues.map(parseResidueLabel);
    return viewOutput(input.session, await viewer.highlightResidues(input.session, residues, input.color, snapshotOptions(input)));
  }
});

export const snapshotTool = defineTool({
  name: "snapshot",
  title: "Snapshot",
  description: "Returns a PNG of the current scene without changing it.",
  inputSchema: z.object({ session: SessionKey, ...ImageOptions }),
  annotations: { readOnlyHint: true, idempotentHint: true, openWorldHint: false },
  async logic(input, { viewer }) {
    return viewOutput(input.session, await viewer.snapshot(input.session, snapshotOptions(input)));
  }
});

export const showDockingPoseTool = defineTool({
  name: "show_docking_pose",
  title: "Show Docking Pose",
  description: "Places a pose from a finished dock_ligand job next to its receptor, which must be open in the session, and returns a PNG.",
  inputSchema: z.object({
    session: SessionKey,
    jobId: z.string().min(1).describe("jobId returned by dock_ligand."),
    rank: z.number().int().min(1).default(1).describe("Pose rank, 1 is the best."),
    ...ImageOptions
  }),
  annotations: { readOnlyHint: false, idempotentHint: true, openWorldHint: false },
  async logic(input, { pipeline, viewer }) {
    const job = pipeline.getJob(input.jobId);
    if (!job) throw new NotFoundError(`docking job ${input.jobId} not found`);
    const pose = job.poses.find((p) => p.rank === input.rank);
    if (!pose) {
      throw new NotFoundError(`job ${input.jobId} has no pose ranked ${input.rank} (${job.poses.length} poses, status ${job.status})`);
    }
    return viewOutput(input.session, await viewer.showPose(input.session, job.id, pose, snapshotOptions(input)));
  }
});

export const closeSessionTool = defineTool({
  name: "close_session",
  title: "Close Session",
  description: "Stops the session's viewer process and discards its state.",
  inputSchema: z.object({ session: SessionKey }),
  annotations: { readOnlyHint: false, destructiveHint: true, idempotentHint: true, openWorldHint: false },
  async logic({ session }, { viewer }) {
    return { data: { session, closed: await viewer.close(session) } };
  }
});
