import { writePdb } from "../pdb/write.js";
import { ValidationError } from "../runtime/errors.js";
import type { StructureStore } from "../store/structureStore.js";
import type { Pose } from "../types/docking.js";
import type { Atom, StructureSource } from "../types/structure.js";
import { isStandardResidue } from "../utils/elements.js";
import {
  REPRESENTATIONS,
  highlightScript,
  mutateScript,
  openStructureScript,
  representationScript,
  rotateScript,
  showPoseScript,
  type Axis,
  type Representation,
  type ResidueSpec
} from "./commands.js";
import type { RenderSessionManager } from "./manager.js";
import type { SessionContext, SnapshotOptions, ViewState } from "./session.js";

export interface ViewResult {
  view: ViewState;
  image: Buffer;
}

/** The viewer operations: each changes the scene, then returns a PNG of it. */
export class RenderController {
  constructor(
    private readonly sessions: RenderSessionManager,
    private readonly store: StructureStore
  ) {}

  async openStructure(key: string, accession: string, source: StructureSource = "experimental", snapshot?: SnapshotOptions): Promise<ViewResult> {
    const structure = await this.store.get(accession, source);
    return this.sessions.run(key, async (ctx) => {
      const path = await ctx.stageFile(`${structure.id}.pdb`, writePdb(structure));
      await ctx.command(openStructureScript(path));
      const view = ctx.updateView({
        structureId: structure.id,
        representation: "cartoon",
        transparency: 0,
        rotation: { x: 0, y: 0, z: 0 },
        highlighted: [],
        mutations: [],
        pose: null
      });
      return { view, image: await ctx.snapshot(snapshot) };
    });
  }

  rotate(key: string, axis: Axis, angle: number, snapshot?: SnapshotOptions): Promise<ViewResult> {
    return this.withStructure(key, snapshot, async (ctx) => {
      await ctx.command(rotateScript(axis, angle));
      const rotation = { ...ctx.view.rotation, [axis]: normalizeAngle(ctx.view.rotation[axis] + angle) };
      ctx.updateView({ rotation });
    });
  }

  async setRepresentation(key: string, representation: Representation, transparency = 0.5, snapshot?: SnapshotOptions): Promise<ViewResult> {
    if (!REPRESENTATIONS.includes(representation)) {
      throw new ValidationError(`representation must be one of ${REPRESENTATIONS.join(", ")}`);
    }
    const t = Math.max(0, Math.min(1, transparency));
    return this.withStructure(key, snapshot, async (ctx) => {
      await ctx.command(representationScript(representation, t));
      ctx.updateView({ representation, transparency: representation === "surface" ? t : 0 });
    });
  }

  async mutateResidue(key: string, residue: ResidueSpec, newName: string, snapshot?: SnapshotOptions): Promise<ViewResult> {
    const target = newName.trim().toUpperCase();
    if (!isStandardResidue(target)) throw new ValidationError(`'${newName}' is not a standard amino acid`);
    const script = mutateScript(residue, target);
    return this.withStructure(key, snapshot, async (ctx) => {
      await ctx.command(script);
      ctx.updateView({ mutations: [...ctx.view.mutations, `${residue.chainId}:${residue.seq}${residue.iCode ?? ""}->${target}`] });
    });
  }

  async highlightResidues(key: string, residues: readonly ResidueSpec[], color = "red", snapshot?: SnapshotOptions): Promise<ViewResult> {
    const script = highlightScript(residues, color);
    return this.withStructure(key, snapshot, async (ctx) => {
      await ctx.command(script);
      const labels = residues.map((r) => `${r.chainId}:${r.seq}${r.iCode ?? ""}`);
      ctx.updateView({ highlighted: Array.from(new Set([...ctx.view.highlighted, ...labels])) });
    });
  }

  /** Stages the pose as a ligand residue (LIG, chain L) and opens it beside the receptor. */
  showPose(key: string, jobId: string, pose: Pose, snapshot?: SnapshotOptions): Promise<ViewResult> {
    return this.withStructure(key, snapshot, async (ctx) => {
      if (ctx.view.structureId !== pose.receptorId) {
        throw new ValidationError(`pose belongs to ${pose.receptorId} but the session shows ${ctx.view.structureId}`);
      }
      const path = await ctx.stageFile(`pose-${jobId}-${pose.rank}.pdb`, writePdb(poseAtoms(pose), { renumber: true }));
      await ctx.command(showPoseScript(path));
      ctx.updateView({ pose: { jobId, rank: pose.rank } });
    });
  }

  snapshot(key: string, options?: SnapshotOptions): Promise<ViewResult> {
    return this.sessions.run(key, async (ctx) => ({ view: ctx.view, image: await ctx.snapshot(options) }));
  }

  close(key: string): Promise<boolean> {
    return this.sessions.closeSession(key);
  }

  private withStructure(key: string, snapshot: SnapshotOptions | undefined, change: (ctx: SessionContext) => Promise<void>): Promise<ViewResult> {
    return this.sessions.run(key, async (ctx) => {
      // Reopened sessions start empty; callers have to load the structure again.
      if (!ctx.view.structureId) throw new ValidationError(`no structure is open in session '${key}'`);
      await change(ctx);
      const image = await ctx.snapshot(snapshot);
      return { view: ctx.view, image };
    });
  }
}

function normalizeAngle(deg: number): number {
  const r = deg % 360;
  return r < 0 ? r + 360 : r;
}

export function poseAtoms(pose: Pose): Atom[] {
  return pose.atoms.map((a) => ({
    serial: a.serial,
    name: a.name,
    element: a.element,
    x: a.x,
    y: a.y,
    z: a.z,
    resName: "LIG",
    resSeq: 1,
    iCode: "",
    chainId: "L",
    hetero: true,
    occupancy: 1,
    bFactor: 0
  }));
}
