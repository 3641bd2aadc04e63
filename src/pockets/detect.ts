import { Vector3 } from "three";
import type { ResidueRef, Structure, Vec3 } from "../types/structure.js";
import { ValidationError } from "../runtime/errors.js";
import { createLogger } from "../runtime/logger.js";
import { HYDROPHOBIC_RESIDUES } from "../utils/elements.js";
import { selectAtoms, type ChainSelector } from "../utils/structure.js";
import { residuesNear } from "./contacts.js";
import { buildGrid, voxelCenter, voxelCoords, type Grid } from "./grid.js";
import { OCCLUSION_DIRECTIONS, stepLimits } from "./occlusion.js";
import { computeBuriedness } from "./occlusionPool.js";

const log = createLogger("pockets");

export type Sensitivity = "low" | "normal" | "high";

export interface PocketParameters {
  /** Voxel edge in Å; cost grows with (1 / resolution)^3. */
  resolution: number;
  /** Clusters with fewer voxels are dropped. */
  minVoxels: number;
  padding: number;
  probeRadius: number;
  /** Minimum fraction of occluded directions for a voxel to count as buried. */
  buriedThreshold: number;
  maxRayLength: number;
  contactDistance: number;
}

export const SENSITIVITY_PRESETS: Readonly<Record<Sensitivity, Pick<PocketParameters, "resolution" | "minVoxels">>> = {
  low: { resolution: 1.5, minVoxels: 4 },
  normal: { resolution: 1.0, minVoxels: 8 },
  high: { resolution: 0.5, minVoxels: 32 }
};

export const DEFAULT_POCKET_PARAMETERS: Readonly<Omit<PocketParameters, "resolution" | "minVoxels">> = {
  padding: 4,
  probeRadius: 1.4,
  buriedThreshold: 0.7,
  maxRayLength: 16,
  contactDistance: 4.5
};

const PARAMETER_KEYS: readonly (keyof PocketParameters)[] = [
  "resolution", "minVoxels", "padding", "probeRadius", "buriedThreshold", "maxRayLength", "contactDistance"
];

export interface DetectOptions extends Partial<PocketParameters> {
  /** Keep hetero groups (ligands, cofactors) in the selection. */
  includeHetero?: boolean;
  parallelism?: number;
  workerThreshold?: number;
}

export interface Voxel {
  readonly index: number;
  readonly i: number;
  readonly j: number;
  readonly k: number;
  readonly center: Vec3;
}

export interface Pocket {
  readonly rank: number;
  readonly center: Vec3;
  /** Å^3 */
  readonly volume: number;
  readonly voxelCount: number;
  readonly resolution: number;
  readonly meanBuriedness: number;
  readonly hydrophobicFraction: number;
  readonly druggability: number;
  readonly residues: readonly ResidueRef[];
  readonly voxels: readonly Voxel[];
}

export function resolveParameters(sensitivity: Sensitivity, overrides: Partial<PocketParameters> = {}): PocketParameters {
  const preset = SENSITIVITY_PRESETS[sensitivity];
  if (!preset) throw new ValidationError(`unknown sensitivity '${String(sensitivity)}'`);
  const p: PocketParameters = { ...DEFAULT_POCKET_PARAMETERS, ...preset };
  for (const key of PARAMETER_KEYS) {
    const value = overrides[key];
    if (value !== undefined) p[key] = value;
  }
  if (!(p.resolution > 0) || !(p.contactDistance > 0) || p.minVoxels < 1 || p.buriedThreshold <= 0 || p.buriedThreshold > 1) {
    throw new ValidationError("invalid pocket detection parameters", { details: { ...p } });
  }
  return p;
}

/**
 * 0.4 * volume term (saturating at 500 Å^3) + 0.3 * buriedness above the
 * threshold + 0.3 * hydrophobic residue fraction, rounded to 3 decimals.
 */
export function druggabilityScore(volume: number, meanBuriedness: number, hydrophobicFraction: number, buriedThreshold: number): number {
  const volumeTerm = Math.min(1, volume / 500);
  const burialTerm = buriedThreshold >= 1 ? 1 : Math.max(0, Math.min(1, (meanBuriedness - buriedThreshold) / (1 - buriedThreshold)));
  const score = 0.4 * volumeTerm + 0.3 * burialTerm + 0.3 * hydrophobicFraction;
  return Math.round(score * 1000) / 1000;
}

type RankKey = Pick<Pocket, "druggability" | "volume" | "residues" | "voxels">;

function minResidueSeq(p: RankKey): number {
  let min = Infinity;
  for (const r of p.residues) if (r.seq < min) min = r.seq;
  return min;
}

/** Druggability desc, volume desc, lowest residue number asc, first voxel index asc. */
export function comparePockets(a: RankKey, b: RankKey): number {
  if (a.druggability !== b.druggability) return b.druggability - a.druggability;
  if (a.volume !== b.volume) return b.volume - a.volume;
  const ra = minResidueSeq(a), rb = minResidueSeq(b);
  if (ra !== rb) return ra < rb ? -1 : 1;
  return (a.voxels[0]?.index ?? 0) - (b.voxels[0]?.index ?? 0);
}

/**
 * Grid-based buriedness pocket detection. Returns pockets best-first with
 * 1-based ranks; an empty or unmatched selection yields [].
 */
export async function detectPockets(
  structure: Structure,
  selector: ChainSelector = "*",
  sensitivity: Sensitivity = "normal",
  options: DetectOptions = {}
): Promise<Pocket[]> {
  const { includeHetero, parallelism, workerThreshold, ...overrides } = options;
  const params = resolveParameters(sensitivity, overrides);
  const atoms = selectAtoms(structure, selector, { includeHetero });
  if (atoms.length === 0) {
    log.debug({ structure: structure.id, selector }, "selection matched no atoms");
    return [];
  }

  const started = Date.now();
  const grid = buildGrid(atoms, params);
  const total = grid.occupancy.length;
  let free = 0;
  for (let v = 0; v < total; v++) if (grid.occupancy[v] === 0) free++;
  const candidates = new Uint32Array(free);
  for (let v = 0, w = 0; v < total; v++) if (grid.occupancy[v] === 0) candidates[w++] = v;

  const buriedness = await computeBuriedness(
    {
      occupancy: grid.occupancy,
      dims: grid.dims,
      candidates,
      directions: OCCLUSION_DIRECTIONS,
      maxSteps: stepLimits(OCCLUSION_DIRECTIONS, params.resolution, params.maxRayLength)
    },
    { parallelism, workerThreshold }
  );

  // -1 marks voxels that are occupied or not buried enough
  const burial = new Float32Array(total).fill(-1);
  for (let c = 0; c < candidates.length; c++) {
    if (buriedness[c] >= params.buriedThreshold) burial[candidates[c]] = buriedness[c];
  }

  const clusters = clusterBuried(grid, burial).filter((cluster) => cluster.length >= params.minVoxels);
  const voxelVolume = params.resolution ** 3;
  const scored = clusters.map((cluster) => {
    const voxels: Voxel[] = cluster.map((index) => {
      const [i, j, k] = voxelCoords(grid, index);
      return { index, i, j, k, center: voxelCenter(grid, i, j, k) };
    });
    const centroid = new Vector3();
    let burialSum = 0;
    for (const v of voxels) {
      centroid.x += v.center[0];
      centroid.y += v.center[1];
      centroid.z += v.center[2];
      burialSum += burial[v.index];
    }
    centroid.divideScalar(voxels.length);
    const residues = residuesNear(atoms, voxels.map((v) => v.center), params.contactDistance);
    const hydrophobic = residues.filter((r) => HYDROPHOBIC_RESIDUES.has(r.name)).length;
    const hydrophobicFraction = residues.length ? hydrophobic / residues.length : 0;
    const meanBuriedness = burialSum / voxels.length;
    const volume = voxels.length * voxelVolume;
    return {
      center: [round3(centroid.x), round3(centroid.y), round3(centroid.z)] as const,
      volume,
      voxelCount: voxels.length,
      resolution: params.resolution,
      meanBuriedness: round3(meanBuriedness),
      hydrophobicFraction: round3(hydrophobicFraction),
      druggability: druggabilityScore(volume, meanBuriedness, hydrophobicFraction, params.buriedThreshold),
      residues,
      voxels
    };
  });

  const pockets = scored.sort(comparePockets).map((p, n) => Object.freeze({ rank: n + 1, ...p }));
  log.debug(
    { structure: structure.id, sensitivity, atoms: atoms.length, voxels: total, candidates: free, pockets: pockets.length, ms: Date.now() - started },
    "pocket detection finished"
  );
  return pockets;
}

/** 6-connected components of buried voxels, seeded in linear index order. */
function clusterBuried(grid: Grid, burial: Float32Array): number[][] {
  const [nx, ny, nz] = grid.dims;
  const plane = nx * ny;
  const seen = new Uint8Array(burial.length);
  const clusters: number[][] = [];
  const queue: number[] = [];
  for (let seed = 0; seed < burial.length; seed++) {
    if (burial[seed] < 0 || seen[seed]) continue;
    seen[seed] = 1;
    queue.length = 0;
    queue.push(seed);
    const members: number[] = [];
    for (let head = 0; head < queue.length; head++) {
      const v = queue[head];
      members.push(v);
      const i = v % nx;
      const j = ((v - i) / nx) % ny;
      const k = (v - i - j * nx) / plane;
      const visit = (n: number) => {
        if (burial[n] >= 0 && !seen[n]) {
          seen[n] = 1;
          queue.push(n);
        }
      };
      if (i > 0) visit(v - 1);
      if (i < nx - 1) visit(v + 1);
      if (j > 0) visit(v - nx);
      if (j < ny - 1) visit(v + nx);
      if (k > 0) visit(v - plane);
      if (k < nz - 1) visit(v + plane);
    }
    clusters.push(members.sort((a, b) => a - b));
  }
  return clusters;
}

function round3(x: number): number {
  return Math.round(x * 1000) / 1000;
}
