import { Box3, Vector3 } from "three";
import type { Atom, Vec3 } from "../types/structure.js";
import { vdwRadius } from "../utils/elements.js";

export interface GridSpec {
  resolution: number;
  padding: number;
  probeRadius: number;
}

/**
 * Regular lattice over the padded bounding box of a set of atoms. Voxel
 * (i, j, k) is centered at origin + (i, j, k) * resolution; its linear index
 * is i + nx * (j + ny * k).
 */
export interface Grid {
  readonly origin: Vec3;
  readonly dims: readonly [number, number, number];
  readonly resolution: number;
  /** 1 where the voxel center lies inside an atom's vdW radius plus the probe radius. */
  readonly occupancy: Uint8Array;
}

export function atomBounds(atoms: readonly Atom[]): Box3 {
  const box = new Box3();
  const v = new Vector3();
  for (const a of atoms) box.expandByPoint(v.set(a.x, a.y, a.z));
  return box;
}

export function buildGrid(atoms: readonly Atom[], spec: GridSpec): Grid {
  const { resolution: res, padding, probeRadius } = spec;
  if (!(res > 0)) throw new RangeError(`grid resolution must be positive, got ${res}`);
  const box = atomBounds(atoms).expandByScalar(padding);
  const size = box.getSize(new Vector3());
  const nx = Math.floor(size.x / res) + 1;
  const ny = Math.floor(size.y / res) + 1;
  const nz = Math.floor(size.z / res) + 1;
  const ox = box.min.x, oy = box.min.y, oz = box.min.z;
  const occupancy = new Uint8Array(nx * ny * nz);

  for (const a of atoms) {
    const r = vdwRadius(a.element) + probeRadius;
    const r2 = r * r;
    const i0 = Math.max(0, Math.ceil((a.x - r - ox) / res)), i1 = Math.min(nx - 1, Math.floor((a.x + r - ox) / res));
    const j0 = Math.max(0, Math.ceil((a.y - r - oy) / res)), j1 = Math.min(ny - 1, Math.floor((a.y + r - oy) / res));
    const k0 = Math.max(0, Math.ceil((a.z - r - oz) / res)), k1 = Math.min(nz - 1, Math.floor((a.z + r - oz) / res));
    for (let k = k0; k <= k1; k++) {
      const dz = oz + k * res - a.z;
      for (let j = j0; j <= j1; j++) {
        const dy = oy + j * res - a.y;
        const dyz2 = dy * dy + dz * dz;
        if (dyz2 > r2) continue;
        const row = nx * (j + ny * k);
        for (let i = i0; i <= i1; i++) {
          const dx = ox + i * res - a.x;
          if (dx * dx + dyz2 <= r2) occupancy[row + i] = 1;
        }
      }
    }
  }

  return { origin: [ox, oy, oz], dims: [nx, ny, nz], resolution: res, occupancy };
}

export function voxelCoords(grid: Grid, index: number): [number, number, number] {
  const [nx, ny] = grid.dims;
  const i = index % nx;
  const rest = (index - i) / nx;
  const j = rest % ny;
  return [i, j, (rest - j) / ny];
}

export function voxelCenter(grid: Grid, i: number, j: number, k: number): Vec3 {
  const [ox, oy, oz] = grid.origin;
  const res = grid.resolution;
  return [ox + i * res, oy + j * res, oz + k * res];
}
