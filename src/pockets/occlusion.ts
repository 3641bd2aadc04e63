/** Everything a sampler needs; plain typed arrays so it crosses thread boundaries by structured clone. */
export interface OcclusionInput {
  occupancy: Uint8Array;
  dims: readonly [number, number, number];
  /** Linear indices of the voxels to sample. */
  candidates: Uint32Array;
  /** Flattened (dx, dy, dz) voxel steps, one triple per direction. */
  directions: Int8Array;
  /** Per direction, how many steps fit in the maximum ray length. */
  maxSteps: Uint16Array;
}

export interface OcclusionTask {
  input: OcclusionInput;
  start: number;
  end: number;
}

// 6 axis directions followed by the 8 body diagonals
export const OCCLUSION_DIRECTIONS = Int8Array.from([
  1, 0, 0, -1, 0, 0, 0, 1, 0, 0, -1, 0, 0, 0, 1, 0, 0, -1,
  1, 1, 1, 1, 1, -1, 1, -1, 1, 1, -1, -1, -1, 1, 1, -1, 1, -1, -1, -1, 1, -1, -1, -1
]);

export function stepLimits(directions: Int8Array, resolution: number, maxRayLength: number): Uint16Array {
  const count = directions.length / 3;
  const out = new Uint16Array(count);
  for (let d = 0; d < count; d++) {
    const dx = directions[d * 3], dy = directions[d * 3 + 1], dz = directions[d * 3 + 2];
    const len = Math.sqrt(dx * dx + dy * dy + dz * dz) * resolution;
    out[d] = Math.min(65535, Math.floor(maxRayLength / len + 1e-9));
  }
  return out;
}

/**
 * Fraction of directions in which a ray from each candidate voxel meets an
 * occupied voxel before leaving the grid or running out of steps, for
 * candidates[start..end).
 */
export function sampleOcclusion(input: OcclusionInput, start: number, end: number): Float32Array {
  const { occupancy, candidates, directions, maxSteps } = input;
  const [nx, ny, nz] = input.dims;
  const dirCount = directions.length / 3;
  const out = new Float32Array(Math.max(0, end - start));

  for (let c = start; c < end; c++) {
    const idx = candidates[c];
    const i = idx % nx;
    const rest = (idx - i) / nx;
    const j = rest % ny;
    const k = (rest - j) / ny;
    let occluded = 0;
    for (let d = 0; d < dirCount; d++) {
      const dx = directions[d * 3], dy = directions[d * 3 + 1], dz = directions[d * 3 + 2];
      const steps = maxSteps[d];
      let x = i, y = j, z = k;
      for (let s = 1; s <= steps; s++) {
        x += dx; y += dy; z += dz;
        if (x < 0 || y < 0 || z < 0 || x >= nx || y >= ny || z >= nz) break;
        if (occupancy[x + nx * (y + ny * z)] === 1) {
          occluded++;
          break;
        }
      }
    }
    out[c - start] = occluded / dirCount;
  }
  return out;
}
