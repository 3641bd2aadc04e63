import type { Atom, ResidueRef, Vec3 } from "../types/structure.js";
import { compareResidueRefs, residueKey, toResidueRef } from "../utils/structure.js";

/**
 * Residues with at least one atom within `distance` of any of `points`,
 * sorted by chain, number and insertion code. Atoms are hashed into cubic
 * cells of edge `distance`, so each point only visits its 27 neighbor cells.
 */
export function residuesNear(atoms: readonly Atom[], points: readonly Vec3[], distance: number): ResidueRef[] {
  if (atoms.length === 0 || points.length === 0) return [];
  const cell = distance;
  const d2 = distance * distance;
  const cells = new Map<string, number[]>();
  for (let i = 0; i < atoms.length; i++) {
    const a = atoms[i];
    const k = `${Math.floor(a.x / cell)},${Math.floor(a.y / cell)},${Math.floor(a.z / cell)}`;
    const bucket = cells.get(k);
    if (bucket) bucket.push(i);
    else cells.set(k, [i]);
  }

  const hit = new Uint8Array(atoms.length);
  for (const [px, py, pz] of points) {
    const cx = Math.floor(px / cell), cy = Math.floor(py / cell), cz = Math.floor(pz / cell);
    for (let dx = -1; dx <= 1; dx++) for (let dy = -1; dy <= 1; dy++) for (let dz = -1; dz <= 1; dz++) {
      const bucket = cells.get(`${cx + dx},${cy + dy},${cz + dz}`);
      if (!bucket) continue;
      for (const ai of bucket) {
        if (hit[ai]) continue;
        const a = atoms[ai];
        const ex = a.x - px, ey = a.y - py, ez = a.z - pz;
        if (ex * ex + ey * ey + ez * ez <= d2) hit[ai] = 1;
      }
    }
  }

  const byKey = new Map<string, ResidueRef>();
  for (let i = 0; i < atoms.length; i++) {
    if (!hit[i]) continue;
    const a = atoms[i];
    const key = residueKey({ chainId: a.chainId, seq: a.resSeq, iCode: a.iCode });
    if (!byKey.has(key)) byKey.set(key, toResidueRef({ chainId: a.chainId, seq: a.resSeq, iCode: a.iCode, name: a.resName }));
  }
  return Array.from(byKey.values()).sort(compareResidueRefs);
}
