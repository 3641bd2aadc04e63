import { Box3, Vector3 } from "three";
import type { Vec3 } from "../types/structure.js";
import type { Pocket } from "./detect.js";

export interface SearchBox {
  center: Vec3;
  /** Å from the center to each face. */
  halfExtents: Vec3;
}

export interface SearchBoxOptions {
  padding?: number;
  /** Lower bound per axis; the docking engine needs room to rotate the ligand. */
  minHalfExtent?: number;
}

/** Docking box around a pocket's voxel centers, padded and clamped to a minimum size. */
export function searchBoxForPocket(pocket: Pick<Pocket, "voxels">, options: SearchBoxOptions = {}): SearchBox {
  const padding = options.padding ?? 4;
  const minHalfExtent = options.minHalfExtent ?? 10;
  const box = new Box3();
  const p = new Vector3();
  for (const v of pocket.voxels) box.expandByPoint(p.set(v.center[0], v.center[1], v.center[2]));
  if (box.isEmpty()) throw new RangeError("pocket has no voxels");
  box.expandByScalar(padding);
  const center = box.getCenter(new Vector3());
  const size = box.getSize(new Vector3());
  const half = (s: number) => round3(Math.max(minHalfExtent, s / 2));
  return {
    center: [round3(center.x), round3(center.y), round3(center.z)],
    halfExtents: [half(size.x), half(size.y), half(size.z)]
  };
}

function round3(x: number): number {
  return Math.round(x * 1000) / 1000;
}
