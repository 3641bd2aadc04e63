import type { Vec3 } from "./structure.js";

export interface PoseAtom {
  readonly serial: number;
  readonly name: string;
  readonly element: string;
  /** AutoDock atom type as written by the engine (C, A, OA, HD, ...). */
  readonly type: string;
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface Pose {
  readonly receptorId: string;
  readonly ligand: string;
  /** 1-based position after sorting by affinity. */
  readonly rank: number;
  /** Model number the engine gave the pose. */
  readonly engineRank: number;
  /** kcal/mol; lower binds stronger. */
  readonly affinity: number;
  readonly rmsdLowerBound: number;
  readonly rmsdUpperBound: number;
  readonly atoms: readonly PoseAtom[];
}

export interface DockingBox {
  readonly center: Vec3;
  readonly halfExtents: Vec3;
}

export interface DockingRequest {
  readonly ligand: string;
  readonly box: DockingBox;
  readonly numPoses: number;
  readonly exhaustiveness?: number;
  readonly seed?: number;
  readonly signal?: AbortSignal;
}

export type DockingJobStatus = "queued" | "preparing" | "running" | "succeeded" | "failed" | "cancelled";

export interface DockingJob {
  readonly id: string;
  readonly receptorId: string;
  readonly ligand: string;
  readonly status: DockingJobStatus;
  readonly createdAt: number;
  readonly startedAt: number | null;
  readonly finishedAt: number | null;
  readonly poses: readonly Pose[];
  readonly error: { readonly code: string; readonly message: string } | null;
  readonly warnings: readonly string[];
}
