import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { createLogger } from "./logger.js";

const log = createLogger("scratch");

export async function createScratchDir(root: string, prefix: string): Promise<string> {
  await mkdir(root, { recursive: true });
  return mkdtemp(join(root, prefix));
}

export async function removeScratchDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Runs `fn` with a fresh directory under `root` and removes the directory on
 * every exit path. A failed removal is logged; the task's own outcome wins.
 */
export async function withScratchDir<T>(root: string, prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createScratchDir(root, prefix);
  try {
    return await fn(dir);
  } finally {
    await removeScratchDir(dir).catch((err: unknown) => {
      log.warn({ dir, err }, "failed to remove scratch directory");
    });
  }
}
