import { access, constants, readdir, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { PruneError } from "../errors.ts";
import { isSnapshotName } from "./snapshot_naming.ts";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PruneOptions {
  now?: Date;
  /** Snapshot names that are never removed, such as the run in progress. */
  protect?: Iterable<string>;
  removeDirectory?: (path: string) => Promise<void>;
  isWritable?: (path: string) => Promise<boolean>;
}

export interface PruneResult {
  deleted: string[];
  failed: PruneError[];
  skipped?: "missing" | "not-writable";
}

/**
 * Best-effort removal of snapshot directories whose mtime is more than
 * `maxAgeDays` old. Verification state is not consulted.
 */
export async function pruneSnapshots(
  root: string,
  maxAgeDays: number,
  options: PruneOptions = {},
): Promise<PruneResult> {
  const now = options.now ?? new Date();
  const protect = new Set(options.protect ?? []);
  const removeDirectory = options.removeDirectory ??
    ((path: string) => rm(path, { recursive: true, force: true }));
  const deleted: string[] = [];
  const failed: PruneError[] = [];

  let names: string[];
  try {
    names = await readdir(root);
  } catch {
    return { deleted, failed, skipped: "missing" };
  }

  const isWritable = options.isWritable ?? canWrite;
  if (!(await isWritable(root))) {
    return { deleted, failed, skipped: "not-writable" };
  }

  const cutoff = now.getTime() - maxAgeDays * DAY_MS;
  for (const name of names.sort()) {
    if (!isSnapshotName(name) || protect.has(name)) continue;
    const path = join(root, name);

    let modified: number;
    try {
      const info = await stat(path);
      if (!info.isDirectory()) continue;
      modified = info.mtime.getTime();
    } catch {
      // Removed by someone else since readdir.
      continue;
    }

    if (modified >= cutoff) continue;

    try {
      await removeDirectory(path);
      deleted.push(path);
    } catch (error) {
      failed.push(new PruneError(path, error));
    }
  }

  return { deleted, failed };
}

async function canWrite(path: string): Promise<boolean> {
  try {
    await access(path, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}
