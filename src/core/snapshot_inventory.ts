import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { isSnapshotName } from "./snapshot_naming.ts";
import { hasVerificationMarker } from "./verification.ts";

export interface SnapshotEntry {
  name: string;
  path: string;
  createdMs: number;
  verified: boolean;
  sizeBytes: number;
}

export async function listSnapshots(root: string): Promise<SnapshotEntry[]> {
  const items: SnapshotEntry[] = [];

  let names: string[];
  try {
    names = await readdir(root);
  } catch {
    // Missing root is treated as empty.
    return items;
  }

  for (const name of names) {
    if (!isSnapshotName(name)) continue;
    const path = join(root, name);
    try {
      const info = await stat(path);
      if (!info.isDirectory()) continue;
      items.push({
        name,
        path,
        createdMs: creationTime(info),
        verified: await hasVerificationMarker(path),
        sizeBytes: await directorySize(path),
      });
    } catch {
      continue;
    }
  }

  return sortChronologically(items);
}

export function sortChronologically(entries: SnapshotEntry[]): SnapshotEntry[] {
  return [...entries].sort((a, b) => a.name.localeCompare(b.name));
}

/** Most recently created first; ties fall back to the name. */
export function newestFirst(entries: SnapshotEntry[]): SnapshotEntry[] {
  return [...entries].sort((a, b) => b.createdMs - a.createdMs || b.name.localeCompare(a.name));
}

export function latestVerified(entries: SnapshotEntry[]): SnapshotEntry | null {
  const verified = sortChronologically(entries.filter((entry) => entry.verified));
  return verified.length > 0 ? verified[verified.length - 1] : null;
}

export function creationTime(info: { birthtimeMs: number; mtimeMs: number }): number {
  return info.birthtimeMs > 0 ? info.birthtimeMs : info.mtimeMs;
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ["KB", "MB", "GB", "TB"];
  let value = bytes / 1024;
  let unitIndex = 0;
  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024;
    unitIndex += 1;
  }
  return `${value.toFixed(1)} ${units[unitIndex]}`;
}

export async function directorySize(path: string): Promise<number> {
  let total = 0;
  try {
    for (const entry of await readdir(path, { withFileTypes: true })) {
      const child = join(path, entry.name);
      if (entry.isFile()) {
        total += (await stat(child)).size;
      } else if (entry.isDirectory()) {
        total += await directorySize(child);
      }
    }
  } catch {
    return 0;
  }
  return total;
}
