import { loadConfig } from "../config.ts";
import { snapshotsRoot } from "../core/snapshot.ts";
import { formatSize, listSnapshots } from "../core/snapshot_inventory.ts";
import { describe } from "../errors.ts";
import type { CommandResult, RuntimeOptions } from "../types.ts";

export async function runList(options: RuntimeOptions = {}): Promise<CommandResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];

  try {
    const config = await loadConfig(options);
    const entries = await listSnapshots(snapshotsRoot(config.backup.local_path));
    if (entries.length === 0) {
      stdout.push("No snapshots found.");
      return { exitCode: 0, stdout, stderr };
    }

    stdout.push("snapshots:");
    for (const entry of entries) {
      const state = entry.verified ? "verified" : "unverified";
      stdout.push(`  ${entry.name}  ${state}  (${formatSize(entry.sizeBytes)})`);
    }

    return { exitCode: 0, stdout, stderr };
  } catch (error) {
    stderr.push(describe(error));
    return { exitCode: 1, stdout, stderr };
  }
}
