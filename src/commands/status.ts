import { stat } from "node:fs/promises";
import { loadConfig } from "../config.ts";
import { snapshotsRoot } from "../core/snapshot.ts";
import { formatSize, latestVerified, listSnapshots, sortChronologically } from "../core/snapshot_inventory.ts";
import { parseSnapshotTimestamp } from "../core/snapshot_naming.ts";
import { describe } from "../errors.ts";
import type { CommandResult, RuntimeOptions } from "../types.ts";

const STALE_AFTER_MS = 24 * 60 * 60 * 1000;

export async function runStatus(options: RuntimeOptions = {}): Promise<CommandResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];

  try {
    const config = await loadConfig(options);

    stdout.push("n8n Auto-Backup Status");
    stdout.push(
      config._meta.loaded
        ? `Config: ${config._meta.config_path}`
        : `Config: defaults (no settings file at ${config._meta.config_path})`,
    );
    stdout.push(`Container: ${config.app.container} (user ${config.app.user}, uid ${config.app.uid})`);
    stdout.push(`Backup directory: ${config.backup.local_path}`);
    stdout.push(`Retention: ${config.retention.max_age_days} days`);
    stdout.push(
      `Watch: ${config.watch.backend} backend on ${config.watch.path}, min interval ${config.watch.min_interval_seconds}s`,
    );
    stdout.push(`Schedule: every ${config.schedule.interval_minutes} minute(s)`);

    const root = snapshotsRoot(config.backup.local_path);
    if (!(await exists(root))) {
      stdout.push("No snapshots yet. Run a backup.");
      return { exitCode: 0, stdout, stderr };
    }

    const entries = await listSnapshots(root);
    const verifiedCount = entries.filter((entry) => entry.verified).length;
    stdout.push(
      `Snapshots: ${entries.length} (${verifiedCount} verified, ${entries.length - verifiedCount} unverified)`,
    );

    const latest = latestVerified(entries);
    stdout.push(
      latest ? `Latest verified: ${latest.name} (${formatSize(latest.sizeBytes)})` : "No verified snapshots yet",
    );

    const newest = sortChronologically(entries).at(-1);
    if (newest && !newest.verified) {
      stdout.push(`Warning: most recent snapshot ${newest.name} is not verified.`);
    }

    if (latest) {
      stdout.push(stalenessMessage(latest.name, options.now ?? new Date()));
    }

    const totalSize = entries.reduce((sum, entry) => sum + entry.sizeBytes, 0);
    stdout.push(`Disk usage: ${formatSize(totalSize)}`);

    return { exitCode: 0, stdout, stderr };
  } catch (error) {
    stderr.push(describe(error));
    return { exitCode: 1, stdout, stderr };
  }
}

function stalenessMessage(name: string, now: Date): string {
  const taken = parseSnapshotTimestamp(name);
  if (taken && now.getTime() - taken.getTime() > STALE_AFTER_MS) {
    return "Warning: latest verified snapshot is stale.";
  }
  return "Health: recent verified snapshot exists.";
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}
