import { loadConfig } from "../config.ts";
import { pruneSnapshots } from "../core/retention.ts";
import { snapshotsRoot } from "../core/snapshot.ts";
import { describe } from "../errors.ts";
import { appendLog } from "../log.ts";
import type { CommandResult, RuntimeOptions } from "../types.ts";

export async function runPrune(options: RuntimeOptions = {}): Promise<CommandResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];

  try {
    const config = await loadConfig(options);
    const root = snapshotsRoot(config.backup.local_path);
    const result = await pruneSnapshots(root, config.retention.max_age_days, { now: options.now });

    if (result.skipped === "missing") {
      stdout.push("No snapshots found.");
      return { exitCode: 0, stdout, stderr };
    }
    if (result.skipped === "not-writable") {
      stdout.push(`Skipped: no write permission on ${root}`);
      return { exitCode: 0, stdout, stderr };
    }

    for (const path of result.deleted) {
      stdout.push(`Pruned ${path}`);
      await appendLog(config.backup.local_path, "SUCCESS", `pruned old snapshot ${path}`);
    }
    for (const failure of result.failed) {
      stderr.push(`Warning: ${failure.message}`);
      await appendLog(config.backup.local_path, "WARNING", failure.message);
    }
    if (result.deleted.length === 0 && result.failed.length === 0) {
      stdout.push(`Nothing to prune (retention ${config.retention.max_age_days} days).`);
    }

    return { exitCode: 0, stdout, stderr };
  } catch (error) {
    stderr.push(describe(error));
    return { exitCode: 1, stdout, stderr };
  }
}
