import { loadConfig } from "../config.ts";
import { runSnapshot } from "../core/orchestrator.ts";
import type { PruneResult } from "../core/retention.ts";
import { describe } from "../errors.ts";
import { createCommandExporter } from "../platform/exporter.ts";
import type { CommandResult, RuntimeOptions } from "../types.ts";

/** Orchestrator entry point, executed inside the environment as the n8n user. */
export async function runSnapshotCommand(options: RuntimeOptions = {}): Promise<CommandResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];

  try {
    const config = await loadConfig(options);
    const exporter = options.exporter ?? createCommandExporter({
      n8nBin: config.app.n8n_bin,
      dataDir: config.app.data_dir,
      runner: options.runner,
    });
    const fixedNow = options.now;

    const run = await runSnapshot({
      backupRoot: config.backup.container_path,
      exporter,
      expectedUid: config.app.uid,
      currentUid: options.uid ?? process.getuid?.(),
      maxAgeDays: config.retention.max_age_days,
      now: fixedNow ? () => fixedNow : undefined,
      logger: options.logger?.child("snapshot"),
      onPrune: (result) => reportPrune(result, stdout, stderr),
    });

    stdout.push(`Backup completed at ${run.timestamp}`);
    stdout.push(`Backup verified successfully: ${run.directory}`);
    return { exitCode: 0, stdout, stderr };
  } catch (error) {
    stderr.push(describe(error));
    return { exitCode: 1, stdout, stderr };
  }
}

export function reportPrune(result: PruneResult, stdout: string[], stderr: string[]): void {
  for (const path of result.deleted) {
    stdout.push(`Pruned old snapshot ${path}`);
  }
  for (const failure of result.failed) {
    stderr.push(`Warning: ${failure.message}`);
  }
}
