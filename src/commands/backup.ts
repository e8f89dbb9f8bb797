import { loadConfig } from "../config.ts";
import { type InvocationResult, type InvokerOptions, triggerBackup } from "../core/invoker.ts";
import { formatSize } from "../core/snapshot_inventory.ts";
import { describe } from "../errors.ts";
import { appendLog } from "../log.ts";
import { environmentFromConfig } from "../platform/container.ts";
import type { AppConfig, CommandResult, RuntimeOptions } from "../types.ts";

export async function runBackup(options: RuntimeOptions = {}): Promise<CommandResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];

  try {
    const config = await loadConfig(options);
    const result = await triggerBackup(invokerOptionsFor(config, options));
    const report = formatInvocation(result);
    stdout.push(...report.stdout);
    stderr.push(...report.stderr);
    await logInvocation(config, result);

    return { exitCode: result.ok ? 0 : 1, stdout, stderr };
  } catch (error) {
    stderr.push(describe(error));
    return { exitCode: 1, stdout, stderr };
  }
}

export function invokerOptionsFor(config: AppConfig, options: RuntimeOptions): InvokerOptions {
  return {
    hostBackupRoot: config.backup.local_path,
    environmentBackupRoot: config.backup.container_path,
    environment: options.environment ?? environmentFromConfig(config, options.runner),
    user: config.app.user,
    snapshotCommand: config.backup.snapshot_command,
    logger: options.logger?.child("invoker"),
  };
}

export function formatInvocation(result: InvocationResult): { stdout: string[]; stderr: string[] } {
  if (!result.ok) {
    const stderr = ["Backup failed or could not be verified"];
    if (result.output.length > 0) {
      stderr.push("", "Snapshot output:", ...result.output.split("\n").map((line) => `  ${line}`));
    }
    return { stdout: [], stderr };
  }

  return {
    stdout: [
      "Backup completed and verified successfully",
      `Backup location: ${result.directory}`,
      "",
      "Backup contents:",
      ...result.contents.map((entry) => `  ${entry.name} (${formatSize(entry.sizeBytes)})`),
    ],
    stderr: [],
  };
}

export async function logInvocation(config: AppConfig, result: InvocationResult): Promise<void> {
  if (result.ok) {
    await appendLog(config.backup.local_path, "SUCCESS", `verified snapshot ${result.directory}`);
  } else {
    await appendLog(
      config.backup.local_path,
      "ERROR",
      `${result.reason} (snapshot command exit code ${result.exitCode})`,
    );
  }
}
