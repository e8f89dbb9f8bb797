import { loadConfig } from "../config.ts";
import { DebounceCoordinator } from "../core/debounce.ts";
import { createBackupTrigger } from "../core/invoker.ts";
import { describe } from "../errors.ts";
import { appendLog } from "../log.ts";
import { watchBackendFromConfig } from "../platform/watch_backends.ts";
import { superviseChanges, withWatchBackend } from "../platform/watcher.ts";
import type { CommandResult, RuntimeOptions } from "../types.ts";
import { formatInvocation, invokerOptionsFor, logInvocation } from "./backup.ts";

export async function runWatch(options: RuntimeOptions = {}): Promise<CommandResult> {
  const writeLine = options.writeLine ?? ((line: string) => console.log(line));
  const clock = options.clock ?? Date.now;
  const signal = options.signal ?? new AbortController().signal;
  const stamp = () => `[${new Date(clock()).toISOString()}]`;

  try {
    const config = await loadConfig(options);
    const logger = options.logger?.child("watch");
    const minIntervalSeconds = config.watch.min_interval_seconds;
    const trigger = createBackupTrigger(invokerOptionsFor(config, options));

    const coordinator = new DebounceCoordinator({
      minIntervalMs: minIntervalSeconds * 1000,
      clock,
      trigger: async () => {
        const result = await trigger();
        const report = formatInvocation(result);
        for (const line of [...report.stdout, ...report.stderr]) writeLine(line);
        await logInvocation(config, result);
      },
      onTrigger: () => writeLine(`${stamp()} Changes detected, running backup...`),
      onSuppress: () =>
        writeLine(`${stamp()} Changes detected, but waiting for debounce period (${minIntervalSeconds}s)...`),
    });

    const backend = options.watchBackend ?? watchBackendFromConfig(config, writeLine);
    writeLine("Starting n8n file watcher...");
    writeLine(`Monitoring ${config.watch.path} for changes (${backend.name} backend)...`);

    await withWatchBackend(backend, async (active) => {
      const changes = superviseChanges(active, {
        retryDelayMs: config.watch.retry_delay_seconds * 1000,
        signal,
        clock,
        sleep: options.sleep,
        onRestart: (error) =>
          writeLine(`${stamp()} ${error.message}, retrying in ${config.watch.retry_delay_seconds}s...`),
      });

      for await (const change of changes) {
        await logger?.debug(`${change.backend}: ${change.detail}`);
        try {
          await coordinator.onChangeSignal();
        } catch (error) {
          writeLine(`${stamp()} Backup error: ${describe(error)}`);
          await appendLog(config.backup.local_path, "ERROR", `backup error: ${describe(error)}`);
        }
      }
    });

    writeLine("Cleaning up...");
    return { exitCode: 0, stdout: ["Watcher stopped."], stderr: [] };
  } catch (error) {
    return { exitCode: 1, stdout: [], stderr: [describe(error)] };
  }
}
