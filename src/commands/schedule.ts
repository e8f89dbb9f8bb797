import { loadConfig } from "../config.ts";
import { createBackupTrigger } from "../core/invoker.ts";
import { describe } from "../errors.ts";
import { appendLog } from "../log.ts";
import { delay } from "../platform/watcher.ts";
import type { CommandResult, RuntimeOptions } from "../types.ts";
import { formatInvocation, invokerOptionsFor, logInvocation } from "./backup.ts";

/** Timer-only mode: one backup per interval, no change watcher. */
export async function runSchedule(options: RuntimeOptions = {}): Promise<CommandResult> {
  const writeLine = options.writeLine ?? ((line: string) => console.log(line));
  const clock = options.clock ?? Date.now;
  const signal = options.signal ?? new AbortController().signal;
  const sleep = options.sleep ?? delay;

  try {
    const config = await loadConfig(options);
    const intervalMinutes = config.schedule.interval_minutes;
    const trigger = createBackupTrigger(invokerOptionsFor(config, options));
    let failures = 0;
    let runs = 0;

    writeLine(`Scheduled backups every ${intervalMinutes} minute(s)...`);
    while (!signal.aborted) {
      writeLine(`[${new Date(clock()).toISOString()}] Running scheduled backup...`);
      try {
        const result = await trigger();
        const report = formatInvocation(result);
        for (const line of [...report.stdout, ...report.stderr]) writeLine(line);
        await logInvocation(config, result);
        if (!result.ok) failures += 1;
      } catch (error) {
        failures += 1;
        writeLine(`Backup error: ${describe(error)}`);
        await appendLog(config.backup.local_path, "ERROR", `scheduled backup error: ${describe(error)}`);
      }
      runs += 1;
      if (signal.aborted) break;
      await sleep(intervalMinutes * 60_000, signal);
    }

    return {
      exitCode: 0,
      stdout: [`Schedule stopped after ${runs} run(s), ${failures} failed.`],
      stderr: [],
    };
  } catch (error) {
    return { exitCode: 1, stdout: [], stderr: [describe(error)] };
  }
}
