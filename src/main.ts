import { isHelpFlag, isHelpTopic, renderHelp } from "./cli/help.ts";
import { parseGlobalOptions } from "./cli/global-options.ts";
import { parseVersionForDisplay, resolveVersion } from "./cli/version.ts";
import { runBackup } from "./commands/backup.ts";
import { runList } from "./commands/list.ts";
import { runPrune } from "./commands/prune.ts";
import { runRestore } from "./commands/restore.ts";
import { runSchedule } from "./commands/schedule.ts";
import { runSnapshotCommand } from "./commands/snapshot.ts";
import { runStatus } from "./commands/status.ts";
import { runWatch } from "./commands/watch.ts";
import { createDebugLogger } from "./debug/logger.ts";
import type { CommandResult, RuntimeOptions } from "./types.ts";

export interface CliResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CliOptions extends RuntimeOptions {
  version?: string;
  isTTY?: boolean;
}

export async function runCli(args: string[], options: CliOptions = {}): Promise<CliResult> {
  const parsedGlobals = parseGlobalOptions(args);
  const env: Record<string, string | undefined> = {
    ...(options.env ?? process.env),
    ...(parsedGlobals.configPath ? { N8N_BACKUP_CONFIG: parsedGlobals.configPath } : {}),
  };
  const effectiveArgs = parsedGlobals.commandArgs;
  const debugEnabled = parsedGlobals.debugEnabled || parsedGlobals.logFilePath !== undefined;
  const logger = options.logger ?? createDebugLogger({
    enabled: debugEnabled,
    logFilePath: parsedGlobals.logFilePath,
  });
  const forceColor = env.CLICOLOR_FORCE === "1";
  const color = forceColor || (env.NO_COLOR === undefined && (options.isTTY ?? process.stdout.isTTY === true));
  await logger.debug(`argv=${JSON.stringify(effectiveArgs)}`);

  if (parsedGlobals.errors.length > 0) {
    return { exitCode: 1, stdout: "", stderr: [...parsedGlobals.errors, "", renderHelp("root", { color })].join("\n") };
  }

  const [command, ...rest] = effectiveArgs;
  if (command === undefined) {
    return { exitCode: 1, stdout: "", stderr: renderHelp("root", { color }) };
  }

  if (isHelpFlag(command)) {
    return { exitCode: 0, stdout: renderHelp("root", { color }), stderr: "" };
  }
  if (command === "help") {
    const topic = rest[0];
    return {
      exitCode: 0,
      stdout: renderHelp(topic && isHelpTopic(topic) ? topic : "root", { color }),
      stderr: "",
    };
  }
  if (command === "-v" || command === "--version" || command === "version") {
    const version = options.version ?? await resolveVersion();
    return { exitCode: 0, stdout: parseVersionForDisplay(version).raw, stderr: "" };
  }

  if (isHelpTopic(command) && isHelpFlag(rest[0])) {
    return { exitCode: 0, stdout: renderHelp(command, { color }), stderr: "" };
  }

  const runtime: RuntimeOptions = { ...options, env, logger };
  let result: CommandResult;

  if (command === "backup") {
    result = await runBackup(runtime);
  } else if (command === "snapshot") {
    result = await runSnapshotCommand(runtime);
  } else if (command === "watch") {
    result = await runWatch(runtime);
  } else if (command === "schedule") {
    result = await runSchedule(runtime);
  } else if (command === "list") {
    result = await runList(runtime);
  } else if (command === "status") {
    result = await runStatus(runtime);
  } else if (command === "prune") {
    result = await runPrune(runtime);
  } else if (command === "restore") {
    const snapshot = rest[0];
    if (!snapshot) {
      return {
        exitCode: 1,
        stdout: "",
        stderr: `${renderHelp("root", { color })}\n\n${renderHelp("restore", { color })}`,
      };
    }
    result = await runRestore(snapshot, runtime);
  } else {
    result = {
      exitCode: 1,
      stdout: [],
      stderr: [`Unknown command: ${command}`, "", renderHelp("root", { color })],
    };
  }

  await logger.debug(`exitCode=${result.exitCode}`);
  return {
    exitCode: result.exitCode,
    stdout: result.stdout.join("\n"),
    stderr: result.stderr.join("\n"),
  };
}
