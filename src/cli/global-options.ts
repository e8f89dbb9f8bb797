export interface ParsedGlobalOptions {
  commandArgs: string[];
  debugEnabled: boolean;
  logFilePath?: string;
  configPath?: string;
  errors: string[];
}

const defaultDebugLogFile = "n8n-autobackup-debug.log";
const knownRootCommands = new Set([
  "backup",
  "snapshot",
  "watch",
  "schedule",
  "list",
  "status",
  "prune",
  "restore",
  "help",
  "version",
  "-h",
  "--help",
  "-v",
  "--version",
]);

export function parseGlobalOptions(args: string[]): ParsedGlobalOptions {
  const commandArgs: string[] = [];
  const errors: string[] = [];
  let debugEnabled = false;
  let logFilePath: string | undefined;
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === "--debug") {
      debugEnabled = true;
      continue;
    }

    if (arg === "--log-file") {
      const next = args[i + 1];
      if (isValue(next)) {
        logFilePath = next;
        i += 1;
      } else {
        logFilePath = defaultDebugLogFile;
      }
      continue;
    }

    if (arg === "--config" || arg.startsWith("--config=")) {
      const inline = arg.startsWith("--config=") ? arg.slice("--config=".length) : undefined;
      const next = args[i + 1];
      if (inline) {
        configPath = inline;
      } else if (inline === undefined && isValue(next)) {
        configPath = next;
        i += 1;
      } else {
        errors.push("--config requires a path");
      }
      continue;
    }

    commandArgs.push(arg);
  }

  return {
    commandArgs,
    debugEnabled,
    logFilePath,
    configPath,
    errors,
  };
}

function isValue(next: string | undefined): next is string {
  return next !== undefined && !next.startsWith("-") && !knownRootCommands.has(next);
}
