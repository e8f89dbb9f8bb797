import { appendFile } from "node:fs/promises";

export interface DebugLogger {
  readonly enabled: boolean;
  debug(message: string): Promise<void>;
  child(scope: string): DebugLogger;
}

interface CreateDebugLoggerOptions {
  enabled: boolean;
  logFilePath?: string;
  scope?: string;
  writeStderr?: (line: string) => void;
}

export function createDebugLogger(options: CreateDebugLoggerOptions): DebugLogger {
  const writeStderr = options.writeStderr ?? ((line: string) => console.error(line));
  const prefix = options.scope ? `[${options.scope}] ` : "";

  return {
    enabled: options.enabled,
    async debug(message: string): Promise<void> {
      if (!options.enabled) return;
      const line = `[DEBUG] ${new Date().toISOString()} ${prefix}${message}`;
      writeStderr(line);
      if (options.logFilePath) {
        await appendFile(options.logFilePath, `${line}\n`, "utf8");
      }
    },
    child(scope: string): DebugLogger {
      return createDebugLogger({
        ...options,
        scope: options.scope ? `${options.scope}:${scope}` : scope,
      });
    },
  };
}

export const silentLogger: DebugLogger = createDebugLogger({ enabled: false });
