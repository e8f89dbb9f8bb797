import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";

export type LogLevel = "SUCCESS" | "INFO" | "WARNING" | "ERROR" | "RESTORE";

export async function appendLog(
  backupRoot: string,
  level: LogLevel,
  message: string,
): Promise<void> {
  await mkdir(backupRoot, { recursive: true });
  const logPath = join(backupRoot, "backup.log");
  const line = `[${new Date().toISOString()}] ${level}: ${message}\n`;
  await appendFile(logPath, line, "utf8");
}
