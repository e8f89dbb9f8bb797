import { mkdir } from "node:fs/promises";
import { basename, dirname } from "node:path";
import { type CommandRunner, runCommand } from "./platform/process.ts";

/** Packs `dataDir` as a single top-level entry, e.g. `.n8n/`. */
export async function createStateArchive(
  dataDir: string,
  archivePath: string,
  runner: CommandRunner = runCommand,
): Promise<void> {
  await mkdir(dirname(archivePath), { recursive: true });

  const result = await runner("tar", ["-czf", archivePath, "-C", dirname(dataDir), basename(dataDir)]);
  if (!result.success) {
    throw new Error(`archive creation failed: ${result.stderr.trim()}`);
  }
}
