import { chmod, mkdir, readdir, stat } from "node:fs/promises";
import { join, posix } from "node:path";
import { type DebugLogger, silentLogger } from "../debug/logger.ts";
import { describe } from "../errors.ts";
import type { ExecutionEnvironment } from "../platform/container.ts";
import { SerialGate } from "./serial_gate.ts";
import { AUTO_BACKUPS_DIR, snapshotsRoot } from "./snapshot.ts";
import { listSnapshots, newestFirst } from "./snapshot_inventory.ts";

export const INVOCATION_FAILURE = "backup failed or could not be verified";

export interface InvokerOptions {
  /** Host directory holding `auto-backups/`. */
  hostBackupRoot: string;
  /** The same directory as mounted inside the environment. */
  environmentBackupRoot: string;
  environment: ExecutionEnvironment;
  user: string;
  snapshotCommand: string[];
  logger?: DebugLogger;
  chmodDirectory?: (path: string, mode: number) => Promise<void>;
}

export interface SnapshotContentEntry {
  name: string;
  sizeBytes: number;
}

export type InvocationResult =
  | {
    ok: true;
    name: string;
    directory: string;
    contents: SnapshotContentEntry[];
    exitCode: number;
  }
  | {
    ok: false;
    reason: string;
    exitCode: number;
    output: string;
  };

/**
 * Runs one snapshot inside the environment and judges it from the host side.
 * Only directories created during this invocation are considered, and only the
 * verification marker counts as proof of success.
 */
export async function triggerBackup(options: InvokerOptions): Promise<InvocationResult> {
  const logger = options.logger ?? silentLogger;
  const hostRoot = snapshotsRoot(options.hostBackupRoot);

  await mkdir(hostRoot, { recursive: true });
  // The environment's principal differs from the host user.
  const chmodDirectory = options.chmodDirectory ?? chmod;
  try {
    await chmodDirectory(hostRoot, 0o777);
  } catch (error) {
    await logger.debug(`chmod ${hostRoot} failed: ${describe(error)}`);
  }
  const before = new Set(await readdir(hostRoot));

  const prepared = await options.environment.mkdir(posix.join(options.environmentBackupRoot, AUTO_BACKUPS_DIR));
  if (!prepared.success) {
    await logger.debug(`mkdir inside ${options.environment.name} failed: ${prepared.stderr.trim()}`);
  }

  const result = await options.environment.exec(options.snapshotCommand, { user: options.user });
  await logger.debug(`snapshot command exited with code ${result.code}`);
  const output = [result.stdout.trim(), result.stderr.trim()].filter((part) => part.length > 0).join("\n");

  const created = newestFirst((await listSnapshots(hostRoot)).filter((entry) => !before.has(entry.name)));
  const latest = created[0];
  if (!latest || !latest.verified) {
    return { ok: false, reason: INVOCATION_FAILURE, exitCode: result.code, output };
  }

  return {
    ok: true,
    name: latest.name,
    directory: latest.path,
    contents: await describeContents(latest.path),
    exitCode: result.code,
  };
}

/** Serialises concurrent requests so that at most one snapshot is written at a time. */
export function createBackupTrigger(
  options: InvokerOptions,
  gate: SerialGate = new SerialGate(),
): () => Promise<InvocationResult> {
  return () => gate.run(() => triggerBackup(options));
}

async function describeContents(directory: string): Promise<SnapshotContentEntry[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const contents: SnapshotContentEntry[] = [];
  for (const entry of entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))) {
    if (!entry.isFile()) continue;
    const { size } = await stat(join(directory, entry.name));
    contents.push({ name: entry.name, sizeBytes: size });
  }
  return contents;
}
