import { mkdir, readdir } from "node:fs/promises";
import { join } from "node:path";
import { type DebugLogger, silentLogger } from "../debug/logger.ts";
import { DirectoryCreationError, ExportError, PermissionError, VerificationError } from "../errors.ts";
import { pruneSnapshots, type PruneResult } from "./retention.ts";
import { type ArtifactExporter, SNAPSHOT_ARTIFACTS, type SnapshotRun, snapshotsRoot } from "./snapshot.ts";
import { nextSnapshotName } from "./snapshot_naming.ts";
import { verifySnapshot } from "./verification.ts";

export interface SnapshotOptions {
  /** Directory holding `auto-backups/`, as seen by this process. */
  backupRoot: string;
  exporter: ArtifactExporter;
  expectedUid: number;
  currentUid: number | undefined;
  maxAgeDays: number;
  now?: () => Date;
  logger?: DebugLogger;
  onPrune?: (result: PruneResult) => Promise<void> | void;
}

export async function runSnapshot(options: SnapshotOptions): Promise<SnapshotRun> {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());

  if (options.currentUid !== options.expectedUid) {
    throw new PermissionError(options.expectedUid, options.currentUid);
  }

  const root = snapshotsRoot(options.backupRoot);
  let existing: string[];
  try {
    await mkdir(root, { recursive: true });
    existing = await readdir(root);
  } catch (error) {
    throw new DirectoryCreationError(root, error);
  }

  const timestamp = nextSnapshotName(existing, now());
  const directory = join(root, timestamp);
  try {
    await mkdir(directory);
  } catch (error) {
    throw new DirectoryCreationError(directory, error);
  }
  await logger.debug(`created ${directory}`);

  const artifacts: string[] = [];
  for (const artifact of SNAPSHOT_ARTIFACTS) {
    const target = join(directory, artifact.fileName);
    try {
      await options.exporter.export(artifact, target);
    } catch (error) {
      throw new ExportError(artifact.fileName, error);
    }
    artifacts.push(target);
    await logger.debug(`exported ${artifact.kind} to ${target}`);
  }

  const pruned = await pruneSnapshots(root, options.maxAgeDays, {
    now: now(),
    protect: [timestamp],
  });
  await options.onPrune?.(pruned);

  const verification = await verifySnapshot(directory);
  if (!verification.verified) {
    throw new VerificationError(directory, verification.missing);
  }

  return {
    timestamp,
    directory,
    artifacts,
    verified: true,
    verificationMarker: verification.markerPath,
  };
}
