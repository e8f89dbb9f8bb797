import { join } from "node:path";

export type ArtifactKind = "workflows" | "credentials" | "archive";

export interface SnapshotArtifact {
  kind: ArtifactKind;
  fileName: string;
}

/** Export order is fixed; verification expects exactly these files. */
export const SNAPSHOT_ARTIFACTS: readonly SnapshotArtifact[] = [
  { kind: "workflows", fileName: "workflows.json" },
  { kind: "credentials", fileName: "credentials.json" },
  { kind: "archive", fileName: "full_backup.tar.gz" },
];

export const VERIFICATION_MARKER = ".backup_verified";
export const AUTO_BACKUPS_DIR = "auto-backups";

export interface SnapshotRun {
  timestamp: string;
  directory: string;
  artifacts: string[];
  verified: boolean;
  verificationMarker: string;
}

/**
 * Capability that writes one artifact to `targetPath`. Implementations reject
 * when the underlying export fails.
 */
export interface ArtifactExporter {
  export(artifact: SnapshotArtifact, targetPath: string): Promise<void>;
}

export function snapshotsRoot(backupRoot: string): string {
  return join(backupRoot, AUTO_BACKUPS_DIR);
}
