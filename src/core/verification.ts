import { stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { SNAPSHOT_ARTIFACTS, type SnapshotArtifact, VERIFICATION_MARKER } from "./snapshot.ts";

export type VerificationResult =
  | { verified: true; markerPath: string }
  | { verified: false; missing: string[] };

export async function verifySnapshot(
  directory: string,
  artifacts: readonly SnapshotArtifact[] = SNAPSHOT_ARTIFACTS,
): Promise<VerificationResult> {
  const missing: string[] = [];
  for (const artifact of artifacts) {
    if (!(await isFile(join(directory, artifact.fileName)))) {
      missing.push(artifact.fileName);
    }
  }

  if (missing.length > 0) {
    return { verified: false, missing };
  }

  const markerPath = join(directory, VERIFICATION_MARKER);
  await writeFile(markerPath, "");
  return { verified: true, markerPath };
}

export async function hasVerificationMarker(directory: string): Promise<boolean> {
  return await isFile(join(directory, VERIFICATION_MARKER));
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}
