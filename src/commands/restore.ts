import { stat } from "node:fs/promises";
import { basename, join, posix, resolve } from "node:path";
import { loadConfig } from "../config.ts";
import { type SnapshotArtifact, SNAPSHOT_ARTIFACTS, snapshotsRoot } from "../core/snapshot.ts";
import { hasVerificationMarker } from "../core/verification.ts";
import { CliError, describe } from "../errors.ts";
import { appendLog } from "../log.ts";
import { environmentFromConfig } from "../platform/container.ts";
import type { CommandResult, RuntimeOptions } from "../types.ts";

const RESTORE_STAGING = "/tmp/n8n-autobackup-restore";

const IMPORT_SUBCOMMANDS: Partial<Record<SnapshotArtifact["kind"], string>> = {
  workflows: "import:workflow",
  credentials: "import:credentials",
};

export async function runRestore(snapshot: string, options: RuntimeOptions = {}): Promise<CommandResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];

  try {
    const config = await loadConfig(options);
    const directory = resolveSnapshotDirectory(snapshot, config.backup.local_path, options.cwd);
    const name = basename(directory);

    if (!(await isDirectory(directory))) {
      throw new CliError(`snapshot not found: ${directory}`, "ERR_SNAPSHOT_NOT_FOUND", 1);
    }
    if (!(await hasVerificationMarker(directory))) {
      throw new CliError(`snapshot ${name} is not verified; refusing to restore`, "ERR_SNAPSHOT_UNVERIFIED", 1);
    }

    const environment = options.environment ?? environmentFromConfig(config, options.runner);
    const staging = posix.join(RESTORE_STAGING, name);
    const prepared = await environment.mkdir(staging);
    if (!prepared.success) {
      throw new CliError(`could not create ${staging} in ${environment.name}: ${prepared.stderr.trim()}`, "ERR_RESTORE", 1);
    }

    for (const artifact of SNAPSHOT_ARTIFACTS) {
      const subcommand = IMPORT_SUBCOMMANDS[artifact.kind];
      if (!subcommand) continue;

      const target = posix.join(staging, artifact.fileName);
      const copied = await environment.copyInto(join(directory, artifact.fileName), target);
      if (!copied.success) {
        throw new CliError(`could not copy ${artifact.fileName}: ${copied.stderr.trim()}`, "ERR_RESTORE", 1);
      }

      const imported = await environment.exec([config.app.n8n_bin, subcommand, `--input=${target}`], {
        user: config.app.user,
      });
      if (!imported.success) {
        throw new CliError(
          `${subcommand} failed with code ${imported.code}: ${imported.stderr.trim()}`,
          "ERR_RESTORE",
          1,
        );
      }
      stdout.push(`Imported ${artifact.kind} from ${artifact.fileName}`);
    }

    await appendLog(config.backup.local_path, "RESTORE", `restored snapshot ${directory}`);
    stdout.push(`Restore completed from snapshot ${name}`);
    return { exitCode: 0, stdout, stderr };
  } catch (error) {
    stderr.push(describe(error));
    return { exitCode: 1, stdout, stderr };
  }
}

export function resolveSnapshotDirectory(snapshot: string, backupRoot: string, cwd?: string): string {
  if (snapshot.includes("/")) {
    return resolve(cwd ?? process.cwd(), snapshot);
  }
  return join(snapshotsRoot(backupRoot), snapshot);
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}
