import { createStateArchive } from "../archive.ts";
import type { ArtifactExporter, SnapshotArtifact } from "../core/snapshot.ts";
import { type CommandRunner, runCommand } from "./process.ts";

export interface CommandExporterOptions {
  n8nBin: string;
  dataDir: string;
  runner?: CommandRunner;
}

/** Exports through the n8n CLI and tar, in the current process's environment. */
export function createCommandExporter(options: CommandExporterOptions): ArtifactExporter {
  const runner = options.runner ?? runCommand;

  return {
    async export(artifact: SnapshotArtifact, targetPath: string): Promise<void> {
      if (artifact.kind === "archive") {
        await createStateArchive(options.dataDir, targetPath, runner);
        return;
      }

      const subcommand = artifact.kind === "workflows" ? "export:workflow" : "export:credentials";
      const result = await runner(options.n8nBin, [subcommand, "--all", `--output=${targetPath}`]);
      if (!result.success) {
        const detail = result.stderr.trim() || result.stdout.trim();
        throw new Error(`${options.n8nBin} ${subcommand} exited with code ${result.code}${detail ? `: ${detail}` : ""}`);
      }
    },
  };
}
