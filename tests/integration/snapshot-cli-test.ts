import assert from "node:assert/strict";
import { readdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { test } from "node:test";
import { runCli } from "../../src/main.ts";
import type { CommandRunner } from "../../src/platform/process.ts";
import { createFakeExporter, ok } from "../support/fakes.ts";
import { createWorkspace, exists, seedSnapshot } from "../support/workspace.ts";

const NOW = new Date("2026-05-01T12:00:00Z");

test("snapshot writes a verified snapshot under the container backup path", async () => {
  const workspace = await createWorkspace();

  const result = await runCli(["snapshot"], {
    env: workspace.env,
    exporter: createFakeExporter(),
    uid: 1000,
    now: NOW,
  });

  const directory = join(workspace.snapshotsDir, "20260501_120000");
  assert.equal(result.exitCode, 0);
  assert.equal(
    result.stdout,
    ["Backup completed at 20260501_120000", `Backup verified successfully: ${directory}`].join("\n"),
  );
  assert.equal(await exists(join(directory, ".backup_verified")), true);
});

test("snapshot refuses to run as the wrong user", async () => {
  const workspace = await createWorkspace();

  const result = await runCli(["snapshot"], {
    env: workspace.env,
    exporter: createFakeExporter(),
    uid: 0,
    now: NOW,
  });

  assert.deepEqual(result, {
    exitCode: 1,
    stdout: "",
    stderr: "snapshot must run as uid 1000 (current uid: 0)",
  });
  assert.equal(await exists(workspace.snapshotsDir), false);
});

test("snapshot reports pruned directories before the completion lines", async () => {
  const workspace = await createWorkspace({ retention: { max_age_days: 3 } });
  const expired = await seedSnapshot(workspace.snapshotsDir, "20260420_000000", {
    modified: new Date("2026-04-20T00:00:00Z"),
  });

  const result = await runCli(["snapshot"], {
    env: workspace.env,
    exporter: createFakeExporter(),
    uid: 1000,
    now: NOW,
  });

  assert.equal(result.exitCode, 0);
  assert.equal(result.stdout.split("\n")[0], `Pruned old snapshot ${expired}`);
  assert.deepEqual(await readdir(workspace.snapshotsDir), ["20260501_120000"]);
});

test("snapshot drives the n8n CLI and tar through the command runner", async () => {
  const workspace = await createWorkspace({ app: { data_dir: "/data/.n8n", n8n_bin: "n8n" } });
  const commands: string[] = [];
  const runner: CommandRunner = async (command, args) => {
    commands.push([command, ...args.filter((arg) => !arg.startsWith("--output=") && !arg.startsWith("/"))].join(" "));
    const output = args.find((arg) => arg.startsWith("--output="))?.slice("--output=".length) ??
      (command === "tar" ? args[1] : undefined);
    if (output) {
      await writeFile(output, "exported");
    }
    return ok();
  };

  const result = await runCli(["snapshot"], { env: workspace.env, runner, uid: 1000, now: NOW });

  assert.equal(result.exitCode, 0);
  assert.deepEqual(commands, [
    "n8n export:workflow --all",
    "n8n export:credentials --all",
    "tar -czf -C .n8n",
  ]);
  assert.equal(dirname(result.stdout.split("\n")[1].slice("Backup verified successfully: ".length)), workspace.snapshotsDir);
});

test("snapshot fails without a marker when an export command fails", async () => {
  const workspace = await createWorkspace();
  const runner: CommandRunner = (command) =>
    Promise.resolve(
      command === "n8n" ? { success: false, code: 1, stdout: "", stderr: "Database is locked" } : ok(),
    );

  const result = await runCli(["snapshot"], { env: workspace.env, runner, uid: 1000, now: NOW });

  assert.equal(result.exitCode, 1);
  assert.equal(
    result.stderr,
    "export of workflows.json failed: n8n export:workflow exited with code 1: Database is locked",
  );
  assert.deepEqual(await readdir(join(workspace.snapshotsDir, "20260501_120000")), []);
});
