import assert from "node:assert/strict";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { test } from "node:test";
import { runCli } from "../../src/main.ts";
import { createWorkspace, exists, seedSnapshot } from "../support/workspace.ts";

const DAY_MS = 24 * 60 * 60 * 1000;

test("list handles a missing snapshots directory", async () => {
  const workspace = await createWorkspace();

  const result = await runCli(["list"], { env: workspace.env });

  assert.deepEqual(result, { exitCode: 0, stdout: "No snapshots found.", stderr: "" });
});

test("list shows snapshots oldest first with their verification state", async () => {
  const workspace = await createWorkspace();
  await seedSnapshot(workspace.snapshotsDir, "20260502_080000", { verified: false, artifacts: ["workflows.json"] });
  await seedSnapshot(workspace.snapshotsDir, "20260501_080000");

  const result = await runCli(["list"], { env: workspace.env });

  assert.equal(result.exitCode, 0);
  assert.equal(
    result.stdout,
    [
      "snapshots:",
      "  20260501_080000  verified  (6 B)",
      "  20260502_080000  unverified  (2 B)",
    ].join("\n"),
  );
});

test("status summarizes configuration and snapshot health", async () => {
  const workspace = await createWorkspace();
  await seedSnapshot(workspace.snapshotsDir, "20260501_080000");
  await seedSnapshot(workspace.snapshotsDir, "20260501_090000", { verified: false, artifacts: ["workflows.json"] });

  const result = await runCli(["status"], { env: workspace.env, now: new Date("2026-05-01T20:00:00Z") });

  assert.equal(result.exitCode, 0);
  assert.deepEqual(result.stdout.split("\n"), [
    "n8n Auto-Backup Status",
    `Config: ${workspace.configPath}`,
    "Container: n8n (user node, uid 1000)",
    `Backup directory: ${workspace.backupDir}`,
    "Retention: 7 days",
    "Watch: container backend on /home/node/.n8n, min interval 150s",
    "Schedule: every 60 minute(s)",
    "Snapshots: 2 (1 verified, 1 unverified)",
    "Latest verified: 20260501_080000 (6 B)",
    "Warning: most recent snapshot 20260501_090000 is not verified.",
    "Health: recent verified snapshot exists.",
    "Disk usage: 8 B",
  ]);
});

test("status warns when the latest verified snapshot is more than a day old", async () => {
  const workspace = await createWorkspace();
  await seedSnapshot(workspace.snapshotsDir, "20260501_080000");

  const result = await runCli(["status"], { env: workspace.env, now: new Date("2026-05-03T08:00:00Z") });

  const lines = result.stdout.split("\n");
  assert.equal(lines.at(-2), "Warning: latest verified snapshot is stale.");
});

test("status before any backup", async () => {
  const workspace = await createWorkspace();

  const result = await runCli(["status"], { env: workspace.env });

  assert.equal(result.stdout.split("\n").at(-1), "No snapshots yet. Run a backup.");
});

test("prune removes expired snapshots and logs each removal", async () => {
  const workspace = await createWorkspace();
  const now = new Date("2026-05-10T00:00:00Z");
  const expired = await seedSnapshot(workspace.snapshotsDir, "20260401_000000", {
    modified: new Date(now.getTime() - 30 * DAY_MS),
  });
  const kept = await seedSnapshot(workspace.snapshotsDir, "20260509_000000", {
    modified: new Date(now.getTime() - DAY_MS),
  });

  const result = await runCli(["prune"], { env: workspace.env, now });

  assert.deepEqual(result, { exitCode: 0, stdout: `Pruned ${expired}`, stderr: "" });
  assert.equal(await exists(expired), false);
  assert.equal(await exists(kept), true);
  const log = await readFile(join(workspace.backupDir, "backup.log"), "utf8");
  assert.ok(log.endsWith(` SUCCESS: pruned old snapshot ${expired}\n`));
});

test("prune with nothing to do", async () => {
  const workspace = await createWorkspace({ retention: { max_age_days: 30 } });
  await seedSnapshot(workspace.snapshotsDir, "20260509_000000");

  const result = await runCli(["prune"], { env: workspace.env });

  assert.equal(result.stdout, "Nothing to prune (retention 30 days).");
});

test("prune without a snapshots directory", async () => {
  const workspace = await createWorkspace();

  const result = await runCli(["prune"], { env: workspace.env });

  assert.deepEqual(result, { exitCode: 0, stdout: "No snapshots found.", stderr: "" });
});
