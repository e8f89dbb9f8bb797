import assert from "node:assert/strict";
import { readdir } from "node:fs/promises";
import { test } from "node:test";
import { runCli } from "../../src/main.ts";
import type { WatchBackend } from "../../src/platform/watcher.ts";
import { createFakeExporter, createInProcessEnvironment } from "../support/fakes.ts";
import { createWorkspace } from "../support/workspace.ts";

const SNAPSHOT_TIME = new Date("2026-05-01T12:00:00Z");

test("watch backs up on the first change and debounces the next one", async () => {
  const workspace = await createWorkspace();
  const controller = new AbortController();
  const lines: string[] = [];
  const lifecycle: string[] = [];
  let now = 0;

  const backend: WatchBackend = {
    name: "scripted",
    async *open() {
      lifecycle.push("open");
      yield "modify /home/node/.n8n/database.sqlite";
      now = 10_000;
      yield "modify /home/node/.n8n/database.sqlite-wal";
      controller.abort();
    },
    teardown: () => {
      lifecycle.push("teardown");
      return Promise.resolve();
    },
  };

  const result = await runCli(["watch"], {
    env: workspace.env,
    environment: createInProcessEnvironment({ backupRoot: workspace.backupDir, now: () => SNAPSHOT_TIME }),
    watchBackend: backend,
    clock: () => now,
    signal: controller.signal,
    writeLine: (line) => lines.push(line),
  });

  assert.deepEqual(result, { exitCode: 0, stdout: "Watcher stopped.", stderr: "" });
  assert.deepEqual(lines, [
    "Starting n8n file watcher...",
    "Monitoring /home/node/.n8n for changes (scripted backend)...",
    "[1970-01-01T00:00:00.000Z] Changes detected, running backup...",
    "Backup completed and verified successfully",
    `Backup location: ${workspace.snapshotsDir}/20260501_120000`,
    "",
    "Backup contents:",
    "  .backup_verified (0 B)",
    "  credentials.json (22 B)",
    "  full_backup.tar.gz (18 B)",
    "  workflows.json (20 B)",
    "[1970-01-01T00:00:10.000Z] Changes detected, but waiting for debounce period (150s)...",
    "Cleaning up...",
  ]);
  assert.deepEqual(lifecycle, ["teardown", "open", "teardown"]);
  assert.deepEqual(await readdir(workspace.snapshotsDir), ["20260501_120000"]);
});

test("watch keeps running after a failed backup and restarts a dead backend", async () => {
  const workspace = await createWorkspace({ watch: { min_interval_seconds: 0, retry_delay_seconds: 2 } });
  const controller = new AbortController();
  const lines: string[] = [];
  const sleeps: number[] = [];
  let opened = 0;

  const backend: WatchBackend = {
    name: "scripted",
    async *open() {
      opened += 1;
      if (opened === 1) {
        yield "change";
        throw new Error("helper exited with code 1");
      }
      yield "change";
      controller.abort();
    },
    teardown: () => Promise.resolve(),
  };

  const result = await runCli(["watch"], {
    env: workspace.env,
    environment: createInProcessEnvironment({
      backupRoot: workspace.backupDir,
      exporter: createFakeExporter({ skip: "archive" }),
    }),
    watchBackend: backend,
    clock: () => 0,
    signal: controller.signal,
    sleep: (ms) => {
      sleeps.push(ms);
      return Promise.resolve();
    },
    writeLine: (line) => lines.push(line),
  });

  assert.equal(result.exitCode, 0);
  assert.deepEqual(sleeps, [2000]);
  assert.equal(lines.filter((line) => line === "Backup failed or could not be verified").length, 2);
  assert.ok(lines.includes("[1970-01-01T00:00:00.000Z] scripted watcher stopped: helper exited with code 1, retrying in 2s..."));
});

test("schedule runs a backup per interval until stopped", async () => {
  const workspace = await createWorkspace({ schedule: { interval_minutes: 15 } });
  const controller = new AbortController();
  const lines: string[] = [];
  const sleeps: number[] = [];
  let tick = 0;

  const result = await runCli(["schedule"], {
    env: workspace.env,
    environment: createInProcessEnvironment({
      backupRoot: workspace.backupDir,
      now: () => new Date(SNAPSHOT_TIME.getTime() + tick * 15 * 60_000),
    }),
    clock: () => tick * 15 * 60_000,
    signal: controller.signal,
    sleep: (ms) => {
      sleeps.push(ms);
      tick += 1;
      if (sleeps.length === 2) controller.abort();
      return Promise.resolve();
    },
    writeLine: (line) => lines.push(line),
  });

  assert.deepEqual(result, { exitCode: 0, stdout: "Schedule stopped after 2 run(s), 0 failed.", stderr: "" });
  assert.deepEqual(sleeps, [900_000, 900_000]);
  assert.deepEqual(lines.filter((line) => line.includes("Running scheduled backup")), [
    "[1970-01-01T00:00:00.000Z] Running scheduled backup...",
    "[1970-01-01T00:15:00.000Z] Running scheduled backup...",
  ]);
  assert.deepEqual((await readdir(workspace.snapshotsDir)).sort(), ["20260501_120000", "20260501_121500"]);
  assert.equal(lines[0], "Scheduled backups every 15 minute(s)...");
});
