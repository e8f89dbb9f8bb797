import assert from "node:assert/strict";
import { type DataTable, Given, Then, When } from "@cucumber/cucumber";
import { runCli } from "../../../src/main.ts";
import type { WatchBackend } from "../../../src/platform/watcher.ts";
import { createInProcessEnvironment } from "../../support/fakes.ts";
import type { BackupWorld } from "../support/world.ts";

const RUNNING_LINE = / Changes detected, running backup\.\.\.$/;

Given("the watcher minimum interval is {int} seconds", async function (this: BackupWorld, seconds: number) {
  this.backupDurationMs = 0;
  await this.initWorkspace({ watch: { min_interval_seconds: seconds } });
});

Given("each backup takes {int} seconds", function (this: BackupWorld, seconds: number) {
  this.backupDurationMs = seconds * 1000;
});

When("changes are detected at seconds:", async function (this: BackupWorld, table: DataTable) {
  const world = this;
  const workspace = this.requireWorkspace();
  const seconds = table.hashes().map((row) => Number(row.second));
  const controller = new AbortController();
  this.clockMs = 0;
  this.lines = [];

  const backend: WatchBackend = {
    name: "scripted",
    async *open() {
      for (const second of seconds) {
        world.clockMs = Math.max(world.clockMs, second * 1000);
        yield `change at ${second}s`;
      }
      controller.abort();
    },
    teardown: () => Promise.resolve(),
  };

  this.result = await runCli(["watch"], {
    env: workspace.env,
    environment: createInProcessEnvironment({
      backupRoot: workspace.backupDir,
      afterExec: () => {
        world.clockMs += world.backupDurationMs;
      },
    }),
    watchBackend: backend,
    clock: () => world.clockMs,
    signal: controller.signal,
    writeLine: (line) => world.lines.push(line),
  });
});

Then("backups started at seconds:", function (this: BackupWorld, table: DataTable) {
  const expected = table.hashes().map((row) => Number(row.second));
  const started = this.lines
    .filter((line) => RUNNING_LINE.test(line))
    .map((line) => Date.parse(line.slice(1, line.indexOf("]"))) / 1000);

  assert.deepEqual(started, expected);
});

Then("the watcher printed {string}", function (this: BackupWorld, line: string) {
  assert.ok(this.lines.includes(line), `missing line: ${line}`);
});
