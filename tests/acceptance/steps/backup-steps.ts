import assert from "node:assert/strict";
import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { type DataTable, Given, Then, When } from "@cucumber/cucumber";
import { runCli } from "../../../src/main.ts";
import { createFakeExporter, createInProcessEnvironment } from "../../support/fakes.ts";
import { seedSnapshot } from "../../support/workspace.ts";
import type { BackupWorld } from "../support/world.ts";

Given("the current time is {string}", function (this: BackupWorld, iso: string) {
  this.now = new Date(iso);
});

Given("the credentials export fails", function (this: BackupWorld) {
  this.failingArtifact = "credentials";
});

Given("a verified snapshot {string} exists", async function (this: BackupWorld, name: string) {
  await seedSnapshot(this.requireWorkspace().snapshotsDir, name);
});

When("the n8n-autobackup backup command runs at {string}", async function (this: BackupWorld, iso: string) {
  const workspace = this.requireWorkspace();
  const environment = createInProcessEnvironment({
    backupRoot: workspace.backupDir,
    exporter: createFakeExporter({ fail: this.failingArtifact }),
    now: () => new Date(iso),
  });

  this.result = await runCli(["backup"], { env: workspace.env, cwd: workspace.root, environment });
});

Then("the command exits with code {int}", function (this: BackupWorld, code: number) {
  assert.equal(this.requireResult().exitCode, code);
});

Then("stdout contains {string}", function (this: BackupWorld, text: string) {
  assert.ok(this.requireResult().stdout.split("\n").includes(text));
});

Then("stderr contains {string}", function (this: BackupWorld, text: string) {
  assert.ok(this.requireResult().stderr.split("\n").includes(text));
});

Then("snapshot {string} contains:", async function (this: BackupWorld, name: string, table: DataTable) {
  const directory = join(this.requireWorkspace().snapshotsDir, name);
  const expected = table.hashes().map((row) => row.file);

  assert.deepEqual((await readdir(directory)).sort(), expected);
});

Then("the snapshot directories are:", async function (this: BackupWorld, table: DataTable) {
  const expected = table.hashes().map((row) => row.name);

  assert.deepEqual((await readdir(this.requireWorkspace().snapshotsDir)).sort(), expected);
});
