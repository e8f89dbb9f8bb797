import assert from "node:assert/strict";
import { fileURLToPath } from "node:url";
import { test } from "node:test";
import { runCommand } from "../../src/platform/process.ts";
import { makeTempDir } from "../support/workspace.ts";

const LAUNCHER = fileURLToPath(new URL("../../bin/n8n-autobackup.js", import.meta.url));

test("installed bin starts outside the package directory", async () => {
  const cwd = await makeTempDir();

  const result = await runCommand(process.execPath, [LAUNCHER, "version"], {
    cwd,
    env: { HOME: cwd, NODE_OPTIONS: "" },
  });

  assert.equal(result.code, 0, result.stderr);
  assert.equal(result.stdout, "0.1.0\n");
});
