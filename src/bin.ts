import { runCli } from "./main.ts";

const controller = new AbortController();
const stop = () => controller.abort();
process.once("SIGINT", stop);
process.once("SIGTERM", stop);

const result = await runCli(process.argv.slice(2), { signal: controller.signal });
if (result.stdout.trim().length > 0) {
  console.log(result.stdout);
}
if (result.stderr.trim().length > 0) {
  console.error(result.stderr);
}
process.exit(result.exitCode);
