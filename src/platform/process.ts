import { spawn } from "node:child_process";
import { createInterface } from "node:readline";

export interface CommandOutput {
  success: boolean;
  code: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  env?: Record<string, string | undefined>;
  cwd?: string;
  signal?: AbortSignal;
}

export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<CommandOutput>;

export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: mergeEnv(options.env),
      signal: options.signal,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    let spawnError: Error | null = null;
    child.on("error", (error) => {
      spawnError = error;
    });
    child.on("close", (code) => {
      const errorText = Buffer.concat(stderr).toString("utf8");
      resolve({
        success: code === 0,
        code: code ?? 1,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: spawnError ? `${errorText}${spawnError.message}` : errorText,
      });
    });
  });
};

/**
 * Yields stdout lines of a long-running command. Throws once the stream ends
 * if the command exited non-zero without being aborted.
 */
export async function* streamCommandLines(
  command: string,
  args: string[],
  options: RunOptions = {},
): AsyncGenerator<string> {
  const child = spawn(command, args, {
    cwd: options.cwd,
    env: mergeEnv(options.env),
    stdio: ["ignore", "pipe", "pipe"],
  });

  const stderr: Buffer[] = [];
  child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
  const exit = new Promise<number>((resolve) => {
    child.on("error", () => resolve(127));
    child.on("close", (code) => resolve(code ?? 1));
  });

  const abort = () => child.kill("SIGTERM");
  options.signal?.addEventListener("abort", abort, { once: true });

  const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      yield line;
    }
    const code = await exit;
    if (code !== 0 && !options.signal?.aborted) {
      const detail = Buffer.concat(stderr).toString("utf8").trim();
      throw new Error(`${command} exited with code ${code}${detail ? `: ${detail}` : ""}`);
    }
  } finally {
    options.signal?.removeEventListener("abort", abort);
    lines.close();
    if (child.exitCode === null && child.signalCode === null) {
      child.kill("SIGTERM");
    }
  }
}

function mergeEnv(env?: Record<string, string | undefined>): NodeJS.ProcessEnv {
  return env ? { ...process.env, ...env } : process.env;
}
