import type { AppConfig } from "../types.ts";
import { type CommandOutput, type CommandRunner, runCommand } from "./process.ts";

export interface ExecOptions {
  user?: string;
}

/**
 * The isolated environment the application runs in. Every operation is
 * pass/fail with captured output; none of them throw on a non-zero exit.
 */
export interface ExecutionEnvironment {
  readonly name: string;
  mkdir(path: string, options?: { mode?: string }): Promise<CommandOutput>;
  exec(command: string[], options?: ExecOptions): Promise<CommandOutput>;
  copyInto(hostPath: string, environmentPath: string): Promise<CommandOutput>;
}

export interface DockerEnvironmentOptions {
  container: string;
  dockerBin?: string;
  dockerHost?: string;
  runner?: CommandRunner;
}

export function createDockerEnvironment(options: DockerEnvironmentOptions): ExecutionEnvironment {
  const docker = options.dockerBin ?? "docker";
  const runner = options.runner ?? runCommand;
  const env = dockerEnv(options.dockerHost);

  return {
    name: options.container,
    async mkdir(path, mkdirOptions = {}) {
      const modeArgs = mkdirOptions.mode ? ["-m", mkdirOptions.mode] : [];
      return await runner(docker, ["exec", options.container, "mkdir", "-p", ...modeArgs, path], { env });
    },
    async exec(command, execOptions = {}) {
      const userArgs = execOptions.user ? ["-u", execOptions.user] : [];
      return await runner(docker, ["exec", ...userArgs, options.container, ...command], { env });
    },
    async copyInto(hostPath, environmentPath) {
      return await runner(docker, ["cp", hostPath, `${options.container}:${environmentPath}`], { env });
    },
  };
}

export function environmentFromConfig(config: AppConfig, runner?: CommandRunner): ExecutionEnvironment {
  return createDockerEnvironment({
    container: config.app.container,
    dockerBin: config.environment.docker_bin,
    dockerHost: config.environment.docker_host,
    runner,
  });
}

export function dockerEnv(dockerHost: string | undefined): Record<string, string> | undefined {
  return dockerHost ? { DOCKER_HOST: dockerHost } : undefined;
}
