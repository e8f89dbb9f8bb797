import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import { CliError } from "../errors.ts";

type Env = Record<string, string | undefined>;

const VARIABLE = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

export function homeDirectory(env: Env): string {
  return env.HOME ?? homedir();
}

/**
 * Expands `~`, `$VAR` and `${VAR}` in a host path taken from the settings
 * file, then anchors relative results at `baseDir`. An unset variable is a
 * config error.
 */
export function expandHostPath(input: string, env: Env, baseDir: string, key: string): string {
  const home = input === "~" || input.startsWith("~/") ? homeDirectory(env) : undefined;
  const withHome = home === undefined ? input : join(home, input.slice(1));

  const expanded = withHome.replace(VARIABLE, (_, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare ?? "";
    const value = env[name];
    if (value === undefined) {
      throw new CliError(`${key}: environment variable ${name} is not set`, "ERR_CONFIG_SCHEMA", 1);
    }
    return value;
  });

  return isAbsolute(expanded) ? expanded : resolve(baseDir, expanded);
}
