import { readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { parse as parseToml } from "smol-toml";
import { CliError } from "./errors.ts";
import { expandHostPath, homeDirectory } from "./core/host_paths.ts";
import type { AppConfig, RuntimeOptions, WatchBackendKind } from "./types.ts";

export interface ConfigLoadOptions extends RuntimeOptions {
  required?: boolean;
  readTextFile?: (path: string) => Promise<string>;
}

export function resolveConfigPath(options: RuntimeOptions = {}): string {
  const env = normalizeEnv(options.env);
  const cwd = options.cwd ?? process.cwd();

  const override = env.N8N_BACKUP_CONFIG;
  if (override && override.trim().length > 0) {
    return resolve(cwd, override);
  }

  return join(homeDirectory(env), ".config", "n8n-autobackup", "settings.toml");
}

export async function loadConfig(options: ConfigLoadOptions = {}): Promise<AppConfig> {
  const env = normalizeEnv(options.env);
  const cwd = options.cwd ?? process.cwd();
  const configPath = resolveConfigPath({ env, cwd });
  const readTextFile = options.readTextFile ?? ((path: string) => readFile(path, "utf8"));
  const required = options.required ?? false;

  let raw = "";
  let loaded = true;
  try {
    raw = await readTextFile(configPath);
  } catch (error) {
    if (required) {
      throw new CliError(`config file not found: ${configPath}`, "ERR_CONFIG_NOT_FOUND", 1);
    }
    if (!isNotFound(error)) {
      throw error;
    }
    loaded = false;
  }

  let parsed: Record<string, unknown>;
  try {
    parsed = parseToml(raw);
  } catch {
    throw new CliError("config parse error: invalid TOML", "ERR_CONFIG_PARSE", 1);
  }

  const appRaw = section(parsed, "app");
  const backupRaw = section(parsed, "backup");
  const retentionRaw = section(parsed, "retention");
  const watchRaw = section(parsed, "watch");
  const scheduleRaw = section(parsed, "schedule");
  const environmentRaw = section(parsed, "environment");

  const configDir = dirname(configPath);
  const backend = asBackend(watchRaw.backend);
  const watchPath = asStringOrDefault(watchRaw.path, "/home/node/.n8n", "watch.path");
  const dockerHost = environmentRaw.docker_host === undefined
    ? env.DOCKER_HOST
    : asOptionalString(environmentRaw.docker_host, "environment.docker_host");

  return {
    app: {
      container: asStringOrDefault(appRaw.container, "n8n", "app.container"),
      user: asStringOrDefault(appRaw.user, "node", "app.user"),
      uid: asIntegerOrDefault(appRaw.uid, 1000, "app.uid", 0),
      data_dir: asStringOrDefault(appRaw.data_dir, "/home/node/.n8n", "app.data_dir"),
      n8n_bin: asStringOrDefault(appRaw.n8n_bin, "n8n", "app.n8n_bin"),
    },
    backup: {
      local_path: expandHostPath(
        asStringOrDefault(backupRaw.local_path, "~/n8n-backups", "backup.local_path"),
        env,
        configDir,
        "backup.local_path",
      ),
      container_path: asStringOrDefault(backupRaw.container_path, "/backup", "backup.container_path"),
      snapshot_command: asStringArrayOrDefault(
        backupRaw.snapshot_command,
        ["n8n-autobackup", "snapshot"],
        "backup.snapshot_command",
      ),
    },
    retention: {
      max_age_days: asIntegerOrDefault(retentionRaw.max_age_days, 7, "retention.max_age_days", 0),
    },
    watch: {
      backend,
      path: backend === "fs" ? expandHostPath(watchPath, env, configDir, "watch.path") : watchPath,
      min_interval_seconds: asIntegerOrDefault(
        watchRaw.min_interval_seconds,
        150,
        "watch.min_interval_seconds",
        0,
      ),
      retry_delay_seconds: asIntegerOrDefault(watchRaw.retry_delay_seconds, 5, "watch.retry_delay_seconds", 1),
      helper_name: asStringOrDefault(watchRaw.helper_name, "n8n-watcher", "watch.helper_name"),
      helper_image: asStringOrDefault(watchRaw.helper_image, "alpine:latest", "watch.helper_image"),
    },
    schedule: {
      interval_minutes: asIntegerOrDefault(scheduleRaw.interval_minutes, 60, "schedule.interval_minutes", 1),
    },
    environment: {
      docker_bin: asStringOrDefault(environmentRaw.docker_bin, "docker", "environment.docker_bin"),
      docker_host: dockerHost && dockerHost.trim().length > 0 ? dockerHost : undefined,
    },
    _meta: {
      config_path: configPath,
      loaded,
    },
  };
}

function normalizeEnv(env?: Record<string, string | undefined>): Record<string, string | undefined> {
  if (env) {
    return { ...env };
  }

  return { ...process.env };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = root[key];
  if (value === undefined) return {};
  if (!isTable(value)) {
    throw new CliError(`${key} section must be a table`, "ERR_CONFIG_SCHEMA", 1);
  }
  return value;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function asString(value: unknown, key: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new CliError(`${key} must be a non-empty string`, "ERR_CONFIG_SCHEMA", 1);
  }
  return value;
}

function asOptionalString(value: unknown, key: string): string {
  if (typeof value !== "string") {
    throw new CliError(`${key} must be a string`, "ERR_CONFIG_SCHEMA", 1);
  }
  return value;
}

function asStringOrDefault(value: unknown, fallback: string, key: string): string {
  if (value === undefined) return fallback;
  return asString(value, key);
}

function asStringArrayOrDefault(value: unknown, fallback: string[], key: string): string[] {
  if (value === undefined) return fallback;
  if (
    !Array.isArray(value) || value.length === 0 ||
    !value.every((item): item is string => typeof item === "string" && item.length > 0)
  ) {
    throw new CliError(`${key} must be a non-empty array of strings`, "ERR_CONFIG_SCHEMA", 1);
  }
  return value;
}

function asIntegerOrDefault(value: unknown, fallback: number, key: string, min: number): number {
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw new CliError(`${key} must be an integer >= ${min}`, "ERR_CONFIG_SCHEMA", 1);
  }
  return value;
}

function asBackend(value: unknown): WatchBackendKind {
  if (value === undefined) return "container";
  if (value === "container" || value === "fs") return value;
  throw new CliError('watch.backend must be "container" or "fs"', "ERR_CONFIG_SCHEMA", 1);
}
