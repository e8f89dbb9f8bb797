import type { ArtifactExporter } from "./core/snapshot.ts";
import type { DebugLogger } from "./debug/logger.ts";
import type { CommandRunner } from "./platform/process.ts";
import type { ExecutionEnvironment } from "./platform/container.ts";
import type { WatchBackend } from "./platform/watcher.ts";

export type WatchBackendKind = "container" | "fs";

export interface AppConfig {
  app: {
    container: string;
    user: string;
    uid: number;
    data_dir: string;
    n8n_bin: string;
  };
  backup: {
    local_path: string;
    container_path: string;
    snapshot_command: string[];
  };
  retention: {
    max_age_days: number;
  };
  watch: {
    backend: WatchBackendKind;
    path: string;
    min_interval_seconds: number;
    retry_delay_seconds: number;
    helper_name: string;
    helper_image: string;
  };
  schedule: {
    interval_minutes: number;
  };
  environment: {
    docker_bin: string;
    docker_host?: string;
  };
  _meta: {
    config_path: string;
    loaded: boolean;
  };
}

export interface RuntimeOptions {
  env?: Record<string, string | undefined>;
  cwd?: string;
  now?: Date;
  uid?: number;
  clock?: () => number;
  signal?: AbortSignal;
  writeLine?: (line: string) => void;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  runner?: CommandRunner;
  environment?: ExecutionEnvironment;
  exporter?: ArtifactExporter;
  watchBackend?: WatchBackend;
  logger?: DebugLogger;
}

export interface CommandResult {
  exitCode: number;
  stdout: string[];
  stderr: string[];
}
