import { watch } from "chokidar";
import type { AppConfig } from "../types.ts";
import { dockerEnv } from "./container.ts";
import { type CommandRunner, runCommand, streamCommandLines } from "./process.ts";
import type { WatchBackend } from "./watcher.ts";

export const CHANGE_LINE = "CHANGE_DETECTED";

export interface ContainerWatchOptions {
  container: string;
  helperName: string;
  helperImage: string;
  path: string;
  dockerBin?: string;
  dockerHost?: string;
  runner?: CommandRunner;
  stream?: typeof streamCommandLines;
  onOutput?: (line: string) => void;
}

/**
 * Runs inotifywait in a throwaway helper container that shares the
 * application's volumes. The helper installs inotify-tools on every start.
 */
export function createContainerWatchBackend(options: ContainerWatchOptions): WatchBackend {
  const docker = options.dockerBin ?? "docker";
  const runner = options.runner ?? runCommand;
  const stream = options.stream ?? streamCommandLines;
  const env = dockerEnv(options.dockerHost);

  const teardown = async () => {
    await runner(docker, ["rm", "-f", options.helperName], { env });
  };

  return {
    name: "container",
    teardown,
    async *open(signal: AbortSignal) {
      await teardown();
      const lines = stream(docker, helperRunArgs(options), { env, signal });
      for await (const line of lines) {
        if (line.trim() === CHANGE_LINE) {
          yield `change under ${options.path}`;
        } else if (line.trim().length > 0) {
          options.onOutput?.(line);
        }
      }
    },
  };
}

export function helperRunArgs(options: Pick<ContainerWatchOptions, "container" | "helperName" | "helperImage" | "path">): string[] {
  const path = shellQuote(options.path);
  const script = [
    "apk add --no-cache inotify-tools >/dev/null",
    `echo "Watcher initialized and monitoring ${options.path.replace(/"/g, "")}"`,
    "while true; do",
    `  inotifywait -qq -r -e modify,create,delete,move ${path} || exit 1`,
    `  echo ${CHANGE_LINE}`,
    "done",
  ].join("\n");

  return [
    "run",
    "--rm",
    "--name",
    options.helperName,
    "--volumes-from",
    options.container,
    options.helperImage,
    "sh",
    "-c",
    script,
  ];
}

export interface FsEventSource {
  onChange(listener: (event: string, path: string) => void): void;
  onError(listener: (error: unknown) => void): void;
  close(): Promise<void>;
}

export interface FsWatchOptions {
  path: string;
  createSource?: (path: string) => FsEventSource;
}

export function chokidarSource(path: string): FsEventSource {
  const watcher = watch(path, { ignoreInitial: true, persistent: true });
  return {
    onChange: (listener) => {
      watcher.on("all", (event: string, changed: string) => listener(event, changed));
    },
    onError: (listener) => {
      watcher.on("error", (error: unknown) => listener(error));
    },
    close: () => watcher.close(),
  };
}

/** Host-side watcher; one batch per chokidar event. */
export function createFsWatchBackend(options: FsWatchOptions): WatchBackend {
  const createSource = options.createSource ?? chokidarSource;
  const active = new Set<FsEventSource>();

  return {
    name: "fs",
    async teardown() {
      const sources = [...active];
      active.clear();
      await Promise.all(sources.map((source) => source.close()));
    },
    async *open(signal: AbortSignal) {
      const channel = new ChangeChannel();
      const source = createSource(options.path);
      active.add(source);

      source.onChange((event, path) => channel.push(`${event} ${path}`));
      source.onError((error) => channel.fail(error));
      const close = () => channel.close();
      signal.addEventListener("abort", close, { once: true });

      try {
        yield* channel;
      } finally {
        signal.removeEventListener("abort", close);
        if (active.delete(source)) {
          await source.close();
        }
      }
    },
  };
}

export function watchBackendFromConfig(config: AppConfig, onOutput?: (line: string) => void): WatchBackend {
  if (config.watch.backend === "fs") {
    return createFsWatchBackend({ path: config.watch.path });
  }

  return createContainerWatchBackend({
    container: config.app.container,
    helperName: config.watch.helper_name,
    helperImage: config.watch.helper_image,
    path: config.watch.path,
    dockerBin: config.environment.docker_bin,
    dockerHost: config.environment.docker_host,
    onOutput,
  });
}

/** Push-to-pull bridge between event callbacks and an async iterator. */
export class ChangeChannel implements AsyncIterable<string> {
  private readonly queue: string[] = [];
  private failure: { error: unknown } | null = null;
  private closed = false;
  private wake: (() => void) | null = null;

  push(item: string): void {
    if (this.closed) return;
    this.queue.push(item);
    this.notify();
  }

  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    this.notify();
  }

  close(): void {
    this.closed = true;
    this.notify();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string> {
    while (true) {
      const next = this.queue.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (this.failure) throw this.failure.error;
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
