import { setTimeout as sleepFor } from "node:timers/promises";
import { WatchBackendError } from "../errors.ts";

export interface ChangeSignal {
  backend: string;
  detail: string;
  at: number;
}

/**
 * A source of filesystem change batches. `open` yields one string per batch
 * and ends or throws when the underlying primitive stops; `teardown` releases
 * any helper process it started and is safe to call at any time.
 */
export interface WatchBackend {
  readonly name: string;
  open(signal: AbortSignal): AsyncIterable<string>;
  teardown(): Promise<void>;
}

export interface SuperviseOptions {
  retryDelayMs: number;
  signal: AbortSignal;
  clock?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onRestart?: (error: WatchBackendError) => void;
}

/** Restartable change stream: retries forever with a fixed delay until aborted. */
export async function* superviseChanges(
  backend: WatchBackend,
  options: SuperviseOptions,
): AsyncGenerator<ChangeSignal> {
  const clock = options.clock ?? Date.now;
  const sleep = options.sleep ?? delay;
  const { signal } = options;

  while (!signal.aborted) {
    let failure: unknown = new Error("watch stream ended");
    try {
      for await (const detail of backend.open(signal)) {
        if (signal.aborted) return;
        yield { backend: backend.name, detail, at: clock() };
      }
    } catch (error) {
      failure = error;
    }

    if (signal.aborted) return;
    options.onRestart?.(new WatchBackendError(backend.name, failure));
    await sleep(options.retryDelayMs, signal);
  }
}

/** Scoped helper lifecycle: stale helpers are removed first, and teardown always runs. */
export async function withWatchBackend<T>(
  backend: WatchBackend,
  fn: (backend: WatchBackend) => Promise<T>,
): Promise<T> {
  await backend.teardown();
  try {
    return await fn(backend);
  } finally {
    await backend.teardown();
  }
}

export async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await sleepFor(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) return;
    throw error;
  }
}
