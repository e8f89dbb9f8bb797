export interface DebounceState {
  /** Clock reading after the last triggered invocation returned; null until the first one. */
  lastTriggerTime: number | null;
  readonly minIntervalMs: number;
}

export type DebounceDecision =
  | { action: "triggered"; startedAt: number; finishedAt: number }
  | { action: "suppressed"; elapsedMs: number; remainingMs: number };

export interface DebounceCoordinatorOptions {
  minIntervalMs: number;
  trigger: () => Promise<unknown>;
  clock?: () => number;
  onTrigger?: (at: number) => void;
  onSuppress?: (decision: Extract<DebounceDecision, { action: "suppressed" }>) => void;
}

/**
 * Leading-edge debounce with a cooldown measured from the end of the last
 * triggered run. Callers must await each signal before sending the next.
 */
export class DebounceCoordinator {
  readonly state: DebounceState;
  private readonly trigger: () => Promise<unknown>;
  private readonly clock: () => number;
  private readonly onTrigger?: (at: number) => void;
  private readonly onSuppress?: DebounceCoordinatorOptions["onSuppress"];

  constructor(options: DebounceCoordinatorOptions) {
    this.state = { lastTriggerTime: null, minIntervalMs: options.minIntervalMs };
    this.trigger = options.trigger;
    this.clock = options.clock ?? Date.now;
    this.onTrigger = options.onTrigger;
    this.onSuppress = options.onSuppress;
  }

  async onChangeSignal(): Promise<DebounceDecision> {
    const now = this.clock();
    const last = this.state.lastTriggerTime;

    if (last !== null && now - last < this.state.minIntervalMs) {
      const elapsedMs = now - last;
      const decision = {
        action: "suppressed" as const,
        elapsedMs,
        remainingMs: this.state.minIntervalMs - elapsedMs,
      };
      this.onSuppress?.(decision);
      return decision;
    }

    this.onTrigger?.(now);
    let finishedAt: number;
    try {
      await this.trigger();
    } finally {
      // Failed runs consume the cooldown too.
      finishedAt = this.clock();
      this.state.lastTriggerTime = finishedAt;
    }
    return { action: "triggered", startedAt: now, finishedAt };
  }
}
