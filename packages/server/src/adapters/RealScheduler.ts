/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { CommandContext, Logger, Scheduler, SessionId, Slot } from "../core.js";
import { TurnTimeout, dispatchCommand } from "../core.js";

interface RealSchedulerOptions {
  readonly dispatch?: typeof dispatchCommand;
  readonly contextFactory: () => Promise<CommandContext>;
  readonly logger?: Logger;
  readonly clock?: () => number;
}

type TimeoutKey = `${SessionId}:${Slot}`;

export class RealScheduler implements Scheduler {
  #timers: Map<TimeoutKey, ReturnType<typeof setTimeout>> = new Map();
  readonly #dispatch: typeof dispatchCommand;
  readonly #contextFactory: RealSchedulerOptions["contextFactory"];
  readonly #logger: Logger | undefined;
  readonly #clock: () => number;

  constructor(options: RealSchedulerOptions) {
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#contextFactory = options.contextFactory;
    this.#logger = options.logger;
    this.#clock = options.clock ?? Date.now;
  }

  get pendingCount(): number {
    return this.#timers.size;
  }

  async scheduleTurnTimeout(sessionId: SessionId, slot: Slot, delayMs: number): Promise<void> {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    const key = this.#toKey(sessionId, slot);
    const existing = this.#timers.get(key);
    if (existing) {
      clearTimeout(existing);
      this.#timers.delete(key);
      this.#logger?.warn("Rescheduling turn timeout", { sessionId, slot, delayMs });
    }

    const timer = setTimeout(async () => {
      this.#timers.delete(key);
      try {
        const context = await this.#contextFactory();
        await this.#dispatch(new TurnTimeout(sessionId, slot, this.#clock()), context);
      } catch (error) {
        this.#logger?.error("Failed to dispatch turn timeout", {
          sessionId,
          slot,
          error,
        });
      }
    }, delayMs);

    this.#timers.set(key, timer);
    this.#logger?.debug("Turn timeout scheduled", { sessionId, slot, delayMs });
  }

  async cancelTurnTimeout(sessionId: SessionId, slot: Slot): Promise<void> {
    const key = this.#toKey(sessionId, slot);
    const timer = this.#timers.get(key);
    if (!timer) return;

    clearTimeout(timer);
    this.#timers.delete(key);
    this.#logger?.debug("Turn timeout cancelled", { sessionId, slot });
  }

  async cancelSessionTimeouts(sessionId: SessionId): Promise<void> {
    await this.cancelTurnTimeout(sessionId, "A");
    await this.cancelTurnTimeout(sessionId, "B");
  }

  #toKey(sessionId: SessionId, slot: Slot): TimeoutKey {
    return `${sessionId}:${slot}`;
  }
}
