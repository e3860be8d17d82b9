/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { TurnTimeout } from "../../domain/commands/TurnTimeout.js";
import type { Scheduler } from "../../domain/ports/Scheduler.js";
import type { SessionId, Slot, TimePoint } from "../../domain/typedefs.js";

/**
 * Deterministic in-memory scheduler used exclusively in tests.
 *
 * Instead of relying on {@link setTimeout}, the scheduler records queued commands and exposes a
 * {@link runFor} helper that advances the virtual clock (in milliseconds). This makes it possible
 * for tests to control timer progression without depending on real time or fake timers.
 */
interface SchedulerState {
  readonly now: TimePoint;
  readonly queue: readonly TurnTimeout[];
}

export class InMemoryScheduler implements Scheduler {
  readonly #dispatch: (command: TurnTimeout) => Promise<void> | void;
  #state: SchedulerState = { now: 0, queue: [] };

  constructor(dispatch: (command: TurnTimeout) => Promise<void> | void) {
    this.#dispatch = dispatch;
  }

  get now(): TimePoint {
    return this.#state.now;
  }

  get pending(): readonly TurnTimeout[] {
    return this.#state.queue;
  }

  async scheduleTurnTimeout(sessionId: SessionId, slot: Slot, delayMs: number): Promise<void> {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    const fireAt = this.#state.now + delayMs;
    const command = new TurnTimeout(sessionId, slot, fireAt);
    const others = this.#state.queue.filter(
      (existing) => !(existing.sessionId === sessionId && existing.slot === slot),
    );
    const insertAt = others.findIndex((existing) => existing.at > command.at);
    const queue =
      insertAt === -1
        ? [...others, command]
        : [...others.slice(0, insertAt), command, ...others.slice(insertAt)];

    this.#state = { ...this.#state, queue };
  }

  async cancelTurnTimeout(sessionId: SessionId, slot: Slot): Promise<void> {
    this.#remove((existing) => existing.sessionId === sessionId && existing.slot === slot);
  }

  async cancelSessionTimeouts(sessionId: SessionId): Promise<void> {
    this.#remove((existing) => existing.sessionId === sessionId);
  }

  async runFor(milliseconds: number): Promise<void> {
    if (milliseconds < 0) {
      throw new Error("Cannot run scheduler backwards in time");
    }

    const targetTime = this.#state.now + milliseconds;
    let state = this.#state;

    while (state.queue.length > 0) {
      const [next, ...remaining] = state.queue;
      if (!next) {
        break;
      }
      if (next.at > targetTime) {
        break;
      }

      state = { now: next.at, queue: remaining };
      this.#state = state;
      await this.#dispatch(next);
      state = this.#state;
    }

    this.#state = { now: targetTime, queue: state.queue };
  }

  #remove(predicate: (command: TurnTimeout) => boolean): void {
    this.#state = {
      ...this.#state,
      queue: this.#state.queue.filter((existing) => !predicate(existing)),
    };
  }
}
