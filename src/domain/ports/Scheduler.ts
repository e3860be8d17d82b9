import type { SessionId, Slot } from "../typedefs.js";

/**
 * Infrastructure abstraction responsible for delivering turn deadlines to the domain.
 *
 * Implementations keep at most one pending timeout per session slot and deliver
 * it as a `TurnTimeout` command. Cancellation is best effort: a timeout that is
 * already being delivered re-checks the session before acting.
 */
export interface Scheduler {
  scheduleTurnTimeout(sessionId: SessionId, slot: Slot, delayMs: number): Promise<void>;
  cancelTurnTimeout(sessionId: SessionId, slot: Slot): Promise<void>;
  cancelSessionTimeouts(sessionId: SessionId): Promise<void>;
}
