import { InvalidSessionStateError } from "../errors/InvalidSessionStateError.js";
import type { MatchRecord } from "../ports/AccountGateway.js";
import type { SessionState } from "../ports/SessionGateway.js";
import type { AccountId, Outcome, SessionStatus, Slot, TimePoint } from "../typedefs.js";
import { isMove, TIMEOUT, type RecordedMove } from "./OutcomeRules.js";

export function slotOf(state: SessionState, accountId: AccountId): Slot | undefined {
  if (state.accountA === accountId) return "A";
  if (state.accountB !== undefined && state.accountB === accountId) return "B";
  return undefined;
}

export function opponentSlot(slot: Slot): Slot {
  return slot === "A" ? "B" : "A";
}

export function accountInSlot(state: SessionState, slot: Slot): AccountId | undefined {
  return slot === "A" ? state.accountA : state.accountB;
}

export function moveOf(state: SessionState, slot: Slot): RecordedMove | undefined {
  return slot === "A" ? state.moveA : state.moveB;
}

export function bothMovesRecorded(state: SessionState): boolean {
  return state.moveA !== undefined && state.moveB !== undefined;
}

export function winnerAccountId(state: SessionState): AccountId | null {
  if (state.outcome === undefined || state.outcome === "tie") return null;
  return accountInSlot(state, state.outcome) ?? null;
}

export function loserAccountId(state: SessionState): AccountId | null {
  if (state.outcome === undefined || state.outcome === "tie") return null;
  return accountInSlot(state, opponentSlot(state.outcome)) ?? null;
}

export function isOpen(status: SessionStatus): boolean {
  return status === "waiting" || status === "active";
}

export function toMatchRecord(state: SessionState, endedAt: TimePoint): MatchRecord {
  if (state.status !== "completed" && state.status !== "cancelled") {
    throw new InvalidSessionStateError("only terminal sessions can be recorded", state);
  }

  return {
    sessionId: state.id,
    status: state.status,
    accountA: state.accountA,
    ...(state.accountB !== undefined ? { accountB: state.accountB } : {}),
    ...(state.moveA !== undefined ? { moveA: state.moveA } : {}),
    ...(state.moveB !== undefined ? { moveB: state.moveB } : {}),
    ...(state.outcome !== undefined ? { outcome: state.outcome } : {}),
    winnerAccountId: winnerAccountId(state),
    ratingDeltaA: state.ratingDeltaA,
    ratingDeltaB: state.ratingDeltaB,
    createdAt: state.createdAt,
    endedAt,
    ...(state.isRematchOf !== undefined ? { isRematchOf: state.isRematchOf } : {}),
  };
}

// -----------------------------------------------------------------------------
//  Assertion function: runtime check of the state machine invariants
// -----------------------------------------------------------------------------
export function assertValidSessionState(state: SessionState): void {
  const fail = (reason: string): never => {
    throw new InvalidSessionStateError(reason, state);
  };

  const isRecordedMove = (value: unknown): boolean => value === TIMEOUT || isMove(value);
  const outcomes: readonly Outcome[] = ["A", "B", "tie"];

  if (!Number.isInteger(state.accountA)) fail("invalid slot A account");
  if (state.accountB !== undefined && state.accountB === state.accountA)
    fail("an account cannot occupy both slots");
  if (state.moveA !== undefined && !isRecordedMove(state.moveA)) fail("invalid move in slot A");
  if (state.moveB !== undefined && !isRecordedMove(state.moveB)) fail("invalid move in slot B");

  switch (state.status) {
    case "waiting":
      if (state.accountB !== undefined) fail("waiting session with slot B bound");
      if (state.moveA !== undefined || state.moveB !== undefined)
        fail("moves recorded before activation");
      break;

    case "active":
      if (state.accountB === undefined) fail("active session without slot B");
      if (state.deadlineAt === undefined) fail("active session without a turn deadline");
      if (state.outcome !== undefined) fail("active session with an outcome");
      break;

    case "completed":
      if (state.accountB === undefined) fail("completed session without slot B");
      if (!bothMovesRecorded(state)) fail("completed session with a pending move");
      if (state.outcome === undefined || !outcomes.includes(state.outcome))
        fail("completed session without an outcome");
      if (state.completedAt === undefined) fail("completed session without completion time");
      break;

    case "cancelled":
      if (state.outcome !== undefined) fail("cancelled session with an outcome");
      if (state.ratingDeltaA !== 0 || state.ratingDeltaB !== 0)
        fail("cancelled session with a rating delta");
      break;

    default:
      fail(`invalid status: ${String(state.status)}`);
  }
}
