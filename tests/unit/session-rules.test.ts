import { describe, expect, it } from "vitest";

import {
  assertValidSessionState,
  loserAccountId,
  opponentSlot,
  slotOf,
  toMatchRecord,
  winnerAccountId,
} from "../../src/domain/entities/SessionRules.js";
import { InvalidSessionStateError } from "../../src/domain/errors/InvalidSessionStateError.js";
import { activeSession } from "../support/mocks.js";

describe("slot lookups", () => {
  it("maps accounts to their slots", () => {
    const state = activeSession();
    expect(slotOf(state, 1)).toBe("A");
    expect(slotOf(state, 2)).toBe("B");
    expect(slotOf(state, 3)).toBeUndefined();
    expect(opponentSlot("A")).toBe("B");
  });

  it("names winner and loser from the outcome", () => {
    const won = activeSession({ status: "completed", outcome: "B" });
    expect(winnerAccountId(won)).toBe(2);
    expect(loserAccountId(won)).toBe(1);

    const tied = activeSession({ status: "completed", outcome: "tie" });
    expect(winnerAccountId(tied)).toBeNull();
    expect(loserAccountId(tied)).toBeNull();
  });
});

describe("toMatchRecord", () => {
  it("summarises a completed session", () => {
    const state = activeSession({
      status: "completed",
      moveA: "rock",
      moveB: "scissors",
      outcome: "A",
      ratingDeltaA: 5,
      ratingDeltaB: -5,
      completedAt: 5_000,
    });

    expect(toMatchRecord(state, 5_000)).toEqual({
      sessionId: "session-1",
      status: "completed",
      accountA: 1,
      accountB: 2,
      moveA: "rock",
      moveB: "scissors",
      outcome: "A",
      winnerAccountId: 1,
      ratingDeltaA: 5,
      ratingDeltaB: -5,
      createdAt: 1_000,
      endedAt: 5_000,
    });
  });

  it("rejects sessions that have not ended", () => {
    expect(() => toMatchRecord(activeSession(), 5_000)).toThrow(InvalidSessionStateError);
  });
});

describe("assertValidSessionState", () => {
  it("accepts a waiting session without slot B", () => {
    expect(() =>
      assertValidSessionState(
        activeSession({ status: "waiting", accountB: undefined, deadlineAt: undefined }),
      ),
    ).not.toThrow();
  });

  it("rejects a waiting session with slot B bound", () => {
    expect(() => assertValidSessionState(activeSession({ status: "waiting" }))).toThrow(
      "Invalid session state: waiting session with slot B bound",
    );
  });

  it("rejects an active session without a deadline", () => {
    expect(() => assertValidSessionState(activeSession({ deadlineAt: undefined }))).toThrow(
      "Invalid session state: active session without a turn deadline",
    );
  });

  it("rejects the same account in both slots", () => {
    expect(() => assertValidSessionState(activeSession({ accountB: 1 }))).toThrow(
      "Invalid session state: an account cannot occupy both slots",
    );
  });

  it("rejects a completed session with a pending move", () => {
    expect(() =>
      assertValidSessionState(
        activeSession({ status: "completed", moveA: "rock", outcome: "A", completedAt: 2_000 }),
      ),
    ).toThrow("Invalid session state: completed session with a pending move");
  });

  it("rejects a cancelled session carrying a rating delta", () => {
    expect(() =>
      assertValidSessionState(activeSession({ status: "cancelled", ratingDeltaA: 3 })),
    ).toThrow("Invalid session state: cancelled session with a rating delta");
  });
});
