import { describe, expect, it } from "vitest";

import { CancelSession } from "../src/domain/commands/CancelSession.js";
import { RequestQuickMatch } from "../src/domain/commands/RequestQuickMatch.js";
import { DISCONNECT_MESSAGE } from "../src/domain/commands/SessionTransitions.js";
import { SubmitMove } from "../src/domain/commands/SubmitMove.js";
import { createHarness, startPairedSession } from "./support/harness.js";

describe("CancelSession command", () => {
  it("cancels a waiting session without notifying anyone", async () => {
    const harness = createHarness();
    const alice = await harness.createAccount("alice");
    const { session } = await new RequestQuickMatch(alice.id, 0).execute(harness.context);
    harness.bus.clear();

    await new CancelSession(session.id, alice.id, 500).execute(harness.context);

    expect(harness.bus.published).toHaveLength(0);
    expect((await harness.sessionGateway.loadSession(session.id)).status).toBe("cancelled");
    expect(await harness.accountGateway.loadMatchRecord(session.id)).toEqual({
      sessionId: session.id,
      status: "cancelled",
      accountA: alice.id,
      winnerAccountId: null,
      ratingDeltaA: 0,
      ratingDeltaB: 0,
      createdAt: 0,
      endedAt: 500,
    });
  });

  it("cancels an active session and tells the remaining player", async () => {
    const harness = createHarness();
    const { alice, bob, sessionId } = await startPairedSession(harness);
    await new SubmitMove(sessionId, bob.id, "rock", 100).execute(harness.context);
    harness.bus.clear();

    await new CancelSession(sessionId, bob.id, 200).execute(harness.context);

    expect(harness.bus.published).toEqual([
      {
        channel: "account:1",
        event: { type: "opponent_disconnected", sessionId, message: DISCONNECT_MESSAGE },
      },
    ]);
    expect(harness.scheduler.pending).toHaveLength(0);
    expect(await harness.accountGateway.loadAccount(alice.id)).toMatchObject({
      rating: 1200,
      gamesPlayed: 0,
    });
    expect(await harness.accountGateway.loadMatchRecord(sessionId)).toMatchObject({
      status: "cancelled",
      moveB: "rock",
      ratingDeltaA: 0,
      ratingDeltaB: 0,
    });
  });

  it("leaves completed sessions alone", async () => {
    const harness = createHarness();
    const { alice, bob, sessionId } = await startPairedSession(harness);
    await new SubmitMove(sessionId, alice.id, "rock", 100).execute(harness.context);
    await new SubmitMove(sessionId, bob.id, "paper", 200).execute(harness.context);
    harness.bus.clear();

    await new CancelSession(sessionId, alice.id, 300).execute(harness.context);

    expect(harness.bus.published).toHaveLength(0);
    expect(await harness.sessionGateway.loadSession(sessionId)).toMatchObject({
      status: "completed",
      outcome: "B",
    });
  });

  it("is a no-op when repeated", async () => {
    const harness = createHarness();
    const { alice, sessionId } = await startPairedSession(harness);

    await new CancelSession(sessionId, alice.id, 100).execute(harness.context);
    await new CancelSession(sessionId, alice.id, 200).execute(harness.context);

    expect(harness.bus.typesOn("account:2")).toEqual(["opponent_disconnected"]);
    expect(await harness.accountGateway.loadMatchRecord(sessionId)).toMatchObject({
      endedAt: 100,
    });
  });

  it("rejects accounts that are not in the session", async () => {
    const harness = createHarness();
    const { sessionId } = await startPairedSession(harness);

    await expect(
      new CancelSession(sessionId, 42, 0).execute(harness.context),
    ).rejects.toMatchObject({ code: "UnknownParticipant" });
    expect((await harness.sessionGateway.loadSession(sessionId)).status).toBe("active");
  });
});
