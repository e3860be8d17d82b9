import { describe, expect, it } from "vitest";

import { RequestQuickMatch } from "../src/domain/commands/RequestQuickMatch.js";
import { WAITING_MESSAGE } from "../src/domain/commands/SessionTransitions.js";
import { AccountNotFoundError } from "../src/domain/errors/AccountNotFoundError.js";
import { GameCommandInputError } from "../src/domain/errors/GameCommandInputError.js";
import { SessionNotFoundError } from "../src/domain/errors/SessionNotFoundError.js";
import { createHarness } from "./support/harness.js";

describe("RequestQuickMatch command", () => {
  it("opens a waiting session when nobody is queued", async () => {
    const harness = createHarness();
    const alice = await harness.createAccount("alice");

    const result = await new RequestQuickMatch(alice.id, 0).execute(harness.context);

    expect(result.matched).toBe(false);
    expect(result.session).toMatchObject({ id: "session-1", status: "waiting", accountA: alice.id });
    expect(harness.bus.published).toEqual([
      {
        channel: "account:1",
        event: { type: "waiting_for_opponent", sessionId: "session-1", message: WAITING_MESSAGE },
      },
    ]);
    expect(harness.scheduler.pending).toHaveLength(0);
  });

  it("pairs the second requester and arms both turn timers", async () => {
    const harness = createHarness();
    const alice = await harness.createAccount("alice");
    const bob = await harness.createAccount("bob");
    await new RequestQuickMatch(alice.id, 0).execute(harness.context);
    harness.bus.clear();

    const result = await new RequestQuickMatch(bob.id, 0).execute(harness.context);

    expect(result.matched).toBe(true);
    expect(result.session).toMatchObject({
      id: "session-1",
      status: "active",
      accountA: alice.id,
      accountB: bob.id,
      deadlineAt: 30_000,
    });

    const joined = {
      type: "player_joined",
      sessionId: "session-1",
      accountId: bob.id,
      name: "bob",
      opponentName: "alice",
      active: true,
      deadlineSeconds: 30,
    };
    expect(harness.bus.published).toEqual([
      { channel: "account:1", event: joined },
      { channel: "account:2", event: joined },
    ]);
    expect(harness.scheduler.pending.map((timeout) => timeout.slot)).toEqual(["A", "B"]);
  });

  it("uses the configured turn duration", async () => {
    const harness = createHarness({ turnDurationMs: 5_000 });
    const alice = await harness.createAccount("alice");
    const bob = await harness.createAccount("bob");
    await new RequestQuickMatch(alice.id, 0).execute(harness.context);

    const result = await new RequestQuickMatch(bob.id, 1_000).execute(harness.context);

    expect(result.session.deadlineAt).toBe(6_000);
  });

  it("rejects unknown accounts without creating a session", async () => {
    const harness = createHarness();

    await expect(new RequestQuickMatch(99, 0).execute(harness.context)).rejects.toBeInstanceOf(
      AccountNotFoundError,
    );
    await expect(harness.sessionGateway.loadSession("session-1")).rejects.toBeInstanceOf(
      SessionNotFoundError,
    );
  });

  it("validates the account identifier", () => {
    expect(() => new RequestQuickMatch(0, 0)).toThrow(GameCommandInputError);
    expect(() => new RequestQuickMatch(1.5, 0)).toThrow(
      "Account identifier must be a positive integer",
    );
  });
});
