import { describe, expect, it, vi, type MockInstance } from "vitest";

import { InMemorySessionGateway } from "../src/adapters/in-memory/InMemorySessionGateway.js";
import { CancelSession } from "../src/domain/commands/CancelSession.js";
import type { CommandContext } from "../src/domain/commands/Command.js";
import { RequestQuickMatch } from "../src/domain/commands/RequestQuickMatch.js";
import { SubmitMove } from "../src/domain/commands/SubmitMove.js";
import { TurnTimeout } from "../src/domain/commands/TurnTimeout.js";
import type { RecordedMove } from "../src/domain/entities/OutcomeRules.js";
import type { AccountGateway } from "../src/domain/ports/AccountGateway.js";
import type {
  MoveRecordResult,
  SessionCompletion,
  SessionState,
  TransitionResult,
} from "../src/domain/ports/SessionGateway.js";
import type { SessionId, Slot, TimePoint } from "../src/domain/typedefs.js";
import { createHarness, type Harness } from "./support/harness.js";

const ITERATIONS = 2_000;
const RACE_TIMEOUT_MS = 60_000;

function mulberry32(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Yields a random number of microtasks before every directory call. */
class JitteryGateway extends InMemorySessionGateway {
  constructor(private readonly random: () => number) {
    super();
  }

  override async loadSession(sessionId: SessionId): Promise<SessionState> {
    await this.#jitter();
    return super.loadSession(sessionId);
  }

  override async recordMove(
    sessionId: SessionId,
    slot: Slot,
    move: RecordedMove,
  ): Promise<MoveRecordResult> {
    await this.#jitter();
    return super.recordMove(sessionId, slot, move);
  }

  override async completeSession(
    sessionId: SessionId,
    completion: SessionCompletion,
  ): Promise<TransitionResult> {
    await this.#jitter();
    return super.completeSession(sessionId, completion);
  }

  override async cancelSession(sessionId: SessionId, at: TimePoint): Promise<TransitionResult> {
    await this.#jitter();
    return super.cancelSession(sessionId, at);
  }

  async #jitter(): Promise<void> {
    const turns = Math.floor(this.random() * 6);
    for (let turn = 0; turn < turns; turn += 1) {
      await Promise.resolve();
    }
  }
}

interface Arena {
  readonly harness: Harness;
  readonly context: CommandContext;
  readonly sessions: JitteryGateway;
  readonly sessionId: SessionId;
  readonly commitMatch: MockInstance<AccountGateway["commitMatch"]>;
}

async function arena(seed: number): Promise<Arena> {
  const harness = createHarness();
  const sessions = new JitteryGateway(mulberry32(seed));
  const context: CommandContext = { ...harness.context, sessionGateway: sessions };

  const alice = await harness.createAccount("alice");
  const bob = await harness.createAccount("bob");
  const { session } = await new RequestQuickMatch(alice.id, 0).execute(context);
  await new RequestQuickMatch(bob.id, 0).execute(context);
  harness.bus.clear();

  const commitMatch = vi.spyOn(harness.accountGateway, "commitMatch");
  return { harness, context, sessions, sessionId: session.id, commitMatch };
}

function completionEvents(harness: Harness): number {
  return harness.bus
    .eventsOn("account:1")
    .filter((event) => event.type === "game_result" || event.type === "game_timeout").length;
}

describe("concurrent session transitions", () => {
  it("completes exactly once when a move races the turn deadline", async () => {
    for (let seed = 1; seed <= ITERATIONS; seed += 1) {
      const { harness, context, sessions, sessionId, commitMatch } = await arena(seed);
      await new SubmitMove(sessionId, 1, "rock", 100).execute(context);

      await Promise.allSettled([
        new SubmitMove(sessionId, 2, "paper", 30_000).execute(context),
        new TurnTimeout(sessionId, "B", 30_000).execute(context),
      ]);

      const final = await sessions.loadSession(sessionId);
      expect(final.status).toBe("completed");
      expect(completionEvents(harness)).toBe(1);
      expect(commitMatch).toHaveBeenCalledTimes(1);

      const alice = await harness.accountGateway.loadAccount(1);
      const bob = await harness.accountGateway.loadAccount(2);
      expect(alice.gamesPlayed + bob.gamesPlayed).toBe(2);
      expect(alice.rating - 1200).toBe(final.ratingDeltaA);
      expect(bob.rating - 1200).toBe(final.ratingDeltaB);
    }
  }, RACE_TIMEOUT_MS);

  it("either completes or cancels when a move races a disconnect", async () => {
    for (let seed = 1; seed <= ITERATIONS; seed += 1) {
      const { harness, context, sessions, sessionId, commitMatch } = await arena(seed);
      await new SubmitMove(sessionId, 1, "rock", 100).execute(context);

      await Promise.allSettled([
        new SubmitMove(sessionId, 2, "scissors", 200).execute(context),
        new CancelSession(sessionId, 1, 200).execute(context),
      ]);

      const final = await sessions.loadSession(sessionId);
      const alice = await harness.accountGateway.loadAccount(1);
      expect(commitMatch).toHaveBeenCalledTimes(1);

      if (final.status === "completed") {
        expect(completionEvents(harness)).toBe(1);
        expect(alice.rating).toBe(1205);
      } else {
        expect(final.status).toBe("cancelled");
        expect(completionEvents(harness)).toBe(0);
        expect(alice.rating).toBe(1200);
      }
    }
  }, RACE_TIMEOUT_MS);

  it("never lets two timeouts for the same slot both record", async () => {
    for (let seed = 1; seed <= ITERATIONS; seed += 1) {
      const { harness, context, sessions, sessionId, commitMatch } = await arena(seed);

      await Promise.all([
        new TurnTimeout(sessionId, "A", 30_000).execute(context),
        new TurnTimeout(sessionId, "A", 30_000).execute(context),
        new TurnTimeout(sessionId, "B", 30_000).execute(context),
      ]);

      const final = await sessions.loadSession(sessionId);
      expect(final).toMatchObject({ status: "completed", outcome: "tie" });
      expect(completionEvents(harness)).toBe(1);
      expect(commitMatch).toHaveBeenCalledTimes(1);
    }
  }, RACE_TIMEOUT_MS);
});
