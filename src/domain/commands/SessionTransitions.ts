import { accountChannel } from "../channels.js";
import {
  resolveOutcome,
  resolveTimeoutOutcome,
  TIMEOUT,
  type Move,
} from "../entities/OutcomeRules.js";
import { updateRatings } from "../entities/RatingRules.js";
import {
  accountInSlot,
  loserAccountId,
  toMatchRecord,
  winnerAccountId,
} from "../entities/SessionRules.js";
import { InvalidSessionStateError } from "../errors/InvalidSessionStateError.js";
import { PersistenceFailureError } from "../errors/PersistenceFailureError.js";
import type { OutboundEvent } from "../events.js";
import type { MessageBus } from "../ports/MessageBus.js";
import type { SessionState } from "../ports/SessionGateway.js";
import type { AccountId, Outcome, TimePoint } from "../typedefs.js";
import type { CommandContext } from "./Command.js";

export const WAITING_MESSAGE = "Waiting for another player to join...";
export const DISCONNECT_MESSAGE = "Your opponent disconnected. The game was cancelled.";
export const PERSISTENCE_WARNING =
  "The result is final but could not be saved. Ratings may take a while to update.";

type Decision =
  | { readonly kind: "moves"; readonly outcome: Outcome; readonly moveA: Move; readonly moveB: Move }
  | { readonly kind: "timeout"; readonly outcome: Outcome; readonly doubleTimeout: boolean };

export function decide(state: SessionState): Decision {
  const { moveA, moveB } = state;
  if (moveA === undefined || moveB === undefined) {
    throw new InvalidSessionStateError("cannot decide a session with a pending move", state);
  }

  if (moveA === TIMEOUT || moveB === TIMEOUT) {
    return {
      kind: "timeout",
      outcome: resolveTimeoutOutcome(moveA, moveB),
      doubleTimeout: moveA === TIMEOUT && moveB === TIMEOUT,
    };
  }

  return { kind: "moves", outcome: resolveOutcome(moveA, moveB), moveA, moveB };
}

export function deadlineSeconds(state: SessionState, at: TimePoint): number {
  if (state.deadlineAt === undefined) return 0;
  return Math.max(0, Math.ceil((state.deadlineAt - at) / 1000));
}

export async function publishToParticipants(
  bus: MessageBus,
  state: SessionState,
  event: OutboundEvent,
): Promise<void> {
  await bus.publish(accountChannel(state.accountA), event);
  if (state.accountB !== undefined) {
    await bus.publish(accountChannel(state.accountB), event);
  }
}

type TransitionContext = Pick<CommandContext, "scheduler" | "logger">;

export async function armTurnTimers(
  state: SessionState,
  at: TimePoint,
  { scheduler, logger }: TransitionContext,
): Promise<void> {
  if (state.deadlineAt === undefined) {
    throw new InvalidSessionStateError("cannot arm timers without a deadline", state);
  }

  const delayMs = Math.max(0, state.deadlineAt - at);
  await scheduler.scheduleTurnTimeout(state.id, "A", delayMs);
  await scheduler.scheduleTurnTimeout(state.id, "B", delayMs);

  logger?.debug("Turn timers armed", { sessionId: state.id, delayMs });
}

export async function announcePlayerJoined(
  state: SessionState,
  joiner: AccountId,
  at: TimePoint,
  { accountGateway, bus }: Pick<CommandContext, "accountGateway" | "bus">,
): Promise<void> {
  const opponentId = opponentOf(state, joiner);
  const player = await accountGateway.loadAccount(joiner);
  const opponent =
    opponentId === undefined ? undefined : await accountGateway.loadAccount(opponentId);

  await publishToParticipants(bus, state, {
    type: "player_joined",
    sessionId: state.id,
    accountId: joiner,
    name: player.name,
    opponentName: opponent?.name ?? "Unknown",
    active: state.status === "active",
    deadlineSeconds: deadlineSeconds(state, at),
  });
}

/** Arms both turn deadlines of a freshly activated session and tells both players. */
export async function activateSession(
  state: SessionState,
  joiner: AccountId,
  at: TimePoint,
  ctx: CommandContext,
): Promise<void> {
  await armTurnTimers(state, at, ctx);

  ctx.logger?.info("Session activated", {
    sessionId: state.id,
    accountA: state.accountA,
    accountB: state.accountB,
    at,
  });

  await announcePlayerJoined(state, joiner, at, ctx);
}

/**
 * Decide a session whose two slots are recorded and move it to `completed`.
 * Returns the completed state, or undefined when another writer completed or
 * cancelled it first.
 */
export async function finalizeSession(
  state: SessionState,
  at: TimePoint,
  ctx: CommandContext,
  source: string,
): Promise<SessionState | undefined> {
  const { sessionGateway, accountGateway, scheduler, bus, config, logger } = ctx;
  const decision = decide(state);

  const accountB = state.accountB;
  if (accountB === undefined) {
    throw new InvalidSessionStateError("cannot finalize a session without slot B", state);
  }

  let ratingDeltaA = 0;
  let ratingDeltaB = 0;
  if (decision.kind === "moves" || !decision.doubleTimeout) {
    const [playerA, playerB] = await Promise.all([
      accountGateway.loadAccount(state.accountA),
      accountGateway.loadAccount(accountB),
    ]);
    const update = updateRatings(playerA.rating, playerB.rating, decision.outcome, config.ratingK);
    ratingDeltaA = update.deltaA;
    ratingDeltaB = update.deltaB;
  }

  const { applied, state: completed } = await sessionGateway.completeSession(state.id, {
    outcome: decision.outcome,
    ratingDeltaA,
    ratingDeltaB,
    completedAt: at,
  });

  if (!applied) {
    logger?.info("Completion skipped; session already finalized", {
      type: source,
      sessionId: state.id,
      status: completed.status,
      at,
    });
    return undefined;
  }

  await scheduler.cancelSessionTimeouts(completed.id);

  logger?.info("Session completed", {
    type: source,
    sessionId: completed.id,
    outcome: decision.outcome,
    byTimeout: decision.kind === "timeout",
    ratingDeltaA,
    ratingDeltaB,
    at,
  });

  if (decision.kind === "moves") {
    await publishToParticipants(bus, completed, {
      type: "game_result",
      sessionId: completed.id,
      moveA: decision.moveA,
      moveB: decision.moveB,
      winnerAccountId: winnerAccountId(completed),
      deltaA: ratingDeltaA,
      deltaB: ratingDeltaB,
    });
  } else {
    await publishToParticipants(bus, completed, {
      type: "game_timeout",
      sessionId: completed.id,
      winnerAccountId: winnerAccountId(completed),
      loserAccountId: loserAccountId(completed),
      deltaA: ratingDeltaA,
      deltaB: ratingDeltaB,
    });
  }

  await recordTerminalSession(completed, at, ctx);
  return completed;
}

/**
 * Commit the match record of a terminal session. The in-memory state is
 * already authoritative, so a failed write is reported, never rolled back.
 */
export async function recordTerminalSession(
  state: SessionState,
  at: TimePoint,
  { accountGateway, bus, logger }: Pick<CommandContext, "accountGateway" | "bus" | "logger">,
): Promise<void> {
  try {
    await accountGateway.commitMatch(toMatchRecord(state, at));
    logger?.debug("Match record committed", { sessionId: state.id, status: state.status });
  } catch (error) {
    const failure = new PersistenceFailureError(state.id, error);
    logger?.error(failure.message, { sessionId: state.id, status: state.status, error });

    if (state.status === "completed") {
      await publishToParticipants(bus, state, {
        type: "persistence_warning",
        sessionId: state.id,
        message: PERSISTENCE_WARNING,
      });
    }
  }
}

export function opponentOf(state: SessionState, accountId: AccountId): AccountId | undefined {
  if (state.accountA === accountId) return accountInSlot(state, "B");
  return state.accountA;
}
