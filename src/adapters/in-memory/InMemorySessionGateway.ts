import { assertValidSessionState } from "../../domain/entities/SessionRules.js";
import type { RecordedMove } from "../../domain/entities/OutcomeRules.js";
import { SessionNotFoundError } from "../../domain/errors/SessionNotFoundError.js";
import { SessionStateError } from "../../domain/errors/SessionStateError.js";
import type {
  MatchResult,
  MoveRecordResult,
  RematchResult,
  SessionCompletion,
  SessionGateway,
  SessionState,
  TransitionResult,
} from "../../domain/ports/SessionGateway.js";
import type { AccountId, SessionId, Slot, TimePoint } from "../../domain/typedefs.js";

/**
 * Session directory held in process memory. Each method runs to completion
 * without yielding before it touches the map, which makes every primitive
 * atomic with respect to the others.
 */
export class InMemorySessionGateway implements SessionGateway {
  #sessions = new Map<SessionId, SessionState>();
  #nextId = 1;

  async loadSession(sessionId: SessionId): Promise<SessionState> {
    return this.#clone(this.#require(sessionId));
  }

  async matchOrCreate(
    accountId: AccountId,
    at: TimePoint,
    deadlineAt: TimePoint,
  ): Promise<MatchResult> {
    for (const state of this.#sessions.values()) {
      if (
        state.status === "waiting" &&
        state.isQuickplay &&
        state.accountB === undefined &&
        state.accountA !== accountId
      ) {
        this.#bind(state, accountId, deadlineAt);
        return { matched: true, state: this.#clone(state) };
      }
    }

    return { matched: false, state: this.#clone(this.#insert(accountId, at)) };
  }

  async joinSession(
    sessionId: SessionId,
    accountId: AccountId,
    deadlineAt: TimePoint,
  ): Promise<SessionState> {
    const state = this.#require(sessionId);
    if (state.status !== "waiting" || state.accountB !== undefined) {
      throw new SessionStateError("AlreadyActive", sessionId, state.status);
    }

    this.#bind(state, accountId, deadlineAt);
    return this.#clone(state);
  }

  async recordMove(
    sessionId: SessionId,
    slot: Slot,
    move: RecordedMove,
  ): Promise<MoveRecordResult> {
    const state = this.#require(sessionId);
    const current = slot === "A" ? state.moveA : state.moveB;

    if (state.status !== "active" || current !== undefined) {
      return { inserted: false, state: this.#clone(state) };
    }

    if (slot === "A") state.moveA = move;
    else state.moveB = move;

    assertValidSessionState(state);
    return { inserted: true, state: this.#clone(state) };
  }

  async completeSession(
    sessionId: SessionId,
    completion: SessionCompletion,
  ): Promise<TransitionResult> {
    const state = this.#require(sessionId);
    if (state.status !== "active") {
      return { applied: false, state: this.#clone(state) };
    }

    const next: SessionState = {
      ...state,
      status: "completed",
      outcome: completion.outcome,
      ratingDeltaA: completion.ratingDeltaA,
      ratingDeltaB: completion.ratingDeltaB,
      completedAt: completion.completedAt,
    };
    assertValidSessionState(next);

    this.#sessions.set(sessionId, next);
    return { applied: true, state: this.#clone(next) };
  }

  async cancelSession(sessionId: SessionId, at: TimePoint): Promise<TransitionResult> {
    const state = this.#require(sessionId);
    if (state.status !== "waiting" && state.status !== "active") {
      return { applied: false, state: this.#clone(state) };
    }

    state.status = "cancelled";
    state.completedAt = at;
    assertValidSessionState(state);
    return { applied: true, state: this.#clone(state) };
  }

  async createRematch(
    previousId: SessionId,
    at: TimePoint,
    deadlineAt: TimePoint,
  ): Promise<RematchResult> {
    const previous = this.#require(previousId);
    if (previous.status !== "completed") {
      throw new SessionStateError("NotCompleted", previousId, previous.status);
    }

    if (previous.rematchSessionId !== undefined) {
      return { created: false, state: this.#clone(this.#require(previous.rematchSessionId)) };
    }

    const state: SessionState = {
      id: `session-${this.#nextId++}`,
      accountA: previous.accountA,
      accountB: previous.accountB,
      status: "active",
      isQuickplay: false,
      createdAt: at,
      deadlineAt,
      ratingDeltaA: 0,
      ratingDeltaB: 0,
      isRematchOf: previous.id,
    };
    assertValidSessionState(state);

    this.#sessions.set(state.id, state);
    previous.rematchSessionId = state.id;
    return { created: true, state: this.#clone(state) };
  }

  async listOpenSessions(accountId: AccountId): Promise<SessionState[]> {
    return [...this.#sessions.values()]
      .filter(
        (state) =>
          (state.status === "waiting" || state.status === "active") &&
          (state.accountA === accountId || state.accountB === accountId),
      )
      .map((state) => this.#clone(state));
  }

  #insert(accountA: AccountId, createdAt: TimePoint): SessionState {
    const state: SessionState = {
      id: `session-${this.#nextId++}`,
      accountA,
      status: "waiting",
      isQuickplay: true,
      createdAt,
      ratingDeltaA: 0,
      ratingDeltaB: 0,
    };
    assertValidSessionState(state);

    this.#sessions.set(state.id, state);
    return state;
  }

  #bind(state: SessionState, accountId: AccountId, deadlineAt: TimePoint): void {
    state.accountB = accountId;
    state.status = "active";
    state.deadlineAt = deadlineAt;
    assertValidSessionState(state);
  }

  #require(sessionId: SessionId): SessionState {
    const state = this.#sessions.get(sessionId);
    if (!state) throw new SessionNotFoundError(sessionId);
    return state;
  }

  #clone(state: SessionState): SessionState {
    return structuredClone(state);
  }
}
