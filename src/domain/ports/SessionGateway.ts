import type { RecordedMove } from "../entities/OutcomeRules.js";
import type {
  AccountId,
  Outcome,
  SessionId,
  SessionStatus,
  Slot,
  TimePoint,
} from "../typedefs.js";

/**
 * The authoritative in-memory snapshot of one two-player match.
 * Fields are populated progressively as the session moves through its states.
 */
export interface SessionState {
  /** Unique session identifier */
  readonly id: SessionId;

  /** Account bound to slot A (the creator) */
  readonly accountA: AccountId;

  /** Account bound to slot B; absent while waiting */
  accountB?: AccountId;

  status: SessionStatus;

  moveA?: RecordedMove;
  moveB?: RecordedMove;

  /** Created by quick match; only those sessions are offered to other players */
  readonly isQuickplay: boolean;

  readonly createdAt: TimePoint;

  /** Turn deadline shared by both slots, set on activation */
  deadlineAt?: TimePoint;

  completedAt?: TimePoint;

  outcome?: Outcome;

  ratingDeltaA: number;
  ratingDeltaB: number;

  /** Session this one is a rematch of (lookup only) */
  readonly isRematchOf?: SessionId;

  /** Rematch created from this session, set at most once */
  rematchSessionId?: SessionId;
}

export interface MatchResult {
  /** True when an existing waiting session was bound, false when one was created */
  readonly matched: boolean;
  readonly state: SessionState;
}

export interface MoveRecordResult {
  /** False when the slot was already recorded or the session was no longer active */
  readonly inserted: boolean;
  readonly state: SessionState;
}

export interface TransitionResult {
  /** Whether this call performed the transition. False means another writer got there first. */
  readonly applied: boolean;
  readonly state: SessionState;
}

export interface SessionCompletion {
  readonly outcome: Outcome;
  readonly ratingDeltaA: number;
  readonly ratingDeltaB: number;
  readonly completedAt: TimePoint;
}

export interface RematchResult {
  /** False when a rematch already existed and was returned instead */
  readonly created: boolean;
  readonly state: SessionState;
}

/**
 * Session Directory: the single source of truth for live sessions.
 *
 * Every method is one atomic step with respect to every other call on the same
 * directory. Callers never write a loaded snapshot back; they express each
 * mutation as one of the guarded primitives below.
 */
export interface SessionGateway {
  loadSession(sessionId: SessionId): Promise<SessionState>;

  /**
   * Scan-and-bind for quick match: bind the first waiting quickplay session
   * with an empty slot B not created by `accountId`, or create a new waiting
   * session for it.
   */
  matchOrCreate(
    accountId: AccountId,
    at: TimePoint,
    deadlineAt: TimePoint,
  ): Promise<MatchResult>;

  /** Bind slot B of a waiting session. Throws `AlreadyActive` when not waiting. */
  joinSession(
    sessionId: SessionId,
    accountId: AccountId,
    deadlineAt: TimePoint,
  ): Promise<SessionState>;

  /** Record a move (or an expiry) into a slot iff the session is active and the slot is unset. */
  recordMove(
    sessionId: SessionId,
    slot: Slot,
    move: RecordedMove,
  ): Promise<MoveRecordResult>;

  /** Compare-and-set `active → completed`. */
  completeSession(
    sessionId: SessionId,
    completion: SessionCompletion,
  ): Promise<TransitionResult>;

  /** Compare-and-set `waiting | active → cancelled`. */
  cancelSession(sessionId: SessionId, at: TimePoint): Promise<TransitionResult>;

  /**
   * Create an active session pre-bound to the participants of a completed
   * session, or return the rematch already created for it.
   */
  createRematch(
    previousId: SessionId,
    at: TimePoint,
    deadlineAt: TimePoint,
  ): Promise<RematchResult>;

  /** Waiting and active sessions the account is bound to. */
  listOpenSessions(accountId: AccountId): Promise<SessionState[]>;
}
