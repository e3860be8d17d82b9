import type { RecordedMove } from "../entities/OutcomeRules.js";
import type { AccountId, Outcome, SessionId, TimePoint } from "../typedefs.js";

export interface Account {
  readonly id: AccountId;
  readonly name: string;
  rating: number;
  gamesPlayed: number;
  gamesWon: number;
  gamesLost: number;
  gamesTied: number;
  readonly createdAt: TimePoint;
}

/** Persisted summary of a terminal session. */
export interface MatchRecord {
  readonly sessionId: SessionId;
  readonly status: "completed" | "cancelled";
  readonly accountA: AccountId;
  readonly accountB?: AccountId;
  readonly moveA?: RecordedMove;
  readonly moveB?: RecordedMove;
  readonly outcome?: Outcome;
  readonly winnerAccountId: AccountId | null;
  readonly ratingDeltaA: number;
  readonly ratingDeltaB: number;
  readonly createdAt: TimePoint;
  readonly endedAt: TimePoint;
  readonly isRematchOf?: SessionId;
}

/**
 * Persistence collaborator for accounts and finished matches.
 * Implementations must apply `commitMatch` as a single transaction.
 */
export interface AccountGateway {
  loadAccount(accountId: AccountId): Promise<Account>;

  createAccount(name: string, createdAt: TimePoint): Promise<Account>;

  /** Accounts ordered by rating, best first, optionally filtered by name. */
  listLeaderboard(search?: string): Promise<Account[]>;

  /**
   * Upsert the match record. For a completed record, also apply the rating
   * deltas and win/loss/tie counters to both accounts, exactly once per session.
   */
  commitMatch(record: MatchRecord): Promise<void>;

  loadMatchRecord(sessionId: SessionId): Promise<MatchRecord | undefined>;
}
