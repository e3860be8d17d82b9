import type { RejectionCode } from "./errors/SessionRejection.js";
import type { Move } from "./entities/OutcomeRules.js";
import type { AccountId, SessionId } from "./typedefs.js";

export interface UserJoinedLobby {
  readonly type: "user_joined_lobby";
  readonly accountId: AccountId;
  readonly name: string;
}

export interface UserLeftLobby {
  readonly type: "user_left_lobby";
  readonly accountId: AccountId;
  readonly name: string;
}

export interface LobbyMember {
  readonly accountId: AccountId;
  readonly name: string;
}

/** Sent to a connection entering the lobby: the other accounts already there. */
export interface LobbySnapshot {
  readonly type: "lobby_snapshot";
  readonly members: readonly LobbyMember[];
}

export interface PlayerJoined {
  readonly type: "player_joined";
  readonly sessionId: SessionId;
  readonly accountId: AccountId;
  readonly name: string;
  readonly opponentName: string;
  readonly active: boolean;
  readonly deadlineSeconds: number;
}

export interface WaitingForOpponent {
  readonly type: "waiting_for_opponent";
  readonly sessionId: SessionId;
  readonly message: string;
}

/** Move content is withheld until the result. */
export interface ChoiceMade {
  readonly type: "choice_made";
  readonly sessionId: SessionId;
  readonly accountId: AccountId;
}

export interface GameResult {
  readonly type: "game_result";
  readonly sessionId: SessionId;
  readonly moveA: Move;
  readonly moveB: Move;
  readonly winnerAccountId: AccountId | null;
  readonly deltaA: number;
  readonly deltaB: number;
}

export interface GameTimeout {
  readonly type: "game_timeout";
  readonly sessionId: SessionId;
  readonly winnerAccountId: AccountId | null;
  readonly loserAccountId: AccountId | null;
  readonly deltaA: number;
  readonly deltaB: number;
}

export interface OpponentDisconnected {
  readonly type: "opponent_disconnected";
  readonly sessionId: SessionId;
  readonly message: string;
}

export interface NewGameCreated {
  readonly type: "new_game_created";
  readonly sessionId: SessionId;
  readonly isRematchOf: SessionId;
}

export interface PersistenceWarning {
  readonly type: "persistence_warning";
  readonly sessionId: SessionId;
  readonly message: string;
}

export interface ErrorAck {
  readonly type: "error";
  readonly code: RejectionCode | "InternalError";
  readonly message: string;
  readonly event?: string;
}

export type OutboundEvent =
  | UserJoinedLobby
  | UserLeftLobby
  | LobbySnapshot
  | PlayerJoined
  | WaitingForOpponent
  | ChoiceMade
  | GameResult
  | GameTimeout
  | OpponentDisconnected
  | NewGameCreated
  | PersistenceWarning
  | ErrorAck;
