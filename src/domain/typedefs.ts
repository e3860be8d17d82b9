// Identifiers and times shared by the session engine. Times are epoch milliseconds.

/** Unique identifier of a session (one two-player match) */
export type SessionId = string;

/** Numeric identity of an account, owned by the persistence collaborator */
export type AccountId = number;

/** Identity of one live realtime connection */
export type ConnectionId = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** One of the two participant positions of a session */
export type Slot = "A" | "B";

/** Session lifecycle enumeration */
export type SessionStatus = "waiting" | "active" | "completed" | "cancelled";

/** Result of a decided session, expressed by slot */
export type Outcome = "A" | "B" | "tie";

/** Room a connection currently occupies */
export type Room = "none" | "lobby" | `session:${SessionId}`;
