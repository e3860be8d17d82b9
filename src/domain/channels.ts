import type { AccountId, ConnectionId, Room, SessionId } from "./typedefs.js";

/**
 * Fan-out addresses. Room channels reach the connections inside the room,
 * account channels reach every live connection of the account.
 */
export type Channel =
  | Exclude<Room, "none">
  | `account:${AccountId}`
  | `connection:${ConnectionId}`;

export const LOBBY = "lobby" as const satisfies Room;

export const sessionRoom = (sessionId: SessionId): `session:${SessionId}` =>
  `session:${sessionId}`;

export const accountChannel = (accountId: AccountId): `account:${AccountId}` =>
  `account:${accountId}`;

export const connectionChannel = (
  connectionId: ConnectionId,
): `connection:${ConnectionId}` => `connection:${connectionId}`;
