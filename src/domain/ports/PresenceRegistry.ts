import type { AccountId, ConnectionId, Room, TimePoint } from "../typedefs.js";

export interface PresenceEntry {
  readonly connectionId: ConnectionId;
  readonly accountId: AccountId;
  readonly room: Room;
  readonly connectedAt: TimePoint;
}

/**
 * Live connections and the room each one occupies.
 * The realtime gateway is the only writer.
 */
export interface PresenceRegistry {
  connect(connectionId: ConnectionId, accountId: AccountId, at: TimePoint): PresenceEntry;
  disconnect(connectionId: ConnectionId): PresenceEntry | undefined;
  setRoom(connectionId: ConnectionId, room: Room): PresenceEntry | undefined;
  get(connectionId: ConnectionId): PresenceEntry | undefined;
  listRoom(room: Room): ReadonlySet<AccountId>;
  connectionsInRoom(room: Room): readonly ConnectionId[];
  connectionsOf(accountId: AccountId): readonly ConnectionId[];
}
