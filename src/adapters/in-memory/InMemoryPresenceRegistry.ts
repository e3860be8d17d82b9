import type { PresenceEntry, PresenceRegistry } from "../../domain/ports/PresenceRegistry.js";
import type { AccountId, ConnectionId, Room, TimePoint } from "../../domain/typedefs.js";

export class InMemoryPresenceRegistry implements PresenceRegistry {
  #entries = new Map<ConnectionId, PresenceEntry>();

  connect(connectionId: ConnectionId, accountId: AccountId, at: TimePoint): PresenceEntry {
    const entry: PresenceEntry = { connectionId, accountId, room: "none", connectedAt: at };
    this.#entries.set(connectionId, entry);
    return entry;
  }

  disconnect(connectionId: ConnectionId): PresenceEntry | undefined {
    const entry = this.#entries.get(connectionId);
    this.#entries.delete(connectionId);
    return entry;
  }

  setRoom(connectionId: ConnectionId, room: Room): PresenceEntry | undefined {
    const entry = this.#entries.get(connectionId);
    if (!entry) return undefined;

    const next: PresenceEntry = { ...entry, room };
    this.#entries.set(connectionId, next);
    return next;
  }

  get(connectionId: ConnectionId): PresenceEntry | undefined {
    return this.#entries.get(connectionId);
  }

  listRoom(room: Room): ReadonlySet<AccountId> {
    const accounts = new Set<AccountId>();
    for (const entry of this.#entries.values()) {
      if (entry.room === room) accounts.add(entry.accountId);
    }
    return accounts;
  }

  connectionsInRoom(room: Room): readonly ConnectionId[] {
    return [...this.#entries.values()]
      .filter((entry) => entry.room === room)
      .map((entry) => entry.connectionId);
  }

  connectionsOf(accountId: AccountId): readonly ConnectionId[] {
    return [...this.#entries.values()]
      .filter((entry) => entry.accountId === accountId)
      .map((entry) => entry.connectionId);
  }
}
