/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { WebSocket } from "ws";

import type {
  AccountId,
  Channel,
  ConnectionId,
  Logger,
  MessageBus,
  OutboundEvent,
  PresenceRegistry,
  Room,
} from "../core.js";

function isRoomChannel(channel: Channel): channel is Exclude<Room, "none"> {
  return channel === "lobby" || channel.startsWith("session:");
}

/** The part of a `ws` socket the bus writes to. */
export interface OutboundSocket {
  readonly readyState: number;
  send(data: string, cb?: (error?: Error) => void): void;
}

/**
 * Delivers events to live sockets. Channels are resolved against the presence
 * registry at publish time, so a socket only needs registering once.
 */
export class WebSocketBus implements MessageBus {
  #sockets: Map<ConnectionId, OutboundSocket> = new Map();
  readonly #presence: PresenceRegistry;
  readonly #logger: Logger | undefined;

  constructor(presence: PresenceRegistry, logger?: Logger) {
    this.#presence = presence;
    this.#logger = logger;
  }

  async publish(channel: Channel, event: OutboundEvent): Promise<void> {
    const message = JSON.stringify(event);
    const targets = this.#resolve(channel);

    for (const connectionId of targets) {
      const socket = this.#sockets.get(connectionId);
      if (!socket || socket.readyState !== WebSocket.OPEN) {
        continue;
      }

      try {
        socket.send(message, (error) => {
          if (error) {
            this.#logger?.warn("Failed to deliver event", { channel, connectionId, error });
          }
        });
      } catch (error) {
        this.#logger?.warn("Failed to deliver event", { channel, connectionId, error });
      }
    }

    this.#logger?.debug("Event published", { channel, type: event.type, targets: targets.length });
  }

  attach(connectionId: ConnectionId, socket: OutboundSocket): void {
    this.#sockets.set(connectionId, socket);
    this.#logger?.info("WebSocket client attached", {
      connectionId,
      size: this.#sockets.size,
    });
  }

  detach(connectionId: ConnectionId): void {
    if (!this.#sockets.delete(connectionId)) return;
    this.#logger?.info("WebSocket client detached", {
      connectionId,
      size: this.#sockets.size,
    });
  }

  #resolve(channel: Channel): readonly ConnectionId[] {
    if (channel.startsWith("connection:")) {
      return [channel.slice("connection:".length)];
    }

    if (channel.startsWith("account:")) {
      const accountId: AccountId = Number(channel.slice("account:".length));
      return this.#presence.connectionsOf(accountId);
    }

    if (isRoomChannel(channel)) {
      return this.#presence.connectionsInRoom(channel);
    }

    return [];
  }
}
