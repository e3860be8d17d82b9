import { connectionChannel, LOBBY, sessionRoom } from "../domain/channels.js";
import { CancelSession } from "../domain/commands/CancelSession.js";
import type { Command, CommandContext } from "../domain/commands/Command.js";
import { dispatchCommand } from "../domain/commands/dispatchCommand.js";
import { JoinSession } from "../domain/commands/JoinSession.js";
import { RequestRematch } from "../domain/commands/RequestRematch.js";
import { opponentOf } from "../domain/commands/SessionTransitions.js";
import { SubmitMove } from "../domain/commands/SubmitMove.js";
import { slotOf } from "../domain/entities/SessionRules.js";
import { OpponentUnavailableError } from "../domain/errors/OpponentUnavailableError.js";
import { SessionRejection } from "../domain/errors/SessionRejection.js";
import type { ErrorAck, LobbyMember } from "../domain/events.js";
import type { Logger } from "../domain/ports/Logger.js";
import type { PresenceEntry, PresenceRegistry } from "../domain/ports/PresenceRegistry.js";
import type { AccountId, ConnectionId, SessionId, TimePoint } from "../domain/typedefs.js";
import { parseInboundMessage, type InboundMessage, type InboundType } from "./InboundMessage.js";

type Dispatch = <TResult>(command: Command<TResult>, ctx: CommandContext) => Promise<TResult>;

export interface RealtimeGatewayOptions {
  readonly presence: PresenceRegistry;
  readonly createContext: () => CommandContext;
  readonly dispatch?: Dispatch;
  readonly clock?: () => TimePoint;
  readonly logger?: Logger;
}

/**
 * Entry point for everything a client connection does: connecting, sending
 * text frames and going away. Presence is written here and nowhere else.
 */
export class RealtimeGateway {
  readonly #presence: PresenceRegistry;
  readonly #createContext: () => CommandContext;
  readonly #dispatch: Dispatch;
  readonly #clock: () => TimePoint;
  readonly #logger: Logger | undefined;

  constructor(options: RealtimeGatewayOptions) {
    this.#presence = options.presence;
    this.#createContext = options.createContext;
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#clock = options.clock ?? Date.now;
    this.#logger = options.logger;
  }

  /** Register a connection. Rejects with `AccountNotFound` for an unknown account. */
  async connect(connectionId: ConnectionId, accountId: AccountId): Promise<PresenceEntry> {
    await this.#createContext().accountGateway.loadAccount(accountId);
    const entry = this.#presence.connect(connectionId, accountId, this.#clock());
    this.#logger?.info("Connection registered", { connectionId, accountId });
    return entry;
  }

  /** Handle one inbound frame. Failures are acknowledged, never thrown. */
  async receive(connectionId: ConnectionId, raw: string): Promise<void> {
    const entry = this.#presence.get(connectionId);
    if (!entry) {
      this.#logger?.warn("Message from unregistered connection dropped", { connectionId });
      return;
    }

    let eventType: InboundType | undefined;
    try {
      const message = parseInboundMessage(raw);
      eventType = message.type;
      await this.#handle(entry, message);
    } catch (error) {
      await this.#acknowledgeFailure(connectionId, error, eventType);
    }
  }

  /**
   * Drop a connection. When it was the account's last one, every open session
   * of the account is cancelled.
   */
  async disconnect(connectionId: ConnectionId): Promise<void> {
    const entry = this.#presence.disconnect(connectionId);
    if (!entry) return;

    this.#logger?.info("Connection closed", {
      connectionId,
      accountId: entry.accountId,
      room: entry.room,
    });

    const ctx = this.#createContext();

    try {
      if (entry.room === LOBBY) {
        await this.#announceLobbyExit(entry.accountId, ctx);
      }
    } catch (error) {
      this.#logger?.error("Failed to announce lobby exit", { connectionId, error });
    }

    if (this.#presence.connectionsOf(entry.accountId).length > 0) {
      return;
    }

    const open = await ctx.sessionGateway.listOpenSessions(entry.accountId);
    for (const session of open) {
      try {
        await this.#dispatch(new CancelSession(session.id, entry.accountId, this.#clock()), ctx);
      } catch (error) {
        this.#logger?.error("Failed to cancel session on disconnect", {
          sessionId: session.id,
          accountId: entry.accountId,
          error,
        });
      }
    }
  }

  async #handle(entry: PresenceEntry, message: InboundMessage): Promise<void> {
    const ctx = this.#createContext();
    const { connectionId, accountId } = entry;

    switch (message.type) {
      case "join_lobby": {
        const account = await ctx.accountGateway.loadAccount(accountId);
        this.#presence.setRoom(connectionId, LOBBY);
        await ctx.bus.publish(connectionChannel(connectionId), {
          type: "lobby_snapshot",
          members: await this.#lobbyMembers(accountId, ctx),
        });
        await ctx.bus.publish(LOBBY, {
          type: "user_joined_lobby",
          accountId,
          name: account.name,
        });
        return;
      }

      case "leave_lobby": {
        if (entry.room !== LOBBY) return;
        this.#presence.setRoom(connectionId, "none");
        await this.#announceLobbyExit(accountId, ctx);
        return;
      }

      case "join_session": {
        await this.#dispatch(new JoinSession(message.sessionId, accountId, this.#clock()), ctx);
        this.#presence.setRoom(connectionId, sessionRoom(message.sessionId));
        if (entry.room === LOBBY) {
          await this.#announceLobbyExit(accountId, ctx);
        }
        return;
      }

      case "submit_move": {
        await this.#dispatch(
          new SubmitMove(message.sessionId, accountId, message.move, this.#clock()),
          ctx,
        );
        return;
      }

      case "request_rematch": {
        await this.#assertOpponentPresent(message.sessionId, accountId, ctx);
        const rematch = await this.#dispatch(
          new RequestRematch(message.sessionId, accountId, this.#clock()),
          ctx,
        );
        this.#presence.setRoom(connectionId, sessionRoom(rematch.id));
        return;
      }
    }
  }

  async #assertOpponentPresent(
    sessionId: SessionId,
    accountId: AccountId,
    ctx: CommandContext,
  ): Promise<void> {
    const previous = await ctx.sessionGateway.loadSession(sessionId);
    if (slotOf(previous, accountId) === undefined) return;

    const opponent = opponentOf(previous, accountId);
    if (opponent !== undefined && this.#presence.connectionsOf(opponent).length === 0) {
      throw new OpponentUnavailableError(sessionId, opponent);
    }
  }

  async #lobbyMembers(except: AccountId, ctx: CommandContext): Promise<LobbyMember[]> {
    const members: LobbyMember[] = [];
    for (const accountId of this.#presence.listRoom(LOBBY)) {
      if (accountId === except) continue;
      const account = await ctx.accountGateway.loadAccount(accountId);
      members.push({ accountId, name: account.name });
    }
    return members.sort((a, b) => a.accountId - b.accountId);
  }

  async #announceLobbyExit(accountId: AccountId, ctx: CommandContext): Promise<void> {
    const account = await ctx.accountGateway.loadAccount(accountId);
    await ctx.bus.publish(LOBBY, {
      type: "user_left_lobby",
      accountId,
      name: account.name,
    });
  }

  async #acknowledgeFailure(
    connectionId: ConnectionId,
    error: unknown,
    eventType: InboundType | undefined,
  ): Promise<void> {
    const ack: ErrorAck =
      error instanceof SessionRejection
        ? { type: "error", code: error.code, message: error.message, event: eventType }
        : { type: "error", code: "InternalError", message: "Internal server error", event: eventType };

    if (!(error instanceof SessionRejection)) {
      this.#logger?.error("Unexpected failure handling message", {
        connectionId,
        event: eventType,
        error,
      });
    }

    try {
      await this.#createContext().bus.publish(connectionChannel(connectionId), ack);
    } catch (publishError) {
      this.#logger?.error("Failed to acknowledge rejected message", {
        connectionId,
        error: publishError,
      });
    }
  }
}
