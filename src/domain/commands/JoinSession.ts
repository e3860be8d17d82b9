import { accountChannel } from "../channels.js";
import { isOpen, slotOf } from "../entities/SessionRules.js";
import { SessionStateError } from "../errors/SessionStateError.js";
import { UnknownParticipantError } from "../errors/UnknownParticipantError.js";
import type { SessionState } from "../ports/SessionGateway.js";
import type { AccountId, SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import {
  activateSession,
  announcePlayerJoined,
  WAITING_MESSAGE,
} from "./SessionTransitions.js";
import { assertCommandInput } from "./validation.js";

/**
 * A connection entering a session room. Participants get the current state
 * announced; an outsider arriving at a waiting session takes slot B.
 */
export class JoinSession extends Command<SessionState> {
  readonly type = "JoinSession" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly accountId: AccountId,
    public readonly at: TimePoint,
  ) {
    super();
    assertCommandInput(sessionId, accountId);
  }

  async execute(ctx: CommandContext): Promise<SessionState> {
    const { sessionGateway, accountGateway, bus, config, logger } = ctx;

    const state = await sessionGateway.loadSession(this.sessionId);

    if (slotOf(state, this.accountId) === undefined) {
      if (state.status !== "waiting") {
        if (isOpen(state.status)) {
          throw new UnknownParticipantError(this.sessionId, this.accountId);
        }
        throw new SessionStateError("NotActive", this.sessionId, state.status);
      }

      await accountGateway.loadAccount(this.accountId);
      const joined = await sessionGateway.joinSession(
        this.sessionId,
        this.accountId,
        this.at + config.turnDurationMs,
      );

      logger?.info("Player took slot B", {
        type: this.type,
        sessionId: this.sessionId,
        accountId: this.accountId,
        at: this.at,
      });

      await activateSession(joined, this.accountId, this.at, ctx);
      return joined;
    }

    if (state.status === "active") {
      await announcePlayerJoined(state, this.accountId, this.at, ctx);
      return state;
    }

    if (state.status === "waiting") {
      await bus.publish(accountChannel(this.accountId), {
        type: "waiting_for_opponent",
        sessionId: state.id,
        message: WAITING_MESSAGE,
      });
      return state;
    }

    throw new SessionStateError("NotActive", this.sessionId, state.status);
  }
}
