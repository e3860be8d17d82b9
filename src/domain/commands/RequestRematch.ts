import { accountChannel } from "../channels.js";
import { slotOf } from "../entities/SessionRules.js";
import { SessionStateError } from "../errors/SessionStateError.js";
import { UnknownParticipantError } from "../errors/UnknownParticipantError.js";
import type { SessionState } from "../ports/SessionGateway.js";
import type { AccountId, SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { armTurnTimers, publishToParticipants } from "./SessionTransitions.js";
import { assertCommandInput } from "./validation.js";

export class RequestRematch extends Command<SessionState> {
  readonly type = "RequestRematch" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly accountId: AccountId,
    public readonly at: TimePoint,
  ) {
    super();
    assertCommandInput(sessionId, accountId);
  }

  async execute(ctx: CommandContext): Promise<SessionState> {
    const { sessionGateway, bus, config, logger } = ctx;
    const previous = await sessionGateway.loadSession(this.sessionId);

    if (slotOf(previous, this.accountId) === undefined) {
      throw new UnknownParticipantError(this.sessionId, this.accountId);
    }

    if (previous.status !== "completed") {
      throw new SessionStateError("NotCompleted", this.sessionId, previous.status);
    }

    const { created, state } = await sessionGateway.createRematch(
      this.sessionId,
      this.at,
      this.at + config.turnDurationMs,
    );

    const event = {
      type: "new_game_created",
      sessionId: state.id,
      isRematchOf: previous.id,
    } as const;

    if (!created) {
      logger?.info("Rematch already exists", {
        type: this.type,
        sessionId: state.id,
        isRematchOf: previous.id,
      });
      await bus.publish(accountChannel(this.accountId), event);
      return state;
    }

    await armTurnTimers(state, this.at, ctx);

    logger?.info("Rematch created", {
      type: this.type,
      sessionId: state.id,
      isRematchOf: previous.id,
      requestedBy: this.accountId,
      at: this.at,
    });

    await publishToParticipants(bus, state, event);
    return state;
  }
}
