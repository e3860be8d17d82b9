import { accountChannel } from "../channels.js";
import { accountInSlot, isOpen, opponentSlot, slotOf } from "../entities/SessionRules.js";
import { UnknownParticipantError } from "../errors/UnknownParticipantError.js";
import type { AccountId, SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { DISCONNECT_MESSAGE, recordTerminalSession } from "./SessionTransitions.js";
import { assertCommandInput } from "./validation.js";

/** A participant dropped out. Cancellation preempts completion and never moves ratings. */
export class CancelSession extends Command {
  readonly type = "CancelSession" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly accountId: AccountId,
    public readonly at: TimePoint,
  ) {
    super();
    assertCommandInput(sessionId, accountId);
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { sessionGateway, scheduler, bus, logger } = ctx;
    const state = await sessionGateway.loadSession(this.sessionId);

    const slot = slotOf(state, this.accountId);
    if (slot === undefined) {
      throw new UnknownParticipantError(this.sessionId, this.accountId);
    }

    if (!isOpen(state.status)) {
      return;
    }

    const { applied, state: cancelled } = await sessionGateway.cancelSession(
      this.sessionId,
      this.at,
    );

    if (!applied) {
      return;
    }

    await scheduler.cancelSessionTimeouts(this.sessionId);

    logger?.info("Session cancelled", {
      type: this.type,
      sessionId: this.sessionId,
      accountId: this.accountId,
      at: this.at,
    });

    const remaining = accountInSlot(cancelled, opponentSlot(slot));
    if (remaining !== undefined) {
      await bus.publish(accountChannel(remaining), {
        type: "opponent_disconnected",
        sessionId: this.sessionId,
        message: DISCONNECT_MESSAGE,
      });
    }

    await recordTerminalSession(cancelled, this.at, ctx);
  }
}
