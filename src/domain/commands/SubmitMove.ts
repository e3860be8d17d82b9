import { accountChannel } from "../channels.js";
import { isMove, type Move } from "../entities/OutcomeRules.js";
import {
  accountInSlot,
  bothMovesRecorded,
  opponentSlot,
  slotOf,
} from "../entities/SessionRules.js";
import { AlreadyChosenError } from "../errors/AlreadyChosenError.js";
import { InvalidMoveError } from "../errors/InvalidMoveError.js";
import { SessionStateError } from "../errors/SessionStateError.js";
import { UnknownParticipantError } from "../errors/UnknownParticipantError.js";
import type { AccountId, SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { finalizeSession } from "./SessionTransitions.js";
import { assertCommandInput } from "./validation.js";

export class SubmitMove extends Command {
  readonly type = "SubmitMove" as const;
  readonly move: Move;

  constructor(
    public readonly sessionId: SessionId,
    public readonly accountId: AccountId,
    move: unknown,
    public readonly at: TimePoint,
  ) {
    super();
    assertCommandInput(sessionId, accountId);

    if (!isMove(move)) {
      throw new InvalidMoveError(move);
    }
    this.move = move;
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { sessionGateway, scheduler, bus, logger } = ctx;
    const state = await sessionGateway.loadSession(this.sessionId);

    const slot = slotOf(state, this.accountId);
    if (slot === undefined) {
      throw new UnknownParticipantError(this.sessionId, this.accountId);
    }

    if (state.status !== "active") {
      throw new SessionStateError("NotActive", this.sessionId, state.status);
    }

    const { inserted, state: updated } = await sessionGateway.recordMove(
      this.sessionId,
      slot,
      this.move,
    );

    if (!inserted) {
      if (updated.status !== "active") {
        throw new SessionStateError("NotActive", this.sessionId, updated.status);
      }
      throw new AlreadyChosenError(this.sessionId, slot);
    }

    await scheduler.cancelTurnTimeout(this.sessionId, slot);

    logger?.info("Move submitted", {
      type: this.type,
      sessionId: this.sessionId,
      accountId: this.accountId,
      slot,
      at: this.at,
    });

    const opponent = accountInSlot(updated, opponentSlot(slot));
    if (opponent !== undefined) {
      await bus.publish(accountChannel(opponent), {
        type: "choice_made",
        sessionId: this.sessionId,
        accountId: this.accountId,
      });
    }

    if (bothMovesRecorded(updated)) {
      await finalizeSession(updated, this.at, ctx, this.type);
    }
  }
}
