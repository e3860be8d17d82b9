import { TIMEOUT } from "../entities/OutcomeRules.js";
import { bothMovesRecorded, moveOf } from "../entities/SessionRules.js";
import { SessionNotFoundError } from "../errors/SessionNotFoundError.js";
import type { SessionState } from "../ports/SessionGateway.js";
import type { SessionId, Slot, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { finalizeSession } from "./SessionTransitions.js";

/**
 * Delivered by the scheduler when a slot's turn deadline passes. Every check
 * is repeated against the current session, so a late or stale delivery is a no-op.
 */
export class TurnTimeout extends Command {
  readonly type = "TurnTimeout" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly slot: Slot,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { sessionGateway, logger } = ctx;

    const state = await this.#loadIfPresent(ctx);
    if (!state || state.status !== "active" || moveOf(state, this.slot) !== undefined) {
      return;
    }

    const { inserted, state: updated } = await sessionGateway.recordMove(
      this.sessionId,
      this.slot,
      TIMEOUT,
    );

    if (!inserted) {
      return;
    }

    logger?.info("Turn expired", {
      type: this.type,
      sessionId: this.sessionId,
      slot: this.slot,
      at: this.at,
    });

    if (bothMovesRecorded(updated)) {
      await finalizeSession(updated, this.at, ctx, this.type);
    }
  }

  async #loadIfPresent({ sessionGateway, logger }: CommandContext): Promise<SessionState | undefined> {
    try {
      return await sessionGateway.loadSession(this.sessionId);
    } catch (error) {
      if (error instanceof SessionNotFoundError) {
        logger?.debug("Timeout ignored; session no longer exists", {
          sessionId: this.sessionId,
          slot: this.slot,
        });
        return undefined;
      }
      throw error;
    }
  }
}
