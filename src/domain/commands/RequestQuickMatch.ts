import { accountChannel } from "../channels.js";
import type { SessionState } from "../ports/SessionGateway.js";
import type { AccountId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { activateSession, WAITING_MESSAGE } from "./SessionTransitions.js";
import { assertCommandInput } from "./validation.js";

export interface QuickMatchResult {
  readonly session: SessionState;
  readonly matched: boolean;
}

/**
 * Matchmaker entry point: pair the requester with an open waiting session, or
 * open a new one for the next requester.
 */
export class RequestQuickMatch extends Command<QuickMatchResult> {
  readonly type = "RequestQuickMatch" as const;

  constructor(
    public readonly accountId: AccountId,
    public readonly at: TimePoint,
  ) {
    super();
    assertCommandInput(undefined, accountId);
  }

  async execute(ctx: CommandContext): Promise<QuickMatchResult> {
    const { sessionGateway, accountGateway, bus, config, logger } = ctx;

    await accountGateway.loadAccount(this.accountId);

    const { matched, state } = await sessionGateway.matchOrCreate(
      this.accountId,
      this.at,
      this.at + config.turnDurationMs,
    );

    if (matched) {
      logger?.info("Quick match paired", {
        type: this.type,
        sessionId: state.id,
        accountId: this.accountId,
        at: this.at,
      });
      await activateSession(state, this.accountId, this.at, ctx);
      return { session: state, matched };
    }

    logger?.info("Quick match waiting for opponent", {
      type: this.type,
      sessionId: state.id,
      accountId: this.accountId,
      at: this.at,
    });

    await bus.publish(accountChannel(this.accountId), {
      type: "waiting_for_opponent",
      sessionId: state.id,
      message: WAITING_MESSAGE,
    });

    return { session: state, matched };
  }
}
