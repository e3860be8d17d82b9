import type { AccountId, SessionId } from "../typedefs.js";
import { SessionRejection } from "./SessionRejection.js";

export class OpponentUnavailableError extends SessionRejection {
  readonly code = "OpponentUnavailable" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly opponentId: AccountId,
  ) {
    super(`Opponent ${opponentId} of session ${sessionId} is no longer connected`);
    this.name = "OpponentUnavailableError";
  }
}
