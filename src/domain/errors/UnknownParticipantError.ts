import type { AccountId, SessionId } from "../typedefs.js";
import { SessionRejection } from "./SessionRejection.js";

export class UnknownParticipantError extends SessionRejection {
  readonly code = "UnknownParticipant" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly accountId: AccountId,
  ) {
    super(`Account ${accountId} is not a participant of session ${sessionId}`);
    this.name = "UnknownParticipantError";
  }
}
