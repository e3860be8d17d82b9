import type { SessionId, Slot } from "../typedefs.js";
import { SessionRejection } from "./SessionRejection.js";

export class AlreadyChosenError extends SessionRejection {
  readonly code = "AlreadyChosen" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly slot: Slot,
  ) {
    super(`Slot ${slot} of session ${sessionId} has already chosen`);
    this.name = "AlreadyChosenError";
  }
}
