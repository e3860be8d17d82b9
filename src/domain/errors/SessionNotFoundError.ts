import type { SessionId } from "../typedefs.js";
import { SessionRejection } from "./SessionRejection.js";

export class SessionNotFoundError extends SessionRejection {
  readonly code = "SessionNotFound" as const;

  constructor(public readonly sessionId: SessionId) {
    super(`Session not found: ${sessionId}`);
    this.name = "SessionNotFoundError";
  }
}
