import type { SessionId, SessionStatus } from "../typedefs.js";
import { SessionRejection } from "./SessionRejection.js";

type StateCode = "AlreadyActive" | "NotActive" | "NotCompleted";

const DESCRIPTIONS: Record<StateCode, string> = {
  AlreadyActive: "is no longer waiting for an opponent",
  NotActive: "is not active",
  NotCompleted: "has not been completed",
};

export class SessionStateError extends SessionRejection {
  constructor(
    public readonly code: StateCode,
    public readonly sessionId: SessionId,
    public readonly status: SessionStatus,
  ) {
    super(`Session ${sessionId} ${DESCRIPTIONS[code]} (status: ${status})`);
    this.name = "SessionStateError";
  }
}
