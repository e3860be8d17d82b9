import type { SessionId } from "../typedefs.js";

/**
 * Raised when the match record could not be committed after the session was
 * already finalized in memory. Not a rejection: the live result stands.
 */
export class PersistenceFailureError extends Error {
  readonly code = "PersistenceFailure" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly reason: unknown,
  ) {
    super(`Failed to persist match record for session ${sessionId}`);
    this.name = "PersistenceFailureError";
  }
}
