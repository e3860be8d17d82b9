import type { SessionState } from "../ports/SessionGateway.js";

export class InvalidSessionStateError extends Error {
  constructor(
    public readonly reason: string,
    public readonly state: SessionState,
  ) {
    super(`Invalid session state: ${reason}`);
    this.name = "InvalidSessionStateError";
  }
}
