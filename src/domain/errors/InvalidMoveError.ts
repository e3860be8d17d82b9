import { MOVES } from "../entities/OutcomeRules.js";
import { SessionRejection } from "./SessionRejection.js";

export class InvalidMoveError extends SessionRejection {
  readonly code = "InvalidMove" as const;

  constructor(public readonly move: unknown) {
    super(`Invalid move: ${String(move)}. Expected one of ${MOVES.join(", ")}`);
    this.name = "InvalidMoveError";
  }
}
