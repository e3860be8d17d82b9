import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { AccountId, SessionId } from "../typedefs.js";

const WHITESPACE_PATTERN = /\s/;

export function isValidAccountId(id: unknown): id is AccountId {
  return typeof id === "number" && Number.isSafeInteger(id) && id > 0;
}

export function isValidSessionId(id: unknown): id is SessionId {
  return typeof id === "string" && id.length > 0 && !WHITESPACE_PATTERN.test(id);
}

export function assertCommandInput(
  sessionId: SessionId | undefined,
  accountId: AccountId,
): void {
  const issues: string[] = [];

  if (sessionId !== undefined && !isValidSessionId(sessionId)) {
    issues.push("Session identifier must be a non-empty string without whitespace");
  }

  if (!isValidAccountId(accountId)) {
    issues.push("Account identifier must be a positive integer");
  }

  if (issues.length > 0) {
    throw GameCommandInputError.because(issues);
  }
}
