import type { AccountId } from "../typedefs.js";
import { SessionRejection } from "./SessionRejection.js";

export class AccountNotFoundError extends SessionRejection {
  readonly code = "AccountNotFound" as const;

  constructor(public readonly accountId: AccountId) {
    super(`Account not found: ${accountId}`);
    this.name = "AccountNotFoundError";
  }
}
