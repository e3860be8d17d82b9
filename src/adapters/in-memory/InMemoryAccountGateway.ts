import { AccountNotFoundError } from "../../domain/errors/AccountNotFoundError.js";
import type { Account, AccountGateway, MatchRecord } from "../../domain/ports/AccountGateway.js";
import type { AccountId, SessionId, TimePoint } from "../../domain/typedefs.js";

export class InMemoryAccountGateway implements AccountGateway {
  #accounts = new Map<AccountId, Account>();
  #matches = new Map<SessionId, MatchRecord>();
  #nextId = 1;

  constructor(private readonly defaultRating: number) {}

  async loadAccount(accountId: AccountId): Promise<Account> {
    return { ...this.#require(accountId) };
  }

  async createAccount(name: string, createdAt: TimePoint): Promise<Account> {
    const account: Account = {
      id: this.#nextId++,
      name,
      rating: this.defaultRating,
      gamesPlayed: 0,
      gamesWon: 0,
      gamesLost: 0,
      gamesTied: 0,
      createdAt,
    };
    this.#accounts.set(account.id, account);
    return { ...account };
  }

  /** Insert or replace an account as-is. Used to restore fixtures. */
  seed(account: Account): Account {
    this.#accounts.set(account.id, { ...account });
    this.#nextId = Math.max(this.#nextId, account.id + 1);
    return { ...account };
  }

  async listLeaderboard(search?: string): Promise<Account[]> {
    const needle = search?.trim().toLowerCase() ?? "";
    return [...this.#accounts.values()]
      .filter((account) => needle === "" || account.name.toLowerCase().includes(needle))
      .sort((a, b) => b.rating - a.rating || a.id - b.id)
      .map((account) => ({ ...account }));
  }

  async commitMatch(record: MatchRecord): Promise<void> {
    const alreadyCommitted = this.#matches.has(record.sessionId);

    if (record.status === "completed" && !alreadyCommitted) {
      const accountB = record.accountB;
      if (accountB === undefined) {
        throw new Error(`Completed match ${record.sessionId} has no second account`);
      }

      const playerA = this.#require(record.accountA);
      const playerB = this.#require(accountB);

      this.#applyResult(playerA, record.ratingDeltaA, record.outcome === "A", record.outcome === "B");
      this.#applyResult(playerB, record.ratingDeltaB, record.outcome === "B", record.outcome === "A");
    }

    this.#matches.set(record.sessionId, { ...record });
  }

  async loadMatchRecord(sessionId: SessionId): Promise<MatchRecord | undefined> {
    const record = this.#matches.get(sessionId);
    return record ? { ...record } : undefined;
  }

  #applyResult(account: Account, delta: number, won: boolean, lost: boolean): void {
    account.rating += delta;
    account.gamesPlayed += 1;
    if (won) account.gamesWon += 1;
    else if (lost) account.gamesLost += 1;
    else account.gamesTied += 1;
  }

  #require(accountId: AccountId): Account {
    const account = this.#accounts.get(accountId);
    if (!account) throw new AccountNotFoundError(accountId);
    return account;
  }
}
