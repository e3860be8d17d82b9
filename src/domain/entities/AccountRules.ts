import type { Account } from "../ports/AccountGateway.js";

/** Percentage of decided games won, to one decimal. Ties do not count. */
export function winRate(account: Pick<Account, "gamesWon" | "gamesLost">): number {
  const decided = account.gamesWon + account.gamesLost;
  if (decided === 0) return 0;
  return Math.round((account.gamesWon / decided) * 1000) / 10;
}
