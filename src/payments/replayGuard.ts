import type { UsedTransactionsRepo } from "../db/types.js";
import { logger } from "../core/logger.js";

/**
 * One on-chain transaction pays for at most one order. The unique key on used_transactions decides
 * races: when two orders match the same hash, only one insert goes through.
 */
export class ReplayGuard {
  constructor(private readonly usedTransactions: UsedTransactionsRepo) {}

  isClaimed(txHash: string): Promise<boolean> {
    return this.usedTransactions.isUsed(txHash);
  }

  async claimedAmong(txHashes: readonly string[]): Promise<Set<string>> {
    return new Set(await this.usedTransactions.findUsed(txHashes));
  }

  async claim(txHash: string, orderId: string, amount: string): Promise<boolean> {
    const claimed = await this.usedTransactions.insertIfAbsent({ txHash, orderId, amount });
    if (!claimed) logger.warn(`replay-guard: tx ${txHash} is already used, order ${orderId} cannot take it`);
    return claimed;
  }
}
