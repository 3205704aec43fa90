import type { Queryable, UsedTransactionsRepo } from "../types.js";

export function createUsedTransactionsRepo(db: Queryable): UsedTransactionsRepo {
  return {
    async isUsed(txHash: string): Promise<boolean> {
      const q = await db.query("SELECT 1 FROM used_transactions WHERE transaction_hash = $1 LIMIT 1", [txHash]);
      return q.rows.length > 0;
    },

    async findUsed(txHashes): Promise<string[]> {
      if (txHashes.length === 0) return [];
      const q = await db.query<{ transaction_hash: string }>(
        "SELECT transaction_hash FROM used_transactions WHERE transaction_hash = ANY($1)",
        [txHashes]
      );
      return q.rows.map((r) => r.transaction_hash);
    },

    async insertIfAbsent(args): Promise<boolean> {
      const q = await db.query<{ transaction_hash: string }>(
        `
        INSERT INTO used_transactions (transaction_hash, order_id, amount)
        VALUES ($1,$2,$3)
        ON CONFLICT (transaction_hash) DO NOTHING
        RETURNING transaction_hash
        `,
        [args.txHash, args.orderId, args.amount]
      );
      return q.rows.length === 1;
    }
  };
}
