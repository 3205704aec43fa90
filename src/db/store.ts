import type { Pool } from "pg";
import type { Queryable, Repositories, Store } from "./types.js";
import { createOrdersRepo } from "./repos/ordersRepo.js";
import { createUsedTransactionsRepo } from "./repos/usedTransactionsRepo.js";
import { createUsedLinksRepo } from "./repos/usedLinksRepo.js";
import { createCatalogRepo } from "./repos/catalogRepo.js";

export function createRepositories(db: Queryable): Repositories {
  return {
    orders: createOrdersRepo(db),
    usedTransactions: createUsedTransactionsRepo(db),
    usedLinks: createUsedLinksRepo(db),
    catalog: createCatalogRepo(db)
  };
}

export function createPgStore(pool: Pick<Pool, "query" | "connect">): Store {
  return {
    ...createRepositories(pool),

    async transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        const result = await work(createRepositories(client));
        await client.query("COMMIT");
        return result;
      } catch (e) {
        await client.query("ROLLBACK").catch(() => undefined);
        throw e;
      } finally {
        client.release();
      }
    }
  };
}
