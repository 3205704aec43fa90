import { describe, expect, it, vi } from "vitest";
import type { Queryable } from "../src/db/types.js";
import { createOrdersRepo } from "../src/db/repos/ordersRepo.js";
import { createUsedTransactionsRepo } from "../src/db/repos/usedTransactionsRepo.js";
import { createUsedLinksRepo } from "../src/db/repos/usedLinksRepo.js";
import { createCatalogRepo } from "../src/db/repos/catalogRepo.js";
import { createPgStore } from "../src/db/store.js";

function fakeDb() {
  const query = vi.fn();
  const db: Queryable = { query };
  return { db, query };
}

describe("ordersRepo", () => {
  it("inserts pending orders and returns the row", async () => {
    const { db, query } = fakeDb();
    const row = { id: "1", status: "pending" };
    query.mockResolvedValueOnce({ rows: [row], rowCount: 1 });
    const createdAt = new Date("2024-03-10T12:00:00Z");
    const expiresAt = new Date("2024-03-10T12:30:00Z");

    const result = await createOrdersRepo(db).createOrder({
      userId: "42",
      productId: "p1",
      locationId: "l1",
      priceFiat: "5000.00",
      fiatCurrency: "RUB",
      priceBtc: "0.00100000",
      btcRate: "5000000.00",
      bitcoinAddress: "bc1qshopaddress",
      paymentAmount: "0.00100137",
      jitterSats: 137,
      createdAt,
      expiresAt
    });

    expect(result).toBe(row);
    expect(query).toHaveBeenCalledWith(expect.stringContaining("VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,'pending',$11,$12)"), [
      "42",
      "p1",
      "l1",
      "5000.00",
      "RUB",
      "0.00100000",
      "5000000.00",
      "bc1qshopaddress",
      "0.00100137",
      137,
      createdAt,
      expiresAt
    ]);
  });

  it("fails loudly when the insert returns nothing", async () => {
    const { db, query } = fakeDb();
    query.mockResolvedValueOnce({ rows: [], rowCount: 0 });
    await expect(
      createOrdersRepo(db).createOrder({
        userId: "42",
        productId: "p1",
        locationId: "l1",
        priceFiat: "1.00",
        fiatCurrency: "RUB",
        priceBtc: "0.00000020",
        btcRate: "5000000.00",
        bitcoinAddress: "bc1qshopaddress",
        paymentAmount: "0.00000157",
        jitterSats: 137,
        createdAt: new Date(),
        expiresAt: new Date()
      })
    ).rejects.toThrow("Order insert returned no row");
  });

  it("completes only pending orders", async () => {
    const { db, query } = fakeDb();
    const repo = createOrdersRepo(db);
    const completedAt = new Date("2024-03-10T12:10:00Z");
    query.mockResolvedValueOnce({ rows: [], rowCount: 1 }).mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await expect(repo.completeOrder({ orderId: "7", contentLink: "https://files.test/a", txHash: "tx-1", completedAt })).resolves.toBe(true);
    await expect(repo.completeOrder({ orderId: "7", contentLink: "https://files.test/b", txHash: "tx-2", completedAt })).resolves.toBe(false);
    expect(query).toHaveBeenNthCalledWith(1, expect.stringContaining("WHERE id = $1 AND status = 'pending'"), [
      "7",
      "https://files.test/a",
      "tx-1",
      completedAt
    ]);
  });

  it("closes only pending orders", async () => {
    const { db, query } = fakeDb();
    const closedAt = new Date("2024-03-10T12:40:00Z");
    query.mockResolvedValueOnce({ rows: [], rowCount: 1 });

    await expect(createOrdersRepo(db).closeOrder({ orderId: "7", status: "expired", closedAt })).resolves.toBe(true);
    expect(query).toHaveBeenCalledWith(expect.stringContaining("SET status = $2, closed_at = $3"), ["7", "expired", closedAt]);
    expect(query).toHaveBeenCalledWith(expect.stringContaining("WHERE id = $1 AND status = 'pending'"), expect.anything());
  });

  it("selects overdue pending orders oldest first", async () => {
    const { db, query } = fakeDb();
    const now = new Date("2024-03-10T13:00:00Z");
    query.mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await createOrdersRepo(db).getExpiredPendingOrders(now, 200);
    expect(query).toHaveBeenCalledWith(expect.stringMatching(/status = 'pending' AND expires_at < \$1\s+ORDER BY expires_at ASC/), [
      now,
      200
    ]);
  });

  it("returns pending payment amounts for an address", async () => {
    const { db, query } = fakeDb();
    query.mockResolvedValueOnce({ rows: [{ payment_amount: "0.00100137" }, { payment_amount: "0.00100300" }], rowCount: 2 });

    await expect(createOrdersRepo(db).getPendingPaymentAmounts("bc1qshopaddress")).resolves.toEqual([
      "0.00100137",
      "0.00100300"
    ]);
  });

  it("maps stats counters to numbers", async () => {
    const { db, query } = fakeDb();
    const since = new Date("2024-03-10T00:00:00Z");
    query.mockResolvedValueOnce({
      rows: [
        {
          total_orders: "10",
          pending_orders: "2",
          completed_orders: "5",
          cancelled_orders: "1",
          expired_orders: "2",
          completed_revenue: "25000.00",
          orders_since: "4",
          completed_since: "3"
        }
      ],
      rowCount: 1
    });

    await expect(createOrdersRepo(db).getStats(since)).resolves.toEqual({
      totalOrders: 10,
      pendingOrders: 2,
      completedOrders: 5,
      cancelledOrders: 1,
      expiredOrders: 2,
      completedRevenueFiat: "25000.00",
      ordersSince: 4,
      completedSince: 3
    });
    expect(query).toHaveBeenCalledWith(expect.any(String), [since]);
  });
});

describe("usedTransactionsRepo", () => {
  it("reports whether the unique insert went through", async () => {
    const { db, query } = fakeDb();
    const repo = createUsedTransactionsRepo(db);
    query
      .mockResolvedValueOnce({ rows: [{ transaction_hash: "tx-1" }], rowCount: 1 })
      .mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await expect(repo.insertIfAbsent({ txHash: "tx-1", orderId: "1", amount: "0.00100137" })).resolves.toBe(true);
    await expect(repo.insertIfAbsent({ txHash: "tx-1", orderId: "2", amount: "0.00100137" })).resolves.toBe(false);
    expect(query).toHaveBeenCalledWith(expect.stringContaining("ON CONFLICT (transaction_hash) DO NOTHING"), [
      "tx-1",
      "2",
      "0.00100137"
    ]);
  });

  it("looks hashes up", async () => {
    const { db, query } = fakeDb();
    query.mockResolvedValueOnce({ rows: [{ "?column?": 1 }], rowCount: 1 });
    await expect(createUsedTransactionsRepo(db).isUsed("tx-1")).resolves.toBe(true);
  });

  it("finds the claimed hashes of a batch in one query", async () => {
    const { db, query } = fakeDb();
    const repo = createUsedTransactionsRepo(db);
    query.mockResolvedValueOnce({ rows: [{ transaction_hash: "tx-2" }], rowCount: 1 });

    await expect(repo.findUsed(["tx-1", "tx-2", "tx-3"])).resolves.toEqual(["tx-2"]);
    await expect(repo.findUsed([])).resolves.toEqual([]);
    expect(query).toHaveBeenCalledTimes(1);
    expect(query).toHaveBeenCalledWith(expect.stringContaining("WHERE transaction_hash = ANY($1)"), [
      ["tx-1", "tx-2", "tx-3"]
    ]);
  });
});

describe("usedLinksRepo", () => {
  it("claims a link per location", async () => {
    const { db, query } = fakeDb();
    query.mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await expect(createUsedLinksRepo(db).insertIfAbsent({ locationId: "l1", link: "https://files.test/a" })).resolves.toBe(false);
    expect(query).toHaveBeenCalledWith(expect.stringContaining("ON CONFLICT (location_id, link) DO NOTHING"), [
      "l1",
      "https://files.test/a"
    ]);
  });
});

describe("catalogRepo", () => {
  it("returns null for a missing location", async () => {
    const { db, query } = fakeDb();
    query.mockResolvedValueOnce({ rows: [], rowCount: 0 });
    await expect(createCatalogRepo(db).getLocationById("missing")).resolves.toBeNull();
  });
});

describe("pg store transactions", () => {
  function fakePool() {
    const clientQuery = vi.fn().mockResolvedValue({ rows: [], rowCount: 1 });
    const release = vi.fn();
    const connect = vi.fn().mockResolvedValue({ query: clientQuery, release });
    const query = vi.fn();
    return { pool: { query, connect }, clientQuery, release, query };
  }

  it("runs the work between BEGIN and COMMIT on one client", async () => {
    const { pool, clientQuery, release, query } = fakePool();
    const store = createPgStore(pool);

    await expect(
      store.transaction((tx) => tx.orders.closeOrder({ orderId: "7", status: "cancelled", closedAt: new Date() }))
    ).resolves.toBe(true);

    expect(clientQuery.mock.calls.map((c) => String(c[0]).trim().split(/\s+/)[0])).toEqual(["BEGIN", "UPDATE", "COMMIT"]);
    expect(release).toHaveBeenCalledTimes(1);
    expect(query).not.toHaveBeenCalled();
  });

  it("rolls back and rethrows when the work fails", async () => {
    const { pool, clientQuery, release } = fakePool();
    const store = createPgStore(pool);
    const err = new Error("no links");

    await expect(
      store.transaction(async () => {
        throw err;
      })
    ).rejects.toBe(err);
    expect(clientQuery.mock.calls.map((c) => c[0])).toEqual(["BEGIN", "ROLLBACK"]);
    expect(release).toHaveBeenCalledTimes(1);
  });
});
