import { describe, expect, it } from "vitest";
import { OrderLedger, type CreateOrderInput } from "../src/orders/ledger.js";
import { canTransition, isTerminal } from "../src/orders/stateMachine.js";
import { InvalidStateError, OrderNotFoundError } from "../src/core/errors.js";
import { MemoryStore } from "./support/memoryStore.js";

const TTL = 30 * 60_000;
const now = new Date("2024-03-10T12:00:00Z");

const input: CreateOrderInput = {
  userId: "42",
  productId: "p1",
  locationId: "l1",
  priceFiat: "5000.00",
  fiatCurrency: "RUB",
  priceBtc: "0.00100000",
  btcRate: "5000000.00",
  bitcoinAddress: "bc1qshopaddress",
  paymentAmount: "0.00100137",
  jitterSats: 137
};

function setup() {
  const store = new MemoryStore();
  const ledger = new OrderLedger({ orders: store.orders, ttlMs: TTL, now: () => now });
  return { store, ledger };
}

describe("order state machine", () => {
  it("only leaves pending", () => {
    expect(canTransition("pending", "completed")).toBe(true);
    expect(canTransition("pending", "expired")).toBe(true);
    expect(canTransition("completed", "cancelled")).toBe(false);
    expect(canTransition("expired", "completed")).toBe(false);
    expect(isTerminal("cancelled")).toBe(true);
    expect(isTerminal("pending")).toBe(false);
  });
});

describe("OrderLedger", () => {
  it("creates pending orders that expire after the TTL", async () => {
    const { ledger } = setup();
    const order = await ledger.create(input);

    expect(order.status).toBe("pending");
    expect(order.created_at).toEqual(now);
    expect(order.expires_at).toEqual(new Date("2024-03-10T12:30:00Z"));
  });

  it("completes once and reports the status afterwards", async () => {
    const { store, ledger } = setup();
    const order = await ledger.create(input);

    await expect(ledger.complete({ orderId: order.id, contentLink: "https://files.test/a", txHash: "tx-1" })).resolves.toEqual({
      applied: true,
      status: "completed"
    });
    await expect(ledger.complete({ orderId: order.id, contentLink: "https://files.test/b", txHash: "tx-2" })).resolves.toEqual({
      applied: false,
      status: "completed"
    });
    expect(store.orderRows.get(order.id)).toMatchObject({ content_link: "https://files.test/a", transaction_hash: "tx-1" });
  });

  it("cancels pending orders and refuses to cancel completed ones", async () => {
    const { ledger } = setup();
    const a = await ledger.create(input);
    const b = await ledger.create(input);

    await expect(ledger.cancel(a.id)).resolves.toEqual({ applied: true, status: "cancelled" });
    await expect(ledger.cancel(a.id)).resolves.toEqual({ applied: false, status: "cancelled" });

    await ledger.complete({ orderId: b.id, contentLink: "https://files.test/a", txHash: "tx-1" });
    await expect(ledger.cancel(b.id)).rejects.toBeInstanceOf(InvalidStateError);
  });

  it("does not expire an order that already completed", async () => {
    const { ledger } = setup();
    const order = await ledger.create(input);
    await ledger.complete({ orderId: order.id, contentLink: "https://files.test/a", txHash: "tx-1" });

    await expect(ledger.expire(order.id)).resolves.toEqual({ applied: false, status: "completed" });
  });

  it("lets one of two racing transitions win", async () => {
    const { store, ledger } = setup();
    const order = await ledger.create(input);

    const [completed, expired] = await Promise.all([
      ledger.complete({ orderId: order.id, contentLink: "https://files.test/a", txHash: "tx-1" }),
      ledger.expire(order.id)
    ]);

    expect([completed.applied, expired.applied].filter(Boolean)).toHaveLength(1);
    expect(completed.status).toBe(expired.status);
    expect(store.orderRows.get(order.id)?.status).toBe(completed.status);
  });

  it("raises OrderNotFoundError for unknown orders", async () => {
    const { ledger } = setup();
    await expect(ledger.expire("999")).rejects.toBeInstanceOf(OrderNotFoundError);
  });
});
