import type { OrdersRepo } from "../db/types.js";
import type { OrderEngine } from "../engine/orderEngine.js";
import type { Notifier } from "../bot/notifier.js";
import { texts } from "../bot/texts.js";
import { ResourceExhaustedError } from "../core/errors.js";
import { logger, errorMessage } from "../core/logger.js";

export type PollResult = {
  checked: number;
  matched: number;
  failed: number;
};

export type PaymentPoller = {
  tick(): Promise<PollResult | null>;
};

export function createPaymentPoller(deps: {
  engine: Pick<OrderEngine, "checkAndComplete">;
  orders: Pick<OrdersRepo, "getPendingOrders">;
  notifier?: Notifier;
  alertAdmin?: (text: string) => Promise<void>;
  batchSize: number;
}): PaymentPoller {
  let running = false;
  // Buyers hear about a stuck paid order once, not on every poll.
  const toldOutOfStock = new Set<string>();

  async function tell(userId: string, text: string): Promise<void> {
    if (!deps.notifier) return;
    try {
      await deps.notifier.notifyUser(userId, text);
    } catch (e) {
      logger.warn(`payments-poller: could not notify user ${userId}`, errorMessage(e));
    }
  }

  // The pending list is complete here, so anything missing from it has left pending.
  function forgetClosed(pendingIds: string[]): void {
    const pending = new Set(pendingIds);
    for (const id of toldOutOfStock) {
      if (!pending.has(id)) toldOutOfStock.delete(id);
    }
  }

  async function tick(): Promise<PollResult | null> {
    if (running) return null;
    running = true;
    try {
      const orders = await deps.orders.getPendingOrders(deps.batchSize);
      if (orders.length) logger.info(`payments-poller: checking ${orders.length} pending order(s)`);
      if (orders.length < deps.batchSize) forgetClosed(orders.map((o) => o.id));

      const result: PollResult = { checked: 0, matched: 0, failed: 0 };
      for (const order of orders) {
        result.checked++;
        try {
          const outcome = await deps.engine.checkAndComplete(order.id);
          if (outcome.kind === "matched") {
            result.matched++;
            toldOutOfStock.delete(order.id);
            await tell(order.user_id, texts.orderCompleted(order.id, outcome.contentLink));
          } else if (outcome.kind === "already_processed") {
            toldOutOfStock.delete(order.id);
            // Whoever made the expiry tells the buyer; the sweeper may have beaten us to it.
            if (outcome.expiredNow) await tell(order.user_id, texts.orderExpired(order.id));
          }
        } catch (e) {
          result.failed++;
          if (e instanceof ResourceExhaustedError) {
            if (!toldOutOfStock.has(order.id)) {
              toldOutOfStock.add(order.id);
              await tell(order.user_id, texts.paidButOutOfStock);
            }
            continue;
          }
          logger.error(`payments-poller: failed processing order ${order.id}`, errorMessage(e));
          await deps.alertAdmin?.(`payments-poller error for order ${order.id}: ${errorMessage(e)}`);
        }
      }
      return result;
    } finally {
      running = false;
    }
  }

  return { tick };
}
