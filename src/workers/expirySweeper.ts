import type { OrderRow, OrdersRepo } from "../db/types.js";
import type { OrderLedger } from "../orders/ledger.js";
import type { Notifier } from "../bot/notifier.js";
import { texts } from "../bot/texts.js";
import { asyncPool } from "../core/async.js";
import { logger, errorMessage } from "../core/logger.js";

export type SweepResult = {
  found: number;
  expired: number;
  failed: number;
};

export type ExpirySweeper = {
  /** One sweep. Resolves to null when the previous sweep is still running. */
  tick(): Promise<SweepResult | null>;
  start(intervalMs: number): void;
  stop(): void;
};

type Outcome = "expired" | "skipped" | "failed";

export function createExpirySweeper(deps: {
  orders: Pick<OrdersRepo, "getExpiredPendingOrders">;
  ledger: Pick<OrderLedger, "expire">;
  notifier?: Notifier;
  batchSize: number;
  concurrency: number;
  now?: () => Date;
}): ExpirySweeper {
  const now = deps.now ?? (() => new Date());
  let running = false;
  let timer: ReturnType<typeof setInterval> | null = null;

  async function expireOne(order: OrderRow): Promise<Outcome> {
    try {
      const result = await deps.ledger.expire(order.id);
      if (!result.applied) return "skipped";
    } catch (e) {
      logger.error(`expiry-sweeper: failed to expire order ${order.id}`, errorMessage(e));
      return "failed";
    }

    if (deps.notifier) {
      try {
        await deps.notifier.notifyUser(order.user_id, texts.orderExpired(order.id));
      } catch (e) {
        logger.warn(`expiry-sweeper: could not notify user ${order.user_id} about order ${order.id}`, errorMessage(e));
      }
    }
    return "expired";
  }

  async function tick(): Promise<SweepResult | null> {
    if (running) {
      logger.debug("expiry-sweeper: previous sweep still running, skipping");
      return null;
    }
    running = true;
    try {
      const orders = await deps.orders.getExpiredPendingOrders(now(), deps.batchSize);
      if (!orders.length) return { found: 0, expired: 0, failed: 0 };

      const outcomes = await asyncPool(deps.concurrency, orders, expireOne);
      const result: SweepResult = {
        found: orders.length,
        expired: outcomes.filter((o) => o === "expired").length,
        failed: outcomes.filter((o) => o === "failed").length
      };
      logger.info(`expiry-sweeper: expired ${result.expired}/${result.found} order(s), ${result.failed} failed`);
      return result;
    } finally {
      running = false;
    }
  }

  function runTick(): void {
    tick().catch((e) => logger.error("expiry-sweeper: sweep failed", errorMessage(e)));
  }

  return {
    tick,
    start(intervalMs: number) {
      if (timer) return;
      timer = setInterval(runTick, intervalMs);
      runTick();
    },
    stop() {
      if (timer) clearInterval(timer);
      timer = null;
    }
  };
}
