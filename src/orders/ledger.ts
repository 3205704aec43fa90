import type { ClosedStatus, NewOrder, OrderRow, OrderStatus, OrdersRepo } from "../db/types.js";
import { InvalidStateError, OrderNotFoundError } from "../core/errors.js";
import { logger } from "../core/logger.js";
import { canTransition } from "./stateMachine.js";

export type LedgerResult = {
  /** False when the order had already left `pending` before this write. */
  applied: boolean;
  status: OrderStatus;
};

export type CreateOrderInput = Omit<NewOrder, "createdAt" | "expiresAt">;

/**
 * Order lifecycle on top of the orders table. Every transition is a single UPDATE
 * conditioned on status = 'pending'; a write that matches no row reports the status
 * the order actually has.
 */
export class OrderLedger {
  private readonly orders: OrdersRepo;
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(args: { orders: OrdersRepo; ttlMs: number; now?: () => Date }) {
    this.orders = args.orders;
    this.ttlMs = args.ttlMs;
    this.now = args.now ?? (() => new Date());
  }

  async create(input: CreateOrderInput): Promise<OrderRow> {
    const createdAt = this.now();
    const expiresAt = new Date(createdAt.getTime() + this.ttlMs);
    const order = await this.orders.createOrder({ ...input, createdAt, expiresAt });
    logger.info(
      `ledger: order ${order.id} created user=${order.user_id} amount=${order.payment_amount} BTC expires=${expiresAt.toISOString()}`
    );
    return order;
  }

  async complete(args: { orderId: string; contentLink: string; txHash: string }): Promise<LedgerResult> {
    const applied = await this.orders.completeOrder({ ...args, completedAt: this.now() });
    if (applied) {
      logger.info(`ledger: order ${args.orderId} completed tx=${args.txHash}`);
      return { applied, status: "completed" };
    }
    return this.notApplied(args.orderId, "completed");
  }

  async cancel(orderId: string): Promise<LedgerResult> {
    const applied = await this.orders.closeOrder({ orderId, status: "cancelled", closedAt: this.now() });
    if (applied) {
      logger.info(`ledger: order ${orderId} cancelled`);
      return { applied, status: "cancelled" };
    }
    const result = await this.notApplied(orderId, "cancelled");
    // Completed orders stay completed.
    if (result.status === "completed") {
      logger.warn(`ledger: refused to cancel completed order ${orderId}`);
      throw new InvalidStateError(orderId, result.status, "cancelled");
    }
    return result;
  }

  async expire(orderId: string): Promise<LedgerResult> {
    return this.close(orderId, "expired");
  }

  private async close(orderId: string, status: ClosedStatus): Promise<LedgerResult> {
    const applied = await this.orders.closeOrder({ orderId, status, closedAt: this.now() });
    if (applied) {
      logger.info(`ledger: order ${orderId} ${status}`);
      return { applied, status };
    }
    return this.notApplied(orderId, status);
  }

  private async notApplied(orderId: string, target: OrderStatus): Promise<LedgerResult> {
    const current = await this.orders.getOrderById(orderId);
    if (!current) throw new OrderNotFoundError(orderId);
    if (canTransition(current.status, target)) {
      // Still pending, so the conditioned write should have matched.
      logger.warn(`ledger: ${target} of order ${orderId} matched no row while status is ${current.status}`);
    } else {
      logger.debug(`ledger: order ${orderId} already ${current.status}, ${target} skipped`);
    }
    return { applied: false, status: current.status };
  }
}
