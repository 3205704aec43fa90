import type { NewOrder, OrderRow, OrderStats, OrdersRepo, Queryable } from "../types.js";

type StatsRow = {
  total_orders: string;
  pending_orders: string;
  completed_orders: string;
  cancelled_orders: string;
  expired_orders: string;
  completed_revenue: string;
  orders_since: string;
  completed_since: string;
};

export function createOrdersRepo(db: Queryable): OrdersRepo {
  return {
    async createOrder(args: NewOrder): Promise<OrderRow> {
      const q = await db.query<OrderRow>(
        `
        INSERT INTO orders (
          user_id, product_id, location_id, price_fiat, fiat_currency, price_btc, btc_rate,
          bitcoin_address, payment_amount, jitter_sats, status, created_at, expires_at
        )
        VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,'pending',$11,$12)
        RETURNING *
        `,
        [
          args.userId,
          args.productId,
          args.locationId,
          args.priceFiat,
          args.fiatCurrency,
          args.priceBtc,
          args.btcRate,
          args.bitcoinAddress,
          args.paymentAmount,
          args.jitterSats,
          args.createdAt,
          args.expiresAt
        ]
      );
      const row = q.rows[0];
      if (!row) throw new Error("Order insert returned no row");
      return row;
    },

    async getOrderById(orderId: string): Promise<OrderRow | null> {
      const q = await db.query<OrderRow>("SELECT * FROM orders WHERE id = $1 LIMIT 1", [orderId]);
      return q.rows[0] ?? null;
    },

    async completeOrder(args): Promise<boolean> {
      const q = await db.query(
        `
        UPDATE orders
        SET status = 'completed',
            content_link = $2,
            transaction_hash = $3,
            completed_at = $4
        WHERE id = $1 AND status = 'pending'
        `,
        [args.orderId, args.contentLink, args.txHash, args.completedAt]
      );
      return q.rowCount === 1;
    },

    async closeOrder(args): Promise<boolean> {
      const q = await db.query(
        `
        UPDATE orders
        SET status = $2, closed_at = $3
        WHERE id = $1 AND status = 'pending'
        `,
        [args.orderId, args.status, args.closedAt]
      );
      return q.rowCount === 1;
    },

    async getPendingOrders(limit: number): Promise<OrderRow[]> {
      const q = await db.query<OrderRow>(
        "SELECT * FROM orders WHERE status = 'pending' ORDER BY created_at ASC LIMIT $1",
        [limit]
      );
      return q.rows;
    },

    async getExpiredPendingOrders(now: Date, limit: number): Promise<OrderRow[]> {
      const q = await db.query<OrderRow>(
        `
        SELECT * FROM orders
        WHERE status = 'pending' AND expires_at < $1
        ORDER BY expires_at ASC
        LIMIT $2
        `,
        [now, limit]
      );
      return q.rows;
    },

    async getPendingPaymentAmounts(bitcoinAddress: string): Promise<string[]> {
      const q = await db.query<{ payment_amount: string }>(
        "SELECT payment_amount FROM orders WHERE status = 'pending' AND bitcoin_address = $1",
        [bitcoinAddress]
      );
      return q.rows.map((r) => r.payment_amount);
    },

    async getCompletedOrdersByUser(userId: string, limit: number): Promise<OrderRow[]> {
      const q = await db.query<OrderRow>(
        `
        SELECT * FROM orders
        WHERE user_id = $1 AND status = 'completed'
        ORDER BY completed_at DESC
        LIMIT $2
        `,
        [userId, limit]
      );
      return q.rows;
    },

    async getStats(since: Date): Promise<OrderStats> {
      const q = await db.query<StatsRow>(
        `
        SELECT
          count(*)::text AS total_orders,
          count(*) FILTER (WHERE status = 'pending')::text AS pending_orders,
          count(*) FILTER (WHERE status = 'completed')::text AS completed_orders,
          count(*) FILTER (WHERE status = 'cancelled')::text AS cancelled_orders,
          count(*) FILTER (WHERE status = 'expired')::text AS expired_orders,
          COALESCE(sum(price_fiat) FILTER (WHERE status = 'completed'), 0)::text AS completed_revenue,
          count(*) FILTER (WHERE created_at >= $1)::text AS orders_since,
          count(*) FILTER (WHERE status = 'completed' AND completed_at >= $1)::text AS completed_since
        FROM orders
        `,
        [since]
      );
      const r = q.rows[0];
      return {
        totalOrders: Number(r?.total_orders ?? 0),
        pendingOrders: Number(r?.pending_orders ?? 0),
        completedOrders: Number(r?.completed_orders ?? 0),
        cancelledOrders: Number(r?.cancelled_orders ?? 0),
        expiredOrders: Number(r?.expired_orders ?? 0),
        completedRevenueFiat: r?.completed_revenue ?? "0",
        ordersSince: Number(r?.orders_since ?? 0),
        completedSince: Number(r?.completed_since ?? 0)
      };
    }
  };
}
