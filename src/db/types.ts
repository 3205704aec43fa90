import type { Pool } from "pg";

/** Anything that runs a query: the pool itself, or a client checked out for a transaction. */
export type Queryable = Pick<Pool, "query">;

export type OrderStatus = "pending" | "completed" | "cancelled" | "expired";

// bigint/numeric columns come back from pg as strings.
export type OrderRow = {
  id: string;
  user_id: string;
  product_id: string;
  location_id: string;
  price_fiat: string;
  fiat_currency: string;
  price_btc: string; // base amount, no jitter
  btc_rate: string;
  bitcoin_address: string;
  payment_amount: string; // expected amount: base + jitter
  jitter_sats: number;
  status: OrderStatus;
  content_link: string | null;
  transaction_hash: string | null;
  created_at: Date;
  expires_at: Date;
  completed_at: Date | null;
  closed_at: Date | null;
};

export type ProductRow = {
  id: string;
  name: string;
  price_fiat: string;
  is_active: boolean;
};

export type LocationRow = {
  id: string;
  product_id: string;
  name: string;
  content_links: string[];
  is_active: boolean;
};

export type UsedTransactionRow = {
  transaction_hash: string;
  order_id: string;
  amount: string;
  used_at: Date;
};

export type NewOrder = {
  userId: string;
  productId: string;
  locationId: string;
  priceFiat: string;
  fiatCurrency: string;
  priceBtc: string;
  btcRate: string;
  bitcoinAddress: string;
  paymentAmount: string;
  jitterSats: number;
  createdAt: Date;
  expiresAt: Date;
};

export type OrderStats = {
  totalOrders: number;
  pendingOrders: number;
  completedOrders: number;
  cancelledOrders: number;
  expiredOrders: number;
  completedRevenueFiat: string;
  ordersSince: number;
  completedSince: number;
};

export type ClosedStatus = Extract<OrderStatus, "cancelled" | "expired">;

export type OrdersRepo = {
  createOrder(args: NewOrder): Promise<OrderRow>;
  getOrderById(orderId: string): Promise<OrderRow | null>;
  /** Conditioned on status = 'pending'. Returns false when no row was updated. */
  completeOrder(args: { orderId: string; contentLink: string; txHash: string; completedAt: Date }): Promise<boolean>;
  /** Conditioned on status = 'pending'. Returns false when no row was updated. */
  closeOrder(args: { orderId: string; status: ClosedStatus; closedAt: Date }): Promise<boolean>;
  getPendingOrders(limit: number): Promise<OrderRow[]>;
  getExpiredPendingOrders(now: Date, limit: number): Promise<OrderRow[]>;
  getPendingPaymentAmounts(bitcoinAddress: string): Promise<string[]>;
  getCompletedOrdersByUser(userId: string, limit: number): Promise<OrderRow[]>;
  getStats(since: Date): Promise<OrderStats>;
};

export type UsedTransactionsRepo = {
  isUsed(txHash: string): Promise<boolean>;
  /** The subset of `txHashes` already claimed, in one round trip. */
  findUsed(txHashes: readonly string[]): Promise<string[]>;
  /** Unique insert keyed by transaction hash. Returns false on conflict. */
  insertIfAbsent(args: { txHash: string; orderId: string; amount: string }): Promise<boolean>;
};

export type UsedLinksRepo = {
  getUsedLinks(locationId: string): Promise<string[]>;
  /** Unique insert keyed by (location, link). Returns false on conflict. */
  insertIfAbsent(args: { locationId: string; link: string }): Promise<boolean>;
};

export type CatalogRepo = {
  getProductById(productId: string): Promise<ProductRow | null>;
  getLocationById(locationId: string): Promise<LocationRow | null>;
};

export type Repositories = {
  orders: OrdersRepo;
  usedTransactions: UsedTransactionsRepo;
  usedLinks: UsedLinksRepo;
  catalog: CatalogRepo;
};

export type Store = Repositories & {
  /** Runs `work` in one database transaction; a thrown error rolls every write back. */
  transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T>;
};
