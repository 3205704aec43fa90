import type { OrderRow, OrderStats, OrderStatus, Repositories, Store } from "../db/types.js";
import {
  AlreadyProcessedError,
  CatalogError,
  OrderNotFoundError,
  ResourceExhaustedError,
  TransactionClaimedError
} from "../core/errors.js";
import { logger, errorMessage } from "../core/logger.js";
import { OrderLedger } from "../orders/ledger.js";
import { InventoryAllocator } from "../inventory/allocator.js";
import { ReplayGuard } from "../payments/replayGuard.js";
import type { PaymentDisambiguator } from "../payments/jitter.js";
import type { PaymentMatcher } from "../payments/btc/matcher.js";
import type { RateSource } from "../payments/rates/oracle.js";
import { btcToSats, fiatToSats, satsToBtc } from "../payments/btc/units.js";

export type CheckOutcome =
  | { kind: "matched"; contentLink: string; txHash: string }
  | { kind: "not_yet" }
  | { kind: "already_processed"; status: OrderStatus; expiredNow?: true };

export type CancelOutcome = { kind: "cancelled" } | { kind: "already_processed"; status: OrderStatus };

export type FulfillOutcome = Exclude<CheckOutcome, { kind: "not_yet" }>;

export type EngineSettings = {
  bitcoinAddress: string;
  fiatCurrency: string;
  orderTtlMs: number;
};

export type AdminAlert = (text: string) => Promise<void>;

const MANUAL_TX_PREFIX = "manual:";
const DEFAULT_HISTORY_LIMIT = 20;

export class OrderEngine {
  private readonly store: Store;
  private readonly rates: RateSource;
  private readonly disambiguator: PaymentDisambiguator;
  private readonly matcher: PaymentMatcher;
  private readonly alertAdmin: AdminAlert | undefined;
  private readonly settings: EngineSettings;
  private readonly now: () => Date;
  // Orders the admin has already heard are paid but out of stock.
  private readonly reportedOutOfStock = new Set<string>();

  constructor(args: {
    store: Store;
    rates: RateSource;
    disambiguator: PaymentDisambiguator;
    matcher: PaymentMatcher;
    alertAdmin?: AdminAlert;
    settings: EngineSettings;
    now?: () => Date;
  }) {
    this.store = args.store;
    this.rates = args.rates;
    this.disambiguator = args.disambiguator;
    this.matcher = args.matcher;
    this.alertAdmin = args.alertAdmin;
    this.settings = args.settings;
    this.now = args.now ?? (() => new Date());
  }

  async createOrder(args: { userId: string; productId: string; locationId: string }): Promise<OrderRow> {
    const { userId, productId, locationId } = args;
    const product = await this.store.catalog.getProductById(productId);
    if (!product || !product.is_active) throw new CatalogError(`Product ${productId} is not available`);

    const location = await this.store.catalog.getLocationById(locationId);
    if (!location || !location.is_active || location.product_id !== productId) {
      throw new CatalogError(`Location ${locationId} is not available for product ${productId}`);
    }
    if ((await this.allocator(this.store).countAvailable(locationId)) === 0) {
      throw new ResourceExhaustedError(locationId);
    }

    const rate = await this.rates.getRate();
    const baseSats = fiatToSats(product.price_fiat, rate);
    if (baseSats <= 0n) throw new CatalogError(`Price ${product.price_fiat} of product ${productId} is below one satoshi`);

    const address = this.settings.bitcoinAddress;
    const pending = (await this.store.orders.getPendingPaymentAmounts(address)).map(btcToSats);
    const { jitterSats, expectedSats } = this.disambiguator.assign(baseSats, pending);

    const order = await this.ledger(this.store).create({
      userId,
      productId,
      locationId,
      priceFiat: product.price_fiat,
      fiatCurrency: this.settings.fiatCurrency,
      priceBtc: satsToBtc(baseSats),
      btcRate: rate.toFixed(2),
      bitcoinAddress: address,
      paymentAmount: satsToBtc(expectedSats),
      jitterSats
    });

    await this.alert(
      `New order ${order.id}\nuser: ${userId}\nproduct: ${product.name} / ${location.name}\n` +
        `price: ${product.price_fiat} ${this.settings.fiatCurrency}\namount: ${order.payment_amount} BTC`
    );
    return order;
  }

  getOrder(orderId: string): Promise<OrderRow | null> {
    return this.store.orders.getOrderById(orderId);
  }

  /**
   * Looks for the order's payment and, when found, claims the transaction, hands out a link
   * and completes the order in one database transaction.
   */
  async checkAndComplete(orderId: string): Promise<CheckOutcome> {
    const order = await this.store.orders.getOrderById(orderId);
    if (!order) throw new OrderNotFoundError(orderId);
    if (order.status !== "pending") return this.closed(orderId, order.status);

    if (order.expires_at.getTime() < this.now().getTime()) {
      const expired = await this.ledger(this.store).expire(orderId);
      this.reportedOutOfStock.delete(orderId);
      return expired.applied
        ? { kind: "already_processed", status: expired.status, expiredNow: true }
        : { kind: "already_processed", status: expired.status };
    }

    const txHash = await this.matcher.check({
      address: order.bitcoin_address,
      expectedSats: btcToSats(order.payment_amount),
      createdAt: order.created_at
    });
    if (!txHash) return { kind: "not_yet" };

    try {
      const contentLink = await this.store.transaction(async (tx) => {
        if (!(await new ReplayGuard(tx.usedTransactions).claim(txHash, orderId, order.payment_amount))) {
          throw new TransactionClaimedError(txHash);
        }
        return this.completeWithLink(tx, order, txHash);
      });
      this.reportedOutOfStock.delete(orderId);
      await this.alert(`Order ${orderId} paid\ntx: ${txHash}\namount: ${order.payment_amount} BTC`);
      return { kind: "matched", contentLink, txHash };
    } catch (e) {
      if (e instanceof TransactionClaimedError) {
        // The hash may have gone to this very order through a concurrent check.
        const current = await this.store.orders.getOrderById(orderId);
        return current && current.status !== "pending" ? this.closed(orderId, current.status) : { kind: "not_yet" };
      }
      if (e instanceof AlreadyProcessedError) return this.closed(orderId, e.status);
      if (e instanceof ResourceExhaustedError) await this.reportExhausted(order, txHash);
      throw e;
    }
  }

  async cancelOrder(orderId: string): Promise<CancelOutcome> {
    const result = await this.ledger(this.store).cancel(orderId);
    return result.applied ? { kind: "cancelled" } : { kind: "already_processed", status: result.status };
  }

  getAvailableLink(locationId: string): Promise<string | null> {
    return this.allocator(this.store).getAvailableLink(locationId);
  }

  countAvailableLinks(locationId: string): Promise<number> {
    return this.allocator(this.store).countAvailable(locationId);
  }

  /** Admin override: completes a pending order without an on-chain match. */
  async fulfillManually(orderId: string): Promise<FulfillOutcome> {
    const order = await this.store.orders.getOrderById(orderId);
    if (!order) throw new OrderNotFoundError(orderId);
    if (order.status !== "pending") return this.closed(orderId, order.status);

    const txHash = `${MANUAL_TX_PREFIX}${orderId}`;
    try {
      const contentLink = await this.store.transaction((tx) => this.completeWithLink(tx, order, txHash));
      this.reportedOutOfStock.delete(orderId);
      logger.warn(`engine: order ${orderId} fulfilled manually`);
      return { kind: "matched", contentLink, txHash };
    } catch (e) {
      if (e instanceof AlreadyProcessedError) return this.closed(orderId, e.status);
      if (e instanceof ResourceExhaustedError) await this.reportExhausted(order, txHash);
      throw e;
    }
  }

  getUserHistory(userId: string, limit = DEFAULT_HISTORY_LIMIT): Promise<OrderRow[]> {
    return this.store.orders.getCompletedOrdersByUser(userId, limit);
  }

  /** Totals plus counters since the start of the current UTC day. */
  getStats(now: Date = this.now()): Promise<OrderStats> {
    const startOfDay = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
    return this.store.orders.getStats(startOfDay);
  }

  private async completeWithLink(tx: Repositories, order: OrderRow, txHash: string): Promise<string> {
    const link = await this.allocator(tx).getAvailableLink(order.location_id);
    if (!link) throw new ResourceExhaustedError(order.location_id);

    const result = await this.ledger(tx).complete({ orderId: order.id, contentLink: link, txHash });
    if (!result.applied) throw new AlreadyProcessedError(order.id, result.status);
    return link;
  }

  private closed(orderId: string, status: OrderStatus): { kind: "already_processed"; status: OrderStatus } {
    this.reportedOutOfStock.delete(orderId);
    return { kind: "already_processed", status };
  }

  private async reportExhausted(order: OrderRow, txHash: string): Promise<void> {
    if (this.reportedOutOfStock.has(order.id)) {
      logger.debug(`engine: order ${order.id} is still waiting for links at location ${order.location_id}`);
      return;
    }
    this.reportedOutOfStock.add(order.id);
    logger.error(`engine: order ${order.id} is paid (${txHash}) but location ${order.location_id} has no links left`);
    await this.alert(
      `Out of stock: order ${order.id} paid (tx ${txHash}) but location ${order.location_id} has no links.\n` +
        `The order stays pending until links are added.`
    );
  }

  private ledger(repos: Repositories): OrderLedger {
    return new OrderLedger({ orders: repos.orders, ttlMs: this.settings.orderTtlMs, now: this.now });
  }

  private allocator(repos: Repositories): InventoryAllocator {
    return new InventoryAllocator(repos.catalog, repos.usedLinks);
  }

  private async alert(text: string): Promise<void> {
    if (!this.alertAdmin) return;
    try {
      await this.alertAdmin(text);
    } catch (e) {
      logger.error("engine: admin alert failed", errorMessage(e));
    }
  }
}
