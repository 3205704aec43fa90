import type {
  CatalogRepo,
  LocationRow,
  NewOrder,
  OrderRow,
  OrderStats,
  OrdersRepo,
  ProductRow,
  Repositories,
  Store,
  UsedLinksRepo,
  UsedTransactionRow,
  UsedTransactionsRepo
} from "../../src/db/types.js";
import { FIAT_DECIMALS, decimalToUnits, unitsToDecimal } from "../../src/payments/btc/units.js";

type Undo = () => void;

// Every call yields to the event loop before touching state, so concurrent callers interleave
// the way they would against a real database. Unique inserts and conditioned updates are
// checked and applied in one synchronous step after the yield.
const yieldTurn = () => new Promise<void>((resolve) => setImmediate(resolve));

export class MemoryStore implements Store {
  readonly products = new Map<string, ProductRow>();
  readonly locations = new Map<string, LocationRow>();
  readonly orderRows = new Map<string, OrderRow>();
  readonly usedTxs = new Map<string, UsedTransactionRow>();
  readonly usedLinkSets = new Map<string, Set<string>>();
  private nextOrderId = 1;
  private lastTransaction: Promise<void> = Promise.resolve();

  readonly orders: OrdersRepo;
  readonly usedTransactions: UsedTransactionsRepo;
  readonly usedLinks: UsedLinksRepo;
  readonly catalog: CatalogRepo;

  constructor() {
    const repos = this.repositories(null);
    this.orders = repos.orders;
    this.usedTransactions = repos.usedTransactions;
    this.usedLinks = repos.usedLinks;
    this.catalog = repos.catalog;
  }

  // Transactions run one after another: a conflicting unique insert waits for the other
  // transaction's commit or rollback, as it would on a row lock.
  async transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T> {
    const previous = this.lastTransaction;
    let release = () => {};
    this.lastTransaction = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;

    const journal: Undo[] = [];
    try {
      return await work(this.repositories(journal));
    } catch (e) {
      for (const undo of journal.reverse()) undo();
      throw e;
    } finally {
      release();
    }
  }

  addProduct(p: Partial<ProductRow> & { id: string }): ProductRow {
    const row: ProductRow = { name: `Product ${p.id}`, price_fiat: "5000.00", is_active: true, ...p };
    this.products.set(row.id, row);
    return row;
  }

  addLocation(l: Partial<LocationRow> & { id: string; product_id: string }): LocationRow {
    const row: LocationRow = { name: `Location ${l.id}`, content_links: [], is_active: true, ...l };
    this.locations.set(row.id, row);
    return row;
  }

  usedLinkCount(locationId: string): number {
    return this.usedLinkSets.get(locationId)?.size ?? 0;
  }

  private repositories(journal: Undo[] | null): Repositories {
    const record = (undo: Undo) => journal?.push(undo);
    return {
      orders: this.ordersRepo(record),
      usedTransactions: this.usedTransactionsRepo(record),
      usedLinks: this.usedLinksRepo(record),
      catalog: this.catalogRepo()
    };
  }

  private ordersRepo(record: (undo: Undo) => void): OrdersRepo {
    const rows = this.orderRows;
    const all = () => [...rows.values()].map((r) => ({ ...r }));

    const update = (orderId: string, patch: Partial<OrderRow>): boolean => {
      const current = rows.get(orderId);
      if (!current || current.status !== "pending") return false;
      rows.set(orderId, { ...current, ...patch });
      record(() => rows.set(orderId, current));
      return true;
    };

    return {
      createOrder: async (o: NewOrder) => {
        await yieldTurn();
        const id = String(this.nextOrderId++);
        const row: OrderRow = {
          id,
          user_id: o.userId,
          product_id: o.productId,
          location_id: o.locationId,
          price_fiat: o.priceFiat,
          fiat_currency: o.fiatCurrency,
          price_btc: o.priceBtc,
          btc_rate: o.btcRate,
          bitcoin_address: o.bitcoinAddress,
          payment_amount: o.paymentAmount,
          jitter_sats: o.jitterSats,
          status: "pending",
          content_link: null,
          transaction_hash: null,
          created_at: o.createdAt,
          expires_at: o.expiresAt,
          completed_at: null,
          closed_at: null
        };
        rows.set(id, row);
        record(() => rows.delete(id));
        return { ...row };
      },

      getOrderById: async (orderId) => {
        await yieldTurn();
        const row = rows.get(orderId);
        return row ? { ...row } : null;
      },

      completeOrder: async (args) => {
        await yieldTurn();
        return update(args.orderId, {
          status: "completed",
          content_link: args.contentLink,
          transaction_hash: args.txHash,
          completed_at: args.completedAt
        });
      },

      closeOrder: async (args) => {
        await yieldTurn();
        return update(args.orderId, { status: args.status, closed_at: args.closedAt });
      },

      getPendingOrders: async (limit) => {
        await yieldTurn();
        return all()
          .filter((r) => r.status === "pending")
          .sort((a, b) => a.created_at.getTime() - b.created_at.getTime())
          .slice(0, limit);
      },

      getExpiredPendingOrders: async (now, limit) => {
        await yieldTurn();
        return all()
          .filter((r) => r.status === "pending" && r.expires_at.getTime() < now.getTime())
          .sort((a, b) => a.expires_at.getTime() - b.expires_at.getTime())
          .slice(0, limit);
      },

      getPendingPaymentAmounts: async (address) => {
        await yieldTurn();
        return all()
          .filter((r) => r.status === "pending" && r.bitcoin_address === address)
          .map((r) => r.payment_amount);
      },

      getCompletedOrdersByUser: async (userId, limit) => {
        await yieldTurn();
        return all()
          .filter((r) => r.user_id === userId && r.status === "completed")
          .sort((a, b) => (b.completed_at?.getTime() ?? 0) - (a.completed_at?.getTime() ?? 0))
          .slice(0, limit);
      },

      getStats: async (since): Promise<OrderStats> => {
        await yieldTurn();
        const orders = all();
        const count = (pred: (r: OrderRow) => boolean) => orders.filter(pred).length;
        const revenue = orders
          .filter((r) => r.status === "completed")
          .reduce((sum, r) => sum + decimalToUnits(r.price_fiat, FIAT_DECIMALS), 0n);
        return {
          totalOrders: orders.length,
          pendingOrders: count((r) => r.status === "pending"),
          completedOrders: count((r) => r.status === "completed"),
          cancelledOrders: count((r) => r.status === "cancelled"),
          expiredOrders: count((r) => r.status === "expired"),
          completedRevenueFiat: unitsToDecimal(revenue, FIAT_DECIMALS),
          ordersSince: count((r) => r.created_at.getTime() >= since.getTime()),
          completedSince: count((r) => r.status === "completed" && (r.completed_at?.getTime() ?? 0) >= since.getTime())
        };
      }
    };
  }

  private usedTransactionsRepo(record: (undo: Undo) => void): UsedTransactionsRepo {
    const used = this.usedTxs;
    return {
      isUsed: async (txHash) => {
        await yieldTurn();
        return used.has(txHash);
      },
      findUsed: async (txHashes) => {
        await yieldTurn();
        return txHashes.filter((h) => used.has(h));
      },
      insertIfAbsent: async (args) => {
        await yieldTurn();
        if (used.has(args.txHash)) return false;
        used.set(args.txHash, {
          transaction_hash: args.txHash,
          order_id: args.orderId,
          amount: args.amount,
          used_at: new Date()
        });
        record(() => used.delete(args.txHash));
        return true;
      }
    };
  }

  private usedLinksRepo(record: (undo: Undo) => void): UsedLinksRepo {
    const setFor = (locationId: string): Set<string> => {
      let set = this.usedLinkSets.get(locationId);
      if (!set) {
        set = new Set();
        this.usedLinkSets.set(locationId, set);
      }
      return set;
    };
    return {
      getUsedLinks: async (locationId) => {
        await yieldTurn();
        return [...setFor(locationId)];
      },
      insertIfAbsent: async ({ locationId, link }) => {
        await yieldTurn();
        const set = setFor(locationId);
        if (set.has(link)) return false;
        set.add(link);
        record(() => set.delete(link));
        return true;
      }
    };
  }

  private catalogRepo(): CatalogRepo {
    return {
      getProductById: async (productId) => {
        await yieldTurn();
        const row = this.products.get(productId);
        return row ? { ...row } : null;
      },
      getLocationById: async (locationId) => {
        await yieldTurn();
        const row = this.locations.get(locationId);
        return row ? { ...row, content_links: [...row.content_links] } : null;
      }
    };
  }
}
