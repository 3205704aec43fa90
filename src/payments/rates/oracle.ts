import type { RateProvider } from "./providers.js";
import { withRetry, type RetryPolicy } from "../../core/retry.js";
import { logger, errorMessage } from "../../core/logger.js";

export type RateSnapshot = {
  rate: number;
  fetchedAt: Date;
};

export type RateQuote = RateSnapshot & {
  source: "cache" | "provider" | "stale" | "fallback";
};

export type RateSource = {
  getRate(): Promise<number>;
};

/** The oracle's single cached rate. Kept after a failed refresh so a stale value can still be served. */
export class RateCache {
  private entry: RateSnapshot | null = null;

  constructor(readonly ttlMs: number) {}

  fresh(now: Date): RateSnapshot | null {
    if (!this.entry) return null;
    return now.getTime() - this.entry.fetchedAt.getTime() < this.ttlMs ? this.entry : null;
  }

  last(): RateSnapshot | null {
    return this.entry;
  }

  store(rate: number, fetchedAt: Date): RateSnapshot {
    this.entry = { rate, fetchedAt };
    return this.entry;
  }
}

export class RateOracle implements RateSource {
  private readonly providers: readonly RateProvider[];
  private readonly cache: RateCache;
  private readonly fallbackRate: number;
  private readonly currency: string;
  private readonly retryPolicy: RetryPolicy;
  private readonly now: () => Date;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;

  constructor(args: {
    providers: readonly RateProvider[];
    cache: RateCache;
    fallbackRate: number;
    currency: string;
    retryPolicy: RetryPolicy;
    now?: () => Date;
    sleep?: (ms: number) => Promise<void>;
  }) {
    if (!(args.fallbackRate > 0)) throw new Error(`Fallback rate must be positive, got ${args.fallbackRate}`);
    this.providers = args.providers;
    this.cache = args.cache;
    this.fallbackRate = args.fallbackRate;
    this.currency = args.currency;
    this.retryPolicy = args.retryPolicy;
    this.now = args.now ?? (() => new Date());
    this.sleep = args.sleep;
  }

  async getRate(): Promise<number> {
    return (await this.quote()).rate;
  }

  async quote(): Promise<RateQuote> {
    const now = this.now();
    const cached = this.cache.fresh(now);
    if (cached) return { ...cached, source: "cache" };

    for (const provider of this.providers) {
      try {
        const rate = await withRetry(() => provider.fetchRate(), this.retryPolicy, {
          label: `rate:${provider.name}`,
          sleep: this.sleep
        });
        if (!Number.isFinite(rate) || rate <= 0) {
          logger.warn(`rate-oracle: ${provider.name} returned an unusable rate`, rate);
          continue;
        }
        const snap = this.cache.store(rate, this.now());
        logger.info(`rate-oracle: BTC/${this.currency} updated from ${provider.name}: ${rate.toFixed(2)}`);
        return { ...snap, source: "provider" };
      } catch (e) {
        logger.warn(`rate-oracle: ${provider.name} failed`, errorMessage(e));
      }
    }

    const last = this.cache.last();
    if (last) {
      logger.warn(
        `rate-oracle: DEGRADED, all providers failed; using cached rate ${last.rate.toFixed(2)} from ${last.fetchedAt.toISOString()}`
      );
      return { ...last, source: "stale" };
    }

    logger.warn(`rate-oracle: DEGRADED, all providers failed and nothing cached; using fallback ${this.fallbackRate}`);
    return { rate: this.fallbackRate, fetchedAt: now, source: "fallback" };
  }
}
