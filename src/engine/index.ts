import type { Pool } from "pg";
import { config, type AppConfig } from "../core/config.js";
import { logger } from "../core/logger.js";
import { notifyAdmin } from "../core/adminAlerts.js";
import type { RetryPolicy } from "../core/retry.js";
import { createPgStore } from "../db/store.js";
import type { Store } from "../db/types.js";
import { RateCache, RateOracle } from "../payments/rates/oracle.js";
import { createRateProviders } from "../payments/rates/providers.js";
import { PaymentDisambiguator, jitterUpperBound, pairCollisionProbability } from "../payments/jitter.js";
import { BlockchainInfoExplorer } from "../payments/btc/explorer.js";
import { BlockchainMatcher, DryRunMatcher, type PaymentMatcher } from "../payments/btc/matcher.js";
import { ReplayGuard } from "../payments/replayGuard.js";
import { OrderEngine } from "./orderEngine.js";

export { OrderEngine } from "./orderEngine.js";
export type { CheckOutcome, CancelOutcome, FulfillOutcome, EngineSettings, AdminAlert } from "./orderEngine.js";
export * from "../core/errors.js";
export type { OrderRow, OrderStatus, OrderStats, Store } from "../db/types.js";
export { texts, describeForUser } from "../bot/texts.js";

export function retryPolicyFromConfig(c: AppConfig): RetryPolicy {
  return { maxAttempts: c.retryMaxAttempts, baseDelayMs: c.retryBaseDelayMs, maxDelayMs: c.retryMaxDelayMs };
}

function createMatcher(c: AppConfig, store: Store, retryPolicy: RetryPolicy): PaymentMatcher {
  if (c.testMode) {
    logger.warn("engine: TEST_MODE is on, payments are not checked on-chain");
    return new DryRunMatcher();
  }
  return new BlockchainMatcher({
    explorer: new BlockchainInfoExplorer({
      baseUrl: c.explorerBaseUrl,
      apiKey: c.blockchainApiKey,
      timeoutMs: c.explorerTimeoutMs
    }),
    claims: new ReplayGuard(store.usedTransactions),
    toleranceSats: c.paymentToleranceSats,
    clockSkewMs: c.clockSkewSec * 1000,
    pageSize: c.explorerPageSize,
    retryPolicy
  });
}

/** Wires the engine from configuration on top of a PostgreSQL pool. */
export function createEngine(pool: Pool, c: AppConfig = config): { engine: OrderEngine; store: Store } {
  const store = createPgStore(pool);
  const retryPolicy = retryPolicyFromConfig(c);

  const rates = new RateOracle({
    providers: createRateProviders(c.rateProviders, { currency: c.fiatCurrency, timeoutMs: c.httpTimeoutMs }),
    cache: new RateCache(c.rateCacheTtlMs),
    fallbackRate: c.rateFallback,
    currency: c.fiatCurrency,
    retryPolicy
  });

  const maxSats =
    c.jitterMaxSats ??
    jitterUpperBound({
      targetProbability: c.jitterTargetProbability,
      concurrentOrders: c.jitterConcurrentOrders,
      toleranceSats: c.paymentToleranceSats
    });
  const range = { minSats: 1, maxSats };
  const disambiguator = new PaymentDisambiguator({ range, toleranceSats: c.paymentToleranceSats });
  logger.info(
    `engine: jitter range ${range.minSats}..${range.maxSats} sats, pair collision probability ` +
      pairCollisionProbability(range, c.paymentToleranceSats).toFixed(4)
  );

  const engine = new OrderEngine({
    store,
    rates,
    disambiguator,
    matcher: createMatcher(c, store, retryPolicy),
    alertAdmin: notifyAdmin,
    settings: {
      bitcoinAddress: c.bitcoinAddress,
      fiatCurrency: c.fiatCurrency,
      orderTtlMs: c.orderTtlMinutes * 60_000
    }
  });
  return { engine, store };
}
