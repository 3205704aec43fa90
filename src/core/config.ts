import "dotenv/config";
import { isBtcAddress } from "./validation.js";

function mustGetEnv(key: string): string {
  const v = process.env[key];
  if (!v) throw new Error(`Missing required env var: ${key}`);
  return v;
}

function getEnv(key: string): string | undefined;
function getEnv(key: string, defaultValue: string): string;
function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  return v === undefined || v === "" ? defaultValue : v;
}

function getNumberEnv(key: string, defaultValue: number): number {
  const raw = getEnv(key);
  if (raw === undefined) return defaultValue;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`Env var ${key} must be a number, got "${raw}"`);
  return n;
}

function getListEnv(key: string, defaultValue: string[]): string[] {
  const raw = getEnv(key);
  if (raw === undefined) return defaultValue;
  return raw
    .split(",")
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean);
}

export const config = {
  botToken: getEnv("BOT_TOKEN"),
  adminTelegramId: getEnv("ADMIN_TELEGRAM_ID"),
  databaseUrl: getEnv("DATABASE_URL"),

  // Every order is paid to this one address; the jitter tells the orders apart.
  bitcoinAddress: getEnv("BITCOIN_ADDRESS", ""),
  // Dry-run: every payment check reports a synthetic match. Never enable with real inventory.
  testMode: getEnv("TEST_MODE", "false").toLowerCase() === "true",

  // Exchange rate
  fiatCurrency: getEnv("FIAT_CURRENCY", "RUB").toUpperCase(),
  rateProviders: getListEnv("RATE_PROVIDERS", ["coingecko", "blockchain", "coindesk"]),
  rateFallback: getNumberEnv("RATE_FALLBACK", 5_000_000),
  rateCacheTtlMs: getNumberEnv("RATE_CACHE_TTL_MS", 5 * 60_000),
  httpTimeoutMs: getNumberEnv("HTTP_TIMEOUT_MS", 10_000),

  // Blockchain explorer (blockchain.info compatible)
  explorerBaseUrl: getEnv("EXPLORER_BASE_URL", "https://blockchain.info"),
  blockchainApiKey: getEnv("BLOCKCHAIN_API_KEY"),
  explorerTimeoutMs: getNumberEnv("EXPLORER_TIMEOUT_MS", 20_000),
  explorerPageSize: getNumberEnv("EXPLORER_PAGE_SIZE", 50),

  // Matching
  paymentToleranceSats: getNumberEnv("PAYMENT_TOLERANCE_SATS", 1),
  clockSkewSec: getNumberEnv("CLOCK_SKEW_SEC", 30),

  // Jitter range is derived from these unless JITTER_MAX_SATS is set explicitly.
  jitterTargetProbability: getNumberEnv("JITTER_TARGET_PROBABILITY", 0.02),
  jitterConcurrentOrders: getNumberEnv("JITTER_CONCURRENT_ORDERS", 3),
  jitterMaxSats: getEnv("JITTER_MAX_SATS") === undefined ? null : getNumberEnv("JITTER_MAX_SATS", 0),

  // Orders
  orderTtlMinutes: getNumberEnv("ORDER_TTL_MINUTES", 30),

  // Workers
  sweepIntervalMs: getNumberEnv("SWEEP_INTERVAL_MS", 5 * 60_000),
  sweepBatchSize: getNumberEnv("SWEEP_BATCH_SIZE", 200),
  sweepConcurrency: getNumberEnv("SWEEP_CONCURRENCY", 5),
  paymentsPollIntervalMs: getNumberEnv("PAYMENTS_POLL_INTERVAL_MS", 60_000),

  // Shared retry policy for rate providers and the explorer
  retryMaxAttempts: getNumberEnv("RETRY_MAX_ATTEMPTS", 3),
  retryBaseDelayMs: getNumberEnv("RETRY_BASE_DELAY_MS", 1_000),
  retryMaxDelayMs: getNumberEnv("RETRY_MAX_DELAY_MS", 8_000),

  // Helpers for parts that must fail fast:
  mustGetEnv
};

export type AppConfig = typeof config;

/**
 * Returns a list of configuration problems. Entry points refuse to start when it is non-empty.
 */
export function validateConfig(c: AppConfig = config): string[] {
  const problems: string[] = [];
  if (!c.databaseUrl) problems.push("DATABASE_URL is not set");
  if (!c.bitcoinAddress) problems.push("BITCOIN_ADDRESS is not set");
  else if (!isBtcAddress(c.bitcoinAddress)) problems.push(`BITCOIN_ADDRESS is not a valid address: ${c.bitcoinAddress}`);
  if (c.rateFallback <= 0) problems.push("RATE_FALLBACK must be positive");
  if (c.rateProviders.length === 0) problems.push("RATE_PROVIDERS is empty");
  if (c.paymentToleranceSats < 0) problems.push("PAYMENT_TOLERANCE_SATS must not be negative");
  if (c.retryMaxAttempts < 1) problems.push("RETRY_MAX_ATTEMPTS must be at least 1");
  return problems;
}
