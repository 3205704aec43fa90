import { logger } from "../core/logger.js";
import { config } from "../core/config.js";
import { pool, createRepositories } from "../db/index.js";
import { OrderLedger } from "../orders/ledger.js";
import { getTelegramBot } from "../bot/telegramApi.js";
import { createTelegramNotifier } from "../bot/notifier.js";
import { createExpirySweeper } from "./expirySweeper.js";

const repos = createRepositories(pool);
const sweeper = createExpirySweeper({
  orders: repos.orders,
  ledger: new OrderLedger({ orders: repos.orders, ttlMs: config.orderTtlMinutes * 60_000 }),
  notifier: config.botToken ? createTelegramNotifier(getTelegramBot()) : undefined,
  batchSize: config.sweepBatchSize,
  concurrency: config.sweepConcurrency
});

logger.info(`expiry-worker started (every ${config.sweepIntervalMs}ms)`);
sweeper.start(config.sweepIntervalMs);

// Graceful shutdown
process.on("SIGINT", async () => {
  logger.info("expiry-worker stopping...");
  sweeper.stop();
  await pool.end().catch(() => undefined);
  process.exit(0);
});
