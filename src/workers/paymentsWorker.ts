import { logger, errorMessage } from "../core/logger.js";
import { config, validateConfig } from "../core/config.js";
import { notifyAdmin } from "../core/adminAlerts.js";
import { pool } from "../db/index.js";
import { createEngine } from "../engine/index.js";
import { getTelegramBot } from "../bot/telegramApi.js";
import { createTelegramNotifier } from "../bot/notifier.js";
import { createPaymentPoller } from "./paymentPoller.js";

const problems = validateConfig();
if (problems.length) {
  for (const p of problems) logger.error(`payments-worker: ${p}`);
  process.exit(1);
}

const { engine, store } = createEngine(pool);
const poller = createPaymentPoller({
  engine,
  orders: store.orders,
  notifier: config.botToken ? createTelegramNotifier(getTelegramBot()) : undefined,
  alertAdmin: notifyAdmin,
  batchSize: 200
});

logger.info(`payments-worker started (every ${config.paymentsPollIntervalMs}ms, testMode=${config.testMode})`);

async function tick() {
  const result = await poller.tick();
  if (result && result.matched) logger.info(`payments-worker: ${result.matched} order(s) completed`);
}

setInterval(() => {
  tick().catch((e) => logger.error("payments-worker tick failed", errorMessage(e)));
}, config.paymentsPollIntervalMs);
await tick().catch((e) => logger.error("payments-worker initial tick failed", errorMessage(e)));

// Graceful shutdown
process.on("SIGINT", async () => {
  logger.info("payments-worker stopping...");
  await pool.end().catch(() => undefined);
  process.exit(0);
});
