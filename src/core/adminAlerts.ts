import { config } from "./config.js";
import { logger, errorMessage } from "./logger.js";
import { getTelegramBot } from "../bot/telegramApi.js";

/** Sends an alert to the admin chat. Never throws: a failed alert is only logged. */
export async function notifyAdmin(text: string): Promise<void> {
  const adminIdRaw = config.adminTelegramId;
  if (!adminIdRaw) return;
  const adminId = Number(adminIdRaw);
  if (!adminId) return;

  try {
    await getTelegramBot().api.sendMessage(adminId, `[ADMIN ALERT]\n${text}`.slice(0, 4000));
  } catch (e) {
    logger.error("Failed to notify admin", errorMessage(e));
  }
}
