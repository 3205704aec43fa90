import { Bot } from "grammy";
import { config } from "../core/config.js";

let shared: Bot | null = null;

/** Outgoing-only bot: buyer notifications and admin alerts. Nothing here polls for updates. */
export function getTelegramBot(token = config.botToken): Bot {
  if (!token) throw new Error("BOT_TOKEN is required to send Telegram messages.");
  if (!shared || shared.token !== token) shared = new Bot(token);
  return shared;
}
