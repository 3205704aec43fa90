import type { Bot } from "grammy";

export type Notifier = {
  notifyUser(userId: string, text: string): Promise<void>;
};

// Telegram caps a message at 4096 characters.
const MAX_MESSAGE_LENGTH = 4000;

export function createTelegramNotifier(bot: Bot): Notifier {
  return {
    async notifyUser(userId: string, text: string): Promise<void> {
      const chatId = Number(userId);
      if (!Number.isSafeInteger(chatId)) throw new Error(`Not a Telegram chat id: ${userId}`);
      await bot.api.sendMessage(chatId, text.slice(0, MAX_MESSAGE_LENGTH));
    }
  };
}
