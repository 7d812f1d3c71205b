import type { NotificationEvent, TelegramTarget } from "./types.js";
import { postJson } from "./utils/http.js";

const TELEGRAM_API_BASE = "https://api.telegram.org/bot";

export interface TelegramMessage {
  readonly chat_id: string;
  readonly text: string;
  readonly parse_mode: "Markdown";
}

export function telegramEndpoint(botToken: string): string {
  return `${TELEGRAM_API_BASE}${botToken}/sendMessage`;
}

export function buildTelegramMessage(chatId: string, event: NotificationEvent): TelegramMessage {
  return {
    chat_id: chatId,
    text: event.message,
    parse_mode: "Markdown"
  };
}

/**
 * Send an event through the Telegram Bot API. Telegram has no colours, so severity only shows in the text.
 */
export async function sendTelegramMessage(target: TelegramTarget, event: NotificationEvent): Promise<void> {
  await postJson(telegramEndpoint(target.botToken), buildTelegramMessage(target.chatId, event));
}
