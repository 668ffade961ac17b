/**
 * Types for the notification layer
 */

/**
 * Configuration for Telegram Client
 */
export interface TelegramClientConfig {
  botToken: string;
  chatId: string;
  /** Upper bound for a single Bot API call */
  requestTimeoutMs: number;
}

/**
 * The part of the Bot API the client uses.
 * Satisfied by `node-telegram-bot-api`'s TelegramBot.
 */
export interface MessagingTransport {
  sendMessage(chatId: string, text: string): Promise<unknown>;
  getMe(): Promise<{ username?: string }>;
}

/**
 * Anything the poll loop can hand a message to
 */
export interface Notifier {
  notify(message: string): Promise<boolean>;
}
