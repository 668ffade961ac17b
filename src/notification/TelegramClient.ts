/**
 * Telegram Client
 *
 * Delivers plain-text messages to a single chat.
 * Delivery failures are logged and reported as `false`, never thrown:
 * the poll loop relies on this to report its own errors safely.
 */

import TelegramBot from 'node-telegram-bot-api';
import { logger, maskSecret } from '../logger.js';
import type { MessagingTransport, TelegramClientConfig } from './types.js';

export class TelegramClient {
  private bot: MessagingTransport;
  private chatId: string;
  private requestTimeoutMs: number;

  constructor(config: TelegramClientConfig, bot?: MessagingTransport) {
    this.bot = bot ?? new TelegramBot(config.botToken, { polling: false });
    this.chatId = config.chatId;
    this.requestTimeoutMs = config.requestTimeoutMs;

    logger.info('Telegram client initialized', {
      chatId: maskSecret(config.chatId),
    });
  }

  /**
   * Send a message to the configured chat.
   * Returns true if the message was delivered
   */
  public async notify(message: string): Promise<boolean> {
    try {
      await this.withTimeout(this.bot.sendMessage(this.chatId, message), 'sendMessage');
      logger.debug('Telegram message sent', { message });
      return true;
    } catch (error) {
      logger.error('Failed to send Telegram message', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Verify the bot token is valid
   */
  public async verifyConnection(): Promise<boolean> {
    try {
      const me = await this.withTimeout(this.bot.getMe(), 'getMe');
      logger.info('Telegram bot verified', {
        username: me.username,
      });
      return true;
    } catch (error) {
      logger.warn('Failed to verify Telegram bot', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Reject if the call does not settle within the configured timeout.
   * The underlying request is not cancelled: a send that completes late may
   * still reach the chat, and since it was reported as failed the poll loop
   * will send the same error text again on its next iteration.
   */
  private withTimeout<T>(call: Promise<T>, operation: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Telegram ${operation} timed out after ${this.requestTimeoutMs}ms`));
      }, this.requestTimeoutMs);
    });

    return Promise.race([call, timeout]).finally(() => clearTimeout(timer));
  }
}
