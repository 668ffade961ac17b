/**
 * Application
 *
 * Wires the modules together:
 * Review API Client → Review Status Poller → Telegram Client
 */

import { logger } from './logger.js';
import type { AppConfig } from './config.js';
import { ReviewApiClient } from './review/index.js';
import { TelegramClient } from './notification/index.js';
import { ReviewStatusPoller } from './poller/index.js';

export class App {
  private readonly config: AppConfig;
  private reviewApiClient: ReviewApiClient;
  private telegramClient: TelegramClient;
  private poller: ReviewStatusPoller;
  private iterations = 0;
  private runPromise: Promise<void> | null = null;

  constructor(config: AppConfig) {
    this.config = config;

    this.reviewApiClient = new ReviewApiClient({
      token: config.reviewApi.token,
      endpoint: config.reviewApi.endpoint,
      requestTimeoutMs: config.reviewApi.requestTimeoutMs,
    });

    this.telegramClient = new TelegramClient({
      botToken: config.telegram.botToken,
      chatId: config.telegram.chatId,
      requestTimeoutMs: config.telegram.requestTimeoutMs,
    });

    this.poller = new ReviewStatusPoller(
      { retryPeriodMs: config.poller.retryPeriodMs },
      this.reviewApiClient,
      this.telegramClient
    );

    this.setupPollerEvents();
  }

  private setupPollerEvents(): void {
    this.poller.on('statusReported', (message, delivered) => {
      this.iterations++;
      logger.info('Homework status reported', { delivered, message });
    });

    this.poller.on('idle', () => {
      this.iterations++;
    });

    this.poller.on('pollFailed', (error, notified) => {
      this.iterations++;
      logger.debug('Poll iteration failed', { kind: error.kind, notified });
    });
  }

  /**
   * Start the application. Resolves once the loop is running
   */
  public async start(): Promise<void> {
    logger.info('Starting Review Status Notifier', {
      endpoint: this.config.reviewApi.endpoint,
      retryPeriodMs: this.config.poller.retryPeriodMs,
    });

    // A bad bot token shows up here, but delivery failures are not fatal
    await this.telegramClient.verifyConnection();

    this.runPromise = this.poller.start().catch((error: unknown) => {
      logger.error('Review Status Poller crashed', {
        error: error instanceof Error ? error.message : String(error),
      });
    });

    logger.info('Notifier started successfully');
  }

  /**
   * Stop the application gracefully
   */
  public async stop(reason: string = 'Manual shutdown'): Promise<void> {
    if (!this.poller.getRunningStatus()) return;

    logger.info('Stopping Review Status Notifier', { reason });
    this.poller.stop();
    await this.runPromise;
    logger.info('Notifier stopped successfully');
  }

  public getStatus(): {
    isRunning: boolean;
    iterations: number;
    timestamp: number;
    lastReportedError: string | null;
  } {
    const state = this.poller.getState();
    return {
      isRunning: this.poller.getRunningStatus(),
      iterations: this.iterations,
      timestamp: state.timestamp,
      lastReportedError: state.lastReportedError,
    };
  }
}
