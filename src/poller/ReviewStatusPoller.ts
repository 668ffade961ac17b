/**
 * Review Status Poller
 *
 * Poll → validate → format → notify → sleep, forever.
 * Every failure inside an iteration ends up in one handler that
 * notifies once per distinct error text.
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import { formatErrorMessage } from '../notification/formatter.js';
import { formatStatus } from '../review/formatter.js';
import { validateResponse } from '../review/validator.js';
import type { Notifier } from '../notification/types.js';
import type { PollError } from '../review/types.js';
import type {
  PollOutcome,
  PollState,
  ReviewStatusPollerConfig,
  ReviewStatusPollerEvents,
  StatusSource,
} from './types.js';

export class ReviewStatusPoller extends EventEmitter<ReviewStatusPollerEvents> {
  private readonly config: ReviewStatusPollerConfig;
  private readonly source: StatusSource;
  private readonly notifier: Notifier;
  private state: PollState;
  private isRunning = false;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wakeUp: (() => void) | null = null;

  constructor(config: ReviewStatusPollerConfig, source: StatusSource, notifier: Notifier) {
    super();
    this.config = config;
    this.source = source;
    this.notifier = notifier;
    this.state = {
      timestamp: config.initialTimestamp ?? Math.floor(Date.now() / 1000),
      lastReportedError: null,
    };

    logger.info('Review Status Poller initialized', {
      retryPeriodMs: config.retryPeriodMs,
      timestamp: this.state.timestamp,
    });
  }

  /**
   * Run iterations until stop() is called
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Review Status Poller already running');
      return;
    }

    this.isRunning = true;
    logger.info('Review Status Poller started');

    while (this.isRunning) {
      try {
        await this.runOnce();
      } catch (error) {
        // runOnce only rejects when an event listener throws
        logger.error('Poll iteration aborted', {
          error: error instanceof Error ? error.message : String(error),
        });
      } finally {
        if (this.isRunning) {
          await this.sleep(this.config.retryPeriodMs);
        }
      }
    }

    logger.info('Review Status Poller stopped');
  }

  /**
   * Stop after the current iteration, cutting a pending sleep short
   */
  stop(): void {
    if (!this.isRunning) return;

    this.isRunning = false;
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    this.wakeUp?.();
    this.wakeUp = null;
  }

  /**
   * One poll iteration. Collaborator failures never reject.
   * Listeners run once state is settled, so a throwing listener
   * rejects this call without touching the cursor or the dedup text.
   */
  async runOnce(): Promise<PollOutcome> {
    let outcome: PollOutcome;
    try {
      outcome = await this.poll();
    } catch (error) {
      outcome = await this.handleFailure({
        kind: 'Unexpected',
        message: error instanceof Error ? error.message : String(error),
      });
    }

    this.emitOutcome(outcome);
    return outcome;
  }

  getState(): PollState {
    return { ...this.state };
  }

  getRunningStatus(): boolean {
    return this.isRunning;
  }

  private async poll(): Promise<PollOutcome> {
    const fetched = await this.source.fetchStatus(this.state.timestamp);
    if (!fetched.ok) {
      return this.handleFailure(fetched.error);
    }

    const validated = validateResponse(fetched.value);
    if (!validated.ok) {
      return this.handleFailure(validated.error);
    }

    const homeworks = validated.value;
    let outcome: PollOutcome;

    if (homeworks.length > 0) {
      // Only the newest entry is reported this cycle
      const formatted = formatStatus(homeworks[0]);
      if (!formatted.ok) {
        return this.handleFailure(formatted.error);
      }

      const skipped = homeworks.length - 1;
      if (skipped > 0) {
        logger.debug('Older homework entries not reported this cycle', { skipped });
      }

      const delivered = await this.notifier.notify(formatted.value);
      outcome = { type: 'reported', message: formatted.value, delivered, skipped };
    } else {
      logger.debug('No new homework statuses');
      outcome = { type: 'idle' };
    }

    this.advanceCursor(fetched.value);
    return outcome;
  }

  private advanceCursor(response: unknown): void {
    const currentDate =
      typeof response === 'object' && response !== null && 'current_date' in response
        ? response.current_date
        : undefined;

    if (typeof currentDate === 'number' && Number.isInteger(currentDate)) {
      this.state.timestamp = currentDate;
      return;
    }

    logger.warn('current_date is not an integer, cursor left unchanged', {
      currentDate,
      timestamp: this.state.timestamp,
    });
  }

  private async handleFailure(error: PollError): Promise<PollOutcome> {
    const message = formatErrorMessage(error);
    logger.error(message, { kind: error.kind });

    if (message === this.state.lastReportedError) {
      logger.debug('Error already reported, notification skipped', { kind: error.kind });
      return { type: 'failed', error, notified: false };
    }

    const notified = await this.notifier.notify(message);
    if (notified) {
      this.state.lastReportedError = message;
    }

    return { type: 'failed', error, notified };
  }

  private emitOutcome(outcome: PollOutcome): void {
    switch (outcome.type) {
      case 'reported':
        this.emit('statusReported', outcome.message, outcome.delivered);
        break;
      case 'idle':
        this.emit('idle');
        break;
      case 'failed':
        this.emit('pollFailed', outcome.error, outcome.notified);
        break;
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wakeUp = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wakeUp = null;
        resolve();
      }, ms);
    });
  }
}
