/**
 * Types for the Review Status Poller
 */

import type { PollError, Result } from '../review/types.js';

/**
 * Source of raw review API replies
 */
export interface StatusSource {
  fetchStatus(fromTimestamp: number): Promise<Result<unknown>>;
}

export interface ReviewStatusPollerConfig {
  /** Pause between two iterations */
  retryPeriodMs: number;

  /** Starting cursor in Unix seconds, defaults to now */
  initialTimestamp?: number;
}

/**
 * Mutable state owned by one poller instance
 */
export interface PollState {
  /** Cursor sent as `from_date` */
  timestamp: number;

  /** Text of the last error notification that was delivered */
  lastReportedError: string | null;
}

/**
 * What a single iteration ended with
 */
export type PollOutcome =
  | { type: 'reported'; message: string; delivered: boolean; skipped: number }
  | { type: 'idle' }
  | { type: 'failed'; error: PollError; notified: boolean };

export interface ReviewStatusPollerEvents {
  statusReported: [message: string, delivered: boolean];
  idle: [];
  pollFailed: [error: PollError, notified: boolean];
}
