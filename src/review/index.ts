/**
 * Review API Module
 *
 * Fetching, validating and formatting homework statuses.
 */

// Types
export type {
  HomeworkStatus,
  ReviewApiClientConfig,
  PollError,
  Result,
} from './types.js';

// Functions & classes
export { ReviewApiClient } from './ReviewApiClient.js';
export { validateResponse } from './validator.js';
export { formatStatus, HOMEWORK_VERDICTS } from './formatter.js';
