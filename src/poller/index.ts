export { ReviewStatusPoller } from './ReviewStatusPoller.js';
export type {
  StatusSource,
  ReviewStatusPollerConfig,
  PollState,
  PollOutcome,
  ReviewStatusPollerEvents,
} from './types.js';
