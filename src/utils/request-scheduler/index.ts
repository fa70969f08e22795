/**
 * Request Scheduler Module
 *
 * Serializes search queries behind the provider's rate limit and routes
 * each result back to the caller that submitted it.
 */

export {
  RequestScheduler,
  createScheduledRequest,
  DEFAULT_MIN_REQUEST_INTERVAL_MS,
  DEFAULT_MAX_RETRIES,
} from './request-scheduler.js';
export type {
  RequestSchedulerOptions,
  RequestSchedulerStats,
  ScheduledRequest,
  RequestState,
  SchedulerState,
} from './request-scheduler.js';

export { RequestQueue } from './request-queue.js';

export { createCompletionHandle } from './completion-handle.js';
export type {
  CompletionReader,
  CompletionWriter,
  CompletionState,
  CompletionOutcome,
} from './completion-handle.js';

export {
  computeBackoffDelay,
  resolveBackoffOptions,
  DEFAULT_BACKOFF,
} from './retry-policy.js';
export type { BackoffOptions } from './retry-policy.js';

export { SchedulerUnavailableError, RequestAbandonedError } from './errors.js';
