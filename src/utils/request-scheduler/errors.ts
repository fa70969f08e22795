/**
 * Scheduler-local errors
 */

/**
 * Thrown to producers once the scheduler's queue is closed
 */
export class SchedulerUnavailableError extends Error {
  constructor(schedulerName = 'RequestScheduler') {
    super(`${schedulerName} is shut down and no longer accepts requests`);
    this.name = 'SchedulerUnavailableError';
  }
}

/**
 * Settles a reader whose write end was dropped without a value
 */
export class RequestAbandonedError extends Error {
  constructor(requestId?: string) {
    super(
      requestId
        ? `Request ${requestId} was dropped by the scheduler before completion`
        : 'Request was dropped by the scheduler before completion'
    );
    this.name = 'RequestAbandonedError';
  }
}
