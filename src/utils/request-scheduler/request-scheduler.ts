/**
 * RequestScheduler
 *
 * Serializes search queries from any number of concurrent callers into a
 * single outbound stream that respects the provider's rate limit.
 *
 * A single loop owns the rate-limit bookkeeping. Callers only push onto
 * the request queue and await their own completion handle, so at most
 * one query is ever in flight and no lock guards the timing state.
 *
 * Behaviour:
 * - FIFO dispatch with at least `minRequestIntervalMs` between dispatches
 * - Failed dispatches count against the interval too
 * - `rate-limit-exceeded` is retried with backoff up to `maxRetries`,
 *   re-entering the queue ahead of later requests
 * - Every other error is delivered to the caller as-is
 *
 * @example
 * ```typescript
 * const scheduler = new RequestScheduler(client, { minRequestIntervalMs: 200 });
 *
 * const result = await scheduler.search(Query.email(exact('jane@example.com')));
 *
 * await scheduler.shutdown();
 * ```
 */

import { nanoid } from 'nanoid';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { validateQuery, type Query } from '../../query/index.js';
import {
  isRateLimitError,
  toSearchApiError,
  type SearchApiError,
} from '../../clients/search-api/errors.js';
import type { SearchExecutor, SearchResult } from '../../clients/search-api/types.js';
import {
  createCompletionHandle,
  type CompletionReader,
  type CompletionWriter,
} from './completion-handle.js';
import { RequestQueue } from './request-queue.js';
import {
  computeBackoffDelay,
  resolveBackoffOptions,
  type BackoffOptions,
} from './retry-policy.js';
import { SchedulerUnavailableError } from './errors.js';

export interface RequestSchedulerOptions {
  /**
   * Minimum spacing between dispatches in milliseconds
   * @default 200 // the provider bans accounts above 5 req/s
   */
  minRequestIntervalMs?: number;

  /**
   * Retries for a rate-limited request before the error reaches the caller
   * @default 3
   */
  maxRetries?: number;

  /**
   * Maximum number of queued requests; producers wait when full
   * @default undefined (unbounded)
   */
  queueCapacity?: number;

  /**
   * Backoff applied before re-dispatching a rate-limited request
   */
  backoff?: Partial<BackoffOptions>;

  /**
   * Optional name for logging purposes
   * @default 'RequestScheduler'
   */
  name?: string;
}

/**
 * A query paired with the write end of its completion handle
 */
export interface ScheduledRequest {
  readonly id: string;
  readonly query: Query;
  readonly completion: CompletionWriter<SearchResult>;
}

/**
 * Per-request lifecycle
 */
export type RequestState =
  | 'queued'
  | 'dispatching'
  | 'retrying'
  | 'delivered'
  | 'delivered-as-error';

export type SchedulerState = 'running' | 'draining' | 'stopping' | 'stopped';

export interface RequestSchedulerStats {
  minRequestIntervalMs: number;
  maxRetries: number;
  queueCapacity?: number;
  queueDepth: number;
  lastDispatchAt: number | null;
  timeUntilNextDispatch: number;
  /** Calls made to the executor, retries included */
  dispatched: number;
  delivered: number;
  failed: number;
  retried: number;
  /** Requests skipped or dropped without reaching a live reader */
  abandoned: number;
  state: SchedulerState;
}

type DispatchOutcome =
  | { ok: true; value: SearchResult }
  | { ok: false; error: SearchApiError };

interface PendingRequest {
  request: ScheduledRequest;
  attempts: number;
  state: RequestState;
}

export const DEFAULT_MIN_REQUEST_INTERVAL_MS = 200;
export const DEFAULT_MAX_RETRIES = 3;

/**
 * Pair a query with a fresh completion handle
 *
 * For callers that keep the read end themselves and hand the request
 * to {@link RequestScheduler.enqueue}.
 */
export function createScheduledRequest(query: Query): {
  request: ScheduledRequest;
  reader: CompletionReader<SearchResult>;
} {
  const id = nanoid(10);
  const { writer, reader } = createCompletionHandle<SearchResult>(id);
  return { request: { id, query, completion: writer }, reader };
}

export class RequestScheduler {
  private readonly queue: RequestQueue<PendingRequest>;
  private readonly minRequestIntervalMs: number;
  private readonly maxRetries: number;
  private readonly backoff: BackoffOptions;
  private readonly name: string;
  private readonly logger: ServiceLogger;
  private readonly loop: Promise<void>;

  // Rate-limit state: read and written by the loop only
  private lastDispatchAt: number | null = null;

  private state: SchedulerState = 'running';
  private readonly counters = {
    dispatched: 0,
    delivered: 0,
    failed: 0,
    retried: 0,
    abandoned: 0,
  };

  constructor(
    private readonly executor: SearchExecutor,
    options: RequestSchedulerOptions = {}
  ) {
    this.minRequestIntervalMs =
      options.minRequestIntervalMs ?? DEFAULT_MIN_REQUEST_INTERVAL_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.name = options.name || 'RequestScheduler';

    if (!Number.isFinite(this.minRequestIntervalMs) || this.minRequestIntervalMs < 0) {
      throw new RangeError(
        `minRequestIntervalMs must be a non-negative number, got ${this.minRequestIntervalMs}`
      );
    }
    if (!Number.isInteger(this.maxRetries) || this.maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${this.maxRetries}`);
    }

    this.backoff = resolveBackoffOptions(options.backoff);
    this.queue = new RequestQueue<PendingRequest>(options.queueCapacity, this.name);
    this.logger = createServiceLogger(this.name);

    this.logger.info(
      {
        minRequestIntervalMs: this.minRequestIntervalMs,
        maxRetries: this.maxRetries,
        queueCapacity: this.queue.capacity ?? 'unbounded',
      },
      'RequestScheduler initialized'
    );

    this.loop = this.run();
  }

  /**
   * Submit a query and get the read end of its completion handle
   *
   * Waits only while a bounded queue is full. Rejects immediately with
   * SchedulerUnavailableError after shutdown, and with an `invalid-input`
   * SearchApiError for queries the provider would refuse.
   */
  async submit(query: Query): Promise<CompletionReader<SearchResult>> {
    if (this.queue.isClosed) {
      throw new SchedulerUnavailableError(this.name);
    }
    validateQuery(query);

    const { request, reader } = createScheduledRequest(query);
    await this.enqueue(request);
    return reader;
  }

  /**
   * Submit a query and wait for its result
   */
  async search(query: Query): Promise<SearchResult> {
    const reader = await this.submit(query);
    return reader.result;
  }

  /**
   * Queue a request built with {@link createScheduledRequest}
   *
   * If the queue refuses it, the request's handle is failed with the
   * same SchedulerUnavailableError this method rejects with.
   */
  async enqueue(request: ScheduledRequest): Promise<void> {
    try {
      await this.queue.push({ request, attempts: 0, state: 'queued' });
    } catch (error) {
      const reason = error instanceof Error ? error : new SchedulerUnavailableError(this.name);
      request.completion.fail(reason);
      throw reason;
    }
    this.logger.debug(
      { requestId: request.id, field: request.query.field, queueDepth: this.queue.size },
      'Request queued'
    );
  }

  /**
   * Stop accepting requests and wait until everything queued is served
   */
  async shutdown(): Promise<void> {
    if (this.state === 'running') {
      this.state = 'draining';
      this.logger.info({ queueDepth: this.queue.size }, 'Shutting down, draining queue');
    }
    this.queue.close();
    await this.loop;
  }

  /**
   * Stop accepting requests and drop everything still queued
   *
   * Dropped callers receive RequestAbandonedError. A dispatch already in
   * flight completes and is delivered; it is not retried.
   */
  async stop(): Promise<void> {
    if (this.state !== 'stopped') {
      this.state = 'stopping';
    }
    this.queue.close();

    const dropped = this.queue.clear();
    for (const pending of dropped) {
      this.dropRequest(pending);
    }
    if (dropped.length > 0) {
      this.logger.warn({ dropped: dropped.length }, 'Scheduler stopped, queued requests dropped');
    }

    await this.loop;
  }

  getQueueDepth(): number {
    return this.queue.size;
  }

  /**
   * Milliseconds until the next dispatch may start, 0 if allowed now
   */
  getTimeUntilNextDispatch(): number {
    if (this.lastDispatchAt === null) return 0;
    const elapsed = Date.now() - this.lastDispatchAt;
    return Math.max(0, this.minRequestIntervalMs - elapsed);
  }

  getStats(): RequestSchedulerStats {
    return {
      minRequestIntervalMs: this.minRequestIntervalMs,
      maxRetries: this.maxRetries,
      queueCapacity: this.queue.capacity,
      queueDepth: this.queue.size,
      lastDispatchAt: this.lastDispatchAt,
      timeUntilNextDispatch: this.getTimeUntilNextDispatch(),
      ...this.counters,
      state: this.state,
    };
  }

  private async run(): Promise<void> {
    let current: PendingRequest | null = null;
    try {
      for (;;) {
        current = await this.queue.next();
        if (current === null) break;
        await this.process(current);
        current = null;
      }
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      log.methodError(this.logger, 'run', failure, { requestId: current?.request.id });
      this.queue.close();
      if (current !== null) {
        this.dropRequest(current);
      }
      for (const pending of this.queue.clear()) {
        this.dropRequest(pending);
      }
    } finally {
      this.state = 'stopped';
      this.logger.info(this.counters, 'RequestScheduler stopped');
    }
  }

  private async process(pending: PendingRequest): Promise<void> {
    const { request } = pending;

    if (this.skipIfAbandoned(pending)) return;

    let waited = false;
    // Timers may fire slightly early, so re-read the clock after each sleep
    for (
      let waitMs = this.getTimeUntilNextDispatch();
      waitMs > 0;
      waitMs = this.getTimeUntilNextDispatch()
    ) {
      this.logger.debug({ requestId: request.id, waitMs }, 'Waiting before dispatch');
      await this.sleep(waitMs);
      waited = true;
    }
    if (waited) {
      // The caller may have given up while we waited
      if (this.skipIfAbandoned(pending)) return;
      if (this.state === 'stopping') {
        this.dropRequest(pending);
        return;
      }
    }

    pending.state = 'dispatching';
    pending.attempts++;
    this.counters.dispatched++;
    log.methodEntry(this.logger, 'dispatch', {
      requestId: request.id,
      field: request.query.field,
      attempt: pending.attempts,
    });

    let outcome: DispatchOutcome;
    try {
      outcome = { ok: true, value: await this.executor.execute(request.query) };
    } catch (error) {
      outcome = { ok: false, error: toSearchApiError(error) };
    }
    this.lastDispatchAt = Date.now();

    if (outcome.ok) {
      const { value } = outcome;
      this.complete(pending, () => request.completion.deliver(value), 'delivered');
      return;
    }

    const { error } = outcome;

    if (isRateLimitError(error) && pending.attempts <= this.maxRetries) {
      await this.retry(pending, error);
      return;
    }

    if (isRateLimitError(error)) {
      this.logger.error(
        { requestId: request.id, attempts: pending.attempts, maxRetries: this.maxRetries },
        'All retry attempts exhausted for rate-limited request'
      );
    } else {
      log.methodError(this.logger, 'dispatch', error, {
        requestId: request.id,
        kind: error.kind,
        statusCode: error.statusCode,
      });
    }
    this.complete(pending, () => request.completion.fail(error), 'delivered-as-error');
  }

  private async retry(pending: PendingRequest, error: SearchApiError): Promise<void> {
    const retry = pending.attempts - 1;
    const delayMs = computeBackoffDelay(retry, this.backoff, error.retryAfterMs);

    pending.state = 'retrying';
    this.counters.retried++;
    this.logger.warn(
      {
        requestId: pending.request.id,
        attempt: pending.attempts,
        maxRetries: this.maxRetries,
        delayMs,
        hasRetryAfter: error.retryAfterMs !== undefined,
      },
      'Rate limited, backing off before retry'
    );

    // The whole account is throttled, so the loop itself waits
    await this.sleep(delayMs);

    if (this.state === 'stopping') {
      this.dropRequest(pending);
      return;
    }
    this.queue.pushFront(pending);
  }

  private complete(
    pending: PendingRequest,
    write: () => boolean,
    state: 'delivered' | 'delivered-as-error'
  ): void {
    pending.state = state;
    if (!write()) {
      this.counters.abandoned++;
      this.logger.debug(
        { requestId: pending.request.id },
        'Caller abandoned request, result discarded'
      );
      return;
    }
    if (state === 'delivered') {
      this.counters.delivered++;
    } else {
      this.counters.failed++;
    }
    log.methodExit(this.logger, 'dispatch', {
      requestId: pending.request.id,
      state,
      attempts: pending.attempts,
    });
  }

  private skipIfAbandoned(pending: PendingRequest): boolean {
    if (!pending.request.completion.isAbandoned) return false;
    this.counters.abandoned++;
    this.logger.debug(
      { requestId: pending.request.id },
      'Caller abandoned request, skipping dispatch'
    );
    return true;
  }

  private dropRequest(pending: PendingRequest): void {
    pending.state = 'delivered-as-error';
    pending.request.completion.drop();
    this.counters.abandoned++;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
