/**
 * Completion Handle
 *
 * One-shot delivery channel between the scheduler (write end) and the
 * caller that submitted a request (read end). The first write wins;
 * every later write, and any write after the reader abandoned the
 * handle, is a silent no-op.
 */

import { RequestAbandonedError } from './errors.js';

export type CompletionState = 'pending' | 'written' | 'abandoned';

export type CompletionOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };

/**
 * Write end, owned by the scheduler
 */
export interface CompletionWriter<T> {
  /** Resolve the reader. Returns false if nothing was delivered. */
  deliver(value: T): boolean;
  /** Reject the reader. Returns false if nothing was delivered. */
  fail(error: Error): boolean;
  /** Release the handle without a value; the reader gets RequestAbandonedError */
  drop(): boolean;
  readonly isAbandoned: boolean;
  readonly state: CompletionState;
}

/**
 * Read end, owned by the caller
 */
export interface CompletionReader<T> {
  readonly id: string;
  readonly result: Promise<T>;
  /** Give up on the result; the scheduler may skip or discard it */
  abandon(): void;
  readonly isAbandoned: boolean;
}

class CompletionChannel<T> implements CompletionWriter<T>, CompletionReader<T> {
  readonly result: Promise<T>;
  private status: CompletionState = 'pending';
  private settle: ((outcome: CompletionOutcome<T>) => void) | null = null;

  constructor(readonly id: string) {
    this.result = new Promise<T>((resolve, reject) => {
      this.settle = (outcome) =>
        outcome.ok ? resolve(outcome.value) : reject(outcome.error);
    });
    // A reader that never awaits must not turn a failure into an unhandled rejection
    this.result.catch(() => undefined);
  }

  get state(): CompletionState {
    return this.status;
  }

  get isAbandoned(): boolean {
    return this.status === 'abandoned';
  }

  deliver(value: T): boolean {
    if (this.status !== 'pending') return false;
    this.status = 'written';
    this.settle?.({ ok: true, value });
    return true;
  }

  fail(error: Error): boolean {
    if (this.status !== 'pending') return false;
    this.status = 'written';
    this.settle?.({ ok: false, error });
    return true;
  }

  drop(): boolean {
    return this.fail(new RequestAbandonedError(this.id));
  }

  abandon(): void {
    if (this.status === 'pending') {
      this.status = 'abandoned';
    }
  }
}

/**
 * Create a linked writer/reader pair
 *
 * @example
 * ```typescript
 * const { writer, reader } = createCompletionHandle<SearchResult>('req-1');
 * writer.deliver(result);
 * await reader.result; // result
 * ```
 */
export function createCompletionHandle<T>(id: string): {
  writer: CompletionWriter<T>;
  reader: CompletionReader<T>;
} {
  const channel = new CompletionChannel<T>(id);
  return { writer: channel, reader: channel };
}
