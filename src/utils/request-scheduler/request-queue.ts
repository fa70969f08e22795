/**
 * RequestQueue
 *
 * FIFO channel with many producers and a single consumer.
 * With a capacity, producers wait for space instead of failing; once
 * closed, new pushes are refused while queued items still drain.
 */

import { SchedulerUnavailableError } from './errors.js';

interface BlockedProducer<T> {
  item: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

export class RequestQueue<T> {
  private readonly items: T[] = [];
  private readonly blockedProducers: BlockedProducer<T>[] = [];
  private waitingConsumer: ((item: T | null) => void) | null = null;
  private closed = false;

  /**
   * @param capacity - Maximum queued items; undefined for an unbounded queue
   * @param ownerName - Used in SchedulerUnavailableError messages
   */
  constructor(
    readonly capacity?: number,
    private readonly ownerName = 'RequestScheduler'
  ) {
    if (capacity !== undefined && (!Number.isInteger(capacity) || capacity < 1)) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Number of producers waiting for space
   */
  get blockedCount(): number {
    return this.blockedProducers.length;
  }

  /**
   * Append an item
   *
   * Resolves once the item is in the queue (or handed to the consumer).
   * Rejects with SchedulerUnavailableError if the queue is, or becomes,
   * closed before that.
   */
  push(item: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new SchedulerUnavailableError(this.ownerName));
    }

    if (this.handToConsumer(item)) {
      return Promise.resolve();
    }

    if (this.capacity === undefined || this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.blockedProducers.push({ item, resolve, reject });
    });
  }

  /**
   * Insert an item ahead of everything queued
   *
   * Used for re-dispatch; ignores the capacity and the closed flag so
   * work already accepted is never lost.
   */
  pushFront(item: T): void {
    if (!this.handToConsumer(item)) {
      this.items.unshift(item);
    }
  }

  /**
   * Take the next item, or null once the queue is closed and empty
   */
  next(): Promise<T | null> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      this.admitBlockedProducer();
      return Promise.resolve(item);
    }

    if (this.closed) {
      return Promise.resolve(null);
    }

    if (this.waitingConsumer) {
      return Promise.reject(new Error('RequestQueue supports a single consumer'));
    }

    return new Promise<T | null>((resolve) => {
      this.waitingConsumer = resolve;
    });
  }

  /**
   * Refuse further pushes
   *
   * Producers still waiting for space are rejected; queued items stay
   * available to the consumer.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const producer of this.blockedProducers.splice(0)) {
      producer.reject(new SchedulerUnavailableError(this.ownerName));
    }

    if (this.items.length === 0 && this.waitingConsumer) {
      const consumer = this.waitingConsumer;
      this.waitingConsumer = null;
      consumer(null);
    }
  }

  /**
   * Remove and return every queued item
   */
  clear(): T[] {
    const drained = this.items.splice(0);
    while (this.admitBlockedProducer()) {
      drained.push(...this.items.splice(0));
    }
    return drained;
  }

  private handToConsumer(item: T): boolean {
    if (!this.waitingConsumer) return false;
    const consumer = this.waitingConsumer;
    this.waitingConsumer = null;
    consumer(item);
    return true;
  }

  private admitBlockedProducer(): boolean {
    const producer = this.blockedProducers.shift();
    if (!producer) return false;
    this.items.push(producer.item);
    producer.resolve();
    return true;
  }
}
