/**
 * Notification Channel
 * Bounded queue between the BLE receive path and its consumer.
 * push() never blocks: when full, the oldest payload is dropped and counted.
 */

import { CircularBuffer } from '../shared/CircularBuffer';
import type { CharacteristicKey } from '../glove-protocol/types';

export interface RawNotification {
  readonly key: CharacteristicKey;
  readonly payload: Buffer;
  /** Monotonic host receive time (ms) */
  readonly hostMs: number;
}

export interface ChannelStats {
  capacity: number;
  queued: number;
  pushed: number;
  dropped: number;
  closed: boolean;
}

export class NotificationChannel<T> implements AsyncIterable<T> {
  private readonly buffer: CircularBuffer<T>;
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private pushed = 0;
  private closed = false;

  constructor(readonly name: string, capacity: number) {
    this.buffer = new CircularBuffer<T>(capacity);
  }

  /**
   * Enqueue without blocking.
   * @returns false once the channel is closed
   */
  push(item: T): boolean {
    if (this.closed) return false;
    this.pushed++;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return true;
    }

    this.buffer.push(item);
    return true;
  }

  /**
   * Take the oldest item, waiting for one if the channel is empty.
   * Resolves done once the channel is closed and drained.
   */
  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise(resolve => this.waiters.push(resolve));
  }

  tryShift(): T | undefined {
    return this.buffer.shift();
  }

  /**
   * Stop accepting items; consumers drain what is left, then finish.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach(resolve => resolve({ value: undefined, done: true }));
  }

  isClosed(): boolean {
    return this.closed;
  }

  getStats(): ChannelStats {
    return {
      capacity: this.buffer.capacity,
      queued: this.buffer.size(),
      pushed: this.pushed,
      dropped: this.buffer.getDroppedCount(),
      closed: this.closed,
    };
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
    };
  }
}
