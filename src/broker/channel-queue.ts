/**
 * Channel Queue - Bounded FIFO with a bounded wait
 *
 * One queue per channel. Producers never block: offer() either accepts the
 * item or reports the queue full. The single consumer waits with take(),
 * which resolves to null when the wait times out or is interrupted.
 */

import { BusErrorCode, ConfigurationError } from './errors.js';

type Waiter<T> = (item: T | null) => void;

export class ChannelQueue<T extends object> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ConfigurationError(
        BusErrorCode.INVALID_OPTION,
        `Queue capacity must be a positive integer, got ${capacity}`,
        { capacity }
      );
    }
  }

  /**
   * Number of items waiting to be taken
   */
  get size(): number {
    return this.items.length;
  }

  isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  /**
   * Non-blocking enqueue
   *
   * @returns false if the queue is at capacity
   */
  offer(item: T): boolean {
    // Queue is empty whenever someone is waiting, so hand-off keeps FIFO order
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }

    if (this.isFull()) {
      return false;
    }

    this.items.push(item);
    return true;
  }

  /**
   * Dequeue the head, waiting up to timeoutMs for one to arrive
   */
  take(timeoutMs: number): Promise<T | null> {
    const head = this.items.shift();
    if (head !== undefined) {
      return Promise.resolve(head);
    }

    return new Promise<T | null>((resolve) => {
      const waiter: Waiter<T> = (item) => {
        clearTimeout(timer);
        resolve(item);
      };

      const timer = setTimeout(() => {
        this.removeWaiter(waiter);
        resolve(null);
      }, timeoutMs);

      this.waiters.push(waiter);
    });
  }

  /**
   * Wake every pending take() with null
   */
  interrupt(): void {
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }

  /**
   * Drop every queued item
   *
   * @returns Number of items dropped
   */
  clear(): number {
    const dropped = this.items.length;
    this.items = [];
    return dropped;
  }

  private removeWaiter(waiter: Waiter<T>): void {
    const index = this.waiters.indexOf(waiter);
    if (index !== -1) {
      this.waiters.splice(index, 1);
    }
  }
}
