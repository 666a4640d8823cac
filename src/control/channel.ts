/**
 * FIFO channel with a non-blocking poll and an awaiting receive.
 *
 * Controllers keep one channel per direction. Receivers poll behind
 * `isEmpty()`; `ready()`/`receive()` are the only suspension points.
 *
 * @module control/channel
 */

import { ControlError, ErrorCode } from './protocol.js';

export class Channel<T extends {}> {
  private items: T[] = [];
  private waiters: Array<() => void> = [];

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  push(item: T): void {
    this.items.push(item);
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }

  /**
   * Remove and return the oldest item, or undefined when empty
   */
  poll(): T | undefined {
    return this.items.shift();
  }

  /**
   * Remove and return the oldest item. Throws on an empty channel.
   */
  take(): T {
    const item = this.items.shift();
    if (item === undefined) {
      throw new ControlError(ErrorCode.EMPTY_QUEUE);
    }
    return item;
  }

  /** Number of pending ready() calls */
  get waiting(): number {
    return this.waiters.length;
  }

  /**
   * Resolves once the channel holds at least one item, or early when
   * `signal` aborts. An aborted wait is removed from the channel.
   */
  ready(signal?: AbortSignal): Promise<void> {
    if (!this.isEmpty() || signal?.aborted) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      const wake = (): void => {
        signal?.removeEventListener('abort', cancel);
        resolve();
      };
      const cancel = (): void => {
        this.waiters = this.waiters.filter(waiter => waiter !== wake);
        resolve();
      };
      this.waiters.push(wake);
      signal?.addEventListener('abort', cancel, { once: true });
    });
  }

  /**
   * Wait for an item and remove it
   */
  async receive(): Promise<T> {
    for (;;) {
      const item = this.poll();
      if (item !== undefined) {
        return item;
      }
      await this.ready();
    }
  }

  /**
   * Drop every queued item. Pending waiters keep waiting.
   */
  clear(): void {
    this.items = [];
  }
}
