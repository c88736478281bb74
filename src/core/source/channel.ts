/**
 * Channel
 *
 * Unbounded single-consumer push channel exposed as an AsyncIterable.
 * Producers call `send()`; the consumer iterates with `for await` or hands
 * the channel to `debounceLatest()` as its source.
 */

import { ChannelClosedError } from '../../shared/errors.js';

export class Channel<T> implements AsyncIterable<T> {
  private buffer: Array<{ value: T }> = [];
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  send(value: T): void {
    if (this.closed) {
      throw new ChannelClosedError();
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
    } else {
      this.buffer.push({ value });
    }
  }

  /** Stop accepting values. Buffered values are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters) {
      waiter({ value: undefined, done: true });
    }
    this.waiters = [];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Values sent but not yet consumed */
  get size(): number {
    return this.buffer.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        this.buffer = [];
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    const entry = this.buffer.shift();
    if (entry) {
      return Promise.resolve({ value: entry.value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
