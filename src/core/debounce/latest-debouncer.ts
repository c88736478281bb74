/**
 * LatestDebouncer
 *
 * Push-style front end for debounceLatest(): callers hand values to `push()`
 * as they happen (keystrokes, resize events) instead of providing a source.
 */

import type { Logger } from '../../shared/logger.js';
import type { DebounceSummary } from '../../shared/types.js';
import { CancellationScope } from '../scheduler/cancellation-scope.js';
import type { Clock } from '../scheduler/clock.js';
import { Channel } from '../source/channel.js';
import { debounceLatest, assertValidTimeout } from './debounce-latest.js';
import type { DebounceAction, PendingTask } from './pending-task.js';

export interface LatestDebouncerOptions {
  scope?: CancellationScope;
  clock?: Clock;
  logger?: Logger;
}

export class LatestDebouncer<T> {
  /** Settles when the pipeline stops; rejects with ActionFailedError on failure */
  readonly done: Promise<DebounceSummary>;

  private readonly channel = new Channel<T>();
  private readonly scope: CancellationScope;
  private pending: PendingTask<T> | null = null;

  constructor(timeoutMs: number, action: DebounceAction<T>, options: LatestDebouncerOptions = {}) {
    assertValidTimeout(timeoutMs);
    this.scope = options.scope ? options.scope.createChild() : new CancellationScope();

    this.done = debounceLatest(this.channel, timeoutMs, action, {
      scope: this.scope,
      clock: options.clock,
      logger: options.logger,
      onTaskScheduled: (task) => {
        this.pending = task;
      },
      onTaskSettled: (task) => {
        if (this.pending === task) this.pending = null;
      },
    }).finally(() => {
      this.channel.close();
      this.scope.dispose();
    });
  }

  /**
   * Offer a value. Returns false once the debouncer no longer accepts values
   * (closed, cancelled or failed).
   */
  push(value: T): boolean {
    if (this.channel.isClosed || this.scope.isCancelled) return false;
    this.channel.send(value);
    return true;
  }

  /** Stop accepting values; the pending value still gets its chance to run. */
  close(): void {
    this.channel.close();
  }

  /** Cancel the pending task (waiting or running) and stop. */
  cancel(reason = 'Debouncer cancelled'): void {
    this.scope.cancel(reason);
    this.channel.close();
  }

  /** Sequence number of the value waiting or running, if any */
  get pendingSequence(): number | null {
    return this.pending ? this.pending.sequence : null;
  }

  get isActive(): boolean {
    return !this.channel.isClosed && !this.scope.isCancelled;
  }
}
