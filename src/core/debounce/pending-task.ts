/**
 * PendingTask
 *
 * One unit of deferred, cancellable work for a single accepted value:
 * wait the debounce window, wait for the predecessor to settle, then run the
 * action unless the predecessor failed. The task owns a child
 * CancellationScope; the operator cancels it when a newer value arrives, and
 * the parent scope cancels it on teardown.
 *
 *   scheduled -> running -> completed
 *   scheduled | running -> cancelled
 *   scheduled | running -> failed
 */

import {
  CancellationError,
  IllegalTaskStateError,
  isCancellation,
  toError,
} from '../../shared/errors.js';
import {
  TERMINAL_STATES,
  type TaskOutcome,
  type TaskState,
} from '../../shared/types.js';
import { CancellationScope } from '../scheduler/cancellation-scope.js';
import { systemClock, type Clock } from '../scheduler/clock.js';
import { delay } from '../scheduler/delay.js';

/** Suspension points and identity handed to the action. */
export interface ActionContext {
  /** Aborted when the task is superseded or torn down */
  readonly signal: AbortSignal;
  /** Arrival index of the value, starting at 1 */
  readonly sequence: number;
  /** Throws CancellationError if cancellation was requested */
  throwIfCancelled(): void;
  /** Cancellable sleep on the operator's clock */
  delay(ms: number): Promise<void>;
}

export type DebounceAction<T> = (
  value: T,
  context: ActionContext,
) => void | Promise<void>;

export interface PendingTaskOptions<T> {
  parentScope: CancellationScope;
  timeoutMs: number;
  action: DebounceAction<T>;
  clock?: Clock;
  /** Task this one must not overlap with */
  predecessor?: PendingTask<T> | null;
}

const TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  scheduled: ['running', 'cancelled', 'failed'],
  running: ['completed', 'cancelled', 'failed'],
  completed: [],
  cancelled: [],
  failed: [],
};

export class PendingTask<T> {
  readonly settled: Promise<TaskOutcome>;

  private currentState: TaskState = 'scheduled';
  private started = false;
  private predecessor: PendingTask<T> | null;
  private readonly scope: CancellationScope;
  private readonly timeoutMs: number;
  private readonly action: DebounceAction<T>;
  private readonly clock: Clock;
  private resolveSettled: (outcome: TaskOutcome) => void = () => {};

  constructor(
    readonly value: T,
    readonly sequence: number,
    options: PendingTaskOptions<T>,
  ) {
    this.scope = options.parentScope.createChild();
    this.timeoutMs = options.timeoutMs;
    this.action = options.action;
    this.clock = options.clock ?? systemClock;
    this.predecessor = options.predecessor ?? null;
    this.settled = new Promise<TaskOutcome>((resolve) => {
      this.resolveSettled = resolve;
    });
  }

  get state(): TaskState {
    return this.currentState;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATES.has(this.currentState);
  }

  /** Cancellation was requested; the task may still be unwinding. */
  get isCancellationRequested(): boolean {
    return this.scope.isCancelled;
  }

  get signal(): AbortSignal {
    return this.scope.signal;
  }

  /**
   * Begin the work. Idempotent; the returned promise is `settled` and never
   * rejects, failures are carried in the outcome.
   */
  start(): Promise<TaskOutcome> {
    if (!this.started && !this.isTerminal) {
      this.started = true;
      void this.execute();
    }
    return this.settled;
  }

  /** Request cancellation. No-op once terminal. */
  cancel(reason?: string): void {
    if (this.isTerminal) return;
    this.scope.cancel(reason);
    if (!this.started) {
      this.finish({ status: 'cancelled' });
    }
  }

  private async execute(): Promise<void> {
    try {
      await delay(this.timeoutMs, this.scope.signal, this.clock);

      if (this.predecessor) {
        const previous = await this.predecessor.settled;
        this.predecessor = null;
        if (previous.status === 'failed') {
          // The pipeline is going down; nothing runs after a failure
          this.scope.cancel(new CancellationError('Predecessor failed'));
        }
      }
      this.scope.throwIfCancelled();

      this.transition('running');
      await this.action(this.value, this.createContext());
      // An action that ignored its signal still must not count as progress
      this.scope.throwIfCancelled();

      this.finish({ status: 'completed' });
    } catch (err) {
      // An abort the action raised for work of its own is a failure
      if (isCancellation(err) && this.scope.isCancelled) {
        this.finish({ status: 'cancelled' });
      } else {
        this.finish({ status: 'failed', error: toError(err) });
      }
    }
  }

  private createContext(): ActionContext {
    const scope = this.scope;
    const clock = this.clock;
    return {
      signal: scope.signal,
      sequence: this.sequence,
      throwIfCancelled: () => scope.throwIfCancelled(),
      delay: (ms: number) => delay(ms, scope.signal, clock),
    };
  }

  private transition(next: TaskState): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new IllegalTaskStateError(this.currentState, next);
    }
    this.currentState = next;
  }

  private finish(outcome: TaskOutcome): void {
    if (this.isTerminal) return;
    this.transition(outcome.status);
    this.predecessor = null;
    this.scope.dispose();
    this.resolveSettled(outcome);
  }
}
