/**
 * debounceLatest
 *
 * Consumes a source of values and, for each one, schedules a delayed action.
 * A newer value cancels the in-flight task, whether it is still waiting out
 * the debounce window or already running its action. Only the latest value's
 * action may run, and never two at once.
 *
 * Cancellation is the expected way for stale work to end and is never
 * reported. Any other error from the action ends the pipeline: the returned
 * promise rejects with ActionFailedError.
 */

import {
  ActionFailedError,
  InvalidTimeoutError,
  toError,
} from '../../shared/errors.js';
import { silentLogger, type Logger } from '../../shared/logger.js';
import type { DebounceSummary, TaskOutcome } from '../../shared/types.js';
import { CancellationScope } from '../scheduler/cancellation-scope.js';
import { systemClock, type Clock } from '../scheduler/clock.js';
import { PendingTask, type DebounceAction } from './pending-task.js';

export type ValueSource<T> = AsyncIterable<T> | Iterable<T>;

export interface DebounceLatestOptions<T> {
  /** Enclosing scope; cancelling it tears the pipeline down */
  scope?: CancellationScope;
  /** External abort signal, linked the same way as `scope` */
  signal?: AbortSignal;
  clock?: Clock;
  logger?: Logger;
  /** Observer called when a task is created for an accepted value */
  onTaskScheduled?: (task: PendingTask<T>) => void;
  /** Observer called once per task when it reaches a terminal state */
  onTaskSettled?: (task: PendingTask<T>, outcome: TaskOutcome) => void;
}

type Step<T> =
  | { kind: 'value'; result: IteratorResult<T> }
  | { kind: 'source-error'; error: Error }
  | { kind: 'failed'; error: ActionFailedError<T> }
  | { kind: 'cancelled' };

export function assertValidTimeout(timeoutMs: number): void {
  if (typeof timeoutMs !== 'number' || !Number.isFinite(timeoutMs) || timeoutMs < 0) {
    throw new InvalidTimeoutError(timeoutMs);
  }
}

export async function debounceLatest<T>(
  source: ValueSource<T>,
  timeoutMs: number,
  action: DebounceAction<T>,
  options: DebounceLatestOptions<T> = {},
): Promise<DebounceSummary> {
  assertValidTimeout(timeoutMs);

  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? silentLogger;
  const scope = options.scope ? options.scope.createChild() : new CancellationScope();
  const unlinkSignal = options.signal ? scope.link(options.signal) : () => {};

  const summary: DebounceSummary = {
    accepted: 0,
    executed: 0,
    cancelled: 0,
    reason: 'source-closed',
  };

  // Mutated from task callbacks; kept on an object so reads are not narrowed away
  const slot: {
    current: PendingTask<T> | null;
    failure: ActionFailedError<T> | null;
    interrupt: ((step: Step<T>) => void) | null;
  } = { current: null, failure: null, interrupt: null };

  const notify = (name: string, fn: () => void): void => {
    try {
      fn();
    } catch (err) {
      logger.warn(`${name} observer threw:`, toError(err).message);
    }
  };

  const onSettled = (task: PendingTask<T>, outcome: TaskOutcome): void => {
    switch (outcome.status) {
      case 'completed':
        summary.executed++;
        logger.debug(`Task #${task.sequence} completed`);
        break;
      case 'cancelled':
        summary.cancelled++;
        logger.debug(`Task #${task.sequence} cancelled`);
        break;
      case 'failed':
        logger.error(`Task #${task.sequence} failed:`, outcome.error.message);
        if (!slot.failure) {
          slot.failure = new ActionFailedError(task.value, task.sequence, outcome.error);
          slot.interrupt?.({ kind: 'failed', error: slot.failure });
        }
        break;
    }

    notify('onTaskSettled', () => options.onTaskSettled?.(task, outcome));
  };

  const accept = (value: T): void => {
    summary.accepted++;
    const previous = slot.current;
    if (previous && !previous.isTerminal) {
      previous.cancel('Superseded by a newer value');
      logger.debug(`Task #${previous.sequence} superseded by #${summary.accepted}`);
    }

    const task = new PendingTask(value, summary.accepted, {
      parentScope: scope,
      timeoutMs,
      action,
      clock,
      predecessor: previous,
    });
    slot.current = task;
    void task.start().then((outcome) => onSettled(task, outcome));
    notify('onTaskScheduled', () => options.onTaskScheduled?.(task));
  };

  const iterator = toAsyncIterator(source);
  let sourceDone = false;

  const releaseSource = (): void => {
    if (sourceDone || !iterator.return) return;
    sourceDone = true;
    Promise.resolve(iterator.return()).catch((err: unknown) => {
      logger.debug('Source did not close cleanly:', toError(err).message);
    });
  };

  const stopStep = (): Step<T> | null => {
    if (slot.failure) return { kind: 'failed', error: slot.failure };
    if (scope.isCancelled) return { kind: 'cancelled' };
    return null;
  };

  // Listeners live for one turn only, so a long source does not pile them up
  const nextStep = (): Promise<Step<T>> => {
    let removeCancel = (): void => {};
    return new Promise<Step<T>>((resolve) => {
      slot.interrupt = resolve;
      removeCancel = scope.onCancel(() => resolve({ kind: 'cancelled' }));
      void pull(iterator).then(resolve);
    }).finally(() => {
      slot.interrupt = null;
      removeCancel();
    });
  };

  const teardown = async (): Promise<void> => {
    const last = slot.current;
    if (last) {
      last.cancel('Pipeline stopped');
      await last.settled;
    }
  };

  try {
    while (true) {
      const step = stopStep() ?? (await nextStep());

      if (step.kind === 'value') {
        if (step.result.done) {
          sourceDone = true;
          break;
        }
        // Stopped while the value was in flight; the next turn handles it
        if (stopStep()) continue;
        accept(step.result.value);
        continue;
      }

      releaseSource();
      await teardown();

      switch (step.kind) {
        case 'failed':
          throw step.error;
        case 'source-error':
          throw step.error;
        case 'cancelled':
          summary.reason = 'cancelled';
          logger.debug('Pipeline cancelled');
          return summary;
      }
    }

    // Source closed: the last task still gets its chance to run
    const last = slot.current;
    if (last) {
      await last.settled;
    }
    if (slot.failure) throw slot.failure;
    if (scope.isCancelled) summary.reason = 'cancelled';
    return summary;
  } finally {
    unlinkSignal();
    scope.dispose();
  }
}

/** Pull the next value without ever rejecting. */
function pull<T>(iterator: AsyncIterator<T>): Promise<Step<T>> {
  return iterator.next().then(
    (result): Step<T> => ({ kind: 'value', result }),
    (err: unknown): Step<T> => ({ kind: 'source-error', error: toError(err) }),
  );
}

function isAsyncIterable<T>(source: ValueSource<T>): source is AsyncIterable<T> {
  return Symbol.asyncIterator in source;
}

function toAsyncIterator<T>(source: ValueSource<T>): AsyncIterator<T> {
  if (isAsyncIterable(source)) {
    return source[Symbol.asyncIterator]();
  }
  return fromIterable(source)[Symbol.asyncIterator]();
}

async function* fromIterable<T>(source: Iterable<T>): AsyncGenerator<T> {
  yield* source;
}
