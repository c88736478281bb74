import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { getEventListeners } from 'node:events';
import { debounceLatest } from './debounce-latest.js';
import type { PendingTask } from './pending-task.js';
import { Channel } from '../source/channel.js';
import { CancellationScope } from '../scheduler/cancellation-scope.js';
import {
  ActionFailedError,
  InvalidTimeoutError,
} from '../../shared/errors.js';
import type { TaskOutcome } from '../../shared/types.js';

async function flushMicrotasks(): Promise<void> {
  for (let i = 0; i < 20; i++) {
    await Promise.resolve();
  }
}

describe('debounceLatest', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // -------------------------------------------------------
  // Latest wins
  // -------------------------------------------------------

  it('runs only the last of values arriving faster than the timeout', async () => {
    const source = new Channel<number>();
    const executed: number[] = [];
    const run = debounceLatest(source, 1000, (value) => {
      executed.push(value);
    });

    source.send(1);
    await vi.advanceTimersByTimeAsync(500);
    source.send(2);
    await vi.advanceTimersByTimeAsync(500);
    source.send(3);

    await vi.advanceTimersByTimeAsync(999);
    expect(executed).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    expect(executed).toEqual([3]);

    source.close();
    await expect(run).resolves.toEqual({
      accepted: 3,
      executed: 1,
      cancelled: 2,
      reason: 'source-closed',
    });
  });

  it('runs every value whose window elapsed before the next one', async () => {
    const source = new Channel<string>();
    const executed: string[] = [];
    const run = debounceLatest(source, 100, (value) => {
      executed.push(value);
    });

    source.send('a');
    await vi.advanceTimersByTimeAsync(150);
    source.send('b');
    await vi.advanceTimersByTimeAsync(150);

    expect(executed).toEqual(['a', 'b']);
    source.close();
    await expect(run).resolves.toMatchObject({ executed: 2, cancelled: 0 });
  });

  it('coalesces a synchronous iterable down to its last value', async () => {
    const executed: number[] = [];
    const run = debounceLatest([1, 2, 3], 50, (value) => {
      executed.push(value);
    });

    await vi.advanceTimersByTimeAsync(50);

    expect(executed).toEqual([3]);
    await expect(run).resolves.toEqual({
      accepted: 3,
      executed: 1,
      cancelled: 2,
      reason: 'source-closed',
    });
  });

  it('still runs the pending value after the source closes', async () => {
    const source = new Channel<number>();
    const executed: number[] = [];
    const run = debounceLatest(source, 200, (value) => {
      executed.push(value);
    });

    source.send(7);
    source.close();
    await vi.advanceTimersByTimeAsync(200);

    expect(executed).toEqual([7]);
    await expect(run).resolves.toMatchObject({ accepted: 1, executed: 1, reason: 'source-closed' });
  });

  // -------------------------------------------------------
  // Mid-action cancellation
  // -------------------------------------------------------

  it('cancels a running action when a newer value arrives', async () => {
    const source = new Channel<number>();
    const started: number[] = [];
    const executed: number[] = [];
    const run = debounceLatest(source, 500, async (value, context) => {
      started.push(value);
      await context.delay(1000);
      executed.push(value);
    });

    source.send(1);
    await vi.advanceTimersByTimeAsync(500);
    expect(started).toEqual([1]);

    await vi.advanceTimersByTimeAsync(200);
    source.send(2);

    await vi.advanceTimersByTimeAsync(500); // t = 1200
    expect(started).toEqual([1, 2]);
    expect(executed).toEqual([]);

    await vi.advanceTimersByTimeAsync(1000); // t = 2200
    expect(executed).toEqual([2]);

    source.close();
    await expect(run).resolves.toEqual({
      accepted: 2,
      executed: 1,
      cancelled: 1,
      reason: 'source-closed',
    });
  });

  it('never runs two actions at once, even when an action ignores its signal', async () => {
    const source = new Channel<number>();
    const executed: number[] = [];
    let running = 0;
    let maxRunning = 0;

    const run = debounceLatest(source, 100, async (value) => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      await new Promise<void>((resolve) => setTimeout(resolve, 1000));
      running--;
      executed.push(value);
    });

    source.send(1);
    await vi.advanceTimersByTimeAsync(200); // action 1 running until t = 1100
    source.send(2);
    await vi.advanceTimersByTimeAsync(2000); // action 2 runs 1100 -> 2100

    expect(maxRunning).toBe(1);
    expect(executed).toEqual([1, 2]);

    source.close();
    // Action 1 returned after cancellation was requested: not counted as executed
    await expect(run).resolves.toMatchObject({ executed: 1, cancelled: 1 });
  });

  // -------------------------------------------------------
  // Pipeline cancellation
  // -------------------------------------------------------

  it('never runs a value when the pipeline is cancelled right after it arrives', async () => {
    const source = new Channel<number>();
    const controller = new AbortController();
    const executed: number[] = [];
    const run = debounceLatest(source, 1000, (value) => {
      executed.push(value);
    }, { signal: controller.signal });

    source.send(1);
    controller.abort();
    await vi.advanceTimersByTimeAsync(2000);

    expect(executed).toEqual([]);
    await expect(run).resolves.toMatchObject({ executed: 0, reason: 'cancelled' });
  });

  it('drops a value waiting out its delay when the pipeline is cancelled', async () => {
    const source = new Channel<number>();
    const controller = new AbortController();
    const executed: number[] = [];
    const run = debounceLatest(source, 1000, (value) => {
      executed.push(value);
    }, { signal: controller.signal });

    source.send(42);
    await vi.advanceTimersByTimeAsync(500);
    controller.abort();
    await vi.advanceTimersByTimeAsync(1500);

    expect(executed).toEqual([]);
    await expect(run).resolves.toEqual({
      accepted: 1,
      executed: 0,
      cancelled: 1,
      reason: 'cancelled',
    });
  });

  it('cancels a running action when the enclosing scope is cancelled', async () => {
    const source = new Channel<number>();
    const scope = new CancellationScope();
    const executed: number[] = [];
    const run = debounceLatest(source, 100, async (value, context) => {
      await context.delay(500);
      executed.push(value);
    }, { scope });

    source.send(1);
    await vi.advanceTimersByTimeAsync(300);
    scope.cancel('shutting down');
    await vi.advanceTimersByTimeAsync(1000);

    expect(executed).toEqual([]);
    await expect(run).resolves.toMatchObject({ accepted: 1, cancelled: 1, reason: 'cancelled' });
    expect(scope.childCount).toBe(0);
  });

  it('releases the source when cancelled', async () => {
    const source = new Channel<number>();
    const controller = new AbortController();
    const run = debounceLatest(source, 100, () => {}, { signal: controller.signal });

    controller.abort();
    await run;

    expect(source.isClosed).toBe(true);
  });

  it('stops pulling from the source once cancelled', async () => {
    const values = [1, 2, 3];
    let pulls = 0;
    const source: AsyncIterable<number> = {
      [Symbol.asyncIterator]: () => ({
        next: async (): Promise<IteratorResult<number>> => {
          pulls++;
          const value = values.shift();
          return value === undefined ? { value: undefined, done: true } : { value, done: false };
        },
      }),
    };
    const scope = new CancellationScope();

    const summary = await debounceLatest(source, 100, () => {}, {
      scope,
      onTaskScheduled: () => scope.cancel('enough'),
    });

    expect(pulls).toBe(1);
    expect(values).toEqual([2, 3]);
    expect(summary).toEqual({ accepted: 1, executed: 0, cancelled: 1, reason: 'cancelled' });
  });

  it('does not accumulate cancellation listeners over a long source', async () => {
    let pipelineScope: CancellationScope | null = null;
    class RecordingScope extends CancellationScope {
      override createChild(): CancellationScope {
        const child = super.createChild();
        pipelineScope ??= child;
        return child;
      }
    }
    const counts: number[] = [];
    const values = Array.from({ length: 2000 }, (_, i) => i + 1);

    const run = debounceLatest(values, 0, () => {}, {
      scope: new RecordingScope(),
      onTaskScheduled: () => {
        if (pipelineScope) counts.push(getEventListeners(pipelineScope.signal, 'abort').length);
      },
    });
    await vi.advanceTimersByTimeAsync(0);

    await expect(run).resolves.toEqual({
      accepted: 2000,
      executed: 1,
      cancelled: 1999,
      reason: 'source-closed',
    });
    expect(counts).toHaveLength(2000);
    expect(Math.max(...counts)).toBeLessThanOrEqual(1);
  });

  // -------------------------------------------------------
  // Zero timeout
  // -------------------------------------------------------

  it('defers a zero-timeout action to the next timer turn', async () => {
    const source = new Channel<number>();
    const executed: number[] = [];
    const run = debounceLatest(source, 0, (value) => {
      executed.push(value);
    });

    source.send(1);
    await flushMicrotasks();
    expect(executed).toEqual([]);

    await vi.advanceTimersByTimeAsync(0);
    expect(executed).toEqual([1]);

    source.close();
    await run;
  });

  // -------------------------------------------------------
  // Failures
  // -------------------------------------------------------

  it('rejects with ActionFailedError and stops accepting after an action throws', async () => {
    const source = new Channel<number>();
    const executed: number[] = [];
    const run = debounceLatest(source, 100, (value) => {
      if (value === 2) throw new Error('boom');
      executed.push(value);
    });
    const result = run.then(() => null, (err: unknown) => err);

    source.send(1);
    await vi.advanceTimersByTimeAsync(150);
    source.send(2);
    await vi.advanceTimersByTimeAsync(150);

    const error = await result;
    expect(error).toBeInstanceOf(ActionFailedError);
    if (!(error instanceof ActionFailedError)) return;
    expect(error.value).toBe(2);
    expect(error.sequence).toBe(2);
    expect(error.code).toBe('ACTION_FAILED');
    expect(error.cause?.message).toBe('boom');
    expect(executed).toEqual([1]);
    expect(source.isClosed).toBe(true);
  });

  it('cancels the waiting value when an earlier action fails', async () => {
    const source = new Channel<number>();
    const executed: number[] = [];
    const run = debounceLatest(source, 100, async (value) => {
      await new Promise<void>((resolve) => setTimeout(resolve, 300));
      if (value === 1) throw new Error('first failed');
      executed.push(value);
    });
    const result = run.then(() => null, (err: unknown) => err);

    source.send(1);
    await vi.advanceTimersByTimeAsync(200); // action 1 running until t = 400
    source.send(2);
    await vi.advanceTimersByTimeAsync(1000);

    const error = await result;
    expect(error).toBeInstanceOf(ActionFailedError);
    if (!(error instanceof ActionFailedError)) return;
    expect(error.value).toBe(1);
    expect(executed).toEqual([]);
  });

  it('fails the pipeline when the action aborts work of its own', async () => {
    const run = debounceLatest([1], 10, () => {
      const controller = new AbortController();
      controller.abort();
      controller.signal.throwIfAborted();
    });
    const result = run.then(() => null, (err: unknown) => err);

    await vi.advanceTimersByTimeAsync(10);

    const error = await result;
    expect(error).toBeInstanceOf(ActionFailedError);
    if (!(error instanceof ActionFailedError)) return;
    expect(error.sequence).toBe(1);
    expect(error.cause?.name).toBe('AbortError');
  });

  it('does not treat a cancelled action as a failure', async () => {
    const source = new Channel<number>();
    const run = debounceLatest(source, 10, async (_value, context) => {
      await context.delay(100);
      context.throwIfCancelled();
    });

    source.send(1);
    await vi.advanceTimersByTimeAsync(50);
    source.send(2);
    await vi.advanceTimersByTimeAsync(200);
    source.close();

    await expect(run).resolves.toMatchObject({ executed: 1, cancelled: 1, reason: 'source-closed' });
  });

  it('propagates source errors after tearing down the pending task', async () => {
    async function* failingSource(): AsyncGenerator<number> {
      yield 1;
      throw new Error('source broke');
    }
    const executed: number[] = [];
    const run = debounceLatest(failingSource(), 100, (value) => {
      executed.push(value);
    });
    const result = run.then(() => null, (err: unknown) => err);

    await vi.advanceTimersByTimeAsync(200);

    const error = await result;
    expect(error).toBeInstanceOf(Error);
    expect(error instanceof Error ? error.message : null).toBe('source broke');
    expect(executed).toEqual([]);
  });

  it.each([-1, Number.NaN, Number.POSITIVE_INFINITY])(
    'rejects an invalid timeout (%s)',
    async (timeoutMs) => {
      await expect(debounceLatest(new Channel<number>(), timeoutMs, () => {})).rejects.toBeInstanceOf(
        InvalidTimeoutError,
      );
    },
  );

  // -------------------------------------------------------
  // Observers
  // -------------------------------------------------------

  it('reports scheduled and settled tasks to observers', async () => {
    const source = new Channel<string>();
    const scheduled: number[] = [];
    const settled: Array<[number, TaskOutcome['status']]> = [];
    const run = debounceLatest(source, 100, () => {}, {
      onTaskScheduled: (task: PendingTask<string>) => scheduled.push(task.sequence),
      onTaskSettled: (task, outcome) => settled.push([task.sequence, outcome.status]),
    });

    source.send('x');
    await vi.advanceTimersByTimeAsync(50);
    source.send('y');
    await vi.advanceTimersByTimeAsync(100);
    source.close();
    await run;

    expect(scheduled).toEqual([1, 2]);
    expect(settled).toEqual([
      [1, 'cancelled'],
      [2, 'completed'],
    ]);
  });

  it('keeps running when an observer throws', async () => {
    const source = new Channel<number>();
    const warn = vi.fn();
    const logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() };
    const run = debounceLatest(source, 10, () => {}, {
      logger,
      onTaskSettled: () => {
        throw new Error('observer bug');
      },
    });

    source.send(1);
    await vi.advanceTimersByTimeAsync(10);
    source.close();

    await expect(run).resolves.toMatchObject({ executed: 1 });
    expect(warn).toHaveBeenCalledWith('onTaskSettled observer threw:', 'observer bug');
  });
});
