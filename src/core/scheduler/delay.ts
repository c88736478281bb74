/**
 * Cancellable delay
 */

import { CancellationError } from '../../shared/errors.js';
import { systemClock, type Clock } from './clock.js';

/**
 * Resolve after `ms` on the given clock, or reject with CancellationError
 * as soon as `signal` aborts. A zero delay still waits for the next timer
 * turn.
 */
export function delay(
  ms: number,
  signal?: AbortSignal,
  clock: Clock = systemClock,
): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancellationError('Delay cancelled'));
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clock.clearTimeout(handle);
      reject(new CancellationError('Delay cancelled'));
    };

    const handle = clock.setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
