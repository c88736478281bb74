/**
 * Clock abstraction, injectable for deterministic testing.
 *
 * `systemClock` resolves the global timer functions on every call, so
 * `vi.useFakeTimers()` takes effect even after this module has loaded.
 */

export type TimerHandle = ReturnType<typeof globalThis.setTimeout>;

export interface Clock {
  now(): number;
  setTimeout(fn: () => void, ms: number): TimerHandle;
  clearTimeout(handle: TimerHandle): void;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  setTimeout: (fn, ms) => globalThis.setTimeout(fn, ms),
  clearTimeout: (handle) => globalThis.clearTimeout(handle),
};
