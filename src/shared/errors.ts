/**
 * Error hierarchy
 *
 * Cancellation is a signal, not a failure: CancellationError exists so that
 * aborted work can unwind through ordinary try/finally paths and be told apart
 * from real failures by `isCancellation()`.
 */

export class DebounceError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: Error,
  ) {
    super(message);
    this.name = 'DebounceError';
  }
}

// --- Config ---

export class ConfigError extends DebounceError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor(path: string) {
    super(`Configuration not found: ${path}. Run 'debounce-latest init' first.`);
    this.name = 'ConfigNotFoundError';
  }
}

export class InvalidTimeoutError extends DebounceError {
  constructor(timeoutMs: unknown) {
    super(
      `Timeout must be a non-negative finite number of milliseconds, got ${String(timeoutMs)}`,
      'INVALID_TIMEOUT',
    );
    this.name = 'InvalidTimeoutError';
  }
}

// --- Cancellation ---

export class CancellationError extends DebounceError {
  constructor(message = 'Operation was cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancellationError';
  }
}

/**
 * True for the expected abort path: our own CancellationError, or the
 * AbortError that host APIs (timers/promises, child_process, fetch) raise
 * when handed an aborted signal.
 */
export function isCancellation(error: unknown): boolean {
  if (error instanceof CancellationError) return true;
  return error instanceof Error && error.name === 'AbortError';
}

// --- Tasks ---

export class ActionFailedError<T = unknown> extends DebounceError {
  constructor(
    public readonly value: T,
    public readonly sequence: number,
    cause: Error,
  ) {
    super(`Action failed for value #${sequence}: ${cause.message}`, 'ACTION_FAILED', cause);
    this.name = 'ActionFailedError';
  }
}

export class IllegalTaskStateError extends DebounceError {
  constructor(from: string, to: string) {
    super(`Illegal task transition: ${from} -> ${to}`, 'ILLEGAL_TASK_STATE');
    this.name = 'IllegalTaskStateError';
  }
}

// --- Sources ---

export class ChannelClosedError extends DebounceError {
  constructor() {
    super('Cannot send on a closed channel', 'CHANNEL_CLOSED');
    this.name = 'ChannelClosedError';
  }
}

// --- CLI ---

export class CommandFailedError extends DebounceError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null = null,
  ) {
    super(
      signal
        ? `Command terminated by ${signal}: ${command}`
        : `Command exited with code ${String(exitCode)}: ${command}`,
      'COMMAND_FAILED',
    );
    this.name = 'CommandFailedError';
  }
}

/** Normalize anything thrown into an Error instance. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
