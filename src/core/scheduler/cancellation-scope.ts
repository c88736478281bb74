/**
 * Cancellation scope
 *
 * A tree of cancellable contexts over AbortController. Cancelling a scope
 * aborts its signal and every live descendant; disposing a child detaches
 * it from its parent so finished work does not accumulate listeners.
 */

import { CancellationError } from '../../shared/errors.js';

export type CancelListener = (reason: CancellationError) => void;

export class CancellationScope {
  private readonly controller = new AbortController();
  private readonly children = new Set<CancellationScope>();
  private detach: (() => void) | null = null;
  private cancelReason: CancellationError | null = null;

  constructor(parent?: CancellationScope) {
    if (parent) {
      if (parent.isCancelled) {
        this.cancel(parent.reason ?? undefined);
      } else {
        parent.children.add(this);
        this.detach = () => parent.children.delete(this);
      }
    }
  }

  /**
   * Wrap an external AbortSignal. The scope is cancelled when the signal
   * aborts; the listener is removed when the scope is disposed.
   */
  static fromSignal(signal: AbortSignal): CancellationScope {
    const scope = new CancellationScope();
    scope.detach = scope.link(signal);
    return scope;
  }

  /**
   * Cancel this scope when `signal` aborts. Returns a function that removes
   * the link.
   */
  link(signal: AbortSignal): () => void {
    if (signal.aborted) {
      this.cancel(describeAbortReason(signal.reason));
      return () => {};
    }
    const onAbort = () => this.cancel(describeAbortReason(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    return () => signal.removeEventListener('abort', onAbort);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancelled(): boolean {
    return this.cancelReason !== null;
  }

  get reason(): CancellationError | null {
    return this.cancelReason;
  }

  /** Number of live child scopes. */
  get childCount(): number {
    return this.children.size;
  }

  /** Cancel this scope and all live descendants. Idempotent. */
  cancel(reason?: string | CancellationError): void {
    if (this.cancelReason) return;
    this.cancelReason = reason instanceof CancellationError
      ? reason
      : new CancellationError(reason);

    for (const child of [...this.children]) {
      child.cancel(this.cancelReason);
    }
    this.children.clear();
    this.controller.abort(this.cancelReason);
  }

  throwIfCancelled(): void {
    if (this.cancelReason) {
      throw this.cancelReason;
    }
  }

  /**
   * Register a listener for cancellation. Runs synchronously if the scope is
   * already cancelled. Returns a function that removes the listener.
   */
  onCancel(listener: CancelListener): () => void {
    if (this.cancelReason) {
      listener(this.cancelReason);
      return () => {};
    }
    const handler = () => {
      if (this.cancelReason) listener(this.cancelReason);
    };
    this.controller.signal.addEventListener('abort', handler, { once: true });
    return () => this.controller.signal.removeEventListener('abort', handler);
  }

  /** Resolves (never rejects) once the scope is cancelled. */
  whenCancelled(): Promise<CancellationError> {
    return new Promise((resolve) => {
      this.onCancel(resolve);
    });
  }

  createChild(): CancellationScope {
    return new CancellationScope(this);
  }

  /** Stop listening to the parent (or wrapped signal). Does not cancel. */
  dispose(): void {
    this.detach?.();
    this.detach = null;
  }
}

function describeAbortReason(reason: unknown): CancellationError {
  if (reason instanceof CancellationError) return reason;
  if (reason instanceof Error) return new CancellationError(reason.message);
  return new CancellationError(reason === undefined ? undefined : String(reason));
}
