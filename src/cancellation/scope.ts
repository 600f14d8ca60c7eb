/**
 * Cancellation scopes.
 *
 * A scope links an optional caller signal with an optional deadline and
 * exposes a single signal that aborts when either fires. The abort reason
 * is always a CancelledError or a DeadlineExceededError.
 *
 * @module cancellation/scope
 */

import { CancelledError, ConfigurationError, DeadlineExceededError } from '../errors/index.js';
import { scheduleTimeout, type CancelTimer } from './timer.js';

export type CancellationReason = CancelledError | DeadlineExceededError;

export interface CancellationScopeOptions {
  /**
   * Caller signal. Aborting it aborts the scope.
   */
  signal?: AbortSignal;

  /**
   * Deadline relative to now. Omit for a scope without a deadline.
   */
  timeoutMs?: number;
}

/**
 * Normalize an abort reason into a cancellation error.
 */
export function toCancellationReason(reason: unknown): CancellationReason {
  if (reason instanceof CancelledError || reason instanceof DeadlineExceededError) {
    return reason;
  }
  return new CancelledError(reason);
}

/**
 * Cancellation error for an aborted signal.
 */
export function cancellationReason(signal: AbortSignal): CancellationReason {
  return toCancellationReason(signal.reason);
}

/**
 * Linked signal with an optional deadline.
 *
 * Always call `dispose()` once the scoped work settles so the deadline timer
 * and the listener on the caller signal are released.
 *
 * @example
 * ```typescript
 * const scope = new CancellationScope({ signal: caller, timeoutMs: 5_000 });
 * try {
 *   await work(scope.signal);
 * } finally {
 *   scope.dispose();
 * }
 * ```
 */
export class CancellationScope {
  public readonly deadline?: number;
  private readonly controller = new AbortController();
  private readonly cancelTimer?: CancelTimer;
  private detach?: () => void;
  private reason?: CancellationReason;

  constructor(options: CancellationScopeOptions = {}) {
    const { signal, timeoutMs } = options;

    if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs < 0)) {
      throw new ConfigurationError(`timeout must be a non-negative finite number, got ${timeoutMs}`);
    }

    if (signal) {
      if (signal.aborted) {
        this.abort(cancellationReason(signal));
      } else {
        const onAbort = (): void => this.abort(cancellationReason(signal));
        signal.addEventListener('abort', onAbort, { once: true });
        this.detach = () => signal.removeEventListener('abort', onAbort);
      }
    }

    if (timeoutMs !== undefined) {
      this.deadline = Date.now() + timeoutMs;
      if (timeoutMs === 0) {
        this.abort(new DeadlineExceededError(0));
      } else if (!this.cancelled) {
        this.cancelTimer = scheduleTimeout(() => this.abort(new DeadlineExceededError(timeoutMs)), timeoutMs);
      }
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get hasDeadline(): boolean {
    return this.deadline !== undefined;
  }

  /**
   * Milliseconds left until the deadline, or undefined without one.
   */
  remainingMs(): number | undefined {
    return this.deadline === undefined ? undefined : Math.max(0, this.deadline - Date.now());
  }

  /**
   * The cancellation error, once the scope is aborted.
   */
  getReason(): CancellationReason | undefined {
    return this.reason;
  }

  throwIfCancelled(): void {
    if (this.reason) {
      throw this.reason;
    }
  }

  dispose(): void {
    this.cancelTimer?.();
    this.detach?.();
    this.detach = undefined;
  }

  private abort(reason: CancellationReason): void {
    if (this.reason) {
      return;
    }
    this.reason = reason;
    this.controller.abort(reason);
    this.dispose();
  }
}
