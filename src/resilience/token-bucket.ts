/**
 * Token bucket rate limiter implementation
 */

import { cancellationReason, CancellationScope } from '../cancellation/index.js';
import { ConfigurationError, LimiterStoppedError, NoTokenAvailableError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { IntervalTicker } from './ticker.js';
import type { AcquireOptions, RateLimiter, Ticker } from './types.js';

/**
 * Wait applied to `acquire` when neither the limiter nor the caller set one
 */
export const DEFAULT_ACQUIRE_TIMEOUT_MS = 30_000;

export interface TokenBucketOptions {
  /** Bucket size; the bucket starts full */
  capacity: number;

  /** Refill period. Ignored when `ticker` is given */
  refillPeriodMs?: number;

  /** Clock driving the refill. Defaults to an IntervalTicker of `refillPeriodMs` */
  ticker?: Ticker;

  /** Wait used by `acquire` without its own timeout. 0 or omitted means 30 seconds */
  defaultTimeoutMs?: number;

  logger?: Logger;
}

interface Waiter {
  resolve(): void;
  reject(reason: unknown): void;
}

/**
 * Bounded token channel.
 *
 * Holds up to `capacity` tokens. A take on an empty channel parks until a
 * put hands it a token directly or its signal aborts.
 */
class TokenChannel {
  private tokens = 0;
  private readonly waiters = new Set<Waiter>();

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.tokens;
  }

  get pending(): number {
    return this.waiters.size;
  }

  tryTake(): boolean {
    if (this.tokens === 0) {
      return false;
    }
    this.tokens--;
    return true;
  }

  /**
   * Returns false when the channel is full and nobody waits.
   */
  put(): boolean {
    for (const waiter of this.waiters) {
      this.waiters.delete(waiter);
      waiter.resolve();
      return true;
    }
    if (this.tokens >= this.capacity) {
      return false;
    }
    this.tokens++;
    return true;
  }

  take(signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      return Promise.reject(cancellationReason(signal));
    }
    if (this.tryTake()) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiters.delete(waiter);
        reject(cancellationReason(signal));
      };
      const waiter: Waiter = {
        resolve: () => {
          signal.removeEventListener('abort', onAbort);
          resolve();
        },
        reject: (reason) => {
          signal.removeEventListener('abort', onAbort);
          reject(reason);
        },
      };
      this.waiters.add(waiter);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  rejectAll(reason: unknown): void {
    const parked = [...this.waiters];
    this.waiters.clear();
    for (const waiter of parked) {
      waiter.reject(reason);
    }
  }
}

/**
 * Token bucket rate limiter refilled on a ticking clock.
 *
 * - The bucket is pre-filled to capacity on construction
 * - Every tick tops it back up to capacity, never beyond
 * - Each admitted request removes exactly one token
 * - Acquirers wait for a refill, bounded by their timeout or signal
 *
 * The refill keeps running until `stop()` is called.
 *
 * @example
 * ```typescript
 * const limiter = new TokenBucketRateLimiter({ capacity: 10, refillPeriodMs: 1_000 });
 * try {
 *   await limiter.acquire({ timeoutMs: 5_000 });
 * } finally {
 *   limiter.stop();
 * }
 * ```
 */
export class TokenBucketRateLimiter implements RateLimiter {
  private readonly channel: TokenChannel;
  private readonly ticker: Ticker;
  private readonly defaultTimeoutMs: number;
  private readonly logger: Logger;
  private isStopped = false;

  constructor(options: TokenBucketOptions) {
    const { capacity, refillPeriodMs, defaultTimeoutMs } = options;

    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ConfigurationError(`rate limiter capacity must be a positive integer, got ${capacity}`);
    }
    if (defaultTimeoutMs !== undefined && (!Number.isFinite(defaultTimeoutMs) || defaultTimeoutMs < 0)) {
      throw new ConfigurationError(`rate limiter timeout must be a non-negative number, got ${defaultTimeoutMs}`);
    }
    if (!options.ticker && refillPeriodMs === undefined) {
      throw new ConfigurationError('rate limiter needs a refill period or a ticker');
    }

    this.channel = new TokenChannel(capacity);
    this.ticker = options.ticker ?? new IntervalTicker(refillPeriodMs ?? 0);
    this.defaultTimeoutMs = defaultTimeoutMs || DEFAULT_ACQUIRE_TIMEOUT_MS;
    this.logger = options.logger ?? new NoopLogger();

    this.refill();
    this.ticker.start(() => this.refill());
  }

  /**
   * Wait for one token.
   *
   * Rejects with NoTokenAvailableError when the timeout elapses, the signal
   * aborts (also when it is already aborted) or the limiter is stopped.
   * A `timeoutMs` of 0 or none uses the limiter's default timeout.
   */
  async acquire(options: AcquireOptions = {}): Promise<void> {
    if (this.isStopped) {
      throw new NoTokenAvailableError(new LimiterStoppedError());
    }

    const scope = new CancellationScope({
      signal: options.signal,
      timeoutMs: options.timeoutMs || this.defaultTimeoutMs,
    });

    try {
      await this.channel.take(scope.signal);
    } catch (error) {
      if (error instanceof NoTokenAvailableError) {
        throw error;
      }
      this.logger.debug('No rate limiter token available', {
        reason: error instanceof Error ? error.message : String(error),
        pending: this.channel.pending,
      });
      throw new NoTokenAvailableError(error);
    } finally {
      scope.dispose();
    }
  }

  /**
   * Take a token only if one is available right now.
   */
  tryAcquire(): boolean {
    return !this.isStopped && this.channel.tryTake();
  }

  /**
   * Halt the refill and reject every parked acquirer. Idempotent.
   */
  stop(): void {
    if (this.isStopped) {
      return;
    }
    this.isStopped = true;
    this.ticker.stop();
    this.channel.rejectAll(new NoTokenAvailableError(new LimiterStoppedError()));
    this.logger.debug('Rate limiter stopped');
  }

  get capacity(): number {
    return this.channel.capacity;
  }

  get available(): number {
    return this.channel.size;
  }

  /** Acquirers currently parked waiting for a refill */
  get pending(): number {
    return this.channel.pending;
  }

  get stopped(): boolean {
    return this.isStopped;
  }

  /**
   * Top the bucket up to capacity. Tokens handed to parked acquirers count
   * as added. Runs to completion on the event loop, so no take interleaves
   * with it.
   */
  private refill(): void {
    if (this.isStopped) {
      return;
    }
    const missing = this.channel.capacity - this.channel.size;
    for (let i = 0; i < missing; i++) {
      this.channel.put();
    }
  }
}
