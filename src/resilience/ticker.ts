/**
 * Periodic clock for the rate limiter refill
 */

import { MAX_TIMER_DELAY_MS } from '../cancellation/index.js';
import { ConfigurationError } from '../errors/index.js';
import type { Ticker } from './types.js';

/**
 * Ticker backed by `setInterval`.
 *
 * The interval is unref'd: it never keeps the process alive on its own.
 * `stop()` clears it and is idempotent.
 */
export class IntervalTicker implements Ticker {
  private handle?: ReturnType<typeof setInterval>;

  constructor(public readonly periodMs: number) {
    if (!Number.isFinite(periodMs) || periodMs <= 0 || periodMs > MAX_TIMER_DELAY_MS) {
      throw new ConfigurationError(`refill period must be between 1 and ${MAX_TIMER_DELAY_MS} ms, got ${periodMs}`);
    }
  }

  start(onTick: () => void): void {
    if (this.handle !== undefined) {
      throw new ConfigurationError('ticker already started');
    }
    this.handle = setInterval(onTick, this.periodMs);
    this.handle.unref();
  }

  stop(): void {
    if (this.handle !== undefined) {
      clearInterval(this.handle);
      this.handle = undefined;
    }
  }
}
