/**
 * Resilience types
 */

import type { HttpResponse } from '../transport/types.js';

/**
 * Result of asking a backoff policy for the next wait.
 */
export interface BackoffStep {
  /** Wait before the next attempt; 0 when `retry` is false */
  delayMs: number;
  retry: boolean;
}

/**
 * Stateful backoff policy. An instance belongs to exactly one logical
 * request and becomes terminal once it returns `retry: false`.
 */
export interface BackoffPolicy {
  next(): BackoffStep;
}

/**
 * Produces a fresh backoff policy for every logical request
 */
export type BackoffFactory = () => BackoffPolicy;

/**
 * Outcome of one execution, as seen by the retry predicate.
 * `attempt` is 1 for the first execution.
 */
export type AttemptOutcome =
  | { ok: true; response: HttpResponse; attempt: number }
  | { ok: false; error: Error; attempt: number };

/**
 * Decides whether an outcome should be retried.
 */
export type RetryPredicate = (outcome: AttemptOutcome) => boolean;

/**
 * Periodic clock driving the rate limiter refill
 */
export interface Ticker {
  start(onTick: () => void): void;
  stop(): void;
}

export interface AcquireOptions {
  signal?: AbortSignal;

  /**
   * Maximum wait for a token. The limiter's default timeout applies when omitted.
   */
  timeoutMs?: number;
}

/**
 * Admission control consulted once per logical request
 */
export interface RateLimiter {
  acquire(options?: AcquireOptions): Promise<void>;
  stop(): void;
}
