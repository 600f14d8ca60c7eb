/**
 * Backoff policies
 *
 * Each policy is stateful and belongs to one logical request. Use the
 * factories at the bottom of this module to hand the client a fresh
 * instance per request.
 */

import { ConfigurationError } from '../errors/index.js';
import type { BackoffFactory, BackoffPolicy, BackoffStep } from './types.js';

/**
 * Upper bound (exclusive) of the jitter added by ExponentialBackoff
 */
export const MAX_JITTER_MS = 500;

const STOP: BackoffStep = { delayMs: 0, retry: false };

/**
 * Source of jitter in milliseconds, expected in [0, MAX_JITTER_MS)
 */
export type JitterSource = () => number;

export const randomJitter: JitterSource = () => Math.floor(Math.random() * MAX_JITTER_MS);

/**
 * Never retries
 */
export class NoopBackoff implements BackoffPolicy {
  next(): BackoffStep {
    return STOP;
  }
}

/**
 * Always retries after the same wait.
 *
 * Paired with a predicate that never turns false this retries forever.
 */
export class InfiniteBackoff implements BackoffPolicy {
  constructor(private readonly baseMs: number) {
    assertDelay('base', baseMs);
  }

  next(): BackoffStep {
    return { delayMs: this.baseMs, retry: true };
  }
}

/**
 * Retries after the same wait until `retries` retries were granted
 */
export class LimitedTriesBackoff implements BackoffPolicy {
  private attemptsDone = 0;

  constructor(
    private readonly baseMs: number,
    private readonly retries: number
  ) {
    assertDelay('base', baseMs);
    assertRetries(retries);
  }

  next(): BackoffStep {
    if (this.attemptsDone + 1 > this.retries) {
      return STOP;
    }
    this.attemptsDone++;
    return { delayMs: this.baseMs, retry: true };
  }

  get attempts(): number {
    return this.attemptsDone;
  }
}

/**
 * Exponential backoff with jitter and a cap.
 *
 * The first wait is `base`, then the wait doubles on every call
 * (`base * 2^i` for the i-th call, counting from 0). A raw wait at or above
 * `max` is replaced by `max`. Every wait gets a jitter in [0, 500) ms added.
 *
 * @example
 * ```typescript
 * const backoff = new ExponentialBackoff(1_000, 30_000, 5);
 * backoff.next(); // ~{ delayMs: 1000 + jitter, retry: true }
 * backoff.next(); // ~{ delayMs: 2000 + jitter, retry: true }
 * ```
 */
export class ExponentialBackoff implements BackoffPolicy {
  private attemptsDone = 0;

  constructor(
    private readonly baseMs: number,
    private readonly maxMs: number,
    private readonly retries: number,
    private readonly jitter: JitterSource = randomJitter
  ) {
    assertExponential(baseMs, maxMs, retries);
  }

  next(): BackoffStep {
    if (this.attemptsDone + 1 > this.retries) {
      return STOP;
    }

    const raw = this.baseMs * 2 ** this.attemptsDone;
    this.attemptsDone++;

    const wait = raw >= this.maxMs ? this.maxMs : raw;
    return { delayMs: wait + this.jitter(), retry: true };
  }

  get attempts(): number {
    return this.attemptsDone;
  }
}

function assertExponential(baseMs: number, maxMs: number, retries: number): void {
  if (!Number.isFinite(baseMs) || baseMs <= 0) {
    throw new ConfigurationError(`exponential backoff base must be positive, got ${baseMs}`);
  }
  assertDelay('max', maxMs);
  assertRetries(retries);
}

function assertDelay(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`backoff ${name} must be a non-negative number, got ${value}`);
  }
}

function assertRetries(retries: number): void {
  if (!Number.isInteger(retries) || retries < 0) {
    throw new ConfigurationError(`backoff retries must be a non-negative integer, got ${retries}`);
  }
}

/**
 * Factory used when retries are disabled
 */
export const noopBackoffFactory: BackoffFactory = () => new NoopBackoff();

export function constantBackoff(baseMs: number): BackoffFactory {
  assertDelay('base', baseMs);
  return () => new InfiniteBackoff(baseMs);
}

export function limitedTriesBackoff(baseMs: number, retries: number): BackoffFactory {
  assertDelay('base', baseMs);
  assertRetries(retries);
  return () => new LimitedTriesBackoff(baseMs, retries);
}

/**
 * Construction fails immediately for a non-positive base, not on first use
 */
export function exponentialBackoff(
  baseMs: number,
  maxMs: number,
  retries: number,
  jitter: JitterSource = randomJitter
): BackoffFactory {
  assertExponential(baseMs, maxMs, retries);
  return () => new ExponentialBackoff(baseMs, maxMs, retries, jitter);
}
