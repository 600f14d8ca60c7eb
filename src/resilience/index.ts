export {
  NoopBackoff,
  InfiniteBackoff,
  LimitedTriesBackoff,
  ExponentialBackoff,
  MAX_JITTER_MS,
  randomJitter,
  noopBackoffFactory,
  constantBackoff,
  limitedTriesBackoff,
  exponentialBackoff,
} from './backoff.js';
export type { JitterSource } from './backoff.js';
export { IntervalTicker } from './ticker.js';
export { TokenBucketRateLimiter, DEFAULT_ACQUIRE_TIMEOUT_MS } from './token-bucket.js';
export type { TokenBucketOptions } from './token-bucket.js';
export { RetryOrchestrator } from './retry.js';
export type { RetryOrchestratorOptions, RetryResult } from './retry.js';
export { retryOnStatus, retryOnServerError, retryOnTransportError, anyOf } from './predicates.js';
export type {
  BackoffStep,
  BackoffPolicy,
  BackoffFactory,
  AttemptOutcome,
  RetryPredicate,
  Ticker,
  AcquireOptions,
  RateLimiter,
} from './types.js';
