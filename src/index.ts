/**
 * lazyhttp: an outbound HTTP client with token-bucket rate limiting,
 * retries with pluggable backoff, request hooks and authentication.
 *
 * @example
 * ```typescript
 * import {
 *   LazyHttpClient,
 *   TokenBucketRateLimiter,
 *   exponentialBackoff,
 *   retryOnStatus,
 * } from 'lazyhttp';
 *
 * const client = new LazyHttpClient({
 *   host: 'https://api.example.com',
 *   rateLimiter: new TokenBucketRateLimiter({ capacity: 5, refillPeriodMs: 1_000 }),
 *   retryPredicate: retryOnStatus(503),
 *   backoffFactory: exponentialBackoff(250, 10_000, 5),
 * });
 * ```
 *
 * @packageDocumentation
 */

// Client
export * from './client/index.js';

// Configuration
export * from './config/index.js';

// Errors
export * from './errors/index.js';

// Cancellation
export * from './cancellation/index.js';

// Resilience
export * from './resilience/index.js';

// Transport
export * from './transport/index.js';

// Responses
export * from './response/index.js';

// Authentication
export * from './auth/index.js';

// Observability
export * from './observability/index.js';
