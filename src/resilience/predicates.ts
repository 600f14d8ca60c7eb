/**
 * Retry predicate helpers
 *
 * @example
 * ```typescript
 * const predicate = anyOf(retryOnStatus(429, 503), retryOnTransportError());
 * ```
 */

import type { AttemptOutcome, RetryPredicate } from './types.js';

/**
 * Retry responses whose status is one of `statuses`
 */
export function retryOnStatus(...statuses: number[]): RetryPredicate {
  const set = new Set(statuses);
  return (outcome: AttemptOutcome) => outcome.ok && set.has(outcome.response.status);
}

/**
 * Retry 5xx responses
 */
export function retryOnServerError(): RetryPredicate {
  return (outcome: AttemptOutcome) => outcome.ok && outcome.response.status >= 500;
}

/**
 * Retry failures where no response was obtained
 */
export function retryOnTransportError(): RetryPredicate {
  return (outcome: AttemptOutcome) => !outcome.ok;
}

export function anyOf(...predicates: RetryPredicate[]): RetryPredicate {
  return (outcome: AttemptOutcome) => predicates.some((predicate) => predicate(outcome));
}
