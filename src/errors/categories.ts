import { LazyHttpError, chainMessage, errorMessage } from './error.js';
import type { HttpRequest } from '../transport/types.js';
import type { RateLimiter } from '../resilience/types.js';
import type { ClientResponse } from '../response/response.js';

/**
 * Error thrown when the client or one of its components is misconfigured
 */
export class ConfigurationError extends LazyHttpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: 'CONFIGURATION', message, details });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when building or decorating a request fails before it is sent.
 *
 * Covers the request builder, pre-request hooks, the authenticator and host resolution.
 */
export class RequestConstructionError extends LazyHttpError {
  public readonly request?: HttpRequest;

  constructor(reason: string, options: { cause?: unknown; request?: HttpRequest } = {}) {
    super({
      code: 'REQUEST_CONSTRUCTION',
      message: `error making request: ${chainMessage(reason, options.cause)}`,
      cause: options.cause,
      details: options.request ? { method: options.request.method, url: options.request.url } : undefined,
    });
    this.name = 'RequestConstructionError';
    this.request = options.request;
  }
}

/**
 * Error thrown when the rate limiter did not admit a request
 */
export class RateLimitError extends LazyHttpError {
  public readonly limiter: RateLimiter;

  constructor(limiter: RateLimiter, cause: NoTokenAvailableError) {
    super({
      code: 'RATE_LIMIT',
      message: `rate limit error: ${cause.message}`,
      cause,
    });
    this.name = 'RateLimitError';
    this.limiter = limiter;
  }
}

/**
 * Error thrown when a post-response hook fails.
 *
 * The response obtained from the transport is still available on the error.
 */
export class ResponseHandlingError extends LazyHttpError {
  public readonly response: ClientResponse;

  constructor(response: ClientResponse, cause: unknown) {
    super({
      code: 'RESPONSE_HANDLING',
      message: `error handling response: ${chainMessage('error running post response hook', cause)}`,
      cause,
      details: { status: response.status },
    });
    this.name = 'ResponseHandlingError';
    this.response = response;
  }
}

/**
 * Error thrown when no token could be taken before the deadline or cancellation
 */
export class NoTokenAvailableError extends LazyHttpError {
  constructor(cause: unknown) {
    super({
      code: 'NO_TOKEN_AVAILABLE',
      message: `no token available in time: ${errorMessage(cause)}`,
      cause,
    });
    this.name = 'NoTokenAvailableError';
  }
}

/**
 * Error thrown when the backoff policy refused another attempt while the
 * retry predicate still asked for one. The last response is not returned.
 */
export class RetryExhaustedError extends LazyHttpError {
  public readonly attempts: number;
  public readonly lastStatus?: number;

  constructor(attempts: number, last: { status?: number; cause?: unknown } = {}) {
    const outcome = last.status !== undefined ? `last status ${last.status}` : chainMessage('last error', last.cause);
    super({
      code: 'RETRY_EXHAUSTED',
      message: `retries exhausted after ${attempts} attempts (${outcome})`,
      cause: last.cause,
      details: { attempts, lastStatus: last.status },
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastStatus = last.status;
  }
}

/**
 * Error thrown when cancellation arrives while waiting between attempts
 */
export class ContextCancelledDuringRetryError extends LazyHttpError {
  public readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super({
      code: 'CANCELLED_DURING_RETRY',
      message: `request cancelled while waiting to retry: ${errorMessage(cause)}`,
      cause,
      details: { attempts },
    });
    this.name = 'ContextCancelledDuringRetryError';
    this.attempts = attempts;
  }
}

/**
 * Error thrown when the transport failed to produce a response
 */
export class TransportError extends LazyHttpError {
  constructor(cause: unknown, request?: HttpRequest) {
    super({
      code: 'TRANSPORT',
      message: chainMessage('error performing request', cause),
      cause,
      details: request ? { method: request.method, url: request.url } : undefined,
    });
    this.name = 'TransportError';
  }
}

/**
 * Error used as the abort reason when a caller signal is aborted
 */
export class CancelledError extends LazyHttpError {
  constructor(reason?: unknown) {
    super({
      code: 'CANCELLED',
      message: chainMessage('operation cancelled', reason),
      cause: reason,
    });
    this.name = 'CancelledError';
  }
}

/**
 * Error used as the abort reason when a deadline elapses
 */
export class DeadlineExceededError extends LazyHttpError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super({
      code: 'DEADLINE_EXCEEDED',
      message: `deadline exceeded after ${timeoutMs}ms`,
      details: { timeoutMs },
    });
    this.name = 'DeadlineExceededError';
    this.timeoutMs = timeoutMs;
  }
}

export class LimiterStoppedError extends LazyHttpError {
  constructor() {
    super({ code: 'LIMITER_STOPPED', message: 'rate limiter stopped' });
    this.name = 'LimiterStoppedError';
  }
}

/**
 * Error thrown when a response body cannot be read, parsed or validated
 */
export class DecodeError extends LazyHttpError {
  constructor(reason: string, cause?: unknown, details?: Record<string, unknown>) {
    super({
      code: 'DECODE',
      message: chainMessage(reason, cause),
      cause,
      details,
    });
    this.name = 'DecodeError';
  }
}

/**
 * Report whether a cancellation or an elapsed deadline is at the root of an error.
 *
 * Walks the `cause` chain, so a RateLimitError raised because the caller
 * aborted counts as a cancellation.
 */
export function isCancellationError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 16 && current instanceof Error; depth++) {
    if (
      current instanceof CancelledError ||
      current instanceof DeadlineExceededError ||
      current instanceof ContextCancelledDuringRetryError ||
      current.name === 'AbortError' ||
      current.name === 'TimeoutError'
    ) {
      return true;
    }
    current = current.cause;
  }
  return false;
}
