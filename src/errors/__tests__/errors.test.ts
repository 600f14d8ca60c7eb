/**
 * Tests for the error hierarchy
 */

import { describe, it, expect } from 'vitest';
import {
  CancelledError,
  ContextCancelledDuringRetryError,
  DeadlineExceededError,
  LazyHttpError,
  NoTokenAvailableError,
  RateLimitError,
  RequestConstructionError,
  RetryExhaustedError,
  TransportError,
  errorMessage,
  isCancellationError,
} from '../index.js';
import type { RateLimiter } from '../../resilience/types.js';

const limiter: RateLimiter = {
  acquire: async () => undefined,
  stop: () => undefined,
};

describe('LazyHttpError', () => {
  it('should keep the prototype chain and the name of subclasses', () => {
    const error = new TransportError(new Error('reset'));

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toBeInstanceOf(LazyHttpError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('TransportError');
    expect(error.code).toBe('TRANSPORT');
  });

  it('should expose the wrapped error as cause', () => {
    const cause = new DeadlineExceededError(10);
    const error = new NoTokenAvailableError(cause);

    expect(error.cause).toBe(cause);
    expect(error.message).toBe('no token available in time: deadline exceeded after 10ms');
  });

  it('should serialize to JSON', () => {
    const error = new RetryExhaustedError(4, { status: 503 });

    expect(error.toJSON()).toEqual({
      name: 'RetryExhaustedError',
      code: 'RETRY_EXHAUSTED',
      message: 'retries exhausted after 4 attempts (last status 503)',
      details: { attempts: 4, lastStatus: 503 },
      cause: undefined,
    });
  });

  it('should match codes with is()', () => {
    const error = new RequestConstructionError('error running pre request hook');

    expect(LazyHttpError.is(error)).toBe(true);
    expect(LazyHttpError.is(error, 'REQUEST_CONSTRUCTION')).toBe(true);
    expect(LazyHttpError.is(error, 'RATE_LIMIT')).toBe(false);
    expect(LazyHttpError.is(new Error('plain'))).toBe(false);
  });
});

describe('RateLimitError', () => {
  it('should carry the limiter and the token error', () => {
    const cause = new NoTokenAvailableError(new CancelledError());
    const error = new RateLimitError(limiter, cause);

    expect(error.limiter).toBe(limiter);
    expect(error.cause).toBe(cause);
    expect(error.message).toBe('rate limit error: no token available in time: operation cancelled');
  });
});

describe('isCancellationError', () => {
  it('should find a cancellation at the root of a chain', () => {
    const error = new RateLimitError(limiter, new NoTokenAvailableError(new DeadlineExceededError(5)));

    expect(isCancellationError(error)).toBe(true);
  });

  it('should treat a cancelled retry wait as cancellation', () => {
    expect(isCancellationError(new ContextCancelledDuringRetryError(2, new CancelledError()))).toBe(true);
  });

  it('should not treat other failures as cancellation', () => {
    expect(isCancellationError(new TransportError(new Error('reset')))).toBe(false);
    expect(isCancellationError(new RetryExhaustedError(3, { status: 500 }))).toBe(false);
    expect(isCancellationError('aborted')).toBe(false);
  });

  it('should recognise platform abort errors', () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';

    expect(isCancellationError(new TransportError(abort))).toBe(true);
  });
});

describe('errorMessage', () => {
  it('should render thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage({ code: 42 })).toBe('{"code":42}');
  });
});
