/**
 * Tests for backoff policies
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  ExponentialBackoff,
  InfiniteBackoff,
  LimitedTriesBackoff,
  MAX_JITTER_MS,
  NoopBackoff,
  exponentialBackoff,
  limitedTriesBackoff,
  noopBackoffFactory,
  constantBackoff,
} from '../backoff.js';
import { ConfigurationError } from '../../errors/index.js';

const SECOND = 1_000;
const HOUR = 60 * 60 * SECOND;

describe('NoopBackoff', () => {
  it('should never retry', () => {
    const backoff = new NoopBackoff();

    expect(backoff.next()).toEqual({ delayMs: 0, retry: false });
    expect(backoff.next()).toEqual({ delayMs: 0, retry: false });
  });
});

describe('InfiniteBackoff', () => {
  it('should always retry after the base wait', () => {
    const backoff = new InfiniteBackoff(250);

    for (let i = 0; i < 100; i++) {
      expect(backoff.next()).toEqual({ delayMs: 250, retry: true });
    }
  });

  it('should accept a zero base', () => {
    expect(new InfiniteBackoff(0).next()).toEqual({ delayMs: 0, retry: true });
  });
});

describe('LimitedTriesBackoff', () => {
  it('should grant exactly the configured number of retries', () => {
    const backoff = new LimitedTriesBackoff(250, 5);

    for (let call = 1; call <= 5; call++) {
      expect(backoff.next()).toEqual({ delayMs: 250, retry: true });
    }
    expect(backoff.next()).toEqual({ delayMs: 0, retry: false });
    expect(backoff.attempts).toBe(5);
  });

  it('should stay terminal once exhausted', () => {
    const backoff = new LimitedTriesBackoff(10, 1);

    backoff.next();
    expect(backoff.next().retry).toBe(false);
    expect(backoff.next().retry).toBe(false);
    expect(backoff.attempts).toBe(1);
  });

  it('should never retry with zero retries', () => {
    expect(new LimitedTriesBackoff(100, 0).next()).toEqual({ delayMs: 0, retry: false });
  });

  it('should allow a zero base for busy retries', () => {
    expect(new LimitedTriesBackoff(0, 2).next()).toEqual({ delayMs: 0, retry: true });
  });

  it('should reject invalid arguments', () => {
    expect(() => new LimitedTriesBackoff(-1, 3)).toThrow(ConfigurationError);
    expect(() => new LimitedTriesBackoff(100, -1)).toThrow(ConfigurationError);
    expect(() => new LimitedTriesBackoff(100, 1.5)).toThrow(ConfigurationError);
  });
});

describe('ExponentialBackoff', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should reject a non-positive base', () => {
    expect(() => new ExponentialBackoff(0, HOUR, 5)).toThrow(ConfigurationError);
    expect(() => new ExponentialBackoff(-5, HOUR, 5)).toThrow('exponential backoff base must be positive, got -5');
  });

  it('should double the wait from the second call on', () => {
    const backoff = new ExponentialBackoff(100, HOUR, 4, () => 0);

    expect(backoff.next()).toEqual({ delayMs: 100, retry: true });
    expect(backoff.next()).toEqual({ delayMs: 200, retry: true });
    expect(backoff.next()).toEqual({ delayMs: 400, retry: true });
    expect(backoff.next()).toEqual({ delayMs: 800, retry: true });
    expect(backoff.next()).toEqual({ delayMs: 0, retry: false });
  });

  it('should strictly increase over five retries and then stop', () => {
    const backoff = new ExponentialBackoff(5 * SECOND, 2 * HOUR, 5);
    const waits: number[] = [];

    for (let call = 1; call <= 5; call++) {
      const step = backoff.next();
      expect(step.retry).toBe(true);
      waits.push(step.delayMs);
    }

    for (let i = 1; i < waits.length; i++) {
      expect(waits[i]).toBeGreaterThan(waits[i - 1]);
    }
    expect(backoff.next()).toEqual({ delayMs: 0, retry: false });
  });

  it('should keep every wait under the cap plus maximum jitter', () => {
    const backoff = new ExponentialBackoff(SECOND, 2 * SECOND, 10);

    for (let call = 1; call <= 10; call++) {
      const step = backoff.next();
      expect(step.retry).toBe(true);
      expect(step.delayMs).toBeLessThanOrEqual(2.5 * SECOND);
    }
  });

  it('should return the cap plus jitter once the raw wait reaches the cap', () => {
    const backoff = new ExponentialBackoff(SECOND, 2 * SECOND, 3, () => 123);

    expect(backoff.next()).toEqual({ delayMs: 1_123, retry: true });
    expect(backoff.next()).toEqual({ delayMs: 2_123, retry: true });
    expect(backoff.next()).toEqual({ delayMs: 2_123, retry: true });
    expect(backoff.attempts).toBe(3);
  });

  it('should draw jitter below the jitter bound', () => {
    const random = vi.spyOn(Math, 'random').mockReturnValue(0.9999);
    const backoff = new ExponentialBackoff(100, HOUR, 1);

    const step = backoff.next();

    expect(random).toHaveBeenCalled();
    expect(step.delayMs).toBe(100 + MAX_JITTER_MS - 1);
  });
});

describe('backoff factories', () => {
  it('should return a fresh policy on every call', () => {
    const factory = limitedTriesBackoff(10, 1);
    const first = factory();
    const second = factory();

    expect(first).not.toBe(second);
    expect(first.next().retry).toBe(true);
    expect(first.next().retry).toBe(false);
    expect(second.next().retry).toBe(true);
  });

  it('should validate eagerly', () => {
    expect(() => exponentialBackoff(0, 1_000, 3)).toThrow(ConfigurationError);
    expect(() => limitedTriesBackoff(10, -2)).toThrow(ConfigurationError);
    expect(() => constantBackoff(-1)).toThrow(ConfigurationError);
  });

  it('should build the expected policy types', () => {
    expect(noopBackoffFactory()).toBeInstanceOf(NoopBackoff);
    expect(constantBackoff(5)()).toBeInstanceOf(InfiniteBackoff);
    expect(exponentialBackoff(5, 50, 2)()).toBeInstanceOf(ExponentialBackoff);
  });
});
