/**
 * Tests for logging utilities
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, InMemoryLogger, NoopLogger, logRetry, redactSensitive, withBindings } from '../logging.js';

describe('redactSensitive', () => {
  it('should redact sensitive keys at any depth', () => {
    expect(
      redactSensitive({
        url: 'http://api.test',
        headers: { Authorization: 'Basic abc', accept: 'text/plain' },
        password: 'test-secret',
      })
    ).toEqual({
      url: 'http://api.test',
      headers: { Authorization: '[REDACTED]', accept: 'text/plain' },
      password: '[REDACTED]',
    });
  });
});

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should skip entries below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: 'warn', includeTimestamps: false });

    logger.debug('hidden');
    logger.warn('Rate limiter slow', { attempt: 2 });

    expect(log).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr).toHaveBeenCalledWith('WARN Rate limiter slow attempt=2');
  });

  it('should write key=value lines, quoting values that need it', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: 'debug', includeTimestamps: false });

    logger.debug('Outgoing request', {
      requestId: 'req-1',
      method: 'GET',
      url: 'http://api.test/items?page=2',
      headers: { authorization: 'Basic abc' },
      status: undefined,
    });

    expect(log).toHaveBeenCalledWith(
      'DEBUG Outgoing request requestId=req-1 method=GET url="http://api.test/items?page=2" headers={"authorization":"[REDACTED]"}'
    );
  });

  it('should write JSON lines with redacted context', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ format: 'json', includeTimestamps: false });

    logger.info('Outgoing request', { requestId: 'req-1', token: 'test-token' });

    expect(log).toHaveBeenCalledWith('{"level":"info","msg":"Outgoing request","requestId":"req-1","token":"[REDACTED]"}');
  });
});

describe('NoopLogger', () => {
  it('should accept entries at every level', () => {
    const logger = new NoopLogger();

    expect(() => {
      logger.trace('a');
      logger.error('b', { attempt: 1 });
    }).not.toThrow();
  });
});

describe('withBindings', () => {
  it('should add the bindings to every entry', () => {
    const logger = new InMemoryLogger();
    const bound = withBindings(logger, { requestId: 'req-7' });

    bound.info('Incoming response', { status: 200 });
    bound.warn('Slow response', { requestId: 'override' });

    expect(logger.getLogs().map((entry) => entry.context)).toEqual([
      { requestId: 'req-7', status: 200 },
      { requestId: 'override' },
    ]);
  });
});

describe('InMemoryLogger', () => {
  it('should record entries by level', () => {
    const logger = new InMemoryLogger();

    logRetry(logger, { method: 'GET', url: '/x', attempt: 1, delayMs: 100, status: 503 });
    logger.error('Post response hook failed', { password: 'test-secret' });

    expect(logger.getLogsByLevel('debug')).toHaveLength(1);
    expect(logger.getLogsByLevel('debug')[0]?.context).toEqual({
      method: 'GET',
      url: '/x',
      attempt: 1,
      delayMs: 100,
      status: 503,
    });
    expect(logger.getLogsByLevel('error')[0]?.context).toEqual({ password: '[REDACTED]' });

    logger.clear();
    expect(logger.getLogs()).toEqual([]);
  });
});
