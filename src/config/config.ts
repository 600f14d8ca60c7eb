/**
 * Client configuration.
 *
 * The client takes one explicit configuration object. Every field is
 * optional and defaults to the disabled or no-op behaviour.
 */

import { z } from 'zod';
import type { Authenticator } from '../auth/authenticator.js';
import type { PostResponseHook, PreRequestHook } from '../client/types.js';
import { ConfigurationError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { noopBackoffFactory } from '../resilience/backoff.js';
import type { BackoffFactory, RateLimiter, RetryPredicate } from '../resilience/types.js';
import type { Transport } from '../transport/types.js';
import { DEFAULT_TRANSPORT_TIMEOUT_MS, UndiciTransport } from '../transport/undici-transport.js';

/**
 * Default longest wait for a rate limiter token when the caller sets no deadline
 */
export const DEFAULT_MAX_RATE_LIMITER_WAIT_MS = 60_000;

export interface ClientConfig {
  /**
   * Scheme and host (e.g. `https://api.example.com`) applied to requests
   * whose URL is a bare path. Requests with an absolute URL keep their own.
   */
  host?: string;

  /** Replaces the default undici transport */
  transport?: Transport;

  /**
   * Per-exchange timeout of the default transport. Default: 30 seconds.
   * Rejected together with `transport`; set the timeout on that transport instead.
   */
  timeoutMs?: number;

  /** Admission control; none by default */
  rateLimiter?: RateLimiter;

  /** Longest wait for a token when the call has no deadline. Default: 60 seconds */
  maxRateLimiterWaitMs?: number;

  /** Absent disables retries */
  retryPredicate?: RetryPredicate;

  /** Called once per logical request. Default: never retry */
  backoffFactory?: BackoffFactory;

  preRequestHooks?: PreRequestHook[];
  postResponseHooks?: PostResponseHook[];
  authenticator?: Authenticator;

  /** Default: NoopLogger */
  logger?: Logger;
}

export interface ResolvedClientConfig {
  host?: string;
  transport: Transport;
  rateLimiter?: RateLimiter;
  maxRateLimiterWaitMs: number;
  retryPredicate?: RetryPredicate;
  backoffFactory: BackoffFactory;
  preRequestHooks: PreRequestHook[];
  postResponseHooks: PostResponseHook[];
  authenticator?: Authenticator;
  logger: Logger;
}

const hostSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'host must use http or https' });

const millisSchema = z.number().int().positive();

const settingsSchema = z.object({
  host: hostSchema.optional(),
  timeoutMs: millisSchema.optional(),
  maxRateLimiterWaitMs: millisSchema.optional(),
});

const envSchema = z.object({
  LAZYHTTP_HOST: hostSchema.optional(),
  LAZYHTTP_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  LAZYHTTP_MAX_RATE_LIMITER_WAIT_MS: z.coerce.number().int().positive().optional(),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate a configuration and fill in defaults.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function resolveClientConfig(config: ClientConfig = {}): ResolvedClientConfig {
  const result = settingsSchema.safeParse({
    host: config.host,
    timeoutMs: config.timeoutMs,
    maxRateLimiterWaitMs: config.maxRateLimiterWaitMs,
  });
  const issues: string[] = result.success ? [] : formatIssues(result.error);
  if (config.transport && config.timeoutMs !== undefined) {
    issues.push('timeoutMs: only applies to the default transport');
  }
  if (!result.success || issues.length > 0) {
    throw new ConfigurationError(`invalid client configuration: ${issues.join('; ')}`, { issues });
  }

  const settings = result.data;
  return {
    host: settings.host,
    transport: config.transport ?? new UndiciTransport({ timeoutMs: settings.timeoutMs ?? DEFAULT_TRANSPORT_TIMEOUT_MS }),
    rateLimiter: config.rateLimiter,
    maxRateLimiterWaitMs: settings.maxRateLimiterWaitMs ?? DEFAULT_MAX_RATE_LIMITER_WAIT_MS,
    retryPredicate: config.retryPredicate,
    backoffFactory: config.backoffFactory ?? noopBackoffFactory,
    preRequestHooks: [...(config.preRequestHooks ?? [])],
    postResponseHooks: [...(config.postResponseHooks ?? [])],
    authenticator: config.authenticator,
    logger: config.logger ?? new NoopLogger(),
  };
}

/**
 * Read the scalar settings from environment variables:
 *
 * - `LAZYHTTP_HOST`
 * - `LAZYHTTP_TIMEOUT_MS`
 * - `LAZYHTTP_MAX_RATE_LIMITER_WAIT_MS`
 *
 * Unset or empty variables are left out of the result.
 *
 * @throws ConfigurationError when a variable is set to an invalid value
 */
export function loadClientConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([name, value]) => name.startsWith('LAZYHTTP_') && value !== undefined && value !== '')
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`invalid environment configuration: ${issues.join('; ')}`, { issues });
  }

  const config: ClientConfig = {};
  if (result.data.LAZYHTTP_HOST !== undefined) {
    config.host = result.data.LAZYHTTP_HOST;
  }
  if (result.data.LAZYHTTP_TIMEOUT_MS !== undefined) {
    config.timeoutMs = result.data.LAZYHTTP_TIMEOUT_MS;
  }
  if (result.data.LAZYHTTP_MAX_RATE_LIMITER_WAIT_MS !== undefined) {
    config.maxRateLimiterWaitMs = result.data.LAZYHTTP_MAX_RATE_LIMITER_WAIT_MS;
  }
  return config;
}
