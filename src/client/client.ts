/**
 * HTTP client composition root.
 *
 * @module client/client
 */

import { randomUUID } from 'crypto';
import { CancellationScope } from '../cancellation/index.js';
import { resolveClientConfig, type ClientConfig, type ResolvedClientConfig } from '../config/config.js';
import {
  NoTokenAvailableError,
  RateLimitError,
  RequestConstructionError,
  ResponseHandlingError,
} from '../errors/index.js';
import { logRequest, logResponse, withBindings } from '../observability/logging.js';
import { RetryOrchestrator } from '../resilience/retry.js';
import { ClientResponse } from '../response/response.js';
import type { HttpRequest } from '../transport/types.js';
import { isAbsoluteUrl, newRequest, type RequestOptions } from './request.js';
import type { DoOptions } from './types.js';

/**
 * HTTP client wrapping every request in a fixed pipeline:
 *
 * 1. rate limiter admission
 * 2. pre-request hooks, in order
 * 3. authenticator
 * 4. host override for requests addressed by path
 * 5. execution with retries, governed by the retry predicate and a fresh backoff
 * 6. post-response hooks, in order
 *
 * The client is safe to share between concurrent callers. Only the rate
 * limiter is shared between requests.
 *
 * @example
 * ```typescript
 * const client = new LazyHttpClient({
 *   host: 'https://api.example.com',
 *   rateLimiter: new TokenBucketRateLimiter({ capacity: 10, refillPeriodMs: 1_000 }),
 *   retryPredicate: retryOnStatus(429, 503),
 *   backoffFactory: exponentialBackoff(200, 5_000, 4),
 * });
 *
 * try {
 *   const response = await client.get('/v1/items', { timeoutMs: 10_000 });
 *   console.log(response.status, response.json());
 * } finally {
 *   client.close();
 * }
 * ```
 */
export class LazyHttpClient {
  private readonly config: ResolvedClientConfig;

  constructor(config: ClientConfig = {}) {
    this.config = resolveClientConfig(config);
  }

  /**
   * Run a request through the pipeline.
   *
   * The request object is decorated in place by hooks and the authenticator.
   * A call whose signal is already aborted fails before any hook runs.
   * Every log entry of the call carries its `requestId`.
   *
   * @throws RateLimitError when no token was granted in time
   * @throws RequestConstructionError when a pre-request hook or the authenticator fails, or no host can be resolved
   * @throws RetryExhaustedError when the backoff gave up on a retryable outcome
   * @throws ContextCancelledDuringRetryError when cancelled during a backoff wait
   * @throws ResponseHandlingError when a post-response hook fails; the response is on the error
   */
  async do(request: HttpRequest, options: DoOptions = {}): Promise<ClientResponse> {
    const scope = new CancellationScope({ signal: options.signal, timeoutMs: options.timeoutMs });
    const logger = withBindings(this.config.logger, { requestId: options.requestId ?? randomUUID() });

    try {
      await this.admit(scope);
      scope.throwIfCancelled();
      await this.runPreRequestHooks(request);
      await this.authenticate(request);
      this.applyHost(request);

      logRequest(logger, request.method, request.url, request.headers);
      const startedAt = Date.now();

      const orchestrator = new RetryOrchestrator({
        predicate: this.config.retryPredicate,
        backoff: this.config.backoffFactory(),
        logger,
      });
      const result = await orchestrator.run(request, this.config.transport, scope.signal);
      const response = new ClientResponse(result.response, request, result.attempts);

      logResponse(logger, response.status, Date.now() - startedAt, result.attempts);

      await this.runPostResponseHooks(response);
      return response;
    } finally {
      scope.dispose();
    }
  }

  async get(url: string, options: DoOptions & RequestOptions = {}): Promise<ClientResponse> {
    return this.send('GET', url, options);
  }

  async head(url: string, options: DoOptions & RequestOptions = {}): Promise<ClientResponse> {
    return this.send('HEAD', url, options);
  }

  async delete(url: string, options: DoOptions & RequestOptions = {}): Promise<ClientResponse> {
    return this.send('DELETE', url, options);
  }

  async post(url: string, json?: unknown, options: DoOptions & RequestOptions = {}): Promise<ClientResponse> {
    return this.send('POST', url, { ...options, json: json ?? options.json });
  }

  async put(url: string, json?: unknown, options: DoOptions & RequestOptions = {}): Promise<ClientResponse> {
    return this.send('PUT', url, { ...options, json: json ?? options.json });
  }

  async patch(url: string, json?: unknown, options: DoOptions & RequestOptions = {}): Promise<ClientResponse> {
    return this.send('PATCH', url, { ...options, json: json ?? options.json });
  }

  /**
   * Stop the configured rate limiter. The client must not be used afterwards.
   */
  close(): void {
    this.config.rateLimiter?.stop();
  }

  private async send(method: string, url: string, options: DoOptions & RequestOptions): Promise<ClientResponse> {
    const { signal, timeoutMs, requestId, ...requestOptions } = options;
    return this.do(newRequest(method, url, requestOptions), { signal, timeoutMs, requestId });
  }

  private async admit(scope: CancellationScope): Promise<void> {
    const limiter = this.config.rateLimiter;
    if (!limiter) {
      return;
    }

    try {
      await limiter.acquire({
        signal: scope.signal,
        timeoutMs: scope.remainingMs() ?? this.config.maxRateLimiterWaitMs,
      });
    } catch (error) {
      throw new RateLimitError(
        limiter,
        error instanceof NoTokenAvailableError ? error : new NoTokenAvailableError(error)
      );
    }
  }

  private async runPreRequestHooks(request: HttpRequest): Promise<void> {
    for (const hook of this.config.preRequestHooks) {
      try {
        await hook(request);
      } catch (error) {
        throw new RequestConstructionError('error running pre request hook', { cause: error, request });
      }
    }
  }

  private async authenticate(request: HttpRequest): Promise<void> {
    const { authenticator } = this.config;
    if (!authenticator) {
      return;
    }
    try {
      await authenticator.authenticate(request);
    } catch (error) {
      throw new RequestConstructionError('error authenticating request', { cause: error, request });
    }
  }

  /**
   * Address path-only requests to the configured host; absolute URLs are kept.
   */
  private applyHost(request: HttpRequest): void {
    if (isAbsoluteUrl(request.url)) {
      return;
    }
    const { host } = this.config;
    if (!host) {
      throw new RequestConstructionError('request URL has no host and no host is configured', { request });
    }
    request.url = new URL(request.url, host).toString();
  }

  private async runPostResponseHooks(response: ClientResponse): Promise<void> {
    for (const hook of this.config.postResponseHooks) {
      try {
        await hook(response);
      } catch (error) {
        throw new ResponseHandlingError(response, error);
      }
    }
  }
}

/**
 * Create a client, run `fn` with it and close the client however `fn` ends.
 *
 * @example
 * ```typescript
 * const items = await withClient({ host: 'https://api.example.com' }, async (client) => {
 *   const response = await client.get('/v1/items');
 *   return response.json();
 * });
 * ```
 */
export async function withClient<T>(config: ClientConfig, fn: (client: LazyHttpClient) => Promise<T>): Promise<T> {
  const client = new LazyHttpClient(config);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}
