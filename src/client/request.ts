/**
 * Request construction.
 *
 * This module provides a fluent builder for client requests and a
 * `newRequest` helper taking an options object.
 *
 * @module client/request
 */

import { basicAuthHeader } from '../auth/authenticator.js';
import { RequestConstructionError } from '../errors/index.js';
import { HTTP_METHODS, type HttpMethod, type HttpRequest } from '../transport/types.js';

/**
 * A request builder.
 *
 * The URL is either absolute or a path starting with `/`, which the client
 * resolves against its configured host.
 *
 * @example
 * ```typescript
 * const request = new RequestBuilder('POST', '/v1/items')
 *   .withQuery('dryRun', 'true')
 *   .withHeader('X-Request-Id', 'abc-123')
 *   .withJsonBody({ name: 'widget' })
 *   .build();
 * ```
 */
export class RequestBuilder {
  private readonly queryParams = new Map<string, string>();
  private readonly headers = new Map<string, string>();
  private requestBody?: string | Uint8Array;
  private failure?: RequestConstructionError;

  /**
   * @param method - HTTP method
   * @param url - Absolute URL or path starting with `/`
   * @param body - Optional value serialized as a JSON body
   */
  constructor(
    public readonly method: HttpMethod,
    public readonly url: string,
    body?: unknown
  ) {
    if (body !== undefined) {
      this.withJsonBody(body);
    }
  }

  withQuery(name: string, value: string): this {
    this.queryParams.set(name, value);
    return this;
  }

  withQueryParams(params: Record<string, string>): this {
    for (const [name, value] of Object.entries(params)) {
      this.queryParams.set(name, value);
    }
    return this;
  }

  /**
   * Set a header. Names are case-insensitive and stored lower-cased.
   */
  withHeader(name: string, value: string): this {
    this.headers.set(name.toLowerCase(), value);
    return this;
  }

  withHeaders(headers: Record<string, string>): this {
    for (const [name, value] of Object.entries(headers)) {
      this.withHeader(name, value);
    }
    return this;
  }

  withBody(body: string): this {
    this.requestBody = body;
    return this;
  }

  withBytesBody(body: Uint8Array): this {
    this.requestBody = body;
    return this;
  }

  /**
   * Serialize `body` as JSON and set `content-type: application/json`.
   *
   * A value that cannot be serialized makes `build()` throw.
   */
  withJsonBody(body: unknown): this {
    try {
      const json = JSON.stringify(body);
      if (json === undefined) {
        throw new TypeError(`value of type ${typeof body} is not serializable`);
      }
      this.requestBody = json;
      this.withHeader('Content-Type', 'application/json');
    } catch (error) {
      this.failure = new RequestConstructionError('error applying request option', { cause: error });
    }
    return this;
  }

  withBasicAuth(username: string, password: string): this {
    return this.withHeader('Authorization', basicAuthHeader(username, password));
  }

  getQueryParams(): ReadonlyMap<string, string> {
    return this.queryParams;
  }

  getHeaders(): ReadonlyMap<string, string> {
    return this.headers;
  }

  getBody(): string | Uint8Array | undefined {
    return this.requestBody;
  }

  /**
   * URL with the query string appended.
   */
  buildUrl(): string {
    if (this.queryParams.size === 0) {
      return this.url;
    }
    const query = new URLSearchParams([...this.queryParams]).toString();
    const separator = this.url.includes('?') ? '&' : '?';
    return `${this.url}${separator}${query}`;
  }

  /**
   * @throws RequestConstructionError for an unsupported method, an invalid URL or a body that failed to serialize
   */
  build(): HttpRequest {
    if (this.failure) {
      throw this.failure;
    }
    if (!HTTP_METHODS.includes(this.method)) {
      throw new RequestConstructionError(`unsupported method "${this.method}"`);
    }
    if (!isAbsoluteUrl(this.url) && !this.url.startsWith('/')) {
      throw new RequestConstructionError(`invalid request URL "${this.url}"`);
    }

    const request: HttpRequest = {
      method: this.method,
      url: this.buildUrl(),
      headers: Object.fromEntries(this.headers),
    };
    if (this.requestBody !== undefined) {
      request.body = this.requestBody;
    }
    return request;
  }

  static get(url: string): RequestBuilder {
    return new RequestBuilder('GET', url);
  }

  static head(url: string): RequestBuilder {
    return new RequestBuilder('HEAD', url);
  }

  static delete(url: string): RequestBuilder {
    return new RequestBuilder('DELETE', url);
  }

  static post(url: string, body?: unknown): RequestBuilder {
    return new RequestBuilder('POST', url, body);
  }

  static put(url: string, body?: unknown): RequestBuilder {
    return new RequestBuilder('PUT', url, body);
  }

  static patch(url: string, body?: unknown): RequestBuilder {
    return new RequestBuilder('PATCH', url, body);
  }
}

export interface RequestOptions {
  headers?: Record<string, string>;
  query?: Record<string, string>;

  /** Raw body; ignored when `json` is set */
  body?: string | Uint8Array;

  /** Value serialized as a JSON body */
  json?: unknown;

  basicAuth?: { username: string; password: string };
}

/**
 * Build a request from a method name, a URL and options.
 *
 * @example
 * ```typescript
 * const request = newRequest('get', '/v1/items', { query: { page: '2' } });
 * ```
 *
 * @throws RequestConstructionError when the method is unknown or an option cannot be applied
 */
export function newRequest(method: string, url: string, options: RequestOptions = {}): HttpRequest {
  const normalized = method.toUpperCase();
  const httpMethod = HTTP_METHODS.find((candidate) => candidate === normalized);
  if (!httpMethod) {
    throw new RequestConstructionError(`error creating request: unsupported method "${method}"`);
  }

  const builder = new RequestBuilder(httpMethod, url);
  if (options.query) {
    builder.withQueryParams(options.query);
  }
  if (options.headers) {
    builder.withHeaders(options.headers);
  }
  if (options.json !== undefined) {
    builder.withJsonBody(options.json);
  } else if (typeof options.body === 'string') {
    builder.withBody(options.body);
  } else if (options.body !== undefined) {
    builder.withBytesBody(options.body);
  }
  if (options.basicAuth) {
    builder.withBasicAuth(options.basicAuth.username, options.basicAuth.password);
  }
  return builder.build();
}

/**
 * Whether the URL carries its own scheme and host
 */
export function isAbsoluteUrl(url: string): boolean {
  if (!URL.canParse(url)) {
    return false;
  }
  return new URL(url).host !== '';
}
