/**
 * HTTP types shared by the transport, the request builder and the client.
 *
 * @module transport/types
 */

/**
 * HTTP methods supported by the client.
 */
export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'];

/**
 * HTTP request structure.
 *
 * The request is mutable on purpose: pre-request hooks and authenticators
 * decorate it in place before it is sent.
 *
 * @example
 * ```typescript
 * const request: HttpRequest = {
 *   method: 'POST',
 *   url: '/v1/items',
 *   headers: { 'content-type': 'application/json' },
 *   body: JSON.stringify({ name: 'widget' }),
 * };
 * ```
 */
export interface HttpRequest {
  method: HttpMethod;

  /**
   * Absolute URL, or a path that the client resolves against its configured host.
   */
  url: string;

  /**
   * Header names are stored lower-cased.
   */
  headers: Record<string, string>;

  body?: string | Uint8Array;
}

/**
 * Raw response produced by a transport.
 */
export interface HttpResponse {
  status: number;

  /**
   * Header names are lower-cased; repeated headers are joined with ", ".
   */
  headers: Record<string, string>;

  body: Uint8Array;
}

/**
 * Transport interface for HTTP communication.
 *
 * A transport performs exactly one exchange per call. It must honour the
 * signal: once aborted, the returned promise rejects promptly.
 *
 * @example
 * ```typescript
 * class StaticTransport implements Transport {
 *   async send(): Promise<HttpResponse> {
 *     return { status: 204, headers: {}, body: new Uint8Array() };
 *   }
 * }
 * ```
 */
export interface Transport {
  send(request: HttpRequest, signal: AbortSignal): Promise<HttpResponse>;
}
