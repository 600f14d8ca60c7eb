/**
 * Request authentication.
 *
 * An authenticator decorates the request in place, after the pre-request
 * hooks and before the request is sent. It runs once per logical request,
 * not once per retry.
 *
 * @module auth/authenticator
 */

import type { HttpRequest } from '../transport/types.js';

export interface Authenticator {
  /**
   * Add credentials to the request. Throwing aborts the request.
   */
  authenticate(request: HttpRequest): void | Promise<void>;
}

/**
 * Value of an `Authorization` header for HTTP basic authentication
 */
export function basicAuthHeader(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, 'utf8').toString('base64')}`;
}

/**
 * HTTP basic authentication.
 *
 * @example
 * ```typescript
 * const client = new LazyHttpClient({
 *   host: 'https://api.example.com',
 *   authenticator: new BasicAuthenticator('user', 'test-secret'),
 * });
 * ```
 */
export class BasicAuthenticator implements Authenticator {
  private readonly header: string;

  constructor(username: string, password: string) {
    this.header = basicAuthHeader(username, password);
  }

  authenticate(request: HttpRequest): void {
    request.headers['authorization'] = this.header;
  }
}

/**
 * Bearer token authentication. The token source is consulted on every request.
 */
export class BearerAuthenticator implements Authenticator {
  constructor(private readonly token: string | (() => string | Promise<string>)) {}

  async authenticate(request: HttpRequest): Promise<void> {
    const token = typeof this.token === 'function' ? await this.token() : this.token;
    request.headers['authorization'] = `Bearer ${token}`;
  }
}

/**
 * Adapt a plain function to the Authenticator interface
 */
export function authenticatorFn(fn: (request: HttpRequest) => void | Promise<void>): Authenticator {
  return { authenticate: fn };
}
