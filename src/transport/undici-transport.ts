/**
 * Default transport built on undici.
 *
 * @module transport/undici-transport
 */

import { request as undiciRequest, type Dispatcher } from 'undici';
import { CancellationScope } from '../cancellation/scope.js';
import type { HttpRequest, HttpResponse, Transport } from './types.js';

/**
 * Default per-exchange timeout in milliseconds
 */
export const DEFAULT_TRANSPORT_TIMEOUT_MS = 30_000;

export interface UndiciTransportOptions {
  /**
   * Upper bound for a single exchange, body included. Defaults to 30 seconds.
   */
  timeoutMs?: number;

  /**
   * Dispatcher used for every exchange (an undici `Agent`, `Pool` or
   * `MockAgent`). Defaults to undici's global dispatcher.
   */
  dispatcher?: Dispatcher;
}

/**
 * Transport that performs each exchange with undici's `request`.
 *
 * @example
 * ```typescript
 * const transport = new UndiciTransport({ timeoutMs: 10_000 });
 * const response = await transport.send(
 *   { method: 'GET', url: 'https://api.example.com/health', headers: {} },
 *   AbortSignal.timeout(5_000),
 * );
 * ```
 */
export class UndiciTransport implements Transport {
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;

  constructor(options: UndiciTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TRANSPORT_TIMEOUT_MS;
    this.dispatcher = options.dispatcher;
  }

  async send(request: HttpRequest, signal: AbortSignal): Promise<HttpResponse> {
    const scope = new CancellationScope({ signal, timeoutMs: this.timeoutMs });

    try {
      const response = await undiciRequest(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: scope.signal,
        dispatcher: this.dispatcher,
      });

      const body = new Uint8Array(await response.body.arrayBuffer());

      return {
        status: response.statusCode,
        headers: flattenHeaders(response.headers),
        body,
      };
    } catch (error) {
      // undici reports aborts with its own error; surface the scope's reason instead
      scope.throwIfCancelled();
      throw error;
    } finally {
      scope.dispose();
    }
  }
}

function flattenHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}
