/**
 * Response returned by the client.
 *
 * @module response/response
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { HttpRequest, HttpResponse } from '../transport/types.js';
import { decodeBytes, decodeJson, decodeJsonAs, decodeText, type DecodeOptions } from './decode.js';

/**
 * Final response of a logical request, with body decoding helpers.
 *
 * @example
 * ```typescript
 * const response = await client.get('/v1/items/42');
 * if (response.ok) {
 *   const item = response.jsonAs(Item);
 * }
 * ```
 */
export class ClientResponse implements HttpResponse {
  public readonly status: number;
  public readonly headers: Record<string, string>;
  public readonly body: Uint8Array;

  constructor(
    raw: HttpResponse,
    /** The prepared request, as sent on the last attempt */
    public readonly request: HttpRequest,
    /** Executions it took to obtain this response */
    public readonly attempts: number
  ) {
    this.status = raw.status;
    this.headers = raw.headers;
    this.body = raw.body;
  }

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  header(name: string): string | undefined {
    return this.headers[name.toLowerCase()];
  }

  bytes(options?: DecodeOptions): Uint8Array {
    return decodeBytes(this, options);
  }

  text(options?: DecodeOptions): string {
    return decodeText(this, options);
  }

  json(options?: DecodeOptions): unknown {
    return decodeJson(this, options);
  }

  jsonAs<T>(schema: ZodType<T, ZodTypeDef, unknown>, options?: DecodeOptions): T {
    return decodeJsonAs(this, schema, options);
  }
}
