/**
 * Response body decoding.
 *
 * @module response/decode
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { DecodeError } from '../errors/index.js';
import type { HttpResponse } from '../transport/types.js';

export interface DecodeOptions {
  /**
   * Reject bodies larger than this many bytes.
   */
  maxBytes?: number;
}

/**
 * Return the raw body, enforcing the optional size limit.
 *
 * @throws DecodeError when the body exceeds `maxBytes`
 */
export function decodeBytes(response: HttpResponse, options: DecodeOptions = {}): Uint8Array {
  const { maxBytes } = options;
  if (maxBytes !== undefined && response.body.byteLength > maxBytes) {
    const size = response.body.byteLength;
    throw new DecodeError(`error reading response body: ${size} bytes exceeds limit of ${maxBytes}`, undefined, {
      status: response.status,
      size,
      maxBytes,
    });
  }
  return response.body;
}

/**
 * Decode the body as UTF-8 text.
 */
export function decodeText(response: HttpResponse, options: DecodeOptions = {}): string {
  return new TextDecoder('utf-8').decode(decodeBytes(response, options));
}

/**
 * Parse the body as JSON without validating its shape.
 *
 * @throws DecodeError when the body is not valid JSON
 */
export function decodeJson(response: HttpResponse, options: DecodeOptions = {}): unknown {
  const text = decodeText(response, options);
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DecodeError('error deserializing response body', error, { status: response.status });
  }
}

/**
 * Parse the body as JSON and validate it against a zod schema.
 *
 * @example
 * ```typescript
 * const User = z.object({ id: z.number(), name: z.string() });
 * const user = decodeJsonAs(response, User);
 * ```
 *
 * @throws DecodeError when the body is not valid JSON or does not match the schema
 */
export function decodeJsonAs<T>(response: HttpResponse, schema: ZodType<T, ZodTypeDef, unknown>, options: DecodeOptions = {}): T {
  const value = decodeJson(response, options);
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DecodeError('response body does not match the expected shape', result.error, {
      status: response.status,
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }
  return result.data;
}
