/**
 * Client extension points
 */

import type { ClientResponse } from '../response/response.js';
import type { HttpRequest } from '../transport/types.js';

/**
 * Runs before authentication and may alter the request in place.
 * Throwing aborts the request with a RequestConstructionError.
 */
export type PreRequestHook = (request: HttpRequest) => void | Promise<void>;

/**
 * Runs on the final response. Throwing yields a ResponseHandlingError that
 * still carries the response.
 */
export type PostResponseHook = (response: ClientResponse) => void | Promise<void>;

/**
 * Per-call options of `LazyHttpClient.do`
 */
export interface DoOptions {
  /** Cancels the whole call: admission, executions and backoff waits */
  signal?: AbortSignal;

  /** Deadline for the whole call, in milliseconds from now */
  timeoutMs?: number;

  /** Added to every log entry of the call. A random UUID when absent */
  requestId?: string;
}
