/**
 * Base error type for the lazyhttp client.
 *
 * @module errors/error
 */

/**
 * Error codes.
 *
 * Categorizes errors by the pipeline stage that produced them.
 */
export type LazyHttpErrorCode =
  | 'REQUEST_CONSTRUCTION' // Building or decorating the request failed
  | 'RATE_LIMIT' // Admission through the rate limiter was not granted
  | 'RESPONSE_HANDLING' // A post-response hook failed
  | 'NO_TOKEN_AVAILABLE' // Limiter deadline or cancellation
  | 'RETRY_EXHAUSTED' // Backoff gave up while the predicate still wanted a retry
  | 'CANCELLED_DURING_RETRY' // Cancelled while waiting between attempts
  | 'TRANSPORT' // The transport failed to produce a response
  | 'CANCELLED' // Caller signal aborted
  | 'DEADLINE_EXCEEDED' // A deadline elapsed
  | 'LIMITER_STOPPED' // The rate limiter was stopped
  | 'DECODE' // Response body could not be decoded
  | 'CONFIGURATION'; // Invalid configuration

export interface LazyHttpErrorOptions {
  code: LazyHttpErrorCode;
  message: string;
  cause?: unknown;
  details?: Record<string, unknown>;
}

/**
 * Base class for every error raised by the client.
 *
 * The wrapped error, if any, is exposed through the standard `cause`
 * property so callers can walk the chain.
 */
export class LazyHttpError extends Error {
  public readonly code: LazyHttpErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(options: LazyHttpErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'LazyHttpError';
    this.code = options.code;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Check whether an unknown value is a client error, optionally with a given code.
   */
  static is(error: unknown, code?: LazyHttpErrorCode): error is LazyHttpError {
    return error instanceof LazyHttpError && (code === undefined || error.code === code);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      cause: this.cause === undefined ? undefined : errorMessage(this.cause),
    };
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  if (typeof value === 'string') {
    return value;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Join a stage description with the message of the error that caused it.
 */
export function chainMessage(prefix: string, cause?: unknown): string {
  return cause === undefined ? prefix : `${prefix}: ${errorMessage(cause)}`;
}
