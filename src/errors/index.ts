export { LazyHttpError, errorMessage, chainMessage } from './error.js';
export type { LazyHttpErrorCode, LazyHttpErrorOptions } from './error.js';
export {
  ConfigurationError,
  RequestConstructionError,
  RateLimitError,
  ResponseHandlingError,
  NoTokenAvailableError,
  RetryExhaustedError,
  ContextCancelledDuringRetryError,
  TransportError,
  CancelledError,
  DeadlineExceededError,
  LimiterStoppedError,
  DecodeError,
  isCancellationError,
} from './categories.js';
