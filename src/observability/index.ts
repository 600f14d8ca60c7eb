export {
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  withBindings,
  redactSensitive,
  logRequest,
  logResponse,
  logRetry,
} from './logging.js';
export type {
  Logger,
  LogLevel,
  LogFormat,
  LogContext,
  LogEntry,
  ConsoleLoggerOptions,
  RetryLogDetails,
} from './logging.js';
