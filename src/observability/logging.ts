/**
 * Logging for the request pipeline.
 *
 * Entries are a message plus a flat context record. The client binds a
 * `requestId` to every entry of a call; retries add `attempt`.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'line';
export type LogContext = Record<string, unknown>;

export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Context keys whose values never reach a log line
 */
const SENSITIVE_FIELDS = new Set([
  'authorization',
  'proxy-authorization',
  'cookie',
  'set-cookie',
  'password',
  'token',
  'secret',
  'apikey',
  'api_key',
]);

function isRecord(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Redacts sensitive fields from a log context, recursively.
 */
export function redactSensitive(context: LogContext): LogContext {
  const result: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      result[key] = redactSensitive(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

export interface ConsoleLoggerOptions {
  /** Entries below this level are dropped. Default: info */
  level?: LogLevel;

  /** `line` writes `key=value` pairs, `json` one object per entry. Default: line */
  format?: LogFormat;

  /** Default: true */
  includeTimestamps?: boolean;
}

function formatValue(value: unknown): string {
  if (typeof value === 'string' && /^[^\s"=]+$/.test(value)) {
    return value;
  }
  return JSON.stringify(value) ?? String(value);
}

function formatLine(time: string | undefined, level: LogLevel, message: string, fields: LogContext): string {
  const parts = time ? [time] : [];
  parts.push(level.toUpperCase(), message);
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      parts.push(`${key}=${formatValue(value)}`);
    }
  }
  return parts.join(' ');
}

/**
 * Logger writing one redacted line per entry to the console.
 * `warn` and `error` go to stderr.
 *
 * @example
 * ```typescript
 * const client = new LazyHttpClient({ logger: new ConsoleLogger({ level: 'debug' }) });
 * // 2026-01-05T10:00:00.000Z DEBUG Retrying request requestId=4b1d... attempt=1 delayMs=200 status=503
 * ```
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly format: LogFormat;
  private readonly includeTimestamps: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LOG_LEVEL_PRIORITY[options.level ?? 'info'];
    this.format = options.format ?? 'line';
    this.includeTimestamps = options.includeTimestamps ?? true;
  }

  trace(message: string, context?: LogContext): void {
    this.write('trace', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context: LogContext = {}): void {
    if (LOG_LEVEL_PRIORITY[level] < this.threshold) {
      return;
    }

    const time = this.includeTimestamps ? new Date().toISOString() : undefined;
    const fields = redactSensitive(context);
    const line =
      this.format === 'json'
        ? JSON.stringify({ time, level, msg: message, ...fields })
        : formatLine(time, level, message, fields);

    if (LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY.warn) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

const discard = (_message: string, _context?: LogContext): void => undefined;

/**
 * Drops every entry; the client default
 */
export class NoopLogger implements Logger {
  readonly trace = discard;
  readonly debug = discard;
  readonly info = discard;
  readonly warn = discard;
  readonly error = discard;
}

/**
 * Wrap a logger so every entry carries `bindings`. Fields of the entry's own
 * context win over bindings of the same name.
 */
export function withBindings(logger: Logger, bindings: LogContext): Logger {
  const merge = (context?: LogContext): LogContext => ({ ...bindings, ...context });
  return {
    trace: (message, context) => logger.trace(message, merge(context)),
    debug: (message, context) => logger.debug(message, merge(context)),
    info: (message, context) => logger.info(message, merge(context)),
    warn: (message, context) => logger.warn(message, merge(context)),
    error: (message, context) => logger.error(message, merge(context)),
  };
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
}

/**
 * Logger that keeps entries in memory, for tests
 */
export class InMemoryLogger implements Logger {
  private entries: LogEntry[] = [];

  trace(message: string, context?: LogContext): void {
    this.add('trace', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.add('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.add('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.add('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.add('error', message, context);
  }

  getLogs(): LogEntry[] {
    return [...this.entries];
  }

  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries = [];
  }

  private add(level: LogLevel, message: string, context?: LogContext): void {
    this.entries.push({
      level,
      message,
      context: redactSensitive(context ?? {}),
      timestamp: new Date(),
    });
  }
}

/**
 * Logs an outgoing HTTP request
 */
export function logRequest(logger: Logger, method: string, url: string, headers?: Record<string, string>): void {
  logger.debug('Outgoing request', { method, url, headers });
}

export function logResponse(logger: Logger, status: number, durationMs: number, attempts: number): void {
  logger.debug('Incoming response', { status, durationMs, attempts });
}

export interface RetryLogDetails {
  method: string;
  url: string;
  attempt: number;
  delayMs: number;
  status?: number;
  error?: string;
}

/**
 * Logs a scheduled retry; `attempt` is the attempt that just failed
 */
export function logRetry(logger: Logger, details: RetryLogDetails): void {
  logger.debug('Retrying request', { ...details });
}
