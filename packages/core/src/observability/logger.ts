/**
 * Log levels for structured logging
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * One log record. Dispatcher and motor entries carry the command `serial`
 * and the property `name` in `data`.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: string;
  /** Server the component talks to, as `host:port` */
  connection?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

/**
 * Sink for protocol diagnostics; pass your own to route them elsewhere
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: Error, data?: Record<string, unknown>): void;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Context name (e.g., 'Dispatcher', 'Transport') */
  context?: string;
  /** Server address stamped on every entry */
  connection?: string;
  /** Receives every entry at or above `level`; prints with {@link formatLogEntry} by default */
  handler?: (entry: LogEntry) => void;
  /** Off by default when `NODE_ENV` is `production` */
  enabled?: boolean;
}

/**
 * What components accept for their `logger` option: options for a new
 * logger, a ready-made {@link Logger}, or `false` to silence output.
 */
export type LoggerSetting = LoggerOptions | Logger | false;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Render an entry as one console line.
 *
 * The command serial and the property name, when present in `data`, lead the
 * message so interleaved traffic can be followed by eye:
 * `2024-05-01T12:00:00.000Z WARN [Dispatcher@beamline-7:6510] #42 var/x Command timed out {"timeoutMs":30000}`
 */
export function formatLogEntry(entry: LogEntry): string {
  const timestamp = new Date(entry.timestamp).toISOString();
  const source = [entry.context, entry.connection && `@${entry.connection}`].filter(Boolean).join('');
  const { serial, name, ...rest } = entry.data ?? {};

  const parts = [timestamp, entry.level.toUpperCase()];
  if (source) parts.push(`[${source}]`);
  if (typeof serial === 'number') parts.push(`#${serial}`);
  if (typeof name === 'string' && name) parts.push(name);
  parts.push(entry.message);
  if (Object.keys(rest).length > 0) parts.push(JSON.stringify(rest));
  return parts.join(' ');
}

function defaultLogHandler(entry: LogEntry): void {
  const line = formatLogEntry(entry);

  switch (entry.level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line, entry.error ?? '');
      break;
  }
}

/**
 * Create a structured logger
 *
 * @example
 * ```typescript
 * const log = createLogger({ level: 'debug', context: 'Dispatcher' });
 * log.warn('Discarding reply for unknown serial', { serial: 42 });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = 'info',
    context,
    connection,
    handler = defaultLogHandler,
    enabled = process.env.NODE_ENV !== 'production',
  } = options;

  const minPriority = LOG_LEVEL_PRIORITY[level];

  function shouldLog(logLevel: LogLevel): boolean {
    if (!enabled) return false;
    return LOG_LEVEL_PRIORITY[logLevel] >= minPriority;
  }

  function log(
    logLevel: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!shouldLog(logLevel)) return;

    handler({
      level: logLevel,
      message,
      timestamp: Date.now(),
      context,
      connection,
      data,
      error,
    });
  }

  return {
    debug(message: string, data?: Record<string, unknown>): void {
      log('debug', message, data);
    },
    info(message: string, data?: Record<string, unknown>): void {
      log('info', message, data);
    },
    warn(message: string, data?: Record<string, unknown>): void {
      log('warn', message, data);
    },
    error(message: string, error?: Error, data?: Record<string, unknown>): void {
      log('error', message, data, error);
    },
  };
}

/**
 * No-op logger that doesn't output anything
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function isLogger(setting: LoggerOptions | Logger): setting is Logger {
  return (
    'debug' in setting &&
    typeof setting.debug === 'function' &&
    'error' in setting &&
    typeof setting.error === 'function'
  );
}

/**
 * Turn a component's `logger` option into a {@link Logger}.
 *
 * A custom logger is used as is; options produce a new logger labelled with
 * `context` unless the options name their own.
 */
export function resolveLogger(setting: LoggerSetting | undefined, context: string): Logger {
  if (setting === false) {
    return noopLogger;
  }
  if (setting && isLogger(setting)) {
    return setting;
  }
  return createLogger({ context, ...setting });
}

/**
 * Stamp a server address on a `logger` option. Ready-made loggers and
 * `false` pass through untouched.
 */
export function bindConnection(setting: LoggerSetting | undefined, connection: string): LoggerSetting | undefined {
  if (setting === false || (setting && isLogger(setting))) {
    return setting;
  }
  return { connection, ...setting };
}
