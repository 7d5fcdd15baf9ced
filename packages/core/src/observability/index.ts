export {
  bindConnection,
  createLogger,
  formatLogEntry,
  noopLogger,
  resolveLogger,
  type LogEntry,
  type LogLevel,
  type Logger,
  type LoggerOptions,
  type LoggerSetting,
} from './logger.js';
