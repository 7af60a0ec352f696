/**
 * Logging Module
 *
 * Leveled, structured logging for the library and the CLI scripts.
 */

export {
  LogLevel,
  LogLevelName,
  LogLevelSchema,
  LogFormat,
  LogFormatSchema,
  LoggerConfigSchema,
  LogColors,
  LogLevelColors,
  createDefaultLoggerConfig,
  parseLogLevel,
  parseLogFormat,
  shouldLog,
  formatError,
  type LogContext,
  type LogEntry,
  type FormattedError,
  type LoggerConfig,
} from './types.js';

export {
  Logger,
  getGlobalLogger,
  setGlobalLogger,
  resetGlobalLogger,
  createLogger,
  createLoggerFromEnv,
} from './logger.js';

export { formatLogEntry, formatTextLine, formatJsonLine, formatPrettyLine, type FormatOptions } from './format.js';
