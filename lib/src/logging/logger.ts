/**
 * Logger Implementation
 *
 * Structured logger shared by the extractor, parser, repository and batch
 * processor. Child loggers extend the source path (`ingest:extractor`);
 * `withContext` binds fields such as the file being ingested to every line.
 */

import { formatLogEntry } from './format.js';
import {
  type LogContext,
  type LogEntry,
  type LoggerConfig,
  LogFormat,
  LogLevel,
  createDefaultLoggerConfig,
  formatError,
  parseLogFormat,
  parseLogLevel,
  shouldLog,
} from './types.js';

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = createDefaultLoggerConfig(config);
  }

  /**
   * Logger for a sub-component: same sink, level and bound context, with
   * `source` appended to the source path
   */
  child(source: string): Logger {
    return new Logger({
      ...this.config,
      source: this.config.source ? `${this.config.source}:${source}` : source,
    });
  }

  /**
   * Logger that adds `fields` to every line it writes. Fields passed to a
   * single call win over bound ones.
   *
   * @example
   * ```typescript
   * const fileLogger = logger.withContext({ filePath: '/uploads/gcso.pdf' });
   * fileLogger.info('Blotter ingested', { incidentCount: 12 });
   * ```
   */
  withContext(fields: LogContext): Logger {
    return new Logger({
      ...this.config,
      context: { ...this.config.context, ...fields },
    });
  }

  error(message: string, context?: LogContext): void;
  error(message: string, error: Error, context?: LogContext): void;
  error(message: string, errorOrContext?: Error | LogContext, context?: LogContext): void {
    if (errorOrContext instanceof Error) {
      this.write(LogLevel.ERROR, message, context, errorOrContext);
    } else {
      this.write(LogLevel.ERROR, message, errorOrContext);
    }
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.WARN, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.INFO, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.write(LogLevel.TRACE, message, context);
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  getConfig(): Readonly<LoggerConfig> {
    return this.config;
  }

  private write(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!shouldLog(level, this.config.level)) {
      return;
    }

    const bound = this.config.context;
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: bound ? { ...bound, ...context } : context,
      source: this.config.source,
      error: error ? formatError(error) : undefined,
    };

    const line = formatLogEntry(entry, this.config);

    if (this.config.output) {
      this.config.output(line, level);
    } else if (this.config.console) {
      toConsole(line, level);
    }
  }
}

function toConsole(line: string, level: LogLevel): void {
  switch (level) {
    case LogLevel.ERROR:
      console.error(line);
      break;
    case LogLevel.WARN:
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

// =============================================================================
// Global Logger Instance
// =============================================================================

let globalLogger: Logger | null = null;

/** Root logger for library code called without one, read from the environment */
export function getGlobalLogger(): Logger {
  globalLogger ??= createLoggerFromEnv('blotter');
  return globalLogger;
}

export function setGlobalLogger(logger: Logger): void {
  globalLogger = logger;
}

export function resetGlobalLogger(): void {
  globalLogger = null;
}

export function createLogger(source: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({ ...config, source });
}

/**
 * Create a logger configured from `LOG_LEVEL` and `LOG_FORMAT`.
 * Explicit overrides win over the environment.
 */
export function createLoggerFromEnv(
  source: string,
  overrides?: Partial<LoggerConfig>,
  env: NodeJS.ProcessEnv = process.env
): Logger {
  const level = env['LOG_LEVEL'] ? parseLogLevel(env['LOG_LEVEL']) : LogLevel.INFO;
  const format = env['LOG_FORMAT'] ? parseLogFormat(env['LOG_FORMAT']) : LogFormat.TEXT;

  return new Logger({ level, format, ...overrides, source });
}
