/**
 * Logging Types and Schemas
 *
 * Log levels, formats and logger configuration for the blotter ingestion
 * library and its command-line scripts.
 */

import { z } from 'zod';

// =============================================================================
// Log Levels
// =============================================================================

/**
 * Log level severity (lower number = higher priority)
 */
export const LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
  TRACE: 4,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelName = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.TRACE]: 'TRACE',
} as const;

export type LogLevelName = (typeof LogLevelName)[keyof typeof LogLevelName];

export const LogLevelSchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
]);

// =============================================================================
// Log Entry
// =============================================================================

/** Structured fields attached to a line, e.g. `{ filePath, blotterId }` */
export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: LogContext | undefined;
  error?: FormattedError | undefined;
  /** Colon-separated source path, e.g. `ingest:extractor` */
  source?: string | undefined;
}

export interface FormattedError {
  name: string;
  message: string;
  code?: string | undefined;
  stack?: string | undefined;
}

// =============================================================================
// Logger Configuration
// =============================================================================

export const LogFormat = {
  /** Human-readable single line */
  TEXT: 'text',
  /** One JSON object per line, for log shippers */
  JSON: 'json',
  /** Text with ANSI colors, for terminals */
  PRETTY: 'pretty',
} as const;

export type LogFormat = (typeof LogFormat)[keyof typeof LogFormat];

export const LogFormatSchema = z.enum(['text', 'json', 'pretty']);

export const LoggerConfigSchema = z.object({
  /**
   * Minimum log level to output
   * @default LogLevel.INFO
   */
  level: LogLevelSchema.default(LogLevel.INFO),

  /**
   * @default 'text'
   */
  format: LogFormatSchema.default('text'),

  timestamps: z.boolean().default(true),

  /** Only honoured by the `pretty` format */
  colors: z.boolean().default(true),

  source: z.string().optional(),

  /** Fields written with every line (see `Logger.withContext`) */
  context: z.record(z.unknown()).optional(),

  console: z.boolean().default(true),

  /**
   * Custom sink; when set, console output is skipped
   */
  output: z
    .function()
    .args(z.string(), LogLevelSchema)
    .returns(z.void())
    .optional(),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;

export function createDefaultLoggerConfig(
  overrides?: Partial<LoggerConfig>
): LoggerConfig {
  return LoggerConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Formatting Helpers
// =============================================================================

export const LogColors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

export const LogLevelColors: Record<LogLevel, string> = {
  [LogLevel.ERROR]: LogColors.red,
  [LogLevel.WARN]: LogColors.yellow,
  [LogLevel.INFO]: LogColors.blue,
  [LogLevel.DEBUG]: LogColors.cyan,
  [LogLevel.TRACE]: LogColors.gray,
};

/**
 * Parse a log level name such as `debug` or `WARN`.
 * Unknown names fall back to INFO.
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.trim().toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'TRACE':
      return LogLevel.TRACE;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Parse a log format name; unknown names fall back to `text`.
 */
export function parseLogFormat(format: string): LogFormat {
  const parsed = LogFormatSchema.safeParse(format.trim().toLowerCase());
  return parsed.success ? parsed.data : LogFormat.TEXT;
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return level <= minLevel;
}

/**
 * Format an error for logging. Error classes of this library expose a
 * string `code`, which is carried along.
 */
export function formatError(error: unknown): FormattedError {
  if (error instanceof Error) {
    const code =
      'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      code,
      stack: error.stack,
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}
