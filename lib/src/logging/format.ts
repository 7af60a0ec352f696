/**
 * Log line rendering for the three output formats
 */

import { type LogEntry, type LogFormat, LogColors, LogLevelColors, LogLevelName } from './types.js';

export interface FormatOptions {
  format: LogFormat;
  timestamps: boolean;
  colors: boolean;
}

export function formatLogEntry(entry: LogEntry, options: FormatOptions): string {
  switch (options.format) {
    case 'json':
      return formatJsonLine(entry);
    case 'pretty':
      return options.colors ? formatPrettyLine(entry, options.timestamps) : formatTextLine(entry, options.timestamps);
    case 'text':
      return formatTextLine(entry, options.timestamps);
  }
}

function hasContext(entry: LogEntry): entry is LogEntry & { context: Record<string, unknown> } {
  return entry.context !== undefined && Object.keys(entry.context).length > 0;
}

/**
 * `LEVEL [source] message {context}`, with the error on an indented line
 */
export function formatTextLine(entry: LogEntry, timestamps: boolean): string {
  const parts: string[] = [];

  if (timestamps) parts.push(`[${entry.timestamp.toISOString()}]`);
  parts.push(LogLevelName[entry.level].padEnd(5));
  if (entry.source) parts.push(`[${entry.source}]`);
  parts.push(entry.message);
  if (hasContext(entry)) parts.push(JSON.stringify(entry.context));

  if (entry.error) {
    const code = entry.error.code ? ` (${entry.error.code})` : '';
    parts.push(`\n  Error: ${entry.error.name}${code}: ${entry.error.message}`);
  }

  return parts.join(' ');
}

/**
 * One object per line; context fields sit beside `message` so log shippers
 * can index `blotterId`, `filePath` and the like directly
 */
export function formatJsonLine(entry: LogEntry): string {
  return JSON.stringify({
    timestamp: entry.timestamp.toISOString(),
    level: LogLevelName[entry.level],
    source: entry.source,
    message: entry.message,
    ...entry.context,
    error: entry.error,
  });
}

export function formatPrettyLine(entry: LogEntry, timestamps: boolean): string {
  const paint = (color: string, text: string): string => `${color}${text}${LogColors.reset}`;
  const parts: string[] = [];

  if (timestamps) parts.push(paint(LogColors.gray, `[${entry.timestamp.toISOString()}]`));
  parts.push(paint(LogLevelColors[entry.level], LogLevelName[entry.level].padEnd(5)));
  if (entry.source) parts.push(paint(LogColors.cyan, `[${entry.source}]`));
  parts.push(entry.message);
  if (hasContext(entry)) parts.push(paint(LogColors.dim, JSON.stringify(entry.context)));

  if (entry.error) {
    const code = entry.error.code ? ` (${entry.error.code})` : '';
    parts.push(`\n  ${paint(LogColors.red, `Error: ${entry.error.name}${code}: ${entry.error.message}`)}`);
    if (entry.error.stack) {
      parts.push(`\n  ${paint(LogColors.gray, entry.error.stack.replace(/\n/g, '\n  '))}`);
    }
  }

  return parts.join(' ');
}
