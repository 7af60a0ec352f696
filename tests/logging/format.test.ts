/**
 * Tests for log line rendering
 */

import { describe, it, expect } from 'vitest';
import { formatJsonLine, formatLogEntry, formatPrettyLine, formatTextLine } from '../../lib/src/logging/format.js';
import { LogColors, LogLevel, type LogEntry } from '../../lib/src/logging/types.js';

const entry: LogEntry = {
  level: LogLevel.WARN,
  message: 'Format detection ambiguity',
  timestamp: new Date('2026-02-11T08:00:00.000Z'),
  context: { selected: 'gcso' },
  source: 'ingest',
};

describe('formatTextLine', () => {
  it('should render level, source, message and context', () => {
    expect(formatTextLine(entry, false)).toBe('WARN  [ingest] Format detection ambiguity {"selected":"gcso"}');
  });

  it('should prefix the timestamp when asked', () => {
    expect(formatTextLine(entry, true)).toBe(
      '[2026-02-11T08:00:00.000Z] WARN  [ingest] Format detection ambiguity {"selected":"gcso"}'
    );
  });

  it('should omit an empty context', () => {
    expect(formatTextLine({ ...entry, context: {} }, false)).toBe('WARN  [ingest] Format detection ambiguity');
  });
});

describe('formatJsonLine', () => {
  it('should place context fields at the top level', () => {
    expect(JSON.parse(formatJsonLine(entry))).toEqual({
      timestamp: '2026-02-11T08:00:00.000Z',
      level: 'WARN',
      source: 'ingest',
      message: 'Format detection ambiguity',
      selected: 'gcso',
    });
  });
});

describe('formatPrettyLine', () => {
  it('should color the level and the source', () => {
    const line = formatPrettyLine(entry, false);

    expect(line.startsWith(`${LogColors.yellow}WARN ${LogColors.reset} ${LogColors.cyan}[ingest]${LogColors.reset}`)).toBe(true);
  });
});

describe('formatLogEntry', () => {
  it('should fall back to plain text for pretty output without colors', () => {
    expect(formatLogEntry(entry, { format: 'pretty', timestamps: false, colors: false })).toBe(
      formatTextLine(entry, false)
    );
  });

  it('should dispatch json', () => {
    expect(formatLogEntry(entry, { format: 'json', timestamps: true, colors: true })).toBe(formatJsonLine(entry));
  });
});
