/**
 * Fallback for layouts no known format claims: any line that starts with a
 * date opens an incident, and the lines after it (up to a blank line or the
 * next dated line) extend its details.
 */

import type { ParsedIncident, ParserConfig } from '../types.js';

const DATED_LINE = /^(\d{1,2}\/\d{1,2}\/\d{2,4}|\d{4}-\d{2}-\d{2})\b\s*(.*)$/;
const LEADING_TIME = /^(\d{1,2}:\d{2}(?::\d{2})?(?:\s*[AP]M)?)\b\s*(.*)$/i;
const TYPE_SEPARATOR = /^(?:(.*?)\s+)?-\s+(.*)$/;

export function* parseGeneric(lines: readonly string[], _config: ParserConfig): Generator<ParsedIncident, void, undefined> {
  let current: ParsedIncident | null = null;

  for (const rawLine of lines) {
    const line = rawLine.trim();
    const dated = DATED_LINE.exec(line);

    if (dated) {
      if (current) yield current;
      current = openIncident(dated[1] ?? '', dated[2] ?? '');
      continue;
    }

    if (!current) {
      continue;
    }

    if (!line) {
      yield current;
      current = null;
      continue;
    }

    current.details = current.details ? `${current.details} ${line}` : line;
  }

  if (current) {
    yield current;
  }
}

function openIncident(date: string, remainder: string): ParsedIncident {
  let rest = remainder.trim();
  let time: string | null = null;

  const timed = LEADING_TIME.exec(rest);
  if (timed) {
    time = timed[1] ?? null;
    rest = (timed[2] ?? '').trim();
  }

  // `14:05 - Theft - ...`: the dash after the time is not a type separator
  rest = rest.replace(/^-\s*/, '');

  let incidentType: string | null = null;
  let details: string = rest;

  const split = TYPE_SEPARATOR.exec(rest);
  if (split) {
    incidentType = split[1]?.trim() || null;
    details = (split[2] ?? '').trim();
  }

  return {
    cfsNumber: null,
    date,
    time,
    incidentType,
    location: null,
    details: details || null,
    officer: null,
    commandLogs: [],
    freeText: [],
  };
}
