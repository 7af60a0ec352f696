/**
 * Gallatin County Sheriff's Office (GCSO) call log
 *
 * ```
 * 02/11/26 01:00:00 CFS26-020475 GALLATIN RD 911 HANG UP
 * 02/11/26 01:34:33 - Alexander, Logan - Deputies responded.
 * ```
 */

import { compilePatterns, type CompiledPatterns } from '../config.js';
import type { CommandLogEntry, ParsedIncident, ParserConfig } from '../types.js';

const START_LINE = /^(\d{2}\/\d{2}\/\d{2})\s+(\d{2}:\d{2}:\d{2})\s+(CFS\d{2}-\d+)\s+(.+?)\s*$/i;
const LOG_LINE = /^(\d{2}\/\d{2}\/\d{2}\s+\d{2}:\d{2}:\d{2})\s+-\s+(.*)$/;

const NAME_TOKEN = "[A-Za-z][A-Za-z.'\\-]*";
const NAME = `${NAME_TOKEN}(?:\\s${NAME_TOKEN}){0,2}`;
/** `Last, First - entry` */
const OFFICER_PREFIX = new RegExp(`^(${NAME},\\s*${NAME})\\s+-\\s+(.*)$`);

interface OpenIncident {
  cfsNumber: string;
  date: string;
  time: string;
  location: string | null;
  incidentType: string | null;
  logs: CommandLogEntry[];
  freeText: string[];
}

export function* parseGcso(lines: readonly string[], config: ParserConfig): Generator<ParsedIncident, void, undefined> {
  const patterns = compilePatterns(config);
  let current: OpenIncident | null = null;

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line || patterns.gcsoSkipLines.some((skip) => skip.test(line))) {
      continue;
    }

    const start = START_LINE.exec(line);
    if (start) {
      if (current) {
        yield finishIncident(current, config, patterns);
      }
      const [, date = '', time = '', cfsNumber = '', rest = ''] = start;
      current = {
        cfsNumber: cfsNumber.toUpperCase(),
        date,
        time,
        ...splitLocationAndType(rest, patterns),
        logs: [],
        freeText: [],
      };
      continue;
    }

    // Page headers and report titles before the first call
    if (!current) {
      continue;
    }

    const log = LOG_LINE.exec(line);
    if (log) {
      current.logs.push(parseLogBody(log[1] ?? '', log[2] ?? ''));
    } else {
      current.freeText.push(line);
    }
  }

  if (current) {
    yield finishIncident(current, config, patterns);
  }
}

function parseLogBody(timestamp: string, body: string): CommandLogEntry {
  const officer = OFFICER_PREFIX.exec(body);
  if (officer) {
    return { timestamp, officer: officer[1] ?? null, entry: (officer[2] ?? '').trim() };
  }
  return { timestamp, officer: null, entry: body.trim() };
}

/**
 * Split `<location> <type>`. The call line has no delimiter between the two,
 * so the type is recognised by the configured incident types, then by the
 * last street suffix, then by position.
 */
export function splitLocationAndType(
  rest: string,
  patterns: CompiledPatterns
): { location: string | null; incidentType: string | null } {
  const text = rest.trim().replace(/\s+/g, ' ');
  const upper = text.toUpperCase();

  for (const type of patterns.gcsoIncidentTypes) {
    if (upper === type) {
      return { location: null, incidentType: text };
    }
    if (upper.endsWith(` ${type}`)) {
      return {
        location: text.slice(0, text.length - type.length).trim(),
        incidentType: text.slice(text.length - type.length),
      };
    }
  }

  const tokens = text.split(' ');
  for (let i = tokens.length - 2; i >= 0; i--) {
    const token = (tokens[i] ?? '').toUpperCase().replace(/[.,]$/, '');
    if (patterns.streetSuffixes.has(token)) {
      return {
        location: tokens.slice(0, i + 1).join(' '),
        incidentType: tokens.slice(i + 1).join(' '),
      };
    }
  }

  if (tokens.length >= 3) {
    return { location: tokens.slice(0, -2).join(' '), incidentType: tokens.slice(-2).join(' ') };
  }
  if (tokens.length === 2) {
    return { location: tokens[0] ?? null, incidentType: tokens[1] ?? null };
  }
  return { location: null, incidentType: text || null };
}

function finishIncident(incident: OpenIncident, config: ParserConfig, patterns: CompiledPatterns): ParsedIncident {
  const narrative = buildNarrative(incident.logs, config, patterns);
  const detailParts = [...incident.freeText, ...(narrative ? [narrative] : [])];

  return {
    cfsNumber: incident.cfsNumber,
    date: incident.date,
    time: incident.time,
    incidentType: incident.incidentType,
    location: incident.location,
    details: detailParts.length > 0 ? detailParts.join(' ') : null,
    officer: incident.logs.find((log) => log.officer !== null)?.officer ?? null,
    commandLogs: incident.logs,
    freeText: incident.freeText,
  };
}

/**
 * Substantive log entries, skipping dispatcher shorthand; falls back to the
 * last entry when none qualify
 */
function buildNarrative(logs: CommandLogEntry[], config: ParserConfig, patterns: CompiledPatterns): string | null {
  const substantive = logs
    .map((log) => log.entry)
    .filter(
      (entry) =>
        entry.length > config.gcso.narrativeMinLength && !patterns.gcsoDispatchNoise.some((noise) => noise.test(entry))
    );

  if (substantive.length > 0) {
    return substantive.join(' ');
  }

  const last = logs[logs.length - 1]?.entry;
  return last ? last : null;
}
