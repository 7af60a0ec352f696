/**
 * Text output for parsed blotters: a layout-preserving serialisation that
 * parses back to the same format, and the CLI summary.
 */

import type { CommandLogEntry, ParsedBlotter, ParsedIncident } from './types.js';

// =============================================================================
// Serialisation
// =============================================================================

/**
 * Write incidents back out in the layout of their source format
 */
export function renderBlotterText(parsed: Pick<ParsedBlotter, 'format' | 'incidents'>): string {
  const lines: string[] = [];

  switch (parsed.format) {
    case 'gcso':
      lines.push("Gallatin County Sheriff's Office Call Log");
      for (const incident of parsed.incidents) {
        lines.push(joinPresent(incident.date, incident.time, incident.cfsNumber, incident.location, incident.incidentType));
        lines.push(...incident.freeText, ...incident.commandLogs.map(renderLogLine));
      }
      break;

    case 'helena': {
      const date = parsed.incidents.find((incident) => incident.date)?.date;
      lines.push('Helena Police Department Daily Report');
      if (date) lines.push(`Date: ${toFullYearDate(date)}`);
      for (const incident of parsed.incidents) {
        lines.push(`${incident.time ?? ''} – ${incident.details ?? incident.incidentType ?? ''}`.trim());
      }
      break;
    }

    case 'havre': {
      const date = parsed.incidents.find((incident) => incident.date)?.date;
      lines.push('HAVRE POLICE DEPARTMENT Dispatch Log');
      if (date) lines.push(`For Date: ${toFullYearDate(date)}`);
      for (const incident of parsed.incidents) {
        lines.push(joinPresent(incident.cfsNumber, incident.time ? toMilitaryTime(incident.time) : null, incident.incidentType));
        if (incident.location) lines.push(`Location/Address: ${incident.location}`);
        if (incident.details) lines.push('Narrative:', incident.details);
      }
      break;
    }

    case 'generic':
      for (const incident of parsed.incidents) {
        const head = joinPresent(incident.date, incident.time, incident.incidentType);
        lines.push(incident.details ? `${head} - ${incident.details}` : head);
      }
      break;
  }

  return lines.join('\n');
}

function renderLogLine(log: CommandLogEntry): string {
  return log.officer ? `${log.timestamp} - ${log.officer} - ${log.entry}` : `${log.timestamp} - ${log.entry}`;
}

function joinPresent(...parts: Array<string | null>): string {
  return parts.filter((part): part is string => Boolean(part)).join(' ');
}

/** `02/11/26` → `02/11/2026` */
function toFullYearDate(date: string): string {
  return date.replace(/^(\d{2})\/(\d{2})\/(\d{2})$/, '$1/$2/20$3');
}

/** `7:37 AM` → `0737` */
function toMilitaryTime(time: string): string {
  const match = /^(\d{1,2}):(\d{2})\s*([AP]M)$/i.exec(time);
  if (!match) {
    return time;
  }
  const hours = Number(match[1]) % 12 + ((match[3] ?? '').toUpperCase() === 'PM' ? 12 : 0);
  return `${String(hours).padStart(2, '0')}${match[2] ?? '00'}`;
}

// =============================================================================
// CLI Summary
// =============================================================================

export interface FormatParsedBlotterOptions {
  /** Incidents to print in full (default 5) */
  limit?: number;
}

export function formatParsedBlotter(parsed: ParsedBlotter, options: FormatParsedBlotterOptions = {}): string {
  const limit = options.limit ?? 5;
  const lines = [
    `Format: ${parsed.format}`,
    `County: ${parsed.county ?? 'Unknown'}`,
    `Incidents: ${parsed.totalCount}`,
  ];

  if (parsed.ambiguousFormats.length > 0) {
    lines.push(`Also matched: ${parsed.ambiguousFormats.join(', ')}`);
  }

  parsed.incidents.slice(0, limit).forEach((incident, index) => {
    lines.push('', ...formatIncident(incident, index + 1));
  });

  const remaining = parsed.incidents.length - limit;
  if (remaining > 0) {
    lines.push('', `... and ${remaining} more`);
  }

  return lines.join('\n');
}

function formatIncident(incident: ParsedIncident, ordinal: number): string[] {
  const lines = [`[${ordinal}] ${joinPresent(incident.cfsNumber, incident.date, incident.time) || '(no call data)'}`];
  const fields: Array<[string, string | null]> = [
    ['Type', incident.incidentType],
    ['Location', incident.location],
    ['Officer', incident.officer],
    ['Details', incident.details],
  ];

  for (const [label, value] of fields) {
    if (value) lines.push(`    ${label}: ${value}`);
  }

  if (incident.commandLogs.length > 0) {
    lines.push(`    Command log (${incident.commandLogs.length}):`);
    for (const log of incident.commandLogs) {
      lines.push(`      ${joinPresent(log.timestamp, log.officer)}  ${log.entry}`);
    }
  }

  return lines;
}
