/**
 * Havre Police Department dispatch log (usually OCR text)
 *
 * ```
 * For Date: 02/11/2026 - Wednesday
 * 26-2080 0737 COMPLAINT C- NTA ISSUED WITH REPORT
 * Location/Address: [HAV 433] 4TH ST
 * Narrative:
 * Caller reported a dog at large.
 * ```
 */

import type { ParsedIncident, ParserConfig } from '../types.js';
import { formatShortDate, militaryToClock } from './helena.js';

const BLOCK_START = /^\d{2}-\d{4}\s/;
const CALL_LINE = /^(\d{2}-\d{4})\s+([0O]?\d{3,4})\s*(.*)$/i;
const ACTION_CODE = /\s+([A-Z]-\s+.+)$/;
const FOR_DATE = /For Date:\s*(\d{2})\/(\d{2})\/(\d{4})/i;

const META_LINE = /^(Location|Narrative|Calling|Involved|Refer|Arrest|Summons|Address|Age|Charges|Page)[\s:/]/i;
const LOCATION_LINE = /^Location(?:\/Address)?:\s*(.+)$/i;
const NARRATIVE_LINE = /^Narrative:\s*(.*)$/i;
const NARRATIVE_END = /^(Refer To|Arrest:|Summons|Charges:|Age:|Address:|Calling Party:|Involved Party:|For Date:)/i;

const AGENCY_CODE = /[[{]HAV[^\]}]*[\]}]?\s*/gi;
const PAGE_HEADER = /HAVRE POLICE DEPT\w*\s+Page:.*?Printed:\s*\d{2}\/\d{2}\/\d{4}/gi;

export function* parseHavre(lines: readonly string[], _config: ParserConfig): Generator<ParsedIncident, void, undefined> {
  const date = findLogDate(lines);
  let block: string[] | null = null;

  for (const rawLine of lines) {
    const line = rawLine.trim();

    if (BLOCK_START.test(line)) {
      const incident = block ? parseBlock(block, date) : null;
      if (incident) {
        yield incident;
      }
      block = [line];
      continue;
    }

    if (block && line) {
      block.push(line);
    }
  }

  const last = block ? parseBlock(block, date) : null;
  if (last) {
    yield last;
  }
}

function parseBlock(lines: string[], date: string | null): ParsedIncident | null {
  const call = CALL_LINE.exec(lines[0] ?? '');
  if (!call) {
    return null;
  }

  const rest = (call[3] ?? '').trim();
  const action = ACTION_CODE.exec(rest);
  let incidentType = cleanOcrArtifacts(action ? rest.slice(0, action.index) : rest);

  if (!incidentType) {
    incidentType = lines.slice(1, 4).find((line) => !META_LINE.test(line)) ?? '';
  }

  const narrative = extractNarrative(lines);
  let details = narrative || incidentType;
  const actionText = action?.[1]?.trim();
  if (actionText) {
    details = details ? `${details} (${actionText})` : actionText;
  }
  details = cleanOcrArtifacts(details.replace(PAGE_HEADER, ''));

  return {
    cfsNumber: call[1] ?? null,
    date,
    time: toClockTime(call[2] ?? ''),
    incidentType: incidentType ? titleCase(incidentType) : null,
    location: extractLocation(lines),
    details: details || null,
    officer: null,
    commandLogs: [],
    freeText: [],
  };
}

/** OCR reads a leading zero as the letter O */
function toClockTime(raw: string): string {
  const digits = raw.replace(/o/gi, '0');
  return militaryToClock(digits.padStart(4, '0'));
}

function extractLocation(lines: string[]): string | null {
  for (const line of lines) {
    const match = LOCATION_LINE.exec(line);
    if (match) {
      const location = cleanOcrArtifacts((match[1] ?? '').replace(AGENCY_CODE, '')).replace(/^[\s\-|~]+|[\s\-|~]+$/g, '');
      return location || null;
    }
  }
  return null;
}

function extractNarrative(lines: string[]): string {
  const narrative: string[] = [];
  let inNarrative = false;

  for (const line of lines) {
    const start = NARRATIVE_LINE.exec(line);
    if (start) {
      inNarrative = true;
      const after = (start[1] ?? '').trim();
      if (after) narrative.push(after);
      continue;
    }
    if (inNarrative) {
      if (NARRATIVE_END.test(line)) break;
      narrative.push(line);
    }
  }

  return narrative.join(' ').trim();
}

function findLogDate(lines: readonly string[]): string | null {
  for (const line of lines) {
    const match = FOR_DATE.exec(line);
    if (match) {
      return formatShortDate(Number(match[3]), Number(match[1]), Number(match[2]));
    }
  }
  return null;
}

/**
 * Drop stray table-border characters (`|`, `!`, braces) that OCR leaves
 * between cells
 */
export function cleanOcrArtifacts(text: string): string {
  return text
    .replace(/(?<!\w)[|!{}](?!\w)/g, ' ')
    .replace(/\s{2,}/g, ' ')
    .trim();
}

export function titleCase(value: string): string {
  return value.toLowerCase().replace(/[a-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1));
}
