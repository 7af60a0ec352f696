/**
 * Helena Police Department press release
 *
 * Two variants, one incident per line:
 * ```
 * 8:20 AM – A theft was reported near the 3100 block of N Montana Ave.
 * 1008 hours, an Officer responded to the 1800 block of Lyndale Ave.
 * ```
 * The clock-time variant is used when any line carries it; the
 * military-time variant otherwise.
 */

import { compilePatterns } from '../config.js';
import type { ParsedIncident, ParserConfig } from '../types.js';

/** The separator is an en-dash, em-dash or whatever OCR made of it */
const CLOCK_LINE = /^(\d{1,2}:\d{2}\s+[AP]M)\s+\S\s+(.+)$/i;
const MILITARY_LINE = /^(\d{4})\s+hours?,\s+(.+)$/i;

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const MONTH_DATE = new RegExp(`\\b(${MONTHS.join('|')})\\s+(\\d{1,2}),?\\s+(\\d{4})\\b`, 'i');
const SLASH_DATE = /\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/;

export function* parseHelena(lines: readonly string[], config: ParserConfig): Generator<ParsedIncident, void, undefined> {
  const trimmed = lines.map((line) => line.trim());
  const date = findReleaseDate(trimmed);
  const useClock = trimmed.some((line) => CLOCK_LINE.test(line));
  const locationPattern = new RegExp(
    `(?:near|to|at|around)\\s+(?:the\\s+)?(\\d+\\s+block\\s+of\\s+[\\w\\s]+?\\s(?:${compilePatterns(config).streetSuffixAlternation}))\\b`,
    'i'
  );

  for (const line of trimmed) {
    let time: string;
    let description: string;

    if (useClock) {
      const match = CLOCK_LINE.exec(line);
      if (!match) continue;
      time = (match[1] ?? '').replace(/\s+/g, ' ');
      description = (match[2] ?? '').trim();
    } else {
      const match = MILITARY_LINE.exec(line);
      if (!match) continue;
      time = militaryToClock(match[1] ?? '');
      description = (match[2] ?? '').replace(/\s+/g, ' ').trim();
    }

    yield {
      cfsNumber: null,
      date,
      time,
      incidentType: classifyIncident(description, config),
      location: locationPattern.exec(description)?.[1]?.trim() ?? null,
      details: description || null,
      officer: null,
      commandLogs: [],
      freeText: [],
    };
  }
}

/**
 * First keyword group found in the description, in configured order
 */
export function classifyIncident(description: string, config: ParserConfig): string | null {
  const lower = description.toLowerCase();
  const hit = config.helena.incidentKeywords.find(({ keywords }) =>
    keywords.some((keyword) => lower.includes(keyword.toLowerCase()))
  );
  return hit?.type ?? null;
}

/**
 * `1008` → `10:08 AM`. Values that are not a valid time of day come back
 * unchanged.
 */
export function militaryToClock(raw: string): string {
  const match = /^(\d{1,2})(\d{2})$/.exec(raw);
  if (!match) {
    return raw;
  }

  const hours = Number(match[1]);
  const minutes = match[2] ?? '00';
  if (hours > 23 || Number(minutes) > 59) {
    return raw;
  }

  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  return `${hour12}:${minutes} ${hours < 12 ? 'AM' : 'PM'}`;
}

/**
 * `MM/DD/YY` for a real calendar date, else `null`
 */
export function formatShortDate(year: number, month: number, day: number): string | null {
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }

  const pad = (value: number): string => String(value).padStart(2, '0');
  return `${pad(month)}/${pad(day)}/${pad(year % 100)}`;
}

function findReleaseDate(lines: readonly string[]): string | null {
  for (const line of lines) {
    const named = MONTH_DATE.exec(line);
    if (named) {
      const month = MONTHS.indexOf((named[1] ?? '').toLowerCase()) + 1;
      const date = formatShortDate(Number(named[3]), month, Number(named[2]));
      if (date) return date;
    }
  }

  for (const line of lines) {
    const slash = SLASH_DATE.exec(line);
    if (slash) {
      const date = formatShortDate(Number(slash[3]), Number(slash[1]), Number(slash[2]));
      if (date) return date;
    }
  }

  return null;
}
