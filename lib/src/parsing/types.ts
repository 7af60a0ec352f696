/**
 * Incident Parsing Types
 *
 * Format tags, parsed incident shapes and the parser configuration that
 * carries every department-specific anchor and word list.
 */

import { z } from 'zod';

// =============================================================================
// Format Tags
// =============================================================================

/**
 * Parsing strategies. `gcso` (Gallatin County Sheriff's Office), `helena`
 * (Helena Police Department) and `havre` (Havre Police Department) are tuned
 * to one department's layout; `generic` is the best-effort fallback.
 */
export const FormatTagSchema = z.enum(['gcso', 'helena', 'havre', 'generic']);

export type FormatTag = z.infer<typeof FormatTagSchema>;

export const KnownFormatTagSchema = FormatTagSchema.exclude(['generic']);

export type KnownFormatTag = z.infer<typeof KnownFormatTagSchema>;

// =============================================================================
// Parsed Incidents
// =============================================================================

export interface CommandLogEntry {
  /** `MM/DD/YY HH:MM:SS` as printed in the source */
  timestamp: string;
  /** `Last, First` when the line names an officer */
  officer: string | null;
  entry: string;
}

/**
 * One incident as read from the source text. Fields the source does not
 * carry are `null`; dates and times are kept as printed.
 */
export interface ParsedIncident {
  cfsNumber: string | null;
  date: string | null;
  time: string | null;
  incidentType: string | null;
  location: string | null;
  details: string | null;
  officer: string | null;
  /** Narrative order, as printed */
  commandLogs: CommandLogEntry[];
  /**
   * Lines inside a GCSO call that are neither the call line nor a log entry,
   * in source order. Already folded into `details`.
   */
  freeText: string[];
}

export interface FormatDetection {
  format: FormatTag;
  /** Every known format whose anchors matched, in priority order */
  matched: KnownFormatTag[];
}

export interface ParsedBlotter {
  format: FormatTag;
  county: string | null;
  incidents: ParsedIncident[];
  totalCount: number;
  /** Known formats that also matched but lost the priority tie-break */
  ambiguousFormats: KnownFormatTag[];
}

// =============================================================================
// Parser Configuration
// =============================================================================

export const FormatAnchorsSchema = z.object({
  /** Regex sources, compiled case-insensitive and multiline */
  anchors: z.array(z.string().min(1)).min(1),
  county: z.string().min(1).nullable().default(null),
});

export const ParserConfigSchema = z.object({
  /** Evaluation order for detection; the first format with a matching anchor wins */
  priority: z.array(KnownFormatTagSchema).min(1),
  formats: z.object({
    gcso: FormatAnchorsSchema,
    helena: FormatAnchorsSchema,
    havre: FormatAnchorsSchema,
  }),
  counties: z.array(z.string().min(1)),
  /** Street designators that end a location (`RD`, `ST`...) */
  streetSuffixes: z.array(z.string().min(1)),
  gcso: z.object({
    skipLinePatterns: z.array(z.string().min(1)),
    incidentTypes: z.array(z.string().min(1)),
    /** Command-log entries containing these are left out of the narrative */
    dispatchNoise: z.array(z.string().min(1)),
    narrativeMinLength: z.number().int().nonnegative().default(50),
  }),
  helena: z.object({
    incidentKeywords: z.array(
      z.object({
        type: z.string().min(1),
        keywords: z.array(z.string().min(1)).min(1),
      })
    ),
  }),
});

export type ParserConfig = z.infer<typeof ParserConfigSchema>;

/**
 * Strategy signature shared by every format: a single forward scan over the
 * lines that yields each incident once its block is complete.
 */
export type FormatParser = (
  lines: readonly string[],
  config: ParserConfig
) => Generator<ParsedIncident, void, undefined>;
