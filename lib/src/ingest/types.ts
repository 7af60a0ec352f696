/**
 * Blotter Ingestion Types
 */

import { z } from 'zod';
import type { BlotterRepository } from '../db/repository.js';
import type { Logger } from '../logging/index.js';
import type { FormatTag, ParserConfig } from '../parsing/types.js';
import {
  ExtractionOptionsSchema,
  type ExtractedText,
  type ExtractionMethod,
  type ExtractionOptions,
} from '../pdf/types.js';

/**
 * Pipeline stages, in order. A run ends in exactly one of the last three.
 */
export const IngestStage = {
  PENDING: 'pending',
  EXTRACTING: 'extracting',
  PARSING: 'parsing',
  PERSISTING: 'persisting',
  SUCCESS: 'success',
  PARTIAL: 'partial',
  FAILED: 'failed',
} as const;

export type IngestStage = (typeof IngestStage)[keyof typeof IngestStage];

export type IngestStatus = Extract<IngestStage, 'success' | 'partial' | 'failed'>;

/**
 * What a blotter that parses to zero incidents counts as
 */
export const ZeroIncidentPolicySchema = z.enum(['success', 'failed']);

export type ZeroIncidentPolicy = z.infer<typeof ZeroIncidentPolicySchema>;

/** Stored when neither the caller nor the text names a county */
export const UNKNOWN_COUNTY = 'Unknown';

export interface IngestResult {
  status: IngestStatus;
  incidentCount: number;
  /** Failure reason; `null` unless `status` is `failed` */
  error: string | null;
  /** `null` only when the blotter row itself could not be written */
  blotterId: number | null;
  format: FormatTag | null;
  county: string | null;
  extractionMethod: ExtractionMethod | null;
  filePath: string;
  durationMs: number;
}

export type ExtractFn = (
  filePath: string,
  options?: Partial<ExtractionOptions>,
  logger?: Logger
) => Promise<ExtractedText>;

export interface IngestDependencies {
  repository: BlotterRepository;
  logger?: Logger;
  /** Replaces text extraction (tests, pre-extracted text) */
  extract?: ExtractFn;
  config?: ParserConfig;
}

export const IngestConfigSchema = z.object({
  extraction: ExtractionOptionsSchema.partial().default({}),
  zeroIncidentPolicy: ZeroIncidentPolicySchema.default('success'),
});

export type IngestConfig = z.infer<typeof IngestConfigSchema>;

export interface IngestOptions {
  extraction?: Partial<ExtractionOptions>;
  zeroIncidentPolicy?: ZeroIncidentPolicy;
  onStage?: (stage: IngestStage) => void;
}

export interface IngestFile {
  filePath: string;
  county?: string | null;
}

export interface BatchIngestSummary {
  results: IngestResult[];
  succeeded: number;
  partial: number;
  failed: number;
  totalIncidents: number;
  durationMs: number;
}

// =============================================================================
// Environment
// =============================================================================

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
}

function parseNumberEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

/**
 * Ingestion settings from the environment
 *
 * - BLOTTER_MIN_TEXT_CHARS: text-layer size below which OCR runs (default 50)
 * - BLOTTER_OCR_ENABLED: `false` to never rasterise (default true)
 * - BLOTTER_OCR_LANGUAGE: tesseract language (default eng)
 * - BLOTTER_OCR_SCALE: page render scale (default 2)
 * - BLOTTER_ZERO_INCIDENT_POLICY: `success` or `failed` (default success)
 *
 * @throws {z.ZodError} When a variable is set to an invalid value
 */
export function loadIngestConfig(env: NodeJS.ProcessEnv = process.env): IngestConfig {
  const extraction: Record<string, unknown> = {
    minTextChars: parseNumberEnv(env['BLOTTER_MIN_TEXT_CHARS']),
    ocrEnabled: parseBooleanEnv(env['BLOTTER_OCR_ENABLED']),
    ocrLanguage: env['BLOTTER_OCR_LANGUAGE'] || undefined,
    ocrScale: parseNumberEnv(env['BLOTTER_OCR_SCALE']),
  };

  return IngestConfigSchema.parse({
    extraction: Object.fromEntries(Object.entries(extraction).filter(([, value]) => value !== undefined)),
    zeroIncidentPolicy: env['BLOTTER_ZERO_INCIDENT_POLICY'] || undefined,
  });
}
