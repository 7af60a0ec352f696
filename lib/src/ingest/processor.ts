/**
 * Blotter Batch Processor
 *
 * Runs one file through extract → detect → parse → persist and reports the
 * outcome. Every failure is turned into a `failed` result and the blotter
 * row is marked failed for audit; nothing is thrown to the caller, so one bad
 * file never stops the files after it.
 */

import { basename } from 'node:path';

import type { BlotterRepository } from '../db/repository.js';
import { getGlobalLogger, type Logger } from '../logging/index.js';
import { loadDefaultParserConfig } from '../parsing/config.js';
import { detectCounty, detectFormatDetailed } from '../parsing/detector.js';
import { parseIncidents } from '../parsing/parser.js';
import type { FormatTag, ParsedIncident } from '../parsing/types.js';
import { extractBlotterText } from '../pdf/extractor.js';
import type { ExtractedText } from '../pdf/types.js';
import {
  type BatchIngestSummary,
  type IngestDependencies,
  type IngestFile,
  type IngestOptions,
  type IngestResult,
  type IngestStage,
  type IngestStatus,
  IngestStage as Stage,
  UNKNOWN_COUNTY,
} from './types.js';

const DEGRADED_NOTE = 'OCR failed; stored from a low-yield text layer that may be incomplete';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Ingest one blotter file
 *
 * @param filePath - PDF or plain-text blotter
 * @param county - County label from the mailbox or upload form; `null` to detect it from the text
 *
 * @example
 * ```typescript
 * const repository = createPgBlotterRepository(getDatabasePool());
 * const result = await processBlotter('/uploads/gcso.pdf', 'Gallatin', { repository });
 * if (result.status === 'failed') console.error(result.error);
 * ```
 */
export async function processBlotter(
  filePath: string,
  county: string | null,
  deps: IngestDependencies,
  options: IngestOptions = {}
): Promise<IngestResult> {
  const startTime = performance.now();
  const logger = (deps.logger ?? getGlobalLogger()).child('ingest');
  const fileLogger = logger.withContext({ filePath });
  const parserConfig = deps.config ?? loadDefaultParserConfig();
  const extract = deps.extract ?? extractBlotterText;
  const label = county?.trim() || null;

  const result: IngestResult = {
    status: Stage.FAILED,
    incidentCount: 0,
    error: null,
    blotterId: null,
    format: null,
    county: label,
    extractionMethod: null,
    filePath,
    durationMs: 0,
  };

  const enter = (stage: IngestStage): void => {
    fileLogger.debug('Stage', { stage });
    options.onStage?.(stage);
  };

  const finish = (status: IngestStatus, error: string | null = null): IngestResult => {
    result.status = status;
    result.error = error;
    result.durationMs = performance.now() - startTime;
    enter(status);

    if (status === Stage.FAILED) {
      fileLogger.error('Blotter ingestion failed', { blotterId: result.blotterId, error });
    } else {
      fileLogger.info('Blotter ingested', {
        blotterId: result.blotterId,
        status,
        format: result.format,
        county: result.county,
        incidentCount: result.incidentCount,
      });
    }
    return result;
  };

  enter(Stage.PENDING);

  let blotterId: number;
  try {
    const blotter = await deps.repository.createBlotter({
      filename: basename(filePath),
      county: label ?? UNKNOWN_COUNTY,
      filePath,
    });
    blotterId = blotter.id;
    result.blotterId = blotterId;
  } catch (error) {
    return finish(Stage.FAILED, errorMessage(error));
  }

  const fail = async (message: string): Promise<IngestResult> => {
    await markFailed(deps.repository, blotterId, message, logger);
    result.incidentCount = 0;
    return finish(Stage.FAILED, message);
  };

  enter(Stage.EXTRACTING);
  let extracted: ExtractedText;
  try {
    extracted = await extract(filePath, options.extraction, logger.child('extractor'));
    result.extractionMethod = extracted.method;
  } catch (error) {
    return fail(errorMessage(error));
  }

  enter(Stage.PARSING);
  let format: FormatTag;
  let incidents: ParsedIncident[];
  try {
    const detection = detectFormatDetailed(extracted.text, parserConfig);
    if (detection.matched.length > 1) {
      fileLogger.warn('Format detection ambiguity; using priority order', {
        selected: detection.format,
        matched: detection.matched,
      });
    }

    format = detection.format;
    incidents = parseIncidents(extracted.text, format, parserConfig).toArray();
    result.format = format;
    result.county = label ?? detectCounty(extracted.text, parserConfig, format) ?? UNKNOWN_COUNTY;
  } catch (error) {
    return fail(`Parse failed: ${errorMessage(error)}`);
  }

  if (incidents.length === 0 && (options.zeroIncidentPolicy ?? 'success') === 'failed') {
    return fail('No incidents found in blotter text');
  }

  const status: IngestStatus = extracted.degraded && incidents.length > 0 ? Stage.PARTIAL : Stage.SUCCESS;

  enter(Stage.PERSISTING);
  try {
    result.incidentCount = await deps.repository.saveParsedIncidents(blotterId, incidents, {
      status,
      county: label ? null : result.county,
      format,
      sourceType: extracted.sourceType,
      notes: extracted.degraded ? DEGRADED_NOTE : null,
    });
  } catch (error) {
    return fail(errorMessage(error));
  }

  return finish(status);
}

/**
 * Mark the audit row failed. A second storage failure is logged, since the
 * original error is the one reported.
 */
async function markFailed(
  repository: BlotterRepository,
  blotterId: number,
  notes: string,
  logger: Logger
): Promise<void> {
  try {
    await repository.markBlotterFailed(blotterId, notes);
  } catch (error) {
    logger.error('Could not mark blotter failed', { blotterId, error: errorMessage(error) });
  }
}

/**
 * Ingest files one at a time, in order
 */
export async function processBlotterFiles(
  files: ReadonlyArray<string | IngestFile>,
  deps: IngestDependencies,
  options: IngestOptions & { county?: string | null; onResult?: (result: IngestResult) => void } = {}
): Promise<BatchIngestSummary> {
  const startTime = performance.now();
  const results: IngestResult[] = [];

  for (const file of files) {
    const { filePath, county } = typeof file === 'string' ? { filePath: file, county: undefined } : file;
    const result = await processBlotter(filePath, county ?? options.county ?? null, deps, options);
    results.push(result);
    options.onResult?.(result);
  }

  return {
    results,
    succeeded: results.filter((r) => r.status === Stage.SUCCESS).length,
    partial: results.filter((r) => r.status === Stage.PARTIAL).length,
    failed: results.filter((r) => r.status === Stage.FAILED).length,
    totalIncidents: results.reduce((sum, r) => sum + r.incidentCount, 0),
    durationMs: performance.now() - startTime,
  };
}
