/**
 * Blotter ingestion pipeline
 */

export {
  IngestStage,
  ZeroIncidentPolicySchema,
  IngestConfigSchema,
  UNKNOWN_COUNTY,
  loadIngestConfig,
  type IngestStatus,
  type ZeroIncidentPolicy,
  type IngestResult,
  type ExtractFn,
  type IngestDependencies,
  type IngestConfig,
  type IngestOptions,
  type IngestFile,
  type BatchIngestSummary,
} from './types.js';

export { processBlotter, processBlotterFiles } from './processor.js';
