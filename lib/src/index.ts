/**
 * Montana Blotter Ingestion - Shared Library
 *
 * Extraction, format detection, incident parsing, storage and the batch
 * processor that ties them together.
 */

// Text Extraction (PDF text layer, OCR fallback, plain text)
export * from './pdf/index.js';

// Format Detection and Incident Parsing
export * from './parsing/index.js';

// Database (PostgreSQL)
export * from './db/index.js';

// Batch Processing
export * from './ingest/index.js';

// Logging
export * from './logging/index.js';
