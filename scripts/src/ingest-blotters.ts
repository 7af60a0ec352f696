#!/usr/bin/env tsx
/**
 * Blotter Ingestion Script
 *
 * Runs each file through extraction, parsing and storage, one after another.
 * A file that fails is reported and the rest still run.
 *
 * Usage:
 *   npx tsx scripts/src/ingest-blotters.ts <file...> [options]
 *   # or via npm script:
 *   npm run ingest -- <file...> [options]
 *
 * Options:
 *   --county=NAME           County label for every file (default: detect from text)
 *   --zero-policy=POLICY    success | failed: how a blotter with no incidents counts
 *   --verbose               Show detailed logging
 *   --quiet                 Minimal output (errors only)
 *   --log-format=FMT        Log format: text, json, pretty (default: pretty)
 *
 * Environment variables:
 *   - DATABASE_URL, or DB_HOST / DB_PORT / DB_USER / DB_PASSWORD / DB_NAME
 *   - BLOTTER_MIN_TEXT_CHARS, BLOTTER_OCR_ENABLED, BLOTTER_OCR_LANGUAGE,
 *     BLOTTER_OCR_SCALE, BLOTTER_ZERO_INCIDENT_POLICY
 *
 * Exit code 1 when any file failed.
 */

import {
  closeDatabasePool,
  createLogger,
  createPgBlotterRepository,
  getDatabasePool,
  loadIngestConfig,
  LogFormatSchema,
  LogLevel,
  parseLogFormat,
  processBlotterFiles,
  validateDatabaseEnv,
  ZeroIncidentPolicySchema,
  type IngestResult,
  type Logger,
  type LogFormat,
  type ZeroIncidentPolicy,
} from '@mt-blotter/lib';

interface ParsedArgs {
  files: string[];
  county: string | null;
  zeroPolicy?: ZeroIncidentPolicy;
  verbose: boolean;
  quiet: boolean;
  logFormat: LogFormat;
}

function parseArgs(): ParsedArgs {
  const result: ParsedArgs = {
    files: [],
    county: null,
    verbose: false,
    quiet: false,
    logFormat: 'pretty',
  };

  for (const arg of process.argv.slice(2)) {
    if (arg.startsWith('--county=')) {
      result.county = arg.slice(9).trim() || null;
    } else if (arg.startsWith('--zero-policy=')) {
      const policy = ZeroIncidentPolicySchema.safeParse(arg.slice(14));
      if (!policy.success) {
        console.error(`Invalid --zero-policy: ${arg.slice(14)} (expected success or failed)`);
        process.exit(1);
      }
      result.zeroPolicy = policy.data;
    } else if (arg === '--verbose') {
      result.verbose = true;
    } else if (arg === '--quiet') {
      result.quiet = true;
    } else if (arg.startsWith('--log-format=')) {
      const format = arg.slice(13);
      if (!LogFormatSchema.safeParse(format).success) {
        console.error(`Invalid --log-format: ${format} (expected text, json or pretty)`);
        process.exit(1);
      }
      result.logFormat = parseLogFormat(format);
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    } else if (arg.startsWith('--')) {
      console.error(`Unknown option: ${arg}`);
      printHelp();
      process.exit(1);
    } else {
      result.files.push(arg);
    }
  }

  if (result.files.length === 0) {
    printHelp();
    process.exit(1);
  }

  return result;
}

function printHelp(): void {
  console.log(`
Blotter Ingestion

Usage:
  npm run ingest -- <file...> [options]

Options:
  --county=NAME           County label for every file (default: detect from text)
  --zero-policy=POLICY    success | failed: how a blotter with no incidents counts
  --verbose               Show detailed logging (DEBUG level)
  --quiet                 Minimal output (ERROR level only)
  --log-format=FMT        Log format: text, json, pretty (default: pretty)
  -h, --help              Show this help message
`);
}

// ============================================================================
// Logger Setup
// ============================================================================

function createIngestLogger(args: ParsedArgs): Logger {
  let level: LogLevel = LogLevel.INFO;
  if (args.verbose) level = LogLevel.DEBUG;
  if (args.quiet) level = LogLevel.ERROR;

  return createLogger('ingest-blotters', {
    level,
    format: args.logFormat,
    timestamps: true,
    colors: true,
  });
}

function describe(result: IngestResult): string {
  const label = result.status.toUpperCase().padEnd(7);
  const detail =
    result.status === 'failed'
      ? (result.error ?? 'unknown error')
      : `${result.incidentCount} incident(s), ${result.format ?? '?'} format, ${result.county ?? 'Unknown'}`;
  return `  [${label}] ${result.filePath}: ${detail}`;
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const args = parseArgs();
  const logger = createIngestLogger(args);

  const validation = validateDatabaseEnv();
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (!validation.isValid) {
    for (const error of validation.errors) {
      logger.error(error);
    }
    process.exit(1);
  }

  const settings = loadIngestConfig();
  const repository = createPgBlotterRepository(getDatabasePool());

  try {
    const summary = await processBlotterFiles(
      args.files,
      { repository, logger },
      {
        county: args.county,
        extraction: settings.extraction,
        zeroIncidentPolicy: args.zeroPolicy ?? settings.zeroIncidentPolicy,
        onResult: (result) => console.log(describe(result)),
      }
    );

    console.log('');
    console.log(
      `Processed ${summary.results.length} file(s): ${summary.succeeded} succeeded, ` +
        `${summary.partial} partial, ${summary.failed} failed, ${summary.totalIncidents} incident(s)`
    );

    process.exitCode = summary.failed > 0 ? 1 : 0;
  } finally {
    await closeDatabasePool();
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
