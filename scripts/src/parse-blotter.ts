#!/usr/bin/env tsx
/**
 * Blotter Parse Script
 *
 * Extracts and parses one blotter file and prints what was found. Nothing is
 * written to the database.
 *
 * Usage:
 *   npx tsx scripts/src/parse-blotter.ts <file> [county] [options]
 *   # or via npm script:
 *   npm run parse-blotter -- <file> [county] [options]
 *
 * Options:
 *   --json            Print the parsed blotter as JSON
 *   --limit=N         Incidents to print in full (default: 5)
 *   --no-ocr          Never fall back to OCR
 *
 * Exit codes: 0 when the file was read (even with zero incidents), 1 when it
 * could not be extracted or parsing failed.
 */

import {
  createLoggerFromEnv,
  extractBlotterText,
  formatParsedBlotter,
  isExtractionError,
  loadDefaultParserConfig,
  loadIngestConfig,
  parseBlotterText,
} from '@mt-blotter/lib';

interface ParsedArgs {
  filePath: string;
  county: string | null;
  json: boolean;
  limit: number;
  ocr: boolean;
}

function parseArgs(): ParsedArgs {
  const positional: string[] = [];
  const result = { json: false, limit: 5, ocr: true };

  for (const arg of process.argv.slice(2)) {
    if (arg === '--json') {
      result.json = true;
    } else if (arg === '--no-ocr') {
      result.ocr = false;
    } else if (arg.startsWith('--limit=')) {
      result.limit = parseInt(arg.slice(8), 10);
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    } else if (arg.startsWith('--')) {
      console.error(`Unknown option: ${arg}`);
      printHelp();
      process.exit(1);
    } else {
      positional.push(arg);
    }
  }

  const [filePath, county] = positional;
  if (!filePath) {
    printHelp();
    process.exit(1);
  }
  if (Number.isNaN(result.limit) || result.limit < 0) {
    console.error('--limit must be a non-negative integer');
    process.exit(1);
  }

  return { filePath, county: county ?? null, ...result };
}

function printHelp(): void {
  console.log(`
Blotter Parser

Usage:
  npm run parse-blotter -- <file> [county] [options]

Options:
  --json            Print the parsed blotter as JSON
  --limit=N         Incidents to print in full (default: 5)
  --no-ocr          Never fall back to OCR
  -h, --help        Show this help message
`);
}

async function main(): Promise<void> {
  const args = parseArgs();
  const logger = createLoggerFromEnv('parse-blotter');
  const settings = loadIngestConfig();

  try {
    const extracted = await extractBlotterText(
      args.filePath,
      { ...settings.extraction, ...(args.ocr ? {} : { ocrEnabled: false }) },
      logger.child('extractor')
    );
    logger.info('Extracted text', {
      method: extracted.method,
      pageCount: extracted.pageCount,
      charCount: extracted.charCount,
    });

    const parsed = parseBlotterText(extracted.text, loadDefaultParserConfig(), logger.child('parser'));
    const result = args.county ? { ...parsed, county: args.county } : parsed;

    console.log(args.json ? JSON.stringify(result, null, 2) : formatParsedBlotter(result, { limit: args.limit }));
  } catch (error) {
    if (isExtractionError(error)) {
      logger.error('Extraction failed', error);
    } else {
      logger.error('Parse failed', error instanceof Error ? error : new Error(String(error)));
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
