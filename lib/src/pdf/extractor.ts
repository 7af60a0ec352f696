/**
 * Blotter Text Extraction
 *
 * Turns a blotter file into text. PDFs are read through their text layer with
 * pdf-parse; when that yields too little, pages are re-read with OCR.
 * Plain-text blotters (email bodies saved to disk) are read as UTF-8.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { extname } from 'node:path';
import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import { getGlobalLogger, type Logger } from '../logging/index.js';
import { recognizePdfPages } from './ocr.js';
import {
  type ExtractedText,
  type ExtractionMethod,
  type ExtractionOptions,
  type SourceType,
  ExtractionError,
  ExtractionErrorCode,
  ExtractionOptionsSchema,
  normalizeExtractedText,
  splitLines,
} from './types.js';

const PDF_MAGIC = '%PDF-';
const TEXT_EXTENSIONS = new Set(['.txt', '.text']);

/**
 * Extract the text of a blotter file.
 *
 * @param filePath - Path to a PDF or plain-text blotter
 * @param options - Thresholds and OCR settings; defaults apply to omitted fields
 * @returns Extracted text with the method that produced it
 * @throws {ExtractionError} When the file cannot be opened, read or rendered
 *
 * @example
 * ```typescript
 * const extracted = await extractBlotterText('/uploads/gcso-2026-02-11.pdf');
 * console.log(`${extracted.lines.length} lines via ${extracted.method}`);
 * ```
 */
export async function extractBlotterText(
  filePath: string,
  options?: Partial<ExtractionOptions>,
  logger: Logger = getGlobalLogger().child('extractor')
): Promise<ExtractedText> {
  const startTime = performance.now();
  const opts = ExtractionOptionsSchema.parse(options ?? {});
  const buffer = await readBlotterFile(filePath);
  const sourceType = detectSourceType(buffer, filePath);

  if (sourceType === 'text') {
    const text = normalizeExtractedText(buffer.toString('utf-8'));
    return buildResult(text, 1, 'text', sourceType, filePath, false, startTime);
  }

  const textLayer = await readTextLayer(buffer, filePath);
  const textLayerChars = textLayer.text.trim().length;

  if (textLayerChars >= opts.minTextChars) {
    return buildResult(textLayer.text, textLayer.pageCount, 'pdf-parse', sourceType, filePath, false, startTime);
  }

  if (!opts.ocrEnabled) {
    logger.warn('Text layer below OCR threshold but OCR is disabled', {
      filePath,
      charCount: textLayerChars,
      minTextChars: opts.minTextChars,
    });
    return buildResult(textLayer.text, textLayer.pageCount, 'pdf-parse', sourceType, filePath, false, startTime);
  }

  logger.info('Text layer too small, falling back to OCR', {
    filePath,
    charCount: textLayerChars,
    minTextChars: opts.minTextChars,
  });

  try {
    const ocr = await recognizePdfPages(buffer, {
      language: opts.ocrLanguage,
      scale: opts.ocrScale,
      maxPages: opts.maxPages,
    });
    const ocrText = normalizeExtractedText(ocr.text);

    if (ocrText.trim().length < textLayerChars) {
      logger.debug('OCR produced less text than the text layer; keeping the text layer', { filePath });
      return buildResult(textLayer.text, textLayer.pageCount, 'pdf-parse', sourceType, filePath, false, startTime);
    }

    return buildResult(ocrText, ocr.pageCount, 'ocr', sourceType, filePath, false, startTime);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);

    if (textLayerChars === 0) {
      throw new ExtractionError(`OCR failed and the PDF has no text layer: ${message}`, ExtractionErrorCode.OCR_FAILED, {
        filePath,
        cause: error instanceof Error ? error : undefined,
      });
    }

    logger.warn('OCR failed; using the low-yield text layer', { filePath, error: message });
    return buildResult(textLayer.text, textLayer.pageCount, 'pdf-parse', sourceType, filePath, true, startTime);
  }
}

/**
 * Read the whole file, mapping fs failures onto extraction error codes
 */
async function readBlotterFile(filePath: string): Promise<Buffer> {
  if (!existsSync(filePath)) {
    throw new ExtractionError(`Blotter file not found: ${filePath}`, ExtractionErrorCode.FILE_NOT_FOUND, { filePath });
  }

  try {
    return await readFile(filePath);
  } catch (readError) {
    throw new ExtractionError(`Failed to read blotter file: ${filePath}`, ExtractionErrorCode.READ_ERROR, {
      filePath,
      cause: readError instanceof Error ? readError : undefined,
    });
  }
}

/**
 * Decide between the PDF and plain-text paths from the magic bytes and the
 * file extension.
 */
export function detectSourceType(buffer: Buffer, filePath: string): SourceType {
  if (buffer.subarray(0, PDF_MAGIC.length).toString('ascii') === PDF_MAGIC) {
    return 'pdf';
  }

  const extension = extname(filePath).toLowerCase();
  if (TEXT_EXTENSIONS.has(extension)) {
    return 'text';
  }

  if (extension === '.pdf') {
    throw new ExtractionError('Invalid PDF: file does not start with PDF header', ExtractionErrorCode.INVALID_PDF, {
      filePath,
    });
  }

  throw new ExtractionError(`Unsupported blotter file type: ${extension || '(none)'}`, ExtractionErrorCode.UNSUPPORTED_FILE, {
    filePath,
  });
}

async function readTextLayer(buffer: Buffer, filePath: string): Promise<{ text: string; pageCount: number }> {
  try {
    const pdfData = await pdfParse(buffer);
    return {
      text: normalizeExtractedText(pdfData.text),
      pageCount: pdfData.numpages,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;

    if (/password|encrypt/i.test(message)) {
      throw new ExtractionError('PDF is password protected', ExtractionErrorCode.PASSWORD_PROTECTED, { filePath, cause });
    }

    throw new ExtractionError(`Invalid or corrupted PDF: ${message}`, ExtractionErrorCode.INVALID_PDF, { filePath, cause });
  }
}

function buildResult(
  text: string,
  pageCount: number,
  method: ExtractionMethod,
  sourceType: SourceType,
  filePath: string,
  degraded: boolean,
  startTime: number
): ExtractedText {
  return {
    text,
    lines: splitLines(text),
    pageCount,
    charCount: text.trim().length,
    method,
    sourceType,
    filePath,
    degraded,
    durationMs: performance.now() - startTime,
  };
}
