/**
 * Blotter Text Extraction Types
 *
 * Result shapes, options and the error class used when turning an incoming
 * blotter file (PDF or plain text) into lines of text.
 */

import { z } from 'zod';

// =============================================================================
// Error Codes
// =============================================================================

export const ExtractionErrorCode = {
  /** File not found or path invalid */
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  /** File exists but could not be read (permissions, EISDIR...) */
  READ_ERROR: 'READ_ERROR',
  /** Missing PDF header or the PDF structure could not be opened */
  INVALID_PDF: 'INVALID_PDF',
  PASSWORD_PROTECTED: 'PASSWORD_PROTECTED',
  /** Neither a PDF nor a plain-text blotter */
  UNSUPPORTED_FILE: 'UNSUPPORTED_FILE',
  /** Text layer was empty and OCR could not run */
  OCR_FAILED: 'OCR_FAILED',
  EXTRACTION_ERROR: 'EXTRACTION_ERROR',
} as const;

export type ExtractionErrorCode = (typeof ExtractionErrorCode)[keyof typeof ExtractionErrorCode];

// =============================================================================
// Extraction Schemas
// =============================================================================

/**
 * How the returned text was obtained
 */
export const ExtractionMethodSchema = z.enum(['text', 'pdf-parse', 'ocr']);

export type ExtractionMethod = z.infer<typeof ExtractionMethodSchema>;

export const SourceTypeSchema = z.enum(['pdf', 'text']);

export type SourceType = z.infer<typeof SourceTypeSchema>;

export interface ExtractedText {
  text: string;
  /** `text` split on line breaks, in page order */
  lines: string[];
  pageCount: number;
  /** Trimmed character count of `text` */
  charCount: number;
  method: ExtractionMethod;
  sourceType: SourceType;
  filePath: string;
  /**
   * True when the text layer was below the OCR threshold and OCR failed,
   * so the returned text may be incomplete
   */
  degraded: boolean;
  durationMs: number;
}

export const ExtractionOptionsSchema = z.object({
  /** Text layers with fewer trimmed characters than this go through OCR */
  minTextChars: z.number().int().nonnegative().default(50),
  ocrEnabled: z.boolean().default(true),
  /** Tesseract language code(s) */
  ocrLanguage: z.string().min(1).default('eng'),
  /** Render scale for rasterised pages; 2 is roughly 150 dpi */
  ocrScale: z.number().positive().default(2),
  /** Upper bound on rasterised pages (undefined = all) */
  maxPages: z.number().int().positive().optional(),
});

export type ExtractionOptions = z.infer<typeof ExtractionOptionsSchema>;

export interface OcrOptions {
  language: string;
  scale: number;
  maxPages?: number | undefined;
}

export interface OcrResult {
  text: string;
  pageCount: number;
}

// =============================================================================
// Error Class
// =============================================================================

/**
 * Raised when a blotter file cannot be opened, read or rendered at all.
 * An empty but readable file is not an extraction error.
 */
export class ExtractionError extends Error {
  readonly code: ExtractionErrorCode;
  readonly filePath: string | undefined;
  readonly cause: Error | undefined;

  constructor(
    message: string,
    code: ExtractionErrorCode,
    options?: { filePath?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'ExtractionError';
    this.code = code;
    this.filePath = options?.filePath;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ExtractionError);
    }
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Normalise line endings and strip form feeds left between pages
 */
export function normalizeExtractedText(text: string): string {
  return text.replace(/\r\n?/g, '\n').replace(/\f/g, '\n');
}

export function splitLines(text: string): string[] {
  return text.length === 0 ? [] : text.split('\n');
}
