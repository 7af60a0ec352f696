/**
 * Text Extraction Module
 *
 * Reads blotter PDFs (text layer first, OCR as fallback) and plain-text
 * blotters into lines of text.
 */

export {
  ExtractionErrorCode,
  ExtractionMethodSchema,
  ExtractionOptionsSchema,
  SourceTypeSchema,
  ExtractionError,
  isExtractionError,
  normalizeExtractedText,
  splitLines,
  type ExtractedText,
  type ExtractionMethod,
  type ExtractionOptions,
  type SourceType,
  type OcrOptions,
  type OcrResult,
} from './types.js';

export { extractBlotterText, detectSourceType } from './extractor.js';

export { recognizePdfPages } from './ocr.js';
