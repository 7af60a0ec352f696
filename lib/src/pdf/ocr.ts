/**
 * OCR Fallback
 *
 * Rasterises each PDF page with pdf.js onto a canvas and recognises the image
 * with tesseract.js. Used for scanned blotters whose text layer is empty or
 * nearly so.
 */

import type { OcrOptions, OcrResult } from './types.js';

/**
 * Recognise the text of every page of a PDF, in page order.
 *
 * The tesseract worker and the pdf.js document are released whether or not
 * recognition succeeds.
 *
 * @param data - Raw PDF bytes
 */
export async function recognizePdfPages(data: Buffer, options: OcrOptions): Promise<OcrResult> {
  // Loaded on first OCR call
  const pdfjsLib = await import('pdfjs-dist/legacy/build/pdf.mjs');
  const { createWorker } = await import('tesseract.js');
  const { createCanvas } = await import('@napi-rs/canvas');

  const pdfDocument = await pdfjsLib.getDocument({
    data: new Uint8Array(data),
    useWorkerFetch: false,
    isEvalSupported: false,
    useSystemFonts: true,
  }).promise;

  try {
    const numPages = pdfDocument.numPages;
    const pagesToProcess = Math.min(options.maxPages ?? numPages, numPages);
    const worker = await createWorker(options.language);
    const pageTexts: string[] = [];

    try {
      for (let pageNum = 1; pageNum <= pagesToProcess; pageNum++) {
        const page = await pdfDocument.getPage(pageNum);
        const viewport = page.getViewport({ scale: options.scale });
        const canvas = createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));
        const context = canvas.getContext('2d');

        await page.render({
          canvasContext: context as unknown as CanvasRenderingContext2D,
          viewport,
        }).promise;

        const {
          data: { text },
        } = await worker.recognize(canvas.toBuffer('image/png'));
        pageTexts.push(text);
        page.cleanup();
      }
    } finally {
      await worker.terminate();
    }

    return { text: pageTexts.join('\n'), pageCount: numPages };
  } finally {
    await pdfDocument.destroy();
  }
}
