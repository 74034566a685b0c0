/**
 * PdfExtractor - Extract text from PDF documents
 *
 * Reads each page's text content in page order with pdfjs-dist and
 * concatenates the page texts with no separator.
 */

import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import { ExtractionFailedError, getErrorMessage } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import type { FormatExtractor } from '../types.js';

/**
 * Returns the text of every page, in page order
 */
export type PdfPageReader = (data: Uint8Array) => Promise<string[]>;

/**
 * Default page reader backed by pdfjs-dist.
 *
 * A page's text is its text items joined in content-stream order; an item
 * flagged as ending a line contributes a trailing newline.
 */
export const readPdfPages: PdfPageReader = async (data) => {
  const loadingTask = pdfjsLib.getDocument({
    data,
    verbosity: 0, // Suppress warnings
    isEvalSupported: false,
  });

  const pdfDocument = await loadingTask.promise;
  try {
    const pages: string[] = [];
    for (let pageNum = 1; pageNum <= pdfDocument.numPages; pageNum++) {
      const page = await pdfDocument.getPage(pageNum);
      const content = await page.getTextContent();
      let pageText = '';
      for (const item of content.items) {
        if ('str' in item) {
          pageText += item.str;
          if (item.hasEOL) {
            pageText += '\n';
          }
        }
      }
      pages.push(pageText);
      page.cleanup();
    }
    return pages;
  } finally {
    await pdfDocument.destroy();
  }
};

/**
 * PdfExtractor - Extract text from PDF
 */
export class PdfExtractor implements FormatExtractor {
  private readonly readPages: PdfPageReader;

  constructor(config: { readPages?: PdfPageReader } = {}) {
    this.readPages = config.readPages ?? readPdfPages;
  }

  /**
   * Extract text from PDF buffer
   *
   * @throws ExtractionFailedError if the container cannot be parsed
   */
  async extract(pdfBuffer: Buffer): Promise<string> {
    let pages: string[];
    try {
      // pdfjs takes ownership of the array it is given, so hand it a copy
      pages = await this.readPages(new Uint8Array(pdfBuffer));
    } catch (error) {
      logger.warn({ error: getErrorMessage(error), bytes: pdfBuffer.length }, 'PDF extraction failed');
      throw new ExtractionFailedError('pdf', getErrorMessage(error));
    }

    const fullText = pages.join('');

    logger.debug(
      {
        pageCount: pages.length,
        textLength: fullText.length,
      },
      'PDF extraction completed'
    );

    return fullText;
  }
}
