/**
 * TextExtractor - Format dispatch for document text extraction
 */

import { UnsupportedFormatError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { DocxExtractor } from './docx/DocxExtractor.js';
import { PdfExtractor } from './pdf/PdfExtractor.js';
import { isSupportedFormat, type DocumentFormat, type FormatExtractor, type SourceDocument } from './types.js';

/**
 * Plain text is decoded as UTF-8; a byte order mark is dropped by the decoder.
 */
export class PlainTextExtractor implements FormatExtractor {
  async extract(content: Buffer): Promise<string> {
    return new TextDecoder('utf-8').decode(content);
  }
}

export class TextExtractor {
  private readonly extractors: Record<DocumentFormat, FormatExtractor>;

  constructor(extractors: Partial<Record<DocumentFormat, FormatExtractor>> = {}) {
    this.extractors = {
      pdf: extractors.pdf ?? new PdfExtractor(),
      docx: extractors.docx ?? new DocxExtractor(),
      plain: extractors.plain ?? new PlainTextExtractor(),
    };
  }

  /**
   * Convert a document container into plain text
   *
   * @throws UnsupportedFormatError for tags other than pdf, docx and plain
   * @throws ExtractionFailedError for corrupt container bytes
   */
  async extractText(document: SourceDocument): Promise<string> {
    if (!isSupportedFormat(document.format)) {
      logger.info({ format: document.format, filename: document.filename }, 'Rejected document with unsupported format');
      throw new UnsupportedFormatError(document.format, document.filename ? { filename: document.filename } : undefined);
    }

    return this.extractors[document.format].extract(document.content);
  }
}
