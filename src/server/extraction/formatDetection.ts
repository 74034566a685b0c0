import { extname } from 'path';
import type { DocumentFormat } from './types.js';

const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  '.pdf': 'pdf',
  '.docx': 'docx',
  '.txt': 'plain',
};

const MIME_FORMATS: Record<string, DocumentFormat> = {
  'application/pdf': 'pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'docx',
  'text/plain': 'plain',
};

/**
 * Derive a format tag from a file name, falling back to the MIME type.
 *
 * Unknown inputs yield the bare extension (e.g. `odt`) or `unknown`, so the
 * extractor can reject them with the tag the caller actually sent.
 */
export function detectDocumentFormat(filename: string | undefined, mimeType?: string): string {
  const extension = filename ? extname(filename).toLowerCase() : '';
  const byExtension = EXTENSION_FORMATS[extension];
  if (byExtension) {
    return byExtension;
  }

  const mime = mimeType?.split(';')[0]?.trim().toLowerCase();
  const byMime = mime ? MIME_FORMATS[mime] : undefined;
  if (byMime) {
    return byMime;
  }

  return extension ? extension.slice(1) : 'unknown';
}
