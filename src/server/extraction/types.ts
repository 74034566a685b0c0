/**
 * Document model shared by the extractors and the analysis pipeline
 */

export const SUPPORTED_FORMATS = ['pdf', 'docx', 'plain'] as const;

export type DocumentFormat = (typeof SUPPORTED_FORMATS)[number];

/**
 * Raw document as received from the caller. The format tag is whatever the
 * caller declared; it is only checked against SUPPORTED_FORMATS at extraction.
 */
export interface SourceDocument {
  readonly content: Buffer;
  readonly format: string;
  readonly filename?: string;
}

export function isSupportedFormat(format: string): format is DocumentFormat {
  return SUPPORTED_FORMATS.some((supported) => supported === format);
}

/**
 * Common contract of the format-specific extractors
 */
export interface FormatExtractor {
  extract(content: Buffer): Promise<string>;
}
