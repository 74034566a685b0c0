/**
 * DocxExtractor - Extract text from DOCX documents
 *
 * Converts the document with mammoth and walks the resulting HTML to
 * recover body paragraphs (plain paragraphs, headings and list items) in
 * document order. Each paragraph is followed by a newline.
 */

import mammoth from 'mammoth';
import * as cheerio from 'cheerio';
import { ExtractionFailedError, getErrorMessage } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import type { FormatExtractor } from '../types.js';

const PARAGRAPH_SELECTOR = 'p, h1, h2, h3, h4, h5, h6, li';

/**
 * Recover paragraph texts from mammoth HTML output.
 *
 * Table cells, footnotes and endnotes are not body paragraphs and are
 * skipped; line breaks inside a paragraph become newlines.
 */
export function paragraphsFromHtml(html: string): string[] {
  const $ = cheerio.load(html, null, false);

  $('li[id^="footnote-"], li[id^="endnote-"]').remove();
  $('a[id^="footnote-ref-"], a[id^="endnote-ref-"]').closest('sup').remove();
  $('br').replaceWith('\n');

  const paragraphs: string[] = [];
  $(PARAGRAPH_SELECTOR).each((_index, element) => {
    const node = $(element);
    if (node.closest('table').length > 0) {
      return;
    }
    // Paragraphs nested in a list item belong to that item
    if (node.is('p') && node.closest('li').length > 0) {
      return;
    }

    if (node.is('li')) {
      const own = node.clone();
      own.find('ul, ol').remove();
      paragraphs.push(own.text());
    } else {
      paragraphs.push(node.text());
    }
  });

  return paragraphs;
}

/**
 * DocxExtractor - Extract text from DOCX
 */
export class DocxExtractor implements FormatExtractor {
  /**
   * Extract text from DOCX buffer
   *
   * @throws ExtractionFailedError if the container cannot be parsed
   */
  async extract(docxBuffer: Buffer): Promise<string> {
    let html: string;
    try {
      const result = await mammoth.convertToHtml({ buffer: docxBuffer }, { ignoreEmptyParagraphs: false });
      html = result.value;
    } catch (error) {
      logger.warn({ error: getErrorMessage(error), bytes: docxBuffer.length }, 'DOCX extraction failed');
      throw new ExtractionFailedError('docx', getErrorMessage(error));
    }

    const paragraphs = paragraphsFromHtml(html);
    const fullText = paragraphs.map((paragraph) => `${paragraph}\n`).join('');

    logger.debug(
      {
        paragraphCount: paragraphs.length,
        textLength: fullText.length,
      },
      'DOCX extraction completed'
    );

    return fullText;
  }
}
