import { describe, it, expect } from 'vitest';
import JSZip from 'jszip';
import { DocxExtractor, paragraphsFromHtml } from '../DocxExtractor.js';
import { ErrorCode, ExtractionFailedError } from '../../../types/errors.js';

const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';

function paragraph(text: string): string {
  return text ? `<w:p><w:r><w:t xml:space="preserve">${text}</w:t></w:r></w:p>` : '<w:p/>';
}

/**
 * Build a minimal DOCX container with the given body paragraphs
 */
async function buildDocx(paragraphs: string[]): Promise<Buffer> {
  const zip = new JSZip();
  zip.file(
    '[Content_Types].xml',
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
      '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
      '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
      '<Default Extension="xml" ContentType="application/xml"/>' +
      '<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>' +
      '</Types>'
  );
  zip.file(
    '_rels/.rels',
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
      '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
      '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>' +
      '</Relationships>'
  );
  zip.file(
    'word/document.xml',
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><w:document xmlns:w="${W_NS}"><w:body>` +
      paragraphs.map(paragraph).join('') +
      '</w:body></w:document>'
  );
  return zip.generateAsync({ type: 'nodebuffer' });
}

describe('paragraphsFromHtml', () => {
  it('collects headings, paragraphs and list items in document order', () => {
    const html =
      '<h1>Title</h1><p>Body<br />line two</p><ul><li>One</li><li>Two<ul><li>Nested</li></ul></li></ul>';

    expect(paragraphsFromHtml(html)).toEqual(['Title', 'Body\nline two', 'One', 'Two', 'Nested']);
  });

  it('keeps empty paragraphs', () => {
    expect(paragraphsFromHtml('<p>First</p><p></p><p>Third</p>')).toEqual(['First', '', 'Third']);
  });

  it('skips paragraphs inside tables', () => {
    const html = '<p>Before</p><table><tbody><tr><td><p>Cell</p></td></tr></tbody></table><p>After</p>';

    expect(paragraphsFromHtml(html)).toEqual(['Before', 'After']);
  });

  it('drops footnotes and their reference markers', () => {
    const html =
      '<p>Claim<sup><a href="#footnote-1" id="footnote-ref-1">[1]</a></sup></p>' +
      '<ol><li id="footnote-1"><p>Source note <a href="#footnote-ref-1">↑</a></p></li></ol>';

    expect(paragraphsFromHtml(html)).toEqual(['Claim']);
  });

  it('reads a paragraph wrapped in a list item once', () => {
    expect(paragraphsFromHtml('<ol><li><p>Item</p></li></ol>')).toEqual(['Item']);
  });
});

describe('DocxExtractor', () => {
  it('appends a newline after every paragraph, empty ones included', async () => {
    const extractor = new DocxExtractor();
    const docx = await buildDocx(['First paragraph', '', 'Second paragraph']);

    await expect(extractor.extract(docx)).resolves.toBe('First paragraph\n\nSecond paragraph\n');
  });

  it('returns an empty string for a document without paragraphs', async () => {
    const extractor = new DocxExtractor();
    await expect(extractor.extract(await buildDocx([]))).resolves.toBe('');
  });

  it('reports a corrupt container as ExtractionFailedError', async () => {
    const extractor = new DocxExtractor();
    const result = extractor.extract(Buffer.from('PK this is not a zip archive'));

    await expect(result).rejects.toBeInstanceOf(ExtractionFailedError);
    await expect(result).rejects.toMatchObject({ code: ErrorCode.EXTRACTION_FAILED, context: { format: 'docx' } });
  });
});
