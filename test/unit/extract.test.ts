import { describe, expect, it } from 'vitest';

import { ExtractionError } from '../../src/errors';
import {
  DocxExtractor,
  HtmlExtractor,
  PdfExtractor,
  PlainTextExtractor,
  createDefaultExtractors,
  htmlToText,
  resolveDocument,
} from '../../src/pipeline/extract';

describe('resolveDocument', () => {
  it.each([
    ['https://files.example.test/assets/Policy.PDF?sv=2023&sig=abc', 'policy.pdf', 'pdf'],
    ['https://files.example.test/contract.docx', 'contract.docx', 'docx'],
    ['https://files.example.test/page.html', 'page.html', 'email'],
    ['https://files.example.test/message.eml#top', 'message.eml', 'email'],
    ['https://files.example.test/notes.txt', 'notes.txt', 'text'],
    ['https://files.example.test/download', 'download', 'text'],
  ])('resolves %s', (url, filename, documentType) => {
    expect(resolveDocument(url)).toEqual({ filename, documentType });
  });

  it('falls back to raw string handling for an unparseable URL', () => {
    expect(resolveDocument('not a url/report.pdf?x=1')).toEqual({ filename: 'report.pdf', documentType: 'pdf' });
  });
});

describe('htmlToText', () => {
  it('drops boilerplate elements, tags and comments', () => {
    const html = [
      '<html><head><style>body { color: red; }</style><script>alert(1)</script></head>',
      '<body><header>Site header</header><nav><a href="/">Home</a></nav>',
      '<!-- hidden --><h1>Grace&nbsp;Period</h1><p>Thirty&#32;days &amp; no more.</p>',
      '<footer>Copyright</footer></body></html>',
    ].join('\n');

    expect(htmlToText(html)).toBe('Grace Period Thirty days & no more.');
  });

  it('tolerates unclosed markup', () => {
    expect(htmlToText('<p>First <b>bold <i>text')).toBe('First bold text');
  });
});

describe('extractors', () => {
  it('registers one extractor per document type', () => {
    const extractors = createDefaultExtractors();

    expect(Object.entries(extractors).map(([key, extractor]) => [key, extractor.documentType])).toEqual([
      ['pdf', 'pdf'],
      ['docx', 'docx'],
      ['email', 'email'],
      ['text', 'text'],
    ]);
  });

  it('decodes plain text and drops invalid UTF-8 bytes', async () => {
    const content = Buffer.concat([Buffer.from('café '), Buffer.from([0xff, 0xfe]), Buffer.from(' menu')]);

    await expect(new PlainTextExtractor().extract(content)).resolves.toBe('café  menu');
  });

  it('extracts html from a buffer', async () => {
    await expect(new HtmlExtractor().extract(Buffer.from('<div>Hello <em>world</em></div>'))).resolves.toBe(
      'Hello world',
    );
  });

  it('raises an extraction error for a corrupt docx container', async () => {
    await expect(new DocxExtractor().extract(Buffer.from('this is not a zip archive'))).rejects.toBeInstanceOf(
      ExtractionError,
    );
  });

  it('raises an extraction error for a corrupt pdf', async () => {
    const failure = await new PdfExtractor(5).extract(Buffer.from('this is not a pdf document')).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ExtractionError);
    expect(failure).toMatchObject({ kind: 'extraction', message: expect.stringMatching(/^PDF extraction failed: /) });
  });
});
