import * as mammoth from 'mammoth';

import { ExtractionError, describeError } from '../errors';
import type { DocumentType } from '../rag/schema';
import { normalizeWhitespace } from './chunk';

export interface Extractor {
  readonly documentType: DocumentType;
  extract(content: Buffer): Promise<string>;
}

export type ExtractorRegistry = Record<DocumentType, Extractor>;

export type ResolvedDocument = {
  filename: string;
  documentType: DocumentType;
};

const MAX_PDF_PAGES = 5;
const MAX_DOCX_PARAGRAPHS = 20;

const STRIPPED_HTML_ELEMENTS = ['script', 'style', 'nav', 'header', 'footer'];

const filenameFromUrl = (url: string): string => {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/, 1)[0] ?? '';
  }

  return (pathname.split('/').pop() ?? '').toLowerCase();
};

/** Picks the extractor variant from the filename extension in the URL path. */
export const resolveDocument = (url: string): ResolvedDocument => {
  const filename = filenameFromUrl(url);

  if (filename.endsWith('.pdf')) {
    return { filename, documentType: 'pdf' };
  }

  if (filename.endsWith('.docx')) {
    return { filename, documentType: 'docx' };
  }

  if (filename.endsWith('.html') || filename.endsWith('.htm') || filename.endsWith('.eml')) {
    return { filename, documentType: 'email' };
  }

  return { filename, documentType: 'text' };
};

/** UTF-8 decode; invalid byte sequences are dropped rather than failing. */
export const decodeText = (content: Buffer): string => content.toString('utf8').replace(/\uFFFD/g, '');

export class PdfExtractor implements Extractor {
  readonly documentType = 'pdf';

  constructor(private readonly maxPages: number = MAX_PDF_PAGES) {}

  async extract(content: Buffer): Promise<string> {
    // loaded lazily: pdf-parse runs a self-test on import when it has no parent module
    const { default: pdfParse } = await import('pdf-parse');

    try {
      const result = await pdfParse(content, { max: this.maxPages });
      return normalizeWhitespace(result.text);
    } catch (error) {
      throw new ExtractionError(`PDF extraction failed: ${describeError(error)}`, { cause: error });
    }
  }
}

export class DocxExtractor implements Extractor {
  readonly documentType = 'docx';

  constructor(private readonly maxParagraphs: number = MAX_DOCX_PARAGRAPHS) {}

  async extract(content: Buffer): Promise<string> {
    let raw: string;
    try {
      const result = await mammoth.extractRawText({ buffer: content });
      raw = result.value;
    } catch (error) {
      throw new ExtractionError(`DOCX extraction failed: ${describeError(error)}`, { cause: error });
    }

    return raw
      .split(/\n+/)
      .map((paragraph) => paragraph.trim())
      .filter(Boolean)
      .slice(0, this.maxParagraphs)
      .join(' ');
  }
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

const decodeEntities = (text: string): string =>
  text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === '#') {
      const hex = entity[1] === 'x' || entity[1] === 'X';
      const codePoint = Number.parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10);
      return Number.isFinite(codePoint) && codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : match;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });

export const htmlToText = (html: string): string => {
  const elements = STRIPPED_HTML_ELEMENTS.join('|');
  const withoutBoilerplate = html
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(new RegExp(`<(${elements})\\b[^>]*>[\\s\\S]*?</\\1\\s*>`, 'gi'), ' ');

  return normalizeWhitespace(decodeEntities(withoutBoilerplate.replace(/<[^>]*>/g, ' ')));
};

/** HTML pages and .eml messages; unclosed or stray tags are tolerated. */
export class HtmlExtractor implements Extractor {
  readonly documentType = 'email';

  async extract(content: Buffer): Promise<string> {
    return htmlToText(decodeText(content));
  }
}

export class PlainTextExtractor implements Extractor {
  readonly documentType = 'text';

  async extract(content: Buffer): Promise<string> {
    return decodeText(content);
  }
}

export const createDefaultExtractors = (): ExtractorRegistry => ({
  pdf: new PdfExtractor(),
  docx: new DocxExtractor(),
  email: new HtmlExtractor(),
  text: new PlainTextExtractor(),
});
