import { describe, expect, it } from 'vitest';

import { ValidationError } from '../../src/errors';
import { chunkText, normalizeWhitespace, tokenize } from '../../src/pipeline/chunk';
import type { DocumentMetadata } from '../../src/rag/schema';
import { words } from '../helpers/fakes';

const metadata: DocumentMetadata = {
  sourceUrl: 'https://docs.example.test/policy.pdf',
  documentType: 'pdf',
  filename: 'policy.pdf',
};

describe('chunkText', () => {
  it('splits 850 words into three 400-word windows with a 50-word tail', () => {
    const chunks = chunkText(words(850), metadata, { chunkSize: 400 });

    expect(chunks.map((chunk) => chunk.metadata.chunkIndex)).toEqual([0, 1, 2]);
    expect(chunks.map((chunk) => chunk.metadata.wordCount)).toEqual([400, 400, 50]);
    expect(chunks[2].metadata.startWord).toBe(800);
    expect(chunks[2].metadata.endWord).toBe(850);
    expect(chunks[2].content.split(' ')[0]).toBe('w800');
  });

  it('produces ceil(L / C) chunks that rebuild the original word sequence', () => {
    const text = words(23);
    const chunks = chunkText(text, metadata, { chunkSize: 5, minTextLength: 1 });

    expect(chunks).toHaveLength(5);
    expect(chunks.map((chunk) => chunk.content).join(' ')).toBe(text);
  });

  it('caps the chunk count and drops the tail text', () => {
    const chunks = chunkText(words(100), metadata, { chunkSize: 5, maxChunks: 3, minTextLength: 1 });

    expect(chunks).toHaveLength(3);
    expect(chunks.map((chunk) => chunk.content).join(' ')).toBe(words(15));
  });

  it('merges caller metadata into every chunk', () => {
    const [first] = chunkText(words(60), metadata, { chunkSize: 100 });

    expect(first.metadata).toEqual({
      ...metadata,
      chunkIndex: 0,
      startWord: 0,
      endWord: 60,
      wordCount: 60,
    });
  });

  it('advances by chunkSize - chunkOverlap when overlap is configured', () => {
    const chunks = chunkText(words(10), metadata, { chunkSize: 4, chunkOverlap: 2, minTextLength: 1 });

    expect(chunks.map((chunk) => [chunk.metadata.startWord, chunk.metadata.endWord])).toEqual([
      [0, 4],
      [2, 6],
      [4, 8],
      [6, 10],
    ]);
  });

  it('collapses irregular whitespace before splitting', () => {
    const chunks = chunkText('  alpha\n\nbeta\t gamma   delta  ', metadata, { chunkSize: 2, minTextLength: 1 });

    expect(chunks.map((chunk) => chunk.content)).toEqual(['alpha beta', 'gamma delta']);
  });

  it('rejects text shorter than the minimum length', () => {
    expect(() => chunkText('   too short   ', metadata)).toThrow(ValidationError);
    expect(() => chunkText('   ', metadata)).toThrow(/Document too short: 0 character/);
  });

  it('rejects an overlap that would stall the window', () => {
    expect(() => chunkText(words(60), metadata, { chunkSize: 4, chunkOverlap: 4 })).toThrow(ValidationError);
  });
});

describe('tokenize', () => {
  it('returns no tokens for blank text', () => {
    expect(tokenize(' \n\t ')).toEqual([]);
    expect(normalizeWhitespace(' a \n b ')).toBe('a b');
  });
});
