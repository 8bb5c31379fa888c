import { ValidationError } from '../errors';
import type { DocumentChunk, DocumentMetadata } from '../rag/schema';

export type ChunkingOptions = {
  /** Words per chunk. */
  chunkSize: number;
  /** Words shared by consecutive chunks; 0 gives non-overlapping windows. */
  chunkOverlap: number;
  /** Chunks past this count are dropped along with the tail text they would cover. */
  maxChunks: number;
  /** Minimum characters of normalized text required to chunk at all. */
  minTextLength: number;
};

export const DEFAULT_CHUNKING: ChunkingOptions = {
  chunkSize: 400,
  chunkOverlap: 0,
  maxChunks: 10,
  minTextLength: 50,
};

export const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

export const tokenize = (text: string): string[] =>
  normalizeWhitespace(text)
    .split(' ')
    .filter(Boolean);

const detokenize = (tokens: string[]): string => tokens.join(' ');

const validateOptions = ({ chunkSize, chunkOverlap, maxChunks }: ChunkingOptions): void => {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ValidationError(`chunkSize must be a positive integer, got ${chunkSize}.`);
  }

  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new ValidationError(`chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}.`);
  }

  if (!Number.isInteger(maxChunks) || maxChunks < 1) {
    throw new ValidationError(`maxChunks must be a positive integer, got ${maxChunks}.`);
  }
};

export const chunkText = (
  text: string,
  metadata: DocumentMetadata,
  overrides: Partial<ChunkingOptions> = {},
): DocumentChunk[] => {
  const options: ChunkingOptions = { ...DEFAULT_CHUNKING, ...overrides };
  validateOptions(options);

  const normalized = normalizeWhitespace(text);
  if (normalized.length < options.minTextLength) {
    throw new ValidationError(
      `Document too short: ${normalized.length} character(s) after normalization, need ${options.minTextLength}.`,
    );
  }

  const tokens = normalized.split(' ');
  const stride = options.chunkSize - options.chunkOverlap;
  const chunks: DocumentChunk[] = [];

  for (let start = 0; start < tokens.length && chunks.length < options.maxChunks; start += stride) {
    const end = Math.min(tokens.length, start + options.chunkSize);
    const content = detokenize(tokens.slice(start, end)).trim();

    if (content) {
      chunks.push({
        content,
        metadata: {
          ...metadata,
          chunkIndex: chunks.length,
          startWord: start,
          endWord: end,
          wordCount: end - start,
        },
      });
    }

    if (end >= tokens.length) {
      break;
    }
  }

  return chunks;
};
