import { z } from 'zod';

export const documentTypes = ['pdf', 'docx', 'email', 'text'] as const;

export type DocumentType = (typeof documentTypes)[number];

export const chunkMetadataSchema = z.object({
  sourceUrl: z.string(),
  documentType: z.enum(documentTypes),
  filename: z.string(),
  chunkIndex: z.number().int().nonnegative(),
  startWord: z.number().int().nonnegative(),
  endWord: z.number().int().nonnegative(),
  wordCount: z.number().int().positive(),
});

export type ChunkMetadata = z.infer<typeof chunkMetadataSchema>;

export type DocumentMetadata = Pick<ChunkMetadata, 'sourceUrl' | 'documentType' | 'filename'>;

export interface DocumentChunk {
  content: string;
  metadata: ChunkMetadata;
  embedding?: readonly number[];
}

export interface IndexedChunk extends DocumentChunk {
  readonly embedding: readonly number[];
}

export interface ScoredChunk {
  content: string;
  score: number;
  metadata: ChunkMetadata;
}

export type CallOptions = {
  signal?: AbortSignal;
};

export interface Embedder {
  /** One vector per input text, same order. */
  embed(texts: string[], options?: CallOptions): Promise<number[][]>;
}

export interface VectorIndex {
  add(chunks: readonly IndexedChunk[]): Promise<void>;
  /** At most `topK` results, highest score first. */
  search(vector: readonly number[], topK: number): Promise<ScoredChunk[]>;
}
