import { BackendError } from '../errors';
import type { IndexedChunk, ScoredChunk, VectorIndex } from './schema';

type Entry = {
  chunk: IndexedChunk;
  norm: number;
};

const magnitude = (vector: readonly number[]): number => {
  let sum = 0;
  for (let i = 0; i < vector.length; i++) sum += vector[i] * vector[i];
  return Math.sqrt(sum);
};

const dot = (a: readonly number[], b: readonly number[]): number => {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
};

/**
 * Brute-force cosine index held in process memory. Adequate for the handful of chunks
 * a single document yields; swap in the Chroma index for larger corpora.
 */
export class InMemoryVectorIndex implements VectorIndex {
  private readonly entries: Entry[] = [];

  private dimension: number | null = null;

  get size(): number {
    return this.entries.length;
  }

  async add(chunks: readonly IndexedChunk[]): Promise<void> {
    const expected = this.dimension ?? chunks[0]?.embedding.length ?? null;

    for (const chunk of chunks) {
      if (chunk.embedding.length === 0 || chunk.embedding.length !== expected) {
        throw new BackendError(
          `Embedding dimension mismatch: expected ${expected}, got ${chunk.embedding.length}.`,
        );
      }
    }

    // validated up front so a bad batch leaves the index untouched
    this.dimension = expected;
    for (const chunk of chunks) {
      this.entries.push({ chunk, norm: magnitude(chunk.embedding) });
    }
  }

  async search(vector: readonly number[], topK: number): Promise<ScoredChunk[]> {
    if (topK <= 0 || this.entries.length === 0) {
      return [];
    }

    if (vector.length !== this.dimension) {
      throw new BackendError(`Query dimension ${vector.length} does not match index dimension ${this.dimension}.`);
    }

    const queryNorm = magnitude(vector);

    return this.entries
      .map(({ chunk, norm }) => ({
        content: chunk.content,
        metadata: { ...chunk.metadata },
        score: queryNorm > 0 && norm > 0 ? dot(vector, chunk.embedding) / (queryNorm * norm) : 0,
      }))
      .sort((left, right) => right.score - left.score)
      .slice(0, topK);
  }
}
