import { ChromaClient } from 'chromadb';
import { v4 as uuidv4 } from 'uuid';

import { BackendError, describeError } from '../errors';
import { createLogger } from '../util/logger';
import { chunkMetadataSchema, type ChunkMetadata, type IndexedChunk, type ScoredChunk, type VectorIndex } from './schema';

export type ChromaIndexOptions = {
  url: string;
  collection: string;
};

type CollectionHandle = ReturnType<ChromaClient['getOrCreateCollection']>;

const logger = createLogger('chroma');

const parseChromaUrl = (value: string): { host: string; port: number; ssl: boolean } => {
  try {
    const url = new URL(value);
    const ssl = url.protocol === 'https:';
    return {
      host: url.hostname,
      port: url.port ? Number.parseInt(url.port, 10) : ssl ? 443 : 8000,
      ssl,
    };
  } catch (error) {
    throw new BackendError(`Invalid Chroma URL "${value}": ${describeError(error)}`, { cause: error });
  }
};

const sanitizeMetadata = (metadata: ChunkMetadata): Record<string, string | number | boolean> => {
  const base: Record<string, string | number | boolean> = {};

  for (const [key, value] of Object.entries(metadata)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      base[key] = value;
    }
  }

  return base;
};

const normalizeScore = (distance: number | null | undefined): number => {
  if (typeof distance !== 'number' || Number.isNaN(distance)) {
    return 0;
  }

  return 1 / (1 + Math.max(distance, 0));
};

export class ChromaVectorIndex implements VectorIndex {
  private readonly client: ChromaClient;

  private readonly collectionName: string;

  private collectionPromise: CollectionHandle | null = null;

  constructor({ url, collection }: ChromaIndexOptions) {
    this.client = new ChromaClient(parseChromaUrl(url));
    this.collectionName = collection;
  }

  private async getCollection(): Promise<Awaited<CollectionHandle>> {
    if (!this.collectionPromise) {
      this.collectionPromise = this.client.getOrCreateCollection({ name: this.collectionName });
    }

    try {
      return await this.collectionPromise;
    } catch (error) {
      // let the next call retry the lookup
      this.collectionPromise = null;
      throw error;
    }
  }

  async add(chunks: readonly IndexedChunk[]): Promise<void> {
    if (!chunks.length) {
      return;
    }

    try {
      const collection = await this.getCollection();
      await collection.add({
        ids: chunks.map(() => uuidv4()),
        embeddings: chunks.map((chunk) => [...chunk.embedding]),
        documents: chunks.map((chunk) => chunk.content),
        metadatas: chunks.map((chunk) => sanitizeMetadata(chunk.metadata)),
      });
    } catch (error) {
      throw new BackendError(`Chroma add failed: ${describeError(error)}`, { cause: error });
    }
  }

  async search(vector: readonly number[], topK: number): Promise<ScoredChunk[]> {
    if (topK <= 0) {
      return [];
    }

    let result: Awaited<ReturnType<Awaited<CollectionHandle>['query']>>;

    try {
      const collection = await this.getCollection();
      result = await collection.query({
        queryEmbeddings: [[...vector]],
        nResults: topK,
      });
    } catch (error) {
      throw new BackendError(`Chroma query failed: ${describeError(error)}`, { cause: error });
    }

    const ids = result.ids?.[0] ?? [];
    const documents = result.documents?.[0] ?? [];
    const metadatas = result.metadatas?.[0] ?? [];
    const distances = result.distances?.[0] ?? [];

    const scored: ScoredChunk[] = [];

    ids.forEach((id, index) => {
      const metadata = chunkMetadataSchema.safeParse(metadatas[index]);
      if (!metadata.success) {
        logger.warn(`Skipping Chroma record ${id} with unexpected metadata.`);
        return;
      }

      scored.push({
        content: documents[index] ?? '',
        metadata: metadata.data,
        score: normalizeScore(distances[index]),
      });
    });

    return scored.sort((left, right) => right.score - left.score);
  }
}
