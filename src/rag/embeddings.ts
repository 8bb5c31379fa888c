import type OpenAI from 'openai';

import { BackendError, describeError, errorStatus, isAbortError, isRetryableStatus } from '../errors';
import { createLogger } from '../util/logger';
import { exponentialBackoff } from '../util/retry';
import type { CallOptions, Embedder } from './schema';

type RequestError = Error & { status?: number; detail?: string };

type BatchingOptions = {
  batchSize?: number;
  maxAttempts?: number;
};

export type OllamaEmbedderOptions = BatchingOptions & {
  baseUrl: string;
  model: string;
  fetchImpl?: typeof fetch;
};

export type OpenAiEmbedderOptions = BatchingOptions & {
  client: OpenAI;
  model: string;
};

const DEFAULT_BATCH_SIZE = 50;
const DEFAULT_MAX_ATTEMPTS = 3;

const logger = createLogger('embed');

const buildEndpoint = (baseUrl: string): string => {
  try {
    const url = new URL(baseUrl);
    url.pathname = '/api/embeddings';
    url.search = '';
    return url.toString();
  } catch (error) {
    throw new BackendError(`Invalid embedding service URL "${baseUrl}": ${describeError(error)}`, { cause: error });
  }
};

const normalizeEmbeddingVector = (values: unknown): number[] => {
  if (!Array.isArray(values)) {
    throw new BackendError('Embedding response did not include an array of numbers.');
  }

  return values.map((value, index) => {
    const numeric = typeof value === 'number' ? value : Number(value);
    if (Number.isNaN(numeric)) {
      throw new BackendError(`Embedding value at index ${index} is not a valid number.`);
    }
    return numeric;
  });
};

/**
 * Splits the input into batches, sends each through `requestBatch` with retry,
 * and concatenates the vectors back in input order.
 */
abstract class BatchedEmbedder implements Embedder {
  private readonly batchSize: number;

  private readonly maxAttempts: number;

  protected constructor({ batchSize, maxAttempts }: BatchingOptions) {
    this.batchSize = Math.max(1, batchSize ?? DEFAULT_BATCH_SIZE);
    this.maxAttempts = Math.max(1, maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  }

  protected abstract requestBatch(batch: string[], options: CallOptions): Promise<number[][]>;

  private chunkTexts(texts: string[]): string[][] {
    const batches: string[][] = [];

    for (let index = 0; index < texts.length; index += this.batchSize) {
      batches.push(texts.slice(index, index + this.batchSize));
    }

    return batches;
  }

  private shouldRetry(error: unknown): boolean {
    return !isAbortError(error) && isRetryableStatus(errorStatus(error));
  }

  private logRetry(error: unknown, attempt: number, delay: number): void {
    const status = errorStatus(error);
    const prefix = typeof status === 'number' ? `status ${status}: ` : '';

    logger.warn(`Embedding request attempt ${attempt} failed (${prefix}${describeError(error)}). Retrying in ${delay}ms.`);
  }

  private buildEmbeddingError(error: unknown): BackendError {
    if (error instanceof BackendError) {
      return error;
    }

    const status = errorStatus(error);
    const detail = describeError(error);
    const message = typeof status === 'number'
      ? `Embedding request failed (status ${status}): ${detail}`
      : `Embedding request failed: ${detail}`;

    return new BackendError(message, { cause: error, status });
  }

  async embed(texts: string[], options: CallOptions = {}): Promise<number[][]> {
    if (!texts.length) {
      return [];
    }

    const embeddings: number[][] = [];

    for (const batch of this.chunkTexts(texts)) {
      let batchEmbeddings: number[][];

      try {
        batchEmbeddings = await exponentialBackoff(
          () => this.requestBatch(batch, options),
          {
            maxAttempts: this.maxAttempts,
            signal: options.signal,
            onRetry: (error, attempt, delay) => this.logRetry(error, attempt, delay),
            shouldRetry: (error) => this.shouldRetry(error),
          },
        );
      } catch (error) {
        throw this.buildEmbeddingError(error);
      }

      if (batchEmbeddings.length !== batch.length) {
        throw new BackendError(
          `Embedding service returned ${batchEmbeddings.length} vector(s) for ${batch.length} input(s).`,
        );
      }

      embeddings.push(...batchEmbeddings);
    }

    return embeddings;
  }
}

/** Local Ollama server; its embeddings endpoint takes one prompt per request. */
export class OllamaEmbedder extends BatchedEmbedder {
  private readonly model: string;

  private readonly endpoint: string;

  private readonly fetchImpl: typeof fetch;

  constructor({ baseUrl, model, fetchImpl, ...batching }: OllamaEmbedderOptions) {
    super(batching);
    this.model = model;
    this.endpoint = buildEndpoint(baseUrl);
    this.fetchImpl = fetchImpl ?? fetch;
  }

  protected async requestBatch(batch: string[], { signal }: CallOptions): Promise<number[][]> {
    const embeddings: number[][] = [];

    for (const text of batch) {
      const response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.model,
          prompt: text,
        }),
        signal,
      });

      if (!response.ok) {
        const detailText = await response.text();
        const error: RequestError = new Error(detailText || response.statusText);
        error.status = response.status;
        error.detail = detailText || response.statusText;
        throw error;
      }

      let data: unknown;

      try {
        data = await response.json();
      } catch (error) {
        throw new BackendError(`Failed to parse embedding response JSON: ${describeError(error)}`, { cause: error });
      }

      const embedding = data && typeof data === 'object' && 'embedding' in data ? data.embedding : undefined;

      embeddings.push(normalizeEmbeddingVector(embedding));
    }

    return embeddings;
  }
}

export class OpenAiEmbedder extends BatchedEmbedder {
  private readonly client: OpenAI;

  private readonly model: string;

  constructor({ client, model, ...batching }: OpenAiEmbedderOptions) {
    super(batching);
    this.client = client;
    this.model = model;
  }

  protected async requestBatch(batch: string[], { signal }: CallOptions): Promise<number[][]> {
    const response = await this.client.embeddings.create(
      { model: this.model, input: batch },
      { signal },
    );

    return [...response.data]
      .sort((left, right) => left.index - right.index)
      .map((item) => normalizeEmbeddingVector(item.embedding));
  }
}
