import { BackendError, PipelineError, toPipelineError } from '../errors';
import type { CallOptions, Embedder, IndexedChunk, VectorIndex } from '../rag/schema';
import type { DocumentCache, DocumentCacheEntry } from '../store/documentCache';
import { createLogger, type Logger } from '../util/logger';
import { mapWithConcurrency } from '../util/pool';
import { err, ok, type Result } from '../util/result';
import type { DocumentProcessor } from './ingest';
import type { Retriever } from './retrieve';

export type QueryEngineOptions = {
  processor: Pick<DocumentProcessor, 'process'>;
  embedder: Embedder;
  index: VectorIndex;
  documentCache: DocumentCache;
  retriever: Pick<Retriever, 'answer'>;
  /** Questions answered in parallel; 1 keeps strictly sequential order of backend calls. */
  questionConcurrency?: number;
  logger?: Logger;
};

export const ingestionFailureAnswer = (error: PipelineError): string =>
  `Error processing question: ${error.message}`;

export class QueryEngine {
  private readonly processor: Pick<DocumentProcessor, 'process'>;

  private readonly embedder: Embedder;

  private readonly index: VectorIndex;

  private readonly documentCache: DocumentCache;

  private readonly retriever: Pick<Retriever, 'answer'>;

  private readonly questionConcurrency: number;

  private readonly logger: Logger;

  constructor({ processor, embedder, index, documentCache, retriever, questionConcurrency, logger }: QueryEngineOptions) {
    this.processor = processor;
    this.embedder = embedder;
    this.index = index;
    this.documentCache = documentCache;
    this.retriever = retriever;
    this.questionConcurrency = Math.max(1, questionConcurrency ?? 1);
    this.logger = logger ?? createLogger('query');
  }

  /**
   * Returns exactly one answer per question, in input order. Never rejects: an ingestion
   * failure yields one fallback string per question.
   */
  async process(documentUrl: string, questions: readonly string[], options: CallOptions = {}): Promise<string[]> {
    const startedAt = Date.now();

    try {
      const ingestion = await this.ensureDocumentProcessed(documentUrl, options);

      if (!ingestion.ok) {
        this.logger.error('Document ingestion failed', {
          url: documentUrl,
          kind: ingestion.error.kind,
          error: ingestion.error.message,
        });
        return questions.map(() => ingestionFailureAnswer(ingestion.error));
      }

      const answers = await mapWithConcurrency(questions, this.questionConcurrency, (question) =>
        this.retriever.answer(question, options),
      );

      this.logger.info(
        `Answered ${answers.length} question(s) in ${((Date.now() - startedAt) / 1000).toFixed(2)}s`,
        { url: documentUrl },
      );

      return answers;
    } catch (error) {
      const failure = toPipelineError(error);
      this.logger.error('Query processing failed', { url: documentUrl, kind: failure.kind, error: failure.message });
      return questions.map(() => ingestionFailureAnswer(failure));
    }
  }

  async ensureDocumentProcessed(
    documentUrl: string,
    options: CallOptions = {},
  ): Promise<Result<DocumentCacheEntry, PipelineError>> {
    const cached = this.documentCache.get(documentUrl);
    if (cached) {
      this.logger.debug('Document in cache, skipping ingestion', { url: documentUrl });
      return ok(cached);
    }

    try {
      const entry = await this.documentCache.ingestOnce(
        documentUrl,
        (signal) => this.ingest(documentUrl, { signal }),
        options.signal,
      );
      return ok(entry);
    } catch (error) {
      return err(toPipelineError(error));
    }
  }

  private async ingest(documentUrl: string, { signal }: CallOptions): Promise<number> {
    const chunks = await this.processor.process(documentUrl, { signal });
    signal?.throwIfAborted();

    let vectors: number[][];
    try {
      vectors = await this.embedder.embed(chunks.map((chunk) => chunk.content), { signal });
    } catch (error) {
      throw toPipelineError(error, (message, options) =>
        new BackendError(`Embedding failed: ${message}`, options));
    }

    if (vectors.length !== chunks.length) {
      throw new BackendError(`Expected ${chunks.length} embedding(s), received ${vectors.length}.`);
    }
    signal?.throwIfAborted();

    const indexed: IndexedChunk[] = chunks.map((chunk, position) => ({
      ...chunk,
      embedding: Object.freeze([...vectors[position]]),
    }));

    try {
      await this.index.add(indexed);
    } catch (error) {
      throw toPipelineError(error, (message, options) =>
        new BackendError(`Index add failed: ${message}`, options));
    }

    this.logger.info(`Indexed ${indexed.length} chunk(s)`, { url: documentUrl });

    return indexed.length;
  }
}
