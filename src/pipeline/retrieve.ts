import { BackendError, PipelineError, describeError, errorStatus, isAbortError, isRetryableStatus, toPipelineError } from '../errors';
import type { AnswerGenerator } from '../llm/client';
import type { CallOptions, Embedder, ScoredChunk, VectorIndex } from '../rag/schema';
import type { AnswerCache } from '../store/answerCache';
import { createLogger, type Logger } from '../util/logger';
import { err, ok, type Result } from '../util/result';
import { exponentialBackoff, type BackoffOptions } from '../util/retry';

export const NOT_FOUND_ANSWER = 'Information not available in the document';
export const GENERATION_FAILED_ANSWER = 'Unable to generate answer';

export type GenerationRetryOptions = Pick<BackoffOptions, 'maxAttempts' | 'initialDelayMs' | 'maxDelayMs' | 'factor' | 'jitter'>;

export type RetrieverOptions = {
  embedder: Embedder;
  index: VectorIndex;
  generator: AnswerGenerator;
  answerCache: AnswerCache;
  topK: number;
  retry?: GenerationRetryOptions;
  logger?: Logger;
};

const DEFAULT_RETRY: GenerationRetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 1_000,
  maxDelayMs: 3_000,
  factor: 2,
  jitter: true,
};

const truncate = (text: string, length = 80): string =>
  text.length > length ? `${text.slice(0, length - 1)}…` : text;

/**
 * Answers a single question against whatever is already in the index.
 * `answer` never rejects: backend failures surface as sentinel or `Error:` strings.
 */
export class Retriever {
  private readonly embedder: Embedder;

  private readonly index: VectorIndex;

  private readonly generator: AnswerGenerator;

  private readonly answerCache: AnswerCache;

  private readonly topK: number;

  private readonly retry: GenerationRetryOptions;

  private readonly logger: Logger;

  constructor({ embedder, index, generator, answerCache, topK, retry, logger }: RetrieverOptions) {
    this.embedder = embedder;
    this.index = index;
    this.generator = generator;
    this.answerCache = answerCache;
    this.topK = topK;
    this.retry = { ...DEFAULT_RETRY, ...retry };
    this.logger = logger ?? createLogger('retrieve');
  }

  async answer(question: string, options: CallOptions = {}): Promise<string> {
    const cached = this.answerCache.get(question);
    if (cached !== undefined) {
      this.logger.debug('Answer served from cache', { question: truncate(question) });
      return cached;
    }

    const retrieved = await this.retrieve(question, options);
    if (!retrieved.ok) {
      this.logger.error('Retrieval failed', {
        question: truncate(question),
        kind: retrieved.error.kind,
        error: retrieved.error.message,
      });
      // not cached: embedding and search failures are usually transient
      return `Error: ${retrieved.error.message}`;
    }

    let answer: string;
    if (retrieved.value.length === 0) {
      answer = NOT_FOUND_ANSWER;
    } else {
      const generated = await this.generate(question, retrieved.value, options);
      if (generated.ok) {
        answer = generated.value;
      } else {
        this.logger.error('Answer generation failed', {
          question: truncate(question),
          kind: generated.error.kind,
          error: generated.error.message,
        });
        answer = GENERATION_FAILED_ANSWER;
      }
    }

    if (options.signal?.aborted) {
      return answer;
    }

    this.answerCache.put(question, answer);
    return answer;
  }

  async retrieve(question: string, { signal }: CallOptions = {}): Promise<Result<ScoredChunk[], PipelineError>> {
    try {
      const [vector] = await this.embedder.embed([question], { signal });
      if (!vector) {
        return err(new BackendError('Embedding service returned no vector for the question.'));
      }

      return ok(await this.index.search(vector, this.topK));
    } catch (error) {
      return err(toPipelineError(error));
    }
  }

  private async generate(
    question: string,
    context: ScoredChunk[],
    { signal }: CallOptions,
  ): Promise<Result<string, PipelineError>> {
    try {
      const response = await exponentialBackoff(
        () => this.generator.generate(question, context, { signal }),
        {
          ...this.retry,
          signal,
          onRetry: (error, attempt, delay) =>
            this.logger.warn(`Generation attempt ${attempt} failed (${describeError(error)}). Retrying in ${delay}ms.`),
          shouldRetry: (error) => !isAbortError(error) && isRetryableStatus(errorStatus(error)),
        },
      );

      return ok(response.answer.trim() || GENERATION_FAILED_ANSWER);
    } catch (error) {
      return err(toPipelineError(error));
    }
  }
}
