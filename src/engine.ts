import type OpenAI from 'openai';

import type { AppConfig } from './config';
import { createOpenAiClient, OpenAiAnswerGenerator } from './llm/client';
import { HttpDownloader } from './pipeline/download';
import { createDefaultExtractors } from './pipeline/extract';
import { DocumentProcessor } from './pipeline/ingest';
import { QueryEngine } from './pipeline/queryEngine';
import { Retriever } from './pipeline/retrieve';
import { ChromaVectorIndex } from './rag/client';
import { OllamaEmbedder, OpenAiEmbedder } from './rag/embeddings';
import { InMemoryVectorIndex } from './rag/memoryIndex';
import type { Embedder, VectorIndex } from './rag/schema';
import { AnswerCache } from './store/answerCache';
import { DocumentCache } from './store/documentCache';

const buildEmbedder = (config: AppConfig, openai: OpenAI): Embedder => {
  const { provider, batchSize, maxAttempts, ollamaUrl, ollamaModel } = config.embedding;

  if (provider === 'ollama') {
    return new OllamaEmbedder({ baseUrl: ollamaUrl, model: ollamaModel, batchSize, maxAttempts });
  }

  return new OpenAiEmbedder({
    client: openai,
    model: config.openai.embeddingModel,
    batchSize,
    maxAttempts,
  });
};

const buildIndex = ({ vectorStore }: AppConfig): VectorIndex =>
  vectorStore.kind === 'chroma'
    ? new ChromaVectorIndex({ url: vectorStore.chromaUrl, collection: vectorStore.collection })
    : new InMemoryVectorIndex();

/**
 * Wires the process-wide collaborators. The caches and the index created here are shared
 * by every request served by the returned engine and live until the process exits.
 */
export const createQueryEngine = (config: AppConfig): QueryEngine => {
  const openai = createOpenAiClient({
    apiKey: config.openai.apiKey,
    baseUrl: config.openai.baseUrl,
    timeoutMs: config.requestTimeoutMs,
  });

  const embedder = buildEmbedder(config, openai);
  const index = buildIndex(config);

  const generator = new OpenAiAnswerGenerator({
    client: openai,
    model: config.openai.model,
    maxTokens: config.openai.maxTokens,
    temperature: config.openai.temperature,
    maxContextWords: config.openai.maxContextWords,
  });

  const processor = new DocumentProcessor({
    downloader: new HttpDownloader(config.download),
    extractors: createDefaultExtractors(),
    chunking: config.chunking,
    maxDocumentWords: config.maxDocumentWords,
  });

  const retriever = new Retriever({
    embedder,
    index,
    generator,
    answerCache: new AnswerCache(),
    topK: config.retrieval.topK,
    retry: { maxAttempts: config.retrieval.generationMaxAttempts },
  });

  return new QueryEngine({
    processor,
    embedder,
    index,
    documentCache: new DocumentCache(),
    retriever,
    questionConcurrency: config.retrieval.questionConcurrency,
  });
};
