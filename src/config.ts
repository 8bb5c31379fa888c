import { z } from 'zod';

import type { ChunkingOptions } from './pipeline/chunk';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  API_PREFIX: z.string().startsWith('/').default('/api/v1'),
  API_TOKEN: z.string().optional(),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(25_000),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_MODEL: z.string().default('gpt-3.5-turbo'),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-ada-002'),
  MAX_TOKENS: z.coerce.number().int().positive().default(300),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  MAX_CONTEXT_WORDS: z.coerce.number().int().positive().default(300),

  EMBEDDING_PROVIDER: z.enum(['openai', 'ollama']).default('openai'),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(50),
  EMBEDDING_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  OLLAMA_EMBED_URL: z.string().url().default('http://127.0.0.1:11434'),
  OLLAMA_EMBED_MODEL: z.string().default('nomic-embed-text'),

  VECTOR_STORE: z.enum(['memory', 'chroma']).default('memory'),
  CHROMA_URL: z.string().url().default('http://127.0.0.1:8000'),
  CHROMA_COLLECTION: z.string().default('document-embeddings'),

  MAX_FILE_SIZE_MB: z.coerce.number().positive().default(10),
  DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  CHUNK_SIZE: z.coerce.number().int().positive().default(400),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(0),
  MAX_CHUNKS: z.coerce.number().int().positive().default(10),
  MIN_TEXT_LENGTH: z.coerce.number().int().nonnegative().default(50),
  MAX_DOCUMENT_WORDS: z.coerce.number().int().positive().default(2000),

  TOP_K_RESULTS: z.coerce.number().int().positive().default(2),
  GENERATION_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(3),
  QUESTION_CONCURRENCY: z.coerce.number().int().positive().default(1),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
}).refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
  message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
  path: ['CHUNK_OVERLAP'],
});

export type AppConfig = {
  port: number;
  apiPrefix: string;
  apiToken?: string;
  requestTimeoutMs: number;
  openai: {
    apiKey?: string;
    baseUrl?: string;
    model: string;
    embeddingModel: string;
    maxTokens: number;
    temperature: number;
    maxContextWords: number;
  };
  embedding: {
    provider: 'openai' | 'ollama';
    batchSize: number;
    maxAttempts: number;
    ollamaUrl: string;
    ollamaModel: string;
  };
  vectorStore: {
    kind: 'memory' | 'chroma';
    chromaUrl: string;
    collection: string;
  };
  download: {
    maxBytes: number;
    timeoutMs: number;
  };
  chunking: ChunkingOptions;
  maxDocumentWords: number;
  retrieval: {
    topK: number;
    generationMaxAttempts: number;
    questionConcurrency: number;
  };
  logLevel: 'debug' | 'info' | 'warn' | 'error';
};

type Env = Record<string, string | undefined>;

// `KEY=` in a .env file means "unset", not "empty string"
const dropBlank = (env: Env): Record<string, string> => {
  const present: Record<string, string> = {};

  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string' && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  return present;
};

export const loadConfig = (env: Env = process.env): AppConfig => {
  const parsed = envSchema.safeParse(dropBlank(env));

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;

  return {
    port: values.PORT,
    apiPrefix: values.API_PREFIX.replace(/\/+$/, ''),
    apiToken: values.API_TOKEN,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    openai: {
      apiKey: values.OPENAI_API_KEY,
      baseUrl: values.OPENAI_BASE_URL,
      model: values.OPENAI_MODEL,
      embeddingModel: values.OPENAI_EMBEDDING_MODEL,
      maxTokens: values.MAX_TOKENS,
      temperature: values.TEMPERATURE,
      maxContextWords: values.MAX_CONTEXT_WORDS,
    },
    embedding: {
      provider: values.EMBEDDING_PROVIDER,
      batchSize: values.EMBEDDING_BATCH_SIZE,
      maxAttempts: values.EMBEDDING_MAX_ATTEMPTS,
      ollamaUrl: values.OLLAMA_EMBED_URL,
      ollamaModel: values.OLLAMA_EMBED_MODEL,
    },
    vectorStore: {
      kind: values.VECTOR_STORE,
      chromaUrl: values.CHROMA_URL,
      collection: values.CHROMA_COLLECTION,
    },
    download: {
      maxBytes: Math.floor(values.MAX_FILE_SIZE_MB * 1024 * 1024),
      timeoutMs: values.DOWNLOAD_TIMEOUT_MS,
    },
    chunking: {
      chunkSize: values.CHUNK_SIZE,
      chunkOverlap: values.CHUNK_OVERLAP,
      maxChunks: values.MAX_CHUNKS,
      minTextLength: values.MIN_TEXT_LENGTH,
    },
    maxDocumentWords: values.MAX_DOCUMENT_WORDS,
    retrieval: {
      topK: values.TOP_K_RESULTS,
      generationMaxAttempts: values.GENERATION_MAX_ATTEMPTS,
      questionConcurrency: values.QUESTION_CONCURRENCY,
    },
    logLevel: values.LOG_LEVEL,
  };
};
