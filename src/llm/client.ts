import OpenAI from 'openai';
import { z } from 'zod';

import { BackendError, describeError } from '../errors';
import type { CallOptions, ScoredChunk } from '../rag/schema';
import { ANSWER_PROMPT } from './prompts';

export type TokenUsage = {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
};

export type GeneratedAnswer = {
  answer: string;
  confidence: number;
  tokenUsage: TokenUsage;
};

export interface AnswerGenerator {
  generate(question: string, context: readonly ScoredChunk[], options?: CallOptions): Promise<GeneratedAnswer>;
}

export type OpenAiClientSettings = {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
};

export type OpenAiAnswerGeneratorOptions = {
  client: OpenAI;
  model: string;
  maxTokens: number;
  temperature: number;
  /** Word budget for all context passages together, highest-scoring first. */
  maxContextWords?: number;
};

const DEFAULT_CONTEXT_WORDS = 300;
const DEFAULT_CONFIDENCE = 0.9;

const answerSchema = z.object({
  answer: z.string(),
  confidence: z.number().optional(),
});

const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max);

export const createOpenAiClient = ({ apiKey, baseUrl, timeoutMs }: OpenAiClientSettings): OpenAI => {
  if (!apiKey) {
    throw new Error('LLM API key not configured. Set OPENAI_API_KEY.');
  }

  // retries are owned by the callers' backoff policy
  return new OpenAI({
    apiKey,
    baseURL: baseUrl,
    timeout: timeoutMs,
    maxRetries: 0,
  });
};

export const buildContext = (context: readonly ScoredChunk[], maxWords: number): string => {
  const passages: string[] = [];
  let remaining = maxWords;

  for (const chunk of context) {
    if (remaining <= 0) {
      break;
    }
    const words = chunk.content.split(/\s+/).filter(Boolean).slice(0, remaining);
    if (!words.length) {
      continue;
    }
    remaining -= words.length;
    passages.push(`[${passages.length + 1}] ${words.join(' ')}`);
  }

  return passages.length ? passages.join('\n\n') : 'No context available';
};

export class OpenAiAnswerGenerator implements AnswerGenerator {
  private readonly client: OpenAI;

  private readonly model: string;

  private readonly maxTokens: number;

  private readonly temperature: number;

  private readonly maxContextWords: number;

  constructor({ client, model, maxTokens, temperature, maxContextWords }: OpenAiAnswerGeneratorOptions) {
    this.client = client;
    this.model = model;
    this.maxTokens = maxTokens;
    this.temperature = temperature;
    this.maxContextWords = maxContextWords ?? DEFAULT_CONTEXT_WORDS;
  }

  async generate(
    question: string,
    context: readonly ScoredChunk[],
    { signal }: CallOptions = {},
  ): Promise<GeneratedAnswer> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: ANSWER_PROMPT },
          {
            role: 'user',
            content: `Context:\n${buildContext(context, this.maxContextWords)}\n\nQuestion: ${question}`,
          },
        ],
      },
      { signal },
    );

    const content = response.choices[0]?.message?.content;

    if (!content) {
      throw new BackendError('LLM response did not contain any content.');
    }

    let payload: unknown;
    try {
      payload = JSON.parse(content);
    } catch (error) {
      throw new BackendError(`Failed to parse LLM JSON response: ${describeError(error)}`, { cause: error });
    }

    const parsed = answerSchema.safeParse(payload);
    if (!parsed.success) {
      throw new BackendError(`LLM response did not match the answer schema: ${parsed.error.message}`);
    }

    const confidence = parsed.data.confidence ?? DEFAULT_CONFIDENCE;

    return {
      answer: parsed.data.answer.trim(),
      confidence: Number.isFinite(confidence) ? clamp(confidence, 0, 1) : 0,
      tokenUsage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
    };
  }
}
