import { Router } from 'express';
import { z } from 'zod';

import type { QueryEngine } from '../pipeline/queryEngine';
import type { ErrorResponse, QueryRequest, QueryResponse, ValidationErrorResponse } from '../types';
import { createLogger } from '../util/logger';
import { requireBearerToken } from './auth';

type QueryRouterOptions = {
  engine: Pick<QueryEngine, 'process'>;
  apiToken: string;
  requestTimeoutMs: number;
};

export type RunQueryOutcome =
  | { status: 200; body: QueryResponse }
  | { status: 400; body: ValidationErrorResponse }
  | { status: 500; body: ErrorResponse };

const logger = createLogger('http');

const querySchema = z.object({
  documents: z.string().url('documents must be a URL'),
  questions: z.array(z.string()).min(1, 'questions must contain at least one question'),
});

export const runQuery = async (
  engine: Pick<QueryEngine, 'process'>,
  body: unknown,
  signal?: AbortSignal,
): Promise<RunQueryOutcome> => {
  const validation = querySchema.safeParse(body);

  if (!validation.success) {
    const errors = validation.error.issues.map((issue) => ({
      path: issue.path.join('.') || undefined,
      message: issue.message,
    }));

    return { status: 400, body: { errors } };
  }

  const { documents, questions }: QueryRequest = validation.data;

  try {
    const answers = await engine.process(documents, questions, { signal });
    return { status: 200, body: { answers } };
  } catch (error) {
    logger.error('Error during query processing', { url: documents, error });
    return { status: 500, body: { error: 'An error occurred during query processing.' } };
  }
};

export const createQueryRouter = ({ engine, apiToken, requestTimeoutMs }: QueryRouterOptions): Router => {
  const router = Router();

  router.post('/hackrx/run', requireBearerToken(apiToken), async (req, res) => {
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new Error(`Request timed out after ${requestTimeoutMs}ms`)),
      requestTimeoutMs,
    );
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort(new Error('Client closed the connection'));
      }
    });

    try {
      const outcome = await runQuery(engine, req.body, controller.signal);
      res.status(outcome.status).json(outcome.body);
    } finally {
      clearTimeout(timer);
    }
  });

  return router;
};
