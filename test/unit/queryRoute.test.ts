import { describe, expect, it, vi } from 'vitest';

import { extractBearerToken, isAuthorized, tokensMatch } from '../../src/routes/auth';
import { runQuery } from '../../src/routes/query';

describe('runQuery', () => {
  it('passes the document URL and questions to the engine', async () => {
    const engine = { process: vi.fn(async (_url: string, questions: readonly string[]) => questions.map((q) => `a:${q}`)) };

    const outcome = await runQuery(engine, {
      documents: 'https://files.example.test/policy.pdf',
      questions: ['What is the waiting period?', 'Is dental covered?'],
    });

    expect(outcome).toEqual({
      status: 200,
      body: { answers: ['a:What is the waiting period?', 'a:Is dental covered?'] },
    });
    expect(engine.process).toHaveBeenCalledWith(
      'https://files.example.test/policy.pdf',
      ['What is the waiting period?', 'Is dental covered?'],
      { signal: undefined },
    );
  });

  it('rejects a body without questions', async () => {
    const engine = { process: vi.fn(async () => []) };

    const outcome = await runQuery(engine, { documents: 'https://files.example.test/policy.pdf', questions: [] });

    expect(outcome).toEqual({
      status: 400,
      body: { errors: [{ path: 'questions', message: 'questions must contain at least one question' }] },
    });
    expect(engine.process).not.toHaveBeenCalled();
  });

  it('rejects a documents value that is not a URL', async () => {
    const engine = { process: vi.fn(async () => []) };

    const outcome = await runQuery(engine, { documents: 'policy.pdf', questions: ['q'] });

    expect(outcome).toEqual({
      status: 400,
      body: { errors: [{ path: 'documents', message: 'documents must be a URL' }] },
    });
  });

  it('maps an unexpected engine failure to a 500', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const engine = {
      process: vi.fn(async (): Promise<string[]> => {
        throw new Error('unexpected');
      }),
    };

    const outcome = await runQuery(engine, { documents: 'https://files.example.test/a.txt', questions: ['q'] });

    expect(outcome).toEqual({ status: 500, body: { error: 'An error occurred during query processing.' } });
  });
});

describe('bearer authentication', () => {
  it('strips the Bearer prefix', () => {
    expect(extractBearerToken('Bearer test-secret')).toBe('test-secret');
    expect(extractBearerToken('bearer   test-secret ')).toBe('test-secret');
    expect(extractBearerToken('test-secret')).toBe('test-secret');
    expect(extractBearerToken(undefined)).toBeUndefined();
    expect(extractBearerToken('   ')).toBeUndefined();
  });

  it('compares tokens exactly', () => {
    expect(tokensMatch('test-secret', 'test-secret')).toBe(true);
    expect(tokensMatch('test-secret', 'test-secreT')).toBe(false);
    expect(tokensMatch('test', 'test-secret')).toBe(false);
  });

  it('authorizes only a matching bearer header', () => {
    expect(isAuthorized('Bearer test-secret', 'test-secret')).toBe(true);
    expect(isAuthorized('Bearer wrong-secret', 'test-secret')).toBe(false);
    expect(isAuthorized('Bearer ', 'test-secret')).toBe(false);
    expect(isAuthorized(undefined, 'test-secret')).toBe(false);
  });
});
