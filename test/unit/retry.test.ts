import { describe, expect, it, vi } from 'vitest';

import { exponentialBackoff } from '../../src/util/retry';

describe('exponentialBackoff', () => {
  it('retries until the action succeeds', async () => {
    const action = vi.fn(async (attempt: number) => {
      if (attempt < 3) {
        throw new Error(`attempt ${attempt} failed`);
      }
      return 'done';
    });

    await expect(exponentialBackoff(action, { initialDelayMs: 0, jitter: false })).resolves.toBe('done');
    expect(action).toHaveBeenCalledTimes(3);
  });

  it('rethrows the last error after maxAttempts', async () => {
    const action = vi.fn(async (attempt: number) => {
      throw new Error(`attempt ${attempt} failed`);
    });

    await expect(exponentialBackoff(action, { maxAttempts: 2, initialDelayMs: 0, jitter: false })).rejects.toThrow(
      'attempt 2 failed',
    );
    expect(action).toHaveBeenCalledTimes(2);
  });

  it('reports exponentially growing, capped delays to onRetry', async () => {
    const delays: number[] = [];
    const action = vi.fn(async () => {
      throw new Error('nope');
    });

    await expect(
      exponentialBackoff(action, {
        maxAttempts: 4,
        initialDelayMs: 1,
        maxDelayMs: 3,
        jitter: false,
        onRetry: (_error, _attempt, delay) => delays.push(delay),
      }),
    ).rejects.toThrow('nope');

    expect(delays).toEqual([1, 2, 3]);
  });

  it('stops when shouldRetry declines', async () => {
    const action = vi.fn(async () => {
      throw new Error('fatal');
    });

    await expect(exponentialBackoff(action, { shouldRetry: () => false })).rejects.toThrow('fatal');
    expect(action).toHaveBeenCalledTimes(1);
  });

  it('gives up while waiting when the signal aborts', async () => {
    const controller = new AbortController();
    const action = vi.fn(async () => {
      controller.abort(new Error('cancelled'));
      throw new Error('transient');
    });

    await expect(exponentialBackoff(action, { signal: controller.signal })).rejects.toThrow('transient');
    expect(action).toHaveBeenCalledTimes(1);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));
    const action = vi.fn(async () => 'never');

    await expect(exponentialBackoff(action, { signal: controller.signal })).rejects.toThrow('cancelled');
    expect(action).not.toHaveBeenCalled();
  });
});
