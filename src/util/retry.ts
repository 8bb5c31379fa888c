import { createLogger } from './logger';

type BackoffOptions = {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
  jitter?: boolean;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
};

const logger = createLogger('retry');

const wait = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

export const exponentialBackoff = async <T>(
  action: (attempt: number) => Promise<T>,
  options: BackoffOptions = {},
): Promise<T> => {
  const {
    maxAttempts = 5,
    initialDelayMs = 500,
    maxDelayMs = 30_000,
    factor = 2,
    jitter = true,
    signal,
    onRetry,
    shouldRetry,
  } = options;

  let attempt = 0;

  // eslint-disable-next-line no-constant-condition
  while (true) {
    attempt += 1;
    signal?.throwIfAborted();

    try {
      return await action(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || signal?.aborted) {
        throw error;
      }

      if (typeof shouldRetry === 'function' && !shouldRetry(error, attempt)) {
        throw error;
      }

      const exponentialDelay = initialDelayMs * factor ** (attempt - 1);
      const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
      const delay = jitter
        ? Math.round(cappedDelay / 2 + Math.random() * (cappedDelay / 2))
        : Math.round(cappedDelay);

      if (typeof onRetry === 'function') {
        try {
          onRetry(error, attempt, delay);
        } catch (hookError) {
          logger.warn('Retry hook threw an error.', { error: hookError });
        }
      }

      await wait(delay, signal);
    }
  }
};

export type { BackoffOptions };
