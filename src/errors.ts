export type PipelineErrorKind = 'download' | 'extraction' | 'validation' | 'backend';

type PipelineErrorOptions = {
  cause?: unknown;
  status?: number;
};

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  readonly status?: number;

  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.status = options.status;
  }
}

/** Network failure, non-2xx status, timeout or size-limit violation while fetching a document. */
export class DownloadError extends PipelineError {
  readonly kind = 'download';
}

/** The document container could not be parsed into text. */
export class ExtractionError extends PipelineError {
  readonly kind = 'extraction';
}

/** Input rejected before any backend work, e.g. text too short to chunk. */
export class ValidationError extends PipelineError {
  readonly kind = 'validation';
}

/** Embedding, index or generation failure. */
export class BackendError extends PipelineError {
  readonly kind = 'backend';
}

export const errorStatus = (error: unknown): number | undefined => {
  if (error && typeof error === 'object' && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number') {
      return status;
    }
  }
  return undefined;
};

export const errorDetail = (error: unknown): string | undefined => {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  if (error && typeof error === 'object' && 'detail' in error) {
    const { detail } = error;
    if (typeof detail === 'string') {
      return detail;
    }
  }

  if (typeof error === 'string' && error) {
    return error;
  }

  return undefined;
};

export const describeError = (error: unknown): string => errorDetail(error) ?? 'Unknown error';

/**
 * Returns `error` unchanged when it already belongs to the taxonomy, otherwise wraps it
 * with `wrap` so callers can branch on `kind`.
 */
export const toPipelineError = (
  error: unknown,
  wrap: (message: string, options: PipelineErrorOptions) => PipelineError = (message, options) =>
    new BackendError(message, options),
): PipelineError => {
  if (error instanceof PipelineError) {
    return error;
  }

  return wrap(describeError(error), { cause: error, status: errorStatus(error) });
};

/** 4xx other than 429 will not succeed on a second try. */
export const isRetryableStatus = (status: number | undefined): boolean =>
  typeof status !== 'number' || status < 400 || status >= 500 || status === 429;

export const isAbortError = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
