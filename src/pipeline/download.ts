import { DownloadError, describeError } from '../errors';
import type { CallOptions } from '../rag/schema';
import { createLogger } from '../util/logger';

export interface Downloader {
  fetch(url: string, options?: CallOptions): Promise<Buffer>;
}

export type HttpDownloaderOptions = {
  maxBytes: number;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};

const logger = createLogger('download');

const formatMegabytes = (bytes: number): string => `${(bytes / (1024 * 1024)).toFixed(1)}MB`;

export class HttpDownloader implements Downloader {
  private readonly maxBytes: number;

  private readonly timeoutMs: number;

  private readonly fetchImpl: typeof fetch;

  constructor({ maxBytes, timeoutMs, fetchImpl }: HttpDownloaderOptions) {
    this.maxBytes = maxBytes;
    this.timeoutMs = timeoutMs;
    this.fetchImpl = fetchImpl ?? fetch;
  }

  async fetch(url: string, { signal }: CallOptions = {}): Promise<Buffer> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = (): void => controller.abort(signal?.reason);

    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    logger.info(`Downloading document from ${url}`);

    try {
      return await this.download(url, controller.signal);
    } catch (error) {
      if (error instanceof DownloadError) {
        throw error;
      }
      if (timedOut) {
        throw new DownloadError(`Download timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      if (controller.signal.aborted) {
        throw new DownloadError('Download aborted', { cause: error });
      }
      throw new DownloadError(`Download failed: ${describeError(error)}`, { cause: error });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async download(url: string, signal: AbortSignal): Promise<Buffer> {
    const response = await this.fetchImpl(url, { signal });

    if (!response.ok) {
      throw new DownloadError(`Download failed with status ${response.status} ${response.statusText}`.trim(), {
        status: response.status,
      });
    }

    const declared = Number.parseInt(response.headers.get('content-length') ?? '', 10);
    if (Number.isFinite(declared) && declared > this.maxBytes) {
      throw new DownloadError(
        `File size too large: ${formatMegabytes(declared)} exceeds limit of ${formatMegabytes(this.maxBytes)}`,
      );
    }

    if (!response.body) {
      return Buffer.alloc(0);
    }

    // content-length may be absent or wrong, so count while reading
    const reader = response.body.getReader();
    const parts: Uint8Array[] = [];
    let received = 0;

    // eslint-disable-next-line no-constant-condition
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }

      received += value.byteLength;
      if (received > this.maxBytes) {
        await reader.cancel();
        throw new DownloadError(`File size too large: body exceeds limit of ${formatMegabytes(this.maxBytes)}`);
      }
      parts.push(value);
    }

    return Buffer.concat(parts);
  }
}
