export type DocumentCacheEntry = {
  chunkCount: number;
  processedAt: number;
};

type InFlightRun = {
  promise: Promise<DocumentCacheEntry>;
  controller: AbortController;
  waiters: number;
};

/**
 * Remembers which document URLs have been chunked, embedded and indexed.
 *
 * Keys are the URL exactly as received. Entries are never evicted: a URL is assumed to
 * point at the same bytes for the lifetime of the process. An entry exists only once
 * every chunk of that document is searchable.
 */
export class DocumentCache {
  private readonly entries = new Map<string, DocumentCacheEntry>();

  private readonly inFlight = new Map<string, InFlightRun>();

  constructor(private readonly now: () => number = Date.now) {}

  get size(): number {
    return this.entries.size;
  }

  has(url: string): boolean {
    return this.entries.has(url);
  }

  get(url: string): DocumentCacheEntry | undefined {
    return this.entries.get(url);
  }

  put(url: string, chunkCount: number): DocumentCacheEntry {
    const entry: DocumentCacheEntry = { chunkCount, processedAt: this.now() };
    this.entries.set(url, entry);
    return entry;
  }

  /**
   * Runs `ingest` at most once at a time per URL. Concurrent callers for the same URL share
   * the in-flight run. The entry is committed only after `ingest` resolves, so a rejected or
   * aborted ingestion leaves nothing behind and a later call starts over.
   *
   * Each caller's `signal` only detaches that caller. The shared run gets its own signal,
   * aborted once every caller waiting on it has aborted.
   */
  ingestOnce(
    url: string,
    ingest: (signal: AbortSignal) => Promise<number>,
    signal?: AbortSignal,
  ): Promise<DocumentCacheEntry> {
    const cached = this.entries.get(url);
    if (cached) {
      return Promise.resolve(cached);
    }

    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const run = this.inFlight.get(url) ?? this.start(url, ingest);
    run.waiters += 1;

    return new Promise<DocumentCacheEntry>((resolve, reject) => {
      const onAbort = (): void => {
        run.waiters -= 1;
        if (run.waiters === 0) {
          if (this.inFlight.get(url) === run) {
            this.inFlight.delete(url);
          }
          run.controller.abort(signal?.reason);
        }
        reject(signal?.reason);
      };

      signal?.addEventListener('abort', onAbort, { once: true });

      run.promise.then(resolve, reject).finally(() => {
        signal?.removeEventListener('abort', onAbort);
      });
    });
  }

  private start(url: string, ingest: (signal: AbortSignal) => Promise<number>): InFlightRun {
    const controller = new AbortController();

    const run: InFlightRun = {
      controller,
      waiters: 0,
      promise: Promise.resolve()
        .then(() => ingest(controller.signal))
        .then((chunkCount) => this.put(url, chunkCount))
        .finally(() => {
          if (this.inFlight.get(url) === run) {
            this.inFlight.delete(url);
          }
        }),
    };

    this.inFlight.set(url, run);

    return run;
  }

  isIngesting(url: string): boolean {
    return this.inFlight.has(url);
  }
}
