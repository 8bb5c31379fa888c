import { describe, expect, it } from 'vitest';

import { AnswerCache } from '../../src/store/answerCache';
import { DocumentCache } from '../../src/store/documentCache';

describe('AnswerCache', () => {
  it('keys on the exact question string', () => {
    const cache = new AnswerCache();
    cache.put('What is X?', 'X is a thing');

    expect(cache.has('What is X?')).toBe(true);
    expect(cache.get('What is X?')).toBe('X is a thing');
    expect(cache.has('what is x')).toBe(false);
    expect(cache.has('What is X? ')).toBe(false);
    expect(cache.size).toBe(1);
  });
});

describe('DocumentCache', () => {
  const url = 'https://docs.example.test/Policy.pdf';

  it('records chunk count and processing time', () => {
    const cache = new DocumentCache(() => 1_700_000_000_000);

    expect(cache.put(url, 3)).toEqual({ chunkCount: 3, processedAt: 1_700_000_000_000 });
    expect(cache.has(url)).toBe(true);
    expect(cache.has(url.toLowerCase())).toBe(false);
  });

  it('runs one ingestion for concurrent callers of the same URL', async () => {
    const cache = new DocumentCache(() => 42);
    let runs = 0;
    let release: (count: number) => void = () => undefined;
    const ingest = (): Promise<number> => {
      runs += 1;
      return new Promise<number>((resolve) => {
        release = resolve;
      });
    };

    const first = cache.ingestOnce(url, ingest);
    const second = cache.ingestOnce(url, ingest);
    expect(cache.isIngesting(url)).toBe(true);

    await Promise.resolve();
    release(4);

    await expect(first).resolves.toEqual({ chunkCount: 4, processedAt: 42 });
    await expect(second).resolves.toEqual({ chunkCount: 4, processedAt: 42 });
    expect(runs).toBe(1);
    expect(cache.isIngesting(url)).toBe(false);

    await cache.ingestOnce(url, ingest);
    expect(runs).toBe(1);
  });

  it('commits nothing when ingestion fails and allows a retry', async () => {
    const cache = new DocumentCache();

    await expect(cache.ingestOnce(url, async () => {
      throw new Error('embedding quota exceeded');
    })).rejects.toThrow('embedding quota exceeded');

    expect(cache.has(url)).toBe(false);
    expect(cache.isIngesting(url)).toBe(false);

    await expect(cache.ingestOnce(url, async () => 2)).resolves.toMatchObject({ chunkCount: 2 });
    expect(cache.has(url)).toBe(true);
  });

  it('does not leave a stuck entry when the task throws synchronously', async () => {
    const cache = new DocumentCache();

    await expect(cache.ingestOnce(url, () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(cache.isIngesting(url)).toBe(false);
  });

  it('aborts the shared ingestion only after every waiting caller has aborted', async () => {
    const cache = new DocumentCache();
    const sharedSignals: AbortSignal[] = [];
    const ingest = (signal: AbortSignal): Promise<number> => {
      sharedSignals.push(signal);
      return new Promise<number>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      });
    };
    const a = new AbortController();
    const b = new AbortController();

    const first = cache.ingestOnce(url, ingest, a.signal);
    const second = cache.ingestOnce(url, ingest, b.signal);
    await Promise.resolve();

    a.abort(new Error('caller a went away'));
    await expect(first).rejects.toThrow('caller a went away');
    expect(sharedSignals).toHaveLength(1);
    expect(sharedSignals[0].aborted).toBe(false);
    expect(cache.isIngesting(url)).toBe(true);

    b.abort(new Error('caller b went away'));
    await expect(second).rejects.toThrow('caller b went away');
    expect(sharedSignals[0].aborted).toBe(true);
    expect(cache.isIngesting(url)).toBe(false);
    expect(cache.has(url)).toBe(false);
  });

  it('rejects a caller whose signal is already aborted without starting a run', async () => {
    const cache = new DocumentCache();
    const controller = new AbortController();
    controller.abort(new Error('already gone'));
    let runs = 0;

    await expect(cache.ingestOnce(url, async () => {
      runs += 1;
      return 1;
    }, controller.signal)).rejects.toThrow('already gone');

    expect(runs).toBe(0);
    expect(cache.isIngesting(url)).toBe(false);
  });
});
