/**
 * Runs `worker` over `items` with at most `limit` tasks in flight.
 * Each task is tagged with its input index, so results come back in input order
 * whatever the completion order.
 */
export const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  const size = Math.max(1, Math.min(Math.trunc(limit) || 1, items.length));
  let cursor = 0;

  const runWorker = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor;
      cursor += 1;
      results[index] = await worker(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: size }, () => runWorker()));

  return results;
};
