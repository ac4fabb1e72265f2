/**
 * Bounded worker pool
 *
 * At most `concurrency` workers run at once; each pulls the next item as
 * soon as it finishes the previous one. Results keep input order.
 */

export interface PoolOptions {
  concurrency: number;
  /** Once aborted, workers stop taking new items */
  signal?: AbortSignal;
}

export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions
): Promise<Array<R | undefined>> {
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  const size = Math.max(1, Math.min(options.concurrency, items.length));
  let next = 0;

  const runWorker = async (): Promise<void> => {
    while (next < items.length && options.signal?.aborted !== true) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await worker(item, index);
    }
  };

  await Promise.all(Array.from({ length: size }, () => runWorker()));
  return results;
}
