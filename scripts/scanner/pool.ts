export type PoolWorker<T, R> = (item: T, workerId: number, index: number) => Promise<R>;

/**
 * Bounded async worker pool. Workers pull the next index from a shared cursor and keep their
 * id for the whole run, so anything keyed by worker id (clone directories, result shards)
 * is never touched by two workers at once. A worker that throws rejects the whole pool;
 * per-item failures belong in `R`.
 */
export async function runWorkerPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: PoolWorker<T, R>,
  onSettled?: (result: R, index: number, total: number) => void
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let cursor = 0;

  const loop = async (workerId: number) => {
    while (true) {
      const index = cursor++;
      if (index >= items.length) {
        break;
      }
      const result = await worker(items[index], workerId, index);
      results[index] = result;
      onSettled?.(result, index, items.length);
    }
  };

  const workerCount = Math.max(1, Math.min(concurrency, items.length || 1));
  await Promise.all(Array.from({ length: workerCount }, (_, position) => loop(position + 1)));

  return results;
}
