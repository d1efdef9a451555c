/**
 * Maps `items` through an async `worker` with at most `limit` calls in
 * flight.
 *
 * Workers pull the next index from a shared cursor; results are stored by
 * index, so the output order matches the input order regardless of
 * completion order. A rejected call rejects the whole map.
 *
 * @param items - Inputs, processed in order of the cursor.
 * @param limit - Maximum concurrent calls (values below 1 count as 1).
 * @param worker - Async mapping function.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let cursor = 0;

  const runWorker = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++;
      results[index] = await worker(items[index], index);
    }
  };

  const workerCount = Math.min(Math.max(1, Math.floor(limit)), items.length);
  await Promise.all(Array.from({ length: workerCount }, runWorker));

  return results;
}
