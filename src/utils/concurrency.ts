/**
 * Runs `worker` over `items` with at most `concurrency` in flight.
 * Each call gets the item's index so results can be written to their own
 * slot and read back in input order. When `signal` aborts, no new items
 * are started and the returned promise rejects with the signal's reason.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<void>,
  concurrency: number,
  signal?: AbortSignal
): Promise<void> {
  let index = 0;
  const size = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  const workers = Array.from({ length: size }, async () => {
    while (index < items.length) {
      signal?.throwIfAborted();
      const current = index;
      index += 1;
      await worker(items[current], current);
    }
  });

  await Promise.all(workers);
  signal?.throwIfAborted();
}
