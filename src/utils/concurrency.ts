/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Items are taken in order; a worker failure rejects the whole pool.
 */
export async function processWithConcurrency<T>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<void>,
  concurrency: number
): Promise<void> {
  let next = 0;

  async function lane(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      await worker(items[index], index);
    }
  }

  const lanes = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, lane));
}
