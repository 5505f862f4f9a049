/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight. Each
 * slot pulls the next index from a shared cursor, so an item is handed to
 * exactly one slot. Slots stop pulling once `signal` is aborted.
 */
export async function processWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
  signal?: AbortSignal,
): Promise<void> {
  let index = 0;
  const slotCount = Math.min(Math.max(1, Math.floor(concurrency)), items.length);
  const slots = new Array(slotCount).fill(null).map(async () => {
    while (!signal?.aborted) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current]);
    }
  });
  await Promise.all(slots);
}
