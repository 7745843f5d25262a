/**
 * Run `fn` over the items with at most `concurrency` in flight. Items are
 * taken in order; once the signal aborts no further item is started.
 * Resolves when every started item has settled, with the number started.
 */
export async function forEachWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal
): Promise<number> {
  if (items.length === 0) return 0;
  const limit = Math.max(1, Math.floor(concurrency));
  let index = 0;

  const workers = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (!signal?.aborted) {
      const current = index++;
      if (current >= items.length) return;
      await fn(items[current], current);
    }
  });

  await Promise.all(workers);
  return Math.min(index, items.length);
}
