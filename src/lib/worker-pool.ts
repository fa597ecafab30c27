/**
 * Run `processor` over `items` with at most `concurrency` calls in flight.
 * Results keep input order. A rejected call rejects the whole map, so
 * processors that must not cancel siblings catch their own errors.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  concurrency: number
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let currentIndex = 0;

  async function worker(): Promise<void> {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      results[index] = await processor(items[index], index);
    }
  }

  const workers = Array.from(
    { length: Math.max(1, Math.min(concurrency, items.length)) },
    () => worker()
  );
  await Promise.all(workers);

  return results;
}
