/**
 * Maps `items` through `fn` with at most `limit` calls in flight. Results
 * keep the order of `items`. `fn` is expected to handle its own errors.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const executing = new Set<Promise<void>>();

  for (let i = 0; i < items.length; i++) {
    const p: Promise<void> = fn(items[i], i)
      .then((value) => {
        results[i] = value;
      })
      .finally(() => {
        executing.delete(p);
      });
    executing.add(p);
    if (executing.size >= Math.max(1, limit)) {
      await Promise.race(executing);
    }
  }
  await Promise.all(executing);

  return results;
}
