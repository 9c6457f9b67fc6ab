/** Upper bound on accounts fetched at once. */
export const MAX_CONCURRENCY = 8;

/**
 * Map `items` through `fn` with at most `limit` calls in flight.
 * Results keep the order of `items`, whatever the completion order.
 * `fn` is expected to settle to a value; a rejection rejects the whole map.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await fn(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
