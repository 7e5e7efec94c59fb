/**
 * Map `items` through `fn` with at most `limit` calls in flight, returning
 * results in input order regardless of completion order.
 *
 * `fn` is expected to settle rather than reject. After a rejection no new
 * calls start, and the map rejects with the first error once the calls
 * already in flight have finished.
 *
 * @example
 * ```typescript
 * const sizes = await mapWithConcurrency(paths, 2, (path) => stat(path).then((s) => s.size));
 * ```
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));
  let next = 0;
  const state: { failure?: { error: unknown } } = {};

  const worker = async (): Promise<void> => {
    while (!state.failure && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        state.failure ??= { error };
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  if (state.failure) {
    throw state.failure.error;
  }
  return results;
}
