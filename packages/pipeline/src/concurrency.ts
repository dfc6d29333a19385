/**
 * Run `worker` over `items` with at most `limit` calls in flight. Results
 * keep the order of `items`. After the first failure no further item
 * starts, and that failure is what the returned promise rejects with.
 */
export async function mapBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const pending = items.map((item, index) => ({ item, index }));
  const failures: unknown[] = [];

  const lane = async (): Promise<void> => {
    for (let next = pending.shift(); next !== undefined && failures.length === 0; next = pending.shift()) {
      try {
        results[next.index] = await worker(next.item, next.index);
      } catch (error) {
        failures.push(error);
      }
    }
  };

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, lane));

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}
