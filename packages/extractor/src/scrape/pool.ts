/**
 * Run `task` over `items` with at most `limit` tasks in flight.
 *
 * Results are collected in completion order, not input order. The first
 * rejected task rejects the returned promise.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = [];
  let cursor = 0;

  async function worker(): Promise<void> {
    while (cursor < items.length) {
      const index = cursor++;
      results.push(await task(items[index], index));
    }
  }

  const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));
  const workers = Array.from({ length: workerCount }, () => worker());
  await Promise.all(workers);

  return results;
}
