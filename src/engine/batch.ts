/**
 * Runs `worker` over `items` with at most `concurrency` in flight. The signal is
 * checked before each item starts; items never started are left out. Results
 * keep the input order.
 */
export async function mapBounded<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  const queue = items.map((item, index) => ({ item, index }));
  const results = new Map<number, R>();
  const limit = Number.isFinite(concurrency) ? Math.floor(concurrency) : 1;
  const lanes = Math.max(1, Math.min(limit, queue.length));

  const runLane = async (): Promise<void> => {
    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      if (signal?.aborted) return;
      results.set(next.index, await worker(next.item, next.index));
    }
  };

  await Promise.all(Array.from({ length: lanes }, runLane));

  return [...results.entries()].sort(([a], [b]) => a - b).map(([, result]) => result);
}
