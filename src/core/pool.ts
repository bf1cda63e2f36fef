import { setImmediate as yieldToEventLoop } from "node:timers/promises";

// Runs fn over items with at most `limit` in flight; results keep input order.
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => R | Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      signal?.throwIfAborted();
      const index = next;
      next += 1;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await fn(item, index);
      await yieldToEventLoop();
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
