/**
 * Maps `items` through `worker` with at most `concurrency` calls in flight; output keeps
 * input order. After the first rejection no further items are started.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let cursor = 0;
  let failed = false;

  const runners = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, async () => {
    while (!failed && cursor < items.length) {
      const index = cursor;
      cursor += 1;
      const item = items[index];
      if (item === undefined) {
        continue;
      }
      try {
        results[index] = await worker(item, index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  });

  await Promise.all(runners);
  return results;
}
