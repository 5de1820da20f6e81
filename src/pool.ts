// src/pool.ts

export type PoolResult<R> =
  | { status: "done"; value: R }
  | { status: "error"; error: unknown }
  | { status: "not-started" };

/**
 * Run `worker` over `items` with at most `size` in flight. Results keep the
 * input order. Once `signal` aborts no new item is started; items already
 * running finish normally.
 */
export async function runPool<T, R>(
  items: readonly T[],
  size: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<PoolResult<R>[]> {
  const results: PoolResult<R>[] = items.map(() => ({ status: "not-started" }));
  const lanes = Math.max(1, Math.min(Math.floor(size) || 1, items.length));
  let next = 0;

  async function lane(): Promise<void> {
    while (next < items.length) {
      if (signal?.aborted) return;
      const index = next++;
      try {
        results[index] = { status: "done", value: await worker(items[index], index) };
      } catch (error) {
        results[index] = { status: "error", error };
      }
    }
  }

  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
}
