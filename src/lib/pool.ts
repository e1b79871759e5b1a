/**
 * Bounded worker pool
 */

export interface PoolOptions {
  concurrency: number;
  /** Checked before each item starts; items not yet started are skipped once aborted */
  signal?: AbortSignal;
}

/**
 * Run `task` over `items` with at most `concurrency` in flight. Results keep
 * the input order; skipped items are absent from the result.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  task: (item: T, index: number) => Promise<R>,
  options: PoolOptions
): Promise<R[]> {
  const results = new Map<number, R>();
  let index = 0;

  async function worker() {
    while (index < items.length) {
      if (options.signal?.aborted) return;
      const current = index++;
      results.set(current, await task(items[current], current));
    }
  }

  const width = Math.max(1, Math.min(options.concurrency, items.length));
  await Promise.all(Array.from({ length: width }, () => worker()));

  return [...results.entries()].sort((a, b) => a[0] - b[0]).map(([, r]) => r);
}
