/**
 * Bounded-concurrency map. Workers pull the next item from a shared queue,
 * so at most `limit` calls are in flight; results are written back by index
 * and come out in input order regardless of completion order.
 */

export interface PoolOptions {
  signal?: AbortSignal;
}

export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  opts?: PoolOptions
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  const signal = opts?.signal;
  signal?.throwIfAborted();

  const queue = items.map((item, index) => ({ item, index }));
  const results: R[] = [];
  let failed = false;

  async function worker(): Promise<void> {
    while (!failed) {
      signal?.throwIfAborted();
      const next = queue.shift();
      if (!next) return;
      try {
        results[next.index] = await fn(next.item, next.index);
      } catch (err) {
        // Stop siblings from picking up new work; in-flight calls finish on their own
        failed = true;
        throw err;
      }
    }
  }

  const workerCount = Math.min(limit, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}

/**
 * Split a list into chunks of at most `size` elements.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Wait `ms`, or reject with the signal's reason as soon as it aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
