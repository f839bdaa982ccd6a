/**
 * Worker pool for independent comptime call sites.
 *
 * Workers are async tasks on the event loop pulling from a shared queue.
 * A single evaluation never suspends; workers interleave between items.
 * Results come back in input order whatever order the workers finish in.
 */

export type PoolOptions = {
  workers: number;
  /** Called after each item settles with the number settled so far. */
  onProgress?: (done: number, total: number) => void;
};

export async function runPool<T, R>(items: readonly T[], task: (item: T) => R, options: PoolOptions): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  let done = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      await yieldToEventLoop();
      results[index] = task(items[index]);
      done++;
      options.onProgress?.(done, items.length);
    }
  };

  const count = Math.max(1, Math.min(options.workers, items.length));
  await Promise.all(Array.from({ length: count }, () => worker()));
  return results;
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
