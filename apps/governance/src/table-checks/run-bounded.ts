/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * The first rejection stops new items from starting and is rethrown once
 * the in-flight calls settle.
 */
export async function runBounded<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  let next = 0;
  let stopped = false;

  const lane = async (): Promise<void> => {
    while (!stopped && next < items.length) {
      const item = items[next];
      next++;
      try {
        await worker(item);
      } catch (error) {
        stopped = true;
        throw error;
      }
    }
  };

  const lanes = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  const results = await Promise.allSettled(
    Array.from({ length: lanes }, () => lane()),
  );
  const failure = results.find(
    (result): result is PromiseRejectedResult => result.status === "rejected",
  );
  if (failure) {
    throw failure.reason;
  }
}
