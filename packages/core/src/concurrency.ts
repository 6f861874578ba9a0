/**
 * Runs `worker` over `items` with at most `limit` calls in flight. Stops
 * handing out new items once `signal` aborts. Waits for every started call to
 * settle before rethrowing the first failure.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  let nextIndex = 0;
  const size = Math.max(1, Math.min(Math.floor(limit), items.length));

  const runners = Array.from({ length: size }, async () => {
    for (;;) {
      if (signal?.aborted) {
        return;
      }
      const index = nextIndex;
      nextIndex += 1;
      if (index >= items.length) {
        return;
      }
      await worker(items[index], index);
    }
  });

  const settled = await Promise.allSettled(runners);
  const failure = settled.find((result): result is PromiseRejectedResult => result.status === "rejected");
  if (failure) {
    throw failure.reason;
  }
}
