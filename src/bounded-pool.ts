// Speaker Match - Bounded pool
// Fixed number of workers draining a shared index queue. Results land at the
// index of their input, so output order never depends on completion order.

/**
 * Map `items` through `fn` with at most `limit` calls in flight, resolving
 * once every call has settled. `limit` may be Infinity for unbounded fan-out.
 *
 * If any call rejects, no further items are started and the returned promise
 * rejects with that error once the calls already running have settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!(limit >= 1)) {
    throw new RangeError(`Concurrency limit must be >= 1, got ${limit}`);
  }

  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  };

  const workerCount = Math.min(Math.floor(limit), items.length);
  const workers: Promise<void>[] = [];
  for (let i = 0; i < workerCount; i++) {
    workers.push(worker());
  }

  const outcomes = await Promise.allSettled(workers);
  for (const outcome of outcomes) {
    if (outcome.status === "rejected") throw outcome.reason;
  }
  return results;
}
