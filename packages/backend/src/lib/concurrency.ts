import { RunCancelledError } from '@clinical/api';

/**
 * Maps `items` through `worker` with at most `limit` calls in flight, preserving input order.
 * Once `signal` aborts no new item starts; calls already running finish before the
 * cancellation is reported.
 */
export const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> => {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}.`);
  }

  const results = new Array<R>(items.length);
  const queue = items.map((item, index) => ({ item, index }));

  const runLane = async (): Promise<void> => {
    while (!signal?.aborted) {
      const entry = queue.shift();
      if (!entry) {
        return;
      }
      results[entry.index] = await worker(entry.item, entry.index);
    }
  };

  const lanes = Array.from({ length: Math.min(limit, items.length) }, () => runLane());
  const settled = await Promise.allSettled(lanes);

  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      throw outcome.reason;
    }
  }

  if (signal?.aborted) {
    throw new RunCancelledError();
  }

  return results;
};
