/**
 * Bounded worker pool over a fixed list of jobs.
 *
 * Results keep the input order regardless of completion order. Jobs not yet
 * started when `shouldStop` returns true are left undefined.
 *
 * @throws RangeError if `limit` is not a positive integer
 */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  shouldStop: () => boolean = () => false,
): Promise<Array<R | undefined>> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Pool limit must be a positive integer, got ${limit}`);
  }

  const results: Array<R | undefined> = items.map(() => undefined);
  const queue = items.map((item, index) => ({ item, index }));

  const runWorker = async (): Promise<void> => {
    for (let job = queue.shift(); job !== undefined; job = queue.shift()) {
      if (shouldStop()) return;
      results[job.index] = await worker(job.item, job.index);
    }
  };

  const workers = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workers }, () => runWorker()));

  return results;
}
