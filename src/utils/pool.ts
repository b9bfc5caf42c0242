/**
 * Fixed-width async worker pool.
 */

/**
 * Run `task` over every item with at most `width` tasks in flight.
 *
 * Results keep the order of `items`. The first rejection rejects the whole
 * call; workers stop picking up new items once a task has failed, and the
 * call settles only after the tasks already running have finished.
 */
export async function mapWithPool<T, R>(
  items: readonly T[],
  width: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) {
        continue;
      }
      try {
        results[index] = await task(item, index);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(width, items.length)) }, () => worker());
  const settled = await Promise.allSettled(workers);
  for (const outcome of settled) {
    if (outcome.status === "rejected") {
      throw outcome.reason;
    }
  }
  return results;
}
