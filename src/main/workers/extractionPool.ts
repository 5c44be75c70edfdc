export type PoolOptions<T, R> = {
  /** Upper bound on tasks in flight (at least 1) */
  concurrency: number;
  /** When aborted, no new tasks start; tasks already running are awaited. */
  signal?: AbortSignal;
  onResult?: (item: T, result: R, countDone: number) => void;
};

/**
 * Runs `work` over `items` with at most `concurrency` tasks in flight and
 * joins them all before resolving. Results keep input order; slots for items
 * never started (after an abort) stay undefined.
 *
 * `work` must not reject. Extraction workers fold their own failures into a
 * fallback result, so a rejection here is a bug and is rethrown after the
 * other workers drain.
 */
export async function runPool<T, R>(items: readonly T[], work: (item: T) => Promise<R>, opts: PoolOptions<T, R>) {
  const results: Array<R | undefined> = new Array(items.length).fill(undefined);
  const width = Math.max(1, Math.min(Math.floor(opts.concurrency) || 1, items.length));
  let next = 0;
  let countDone = 0;

  const worker = async () => {
    while (next < items.length && !opts.signal?.aborted) {
      const idx = next++;
      const item = items[idx];
      const result = await work(item);
      results[idx] = result;
      countDone += 1;
      opts.onResult?.(item, result, countDone);
    }
  };

  const settled = await Promise.allSettled(Array.from({ length: width }, () => worker()));
  const failed = settled.find((s): s is PromiseRejectedResult => s.status === "rejected");
  if (failed) throw failed.reason;
  return results;
}
