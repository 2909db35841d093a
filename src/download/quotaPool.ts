export type QuotaTask<T, R> = (item: T, signal: AbortSignal) => Promise<R | null>;

export type QuotaOutcome<R> = {
  /** In completion order, at most `quota` long. */
  successes: R[];
  attempted: number;
  failed: number;
  abandoned: number;
};

type Settled<R> = { index: number; value: R | null; error?: unknown };

/**
 * Runs `task` over `items` with at most `workers` in flight, topping the pool up after every
 * completion, until `quota` tasks have produced a non-null result or the items run out.
 *
 * Once the quota is met nothing new is dispatched and the shared signal is aborted; results
 * of tasks still in flight at that point are discarded.
 */
export async function runUntilQuota<T, R>(
  items: readonly T[],
  params: {
    quota: number;
    workers: number;
    task: QuotaTask<T, R>;
    onSuccess?: (result: R, successCount: number) => void;
    onFailure?: (item: T, error: unknown) => void;
  }
): Promise<QuotaOutcome<R>> {
  const workers = Math.max(1, Math.floor(params.workers));
  const controller = new AbortController();
  const inFlight = new Map<number, Promise<Settled<R>>>();
  const successes: R[] = [];
  let next = 0;
  let failed = 0;

  const start = (index: number, item: T): Promise<Settled<R>> =>
    params.task(item, controller.signal).then(
      (value) => ({ index, value }),
      (error: unknown) => ({ index, value: null, error })
    );

  while (successes.length < params.quota) {
    while (inFlight.size < workers && next < items.length) {
      const index = next;
      next += 1;
      inFlight.set(index, start(index, items[index]));
    }
    if (inFlight.size === 0) break;

    const settled = await Promise.race(inFlight.values());
    inFlight.delete(settled.index);

    if (settled.value !== null) {
      successes.push(settled.value);
      params.onSuccess?.(settled.value, successes.length);
    } else {
      failed += 1;
      params.onFailure?.(items[settled.index], settled.error);
    }
  }

  const abandoned = inFlight.size;
  if (abandoned > 0) controller.abort();
  return { successes, attempted: next, failed, abandoned };
}
