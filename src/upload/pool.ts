/**
 * Bounded worker pool
 */

export type Settled<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown };

/**
 * Runs `worker` over `items` with at most `concurrency` in flight.
 *
 * Results come back in input order. A failing item is recorded and the
 * pool moves on; it never cancels the others.
 */
export function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  onSettled?: (completed: number, total: number) => void
): Promise<Array<Settled<R>>> {
  const results: Array<Settled<R>> = new Array(items.length);
  // NaN would start nothing and never settle
  const limit = Number.isNaN(concurrency) ? 1 : Math.max(1, Math.floor(concurrency));
  let active = 0;
  let nextIndex = 0;
  let completed = 0;

  return new Promise((resolve, reject) => {
    if (items.length === 0) {
      resolve(results);
      return;
    }

    const startNext = (): void => {
      // All items started; resolve once the last one settles
      if (nextIndex >= items.length) {
        if (active === 0) {
          resolve(results);
        }
        return;
      }

      const index = nextIndex;
      nextIndex++;
      active++;

      const settle = (result: Settled<R>): void => {
        results[index] = result;
        active--;
        completed++;
        try {
          onSettled?.(completed, items.length);
        } catch (error) {
          reject(error);
        }
        startNext();
      };

      // Promise.resolve().then() turns a synchronous throw into a rejection
      void Promise.resolve()
        .then(() => worker(items[index], index))
        .then(
          (value) => settle({ status: 'fulfilled', value }),
          (reason: unknown) => settle({ status: 'rejected', reason })
        );
    };

    for (let i = 0; i < Math.min(limit, items.length); i++) {
      startNext();
    }
  });
}
