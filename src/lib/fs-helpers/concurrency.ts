import { createAbortError } from './abort.js';

export interface ParallelResult<R> {
  results: { index: number; value: R }[];
  errors: { index: number; error: Error }[];
}

/**
 * Run `processor` over `items` with at most `concurrency` tasks in flight.
 *
 * A rejected task is recorded in `errors` and never stops its siblings.
 * Results arrive in completion order, each tagged with its item index.
 * Once `signal` aborts no further items start; in-flight tasks are awaited
 * and the call then rejects with an AbortError.
 */
export async function processInParallel<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  concurrency: number,
  signal?: AbortSignal
): Promise<ParallelResult<R>> {
  const results: ParallelResult<R>['results'] = [];
  const errors: ParallelResult<R>['errors'] = [];

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(
      `Concurrency must be a positive integer, got ${String(concurrency)}`
    );
  }

  if (items.length === 0) {
    return { results, errors };
  }

  let nextIndex = 0;
  let aborted = Boolean(signal?.aborted);
  const inFlight = new Set<Promise<void>>();

  const onAbort = (): void => {
    aborted = true;
  };

  if (signal && !signal.aborted) {
    signal.addEventListener('abort', onAbort, { once: true });
  }

  const startNext = (): void => {
    while (
      !aborted &&
      inFlight.size < concurrency &&
      nextIndex < items.length
    ) {
      const index = nextIndex;
      nextIndex += 1;
      const item = items[index];
      if (item === undefined) break;
      const task = (async (): Promise<void> => {
        try {
          const value = await processor(item, index);
          results.push({ index, value });
        } catch (reason) {
          const error =
            reason instanceof Error ? reason : new Error(String(reason));
          errors.push({ index, error });
        }
      })();
      inFlight.add(task);
      void task.finally(() => {
        inFlight.delete(task);
      });
    }
  };

  startNext();
  while (inFlight.size > 0) {
    await Promise.race(inFlight);
    startNext();
  }

  if (signal) {
    signal.removeEventListener('abort', onAbort);
  }

  if (aborted) {
    throw createAbortError();
  }

  return { results, errors };
}
