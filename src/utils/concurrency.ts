import { abortReason } from "./retry";

/**
 * Process items concurrently with a worker pool.
 * Results keep the order of the input items.
 *
 * The first rejection, or the signal firing, stops workers from picking up
 * further items; items already in flight run to completion (or observe the
 * same signal themselves).
 */
export async function processWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  processor: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  if (items.length === 0) return [];

  const results: R[] = new Array<R>(items.length);
  let idx = 0;
  let failed = false;
  const getNextIndex = () => idx++;

  const workers = new Array(Math.min(Math.max(1, concurrency), items.length))
    .fill(0)
    .map(async () => {
      while (!failed) {
        const myIdx = getNextIndex();
        if (myIdx >= items.length) return;
        if (signal?.aborted) throw abortReason(signal);
        try {
          results[myIdx] = await processor(items[myIdx], myIdx);
        } catch (e) {
          failed = true;
          throw e;
        }
      }
    });

  await Promise.all(workers);
  return results;
}
