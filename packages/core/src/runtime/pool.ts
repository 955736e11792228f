/**
 * Async worker pool over a fixed list of items.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

export interface PoolOptions {
  concurrency: number;
  /** Workers stop picking up items once the signal is aborted */
  signal?: AbortSignal;
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight.
 * Workers yield to the event loop between items so an abort raised
 * elsewhere is seen before the next item starts.
 *
 * @returns indexes of the items that were never started
 */
export async function runPool<T>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<void>,
  options: PoolOptions,
): Promise<number[]> {
  let next = 0;
  const workers = Math.max(1, Math.min(options.concurrency, items.length));

  const loop = async (): Promise<void> => {
    while (next < items.length && !options.signal?.aborted) {
      const index = next++;
      await worker(items[index], index);
      await yieldToEventLoop();
    }
  };

  await Promise.all(Array.from({ length: workers }, loop));

  const unstarted: number[] = [];
  for (let i = next; i < items.length; i++) {
    unstarted.push(i);
  }
  return unstarted;
}
