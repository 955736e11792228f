import { describe, it, expect } from 'vitest';
import { setImmediate as nextTurn } from 'node:timers/promises';
import { runPool } from '../../../src/runtime';

describe('runPool', () => {
  it('should process every item with bounded concurrency', async () => {
    let inFlight = 0;
    let peak = 0;
    const seen: number[] = [];

    const unstarted = await runPool(
      [1, 2, 3, 4, 5],
      async item => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await nextTurn();
        seen.push(item);
        inFlight--;
      },
      { concurrency: 2 },
    );

    expect(unstarted).toEqual([]);
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5]);
    expect(peak).toBe(2);
  });

  it('should stop picking up items after an abort', async () => {
    const controller = new AbortController();
    const started: string[] = [];

    const unstarted = await runPool(
      ['a', 'b', 'c', 'd'],
      async item => {
        started.push(item);
        if (item === 'b') controller.abort();
      },
      { concurrency: 1, signal: controller.signal },
    );

    expect(started).toEqual(['a', 'b']);
    expect(unstarted).toEqual([2, 3]);
  });

  it('should handle an empty list', async () => {
    await expect(runPool([], async () => undefined, { concurrency: 4 })).resolves.toEqual([]);
  });
});
