import { describe, it, expect } from 'vitest';
import { mapWithConcurrency } from '../src/scan/concurrency.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('mapWithConcurrency', () => {
  it('keeps input order in the results', async () => {
    const results = await mapWithConcurrency([30, 10, 20], 3, async (ms, i) => {
      await delay(ms);
      return `${i}:${ms}`;
    });
    expect(results).toEqual(['0:30', '1:10', '2:20']);
  });

  it('never runs more than the limit at once', async () => {
    let running = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      running++;
      peak = Math.max(peak, running);
      await delay(5);
      running--;
    });
    expect(peak).toBe(2);
  });

  it('returns an empty list for no items', async () => {
    expect(await mapWithConcurrency([], 4, async (x: number) => x)).toEqual([]);
  });

  it('rejects with the first worker error', async () => {
    await expect(
      mapWithConcurrency([1, 2], 1, async (x) => {
        if (x === 2) throw new Error('worker failed');
        return x;
      }),
    ).rejects.toThrow('worker failed');
  });
});
