import { describe, it, expect } from 'vitest';

import { chunk, mapWithConcurrency } from '../concurrency.js';

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe('mapWithConcurrency', () => {
  it('should keep results in input order', async () => {
    const results = await mapWithConcurrency([30, 10, 20], 3, async (ms, index) => {
      await delay(ms);
      return index;
    });

    expect(results).toEqual([0, 1, 2]);
  });

  it('should never exceed the limit', async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await delay(5);
      inFlight--;
    });

    expect(maxInFlight).toBe(2);
  });

  it('should wait for running calls before rethrowing the first failure', async () => {
    const finished: number[] = [];

    const pending = mapWithConcurrency([0, 1, 2, 3], 2, async (item) => {
      if (item === 0) {
        throw new Error('first failed');
      }
      await delay(20);
      finished.push(item);
    });

    await expect(pending).rejects.toThrow('first failed');
    // Item 1 was already running; items 2 and 3 were never started
    expect(finished).toEqual([1]);
  });
});

describe('chunk', () => {
  it('should split into near-equal contiguous parts', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([
      [1, 2, 3],
      [4, 5],
    ]);
    expect(chunk([1, 2], 5)).toEqual([[1], [2]]);
    expect(chunk([1, 2, 3], 1)).toEqual([[1, 2, 3]]);
    expect(chunk([], 3)).toEqual([]);
  });
});
