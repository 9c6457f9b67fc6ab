import { describe, expect, it } from 'vitest';
import { mapWithConcurrency } from '../../src/utils/concurrency.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('mapWithConcurrency', () => {
  it('keeps input order whatever the completion order', async () => {
    const results = await mapWithConcurrency([30, 5, 15], 3, async (ms, index) => {
      await delay(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:15']);
  });

  it('never exceeds the limit', async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight -= 1;
    });

    expect(peak).toBe(2);
  });

  it('runs one at a time with a limit of 1', async () => {
    const order: string[] = [];

    await mapWithConcurrency(['a', 'b'], 1, async (item) => {
      order.push(`start:${item}`);
      await delay(1);
      order.push(`end:${item}`);
    });

    expect(order).toEqual(['start:a', 'end:a', 'start:b', 'end:b']);
  });

  it('handles no items', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('treats a non-positive limit as 1', async () => {
    await expect(mapWithConcurrency([1, 2], 0, async (n) => n * 2)).resolves.toEqual([2, 4]);
  });
});
