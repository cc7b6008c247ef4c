import { describe, expect, it } from 'vitest';
import { mapBounded } from './batch';

describe('mapBounded', () => {
  it('never runs more than the allowed number of workers at once', async () => {
    let active = 0;
    let peak = 0;

    const results = await mapBounded([1, 2, 3, 4, 5, 6], 2, async (value) => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 2));
      active -= 1;
      return value * 10;
    });

    expect(results).toEqual([10, 20, 30, 40, 50, 60]);
    expect(peak).toBe(2);
  });

  it('starts nothing once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const seen: number[] = [];

    const results = await mapBounded([1, 2], 1, async (value) => {
      seen.push(value);
      return value;
    }, controller.signal);

    expect(results).toEqual([]);
    expect(seen).toEqual([]);
  });

  it('treats a non-finite concurrency as sequential', async () => {
    await expect(mapBounded(['a', 'b'], Number.NaN, async (value) => value.toUpperCase())).resolves.toEqual(['A', 'B']);
  });
});
