/**
 * Concurrency Helper Tests
 *
 * @module __tests__/concurrency
 */

import { describe, test, expect } from 'vitest';
import { mapWithConcurrency, TimeoutError, withTimeout } from '../concurrency';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('mapWithConcurrency', () => {
  test('never exceeds the limit and keeps input order', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 10, 20, 5, 15], 2, async (ms, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(ms);
      inFlight--;
      return index * 10;
    });

    expect(peak).toBe(2);
    expect(results).toEqual([0, 10, 20, 30, 40].map((value) => ({ status: 'fulfilled', value })));
  });

  test('isolates failures', async () => {
    const results = await mapWithConcurrency(['a', 'b', 'c'], 3, async (item) => {
      if (item === 'b') throw new Error('boom');
      return item.toUpperCase();
    });

    expect(results[0]).toEqual({ status: 'fulfilled', value: 'A' });
    expect(results[1].status).toBe('rejected');
    if (results[1].status === 'rejected') {
      expect(results[1].reason.message).toBe('boom');
    }
    expect(results[2]).toEqual({ status: 'fulfilled', value: 'C' });
  });

  test('handles an empty list', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });

  test('rejects a non-positive limit', async () => {
    await expect(mapWithConcurrency([1], 0, async (n) => n)).rejects.toThrow(RangeError);
  });
});

describe('withTimeout', () => {
  test('resolves when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 50, 'fast')).resolves.toBe('ok');
  });

  test('rejects with TimeoutError when too slow', async () => {
    const slow = sleep(200).then(() => 'late');
    const error = await withTimeout(slow, 10, 'generation').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error instanceof TimeoutError && error.message).toBe('generation timed out after 10ms');
  });
});
