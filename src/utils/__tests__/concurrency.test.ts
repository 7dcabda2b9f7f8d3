import { describe, expect, test, vi } from 'vitest';
import { TimeoutError, mapWithConcurrency, withTimeout } from '../concurrency';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('mapWithConcurrency', () => {
  test('keeps input order', async () => {
    const results = await mapWithConcurrency([30, 10, 20], 3, async (ms, i) => {
      await delay(ms);
      return i;
    });
    expect(results).toEqual([0, 1, 2]);
  });

  test('never exceeds the limit', async () => {
    let inFlight = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight--;
    });
    expect(peak).toBe(3);
  });

  test('finishes every item before rejecting', async () => {
    const done: number[] = [];
    const run = mapWithConcurrency([1, 2, 3], 1, async (n) => {
      if (n === 1) throw new Error('first failed');
      done.push(n);
    });

    await expect(run).rejects.toThrow('first failed');
    expect(done).toEqual([2, 3]);
  });

  test('handles an empty list', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});

describe('withTimeout', () => {
  test('resolves with the operation result', async () => {
    expect(await withTimeout(async () => 'ok', 100)).toBe('ok');
  });

  test('rejects and aborts after the deadline', async () => {
    let signal: AbortSignal | undefined;
    const run = withTimeout((s) => {
      signal = s;
      return new Promise<string>(() => {});
    }, 10);

    await expect(run).rejects.toBeInstanceOf(TimeoutError);
    expect(signal?.aborted).toBe(true);
  });

  test('passes operation errors through', async () => {
    await expect(withTimeout(async () => Promise.reject(new Error('nope')), 100)).rejects.toThrow('nope');
  });

  test('clears the deadline when the operation throws synchronously', async () => {
    vi.useFakeTimers();
    try {
      const run = withTimeout(() => {
        throw new Error('boom');
      }, 1_000);

      await expect(run).rejects.toThrow('boom');
      expect(vi.getTimerCount()).toBe(0);
    } finally {
      vi.useRealTimers();
    }
  });
});
