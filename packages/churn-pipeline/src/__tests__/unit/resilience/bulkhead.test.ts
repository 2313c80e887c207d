/**
 * Bulkhead tests
 */

import { describe, it, expect, vi } from 'vitest';
import { Bulkhead, BulkheadRejectionError } from '../../../resilience/bulkhead.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('Bulkhead', () => {
  it('runs operations up to the cap and rejects the overflow', async () => {
    const bulkhead = new Bulkhead({ name: 'test', maxConcurrent: 1, defaultRetryAfterMs: 5_000 });
    const gate = deferred<string>();

    const first = bulkhead.execute(() => gate.promise);
    expect(bulkhead.isSaturated).toBe(true);

    const rejection = bulkhead.execute(() => Promise.resolve('second'));
    await expect(rejection).rejects.toBeInstanceOf(BulkheadRejectionError);

    gate.resolve('first');
    await expect(first).resolves.toBe('first');
    expect(bulkhead.isSaturated).toBe(false);
    await expect(bulkhead.execute(() => Promise.resolve('third'))).resolves.toBe('third');
  });

  it('uses the default retry hint before anything has completed', async () => {
    const bulkhead = new Bulkhead({ name: 'test', maxConcurrent: 1, defaultRetryAfterMs: 5_000 });
    const gate = deferred<void>();
    const first = bulkhead.execute(() => gate.promise);

    try {
      await bulkhead.execute(() => Promise.resolve());
      throw new Error('expected a rejection');
    } catch (error) {
      expect(error).toBeInstanceOf(BulkheadRejectionError);
      if (!(error instanceof BulkheadRejectionError)) return;
      expect(error.retryAfterMs).toBeGreaterThan(4_000);
      expect(error.retryAfterMs).toBeLessThanOrEqual(5_000);
      expect(error.bulkheadName).toBe('test');
      expect(error.stats.activeCount).toBe(1);
    }

    gate.resolve();
    await first;
  });

  it('never suggests retrying sooner than one second', async () => {
    const bulkhead = new Bulkhead({ name: 'test', maxConcurrent: 1, defaultRetryAfterMs: 10 });
    const gate = deferred<void>();
    const first = bulkhead.execute(() => gate.promise);

    await expect(bulkhead.execute(() => Promise.resolve())).rejects.toMatchObject({ retryAfterMs: 1000 });

    gate.resolve();
    await first;
  });

  it('releases the slot when the operation throws', async () => {
    const bulkhead = new Bulkhead({ name: 'test', maxConcurrent: 1, defaultRetryAfterMs: 1_000 });

    await expect(bulkhead.execute(() => Promise.reject(new Error('failed')))).rejects.toThrow('failed');

    expect(bulkhead.isSaturated).toBe(false);
    expect(bulkhead.getStats()).toMatchObject({
      activeCount: 0,
      completedCount: 1,
      failedCount: 1,
      rejectedCount: 0,
      averageExecutionMs: 0,
    });
  });

  it('bases the retry hint only on executions that resolved', async () => {
    vi.useFakeTimers();
    try {
      const bulkhead = new Bulkhead({ name: 'test', maxConcurrent: 1, defaultRetryAfterMs: 60_000 });
      const slow = deferred<void>();
      const first = bulkhead.execute(() => slow.promise);
      vi.advanceTimersByTime(4_000);
      slow.resolve();
      await first;

      for (let i = 0; i < 3; i++) {
        await expect(bulkhead.execute(() => Promise.reject(new Error('invalid')))).rejects.toThrow('invalid');
      }

      const hold = deferred<void>();
      const inFlight = bulkhead.execute(() => hold.promise);
      await expect(bulkhead.execute(() => Promise.resolve())).rejects.toMatchObject({ retryAfterMs: 4_000 });
      expect(bulkhead.getStats()).toMatchObject({ completedCount: 4, failedCount: 3, averageExecutionMs: 4_000 });

      hold.resolve();
      await inFlight;
    } finally {
      vi.useRealTimers();
    }
  });

  it('tracks stats', async () => {
    const bulkhead = new Bulkhead({ name: 'stats', maxConcurrent: 2, defaultRetryAfterMs: 1_000 });
    const a = deferred<void>();
    const b = deferred<void>();

    const first = bulkhead.execute(() => a.promise);
    const second = bulkhead.execute(() => b.promise);
    await expect(bulkhead.execute(() => Promise.resolve())).rejects.toBeInstanceOf(BulkheadRejectionError);

    const during = bulkhead.getStats();
    expect(during).toMatchObject({ name: 'stats', activeCount: 2, maxConcurrent: 2, rejectedCount: 1 });
    expect(during.oldestActiveStartedAt).not.toBeNull();

    a.resolve();
    b.resolve();
    await Promise.all([first, second]);

    expect(bulkhead.getStats()).toMatchObject({ activeCount: 0, completedCount: 2, oldestActiveStartedAt: null });
  });

  it('requires at least one slot', () => {
    expect(() => new Bulkhead({ name: 'none', maxConcurrent: 0, defaultRetryAfterMs: 1 })).toThrow(
      "Bulkhead 'none' needs maxConcurrent >= 1"
    );
  });
});
