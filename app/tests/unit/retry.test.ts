import { describe, it, expect, vi } from 'vitest';
import { computeBackoffDelay, withRetry, withTimeout } from '../../src/services/retry.js';
import {
  AdapterTimeoutError,
  TransientInfraError,
  ValidationError,
  VersionConflictError,
} from '../../src/services/governance-errors.js';

describe('computeBackoffDelay', () => {
  it('doubles per attempt and adds jitter', () => {
    expect(computeBackoffDelay(200, 0, () => 0)).toBe(200);
    expect(computeBackoffDelay(200, 2, () => 0)).toBe(800);
    expect(computeBackoffDelay(200, 1, () => 0.5)).toBe(450);
  });

  it('caps the delay at 30 seconds', () => {
    expect(computeBackoffDelay(1_000, 10, () => 0.99)).toBe(30_000);
  });
});

describe('withRetry', () => {
  const opts = { attempts: 3, baseDelayMs: 100, random: () => 0 };

  it('retries transient failures until success', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const onRetry = vi.fn();
    let calls = 0;

    const result = await withRetry(async (attempt) => {
      calls++;
      if (attempt < 2) throw new VersionConflictError('a/db', 1, 2);
      return 'done';
    }, { ...opts, sleep, onRetry });

    expect(result).toBe('done');
    expect(calls).toBe(3);
    expect(sleep.mock.calls.map((c) => c[0])).toEqual([100, 200]);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('rethrows the last error once attempts are exhausted', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi.fn(async () => {
      throw new TransientInfraError('still down');
    });

    await expect(withRetry(fn, { ...opts, sleep })).rejects.toThrow('still down');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('does not retry non-transient errors', async () => {
    const fn = vi.fn(async () => {
      throw new ValidationError('bad input');
    });

    await expect(withRetry(fn, { ...opts, sleep: async () => {} })).rejects.toBeInstanceOf(ValidationError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('stops retrying once the signal aborts', async () => {
    const controller = new AbortController();
    const fn = vi.fn(async () => {
      controller.abort();
      throw new TransientInfraError('flaky');
    });

    await expect(withRetry(fn, { ...opts, sleep: async () => {}, signal: controller.signal })).rejects.toThrow('flaky');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  it('resolves when the promise settles first', async () => {
    await expect(withTimeout(Promise.resolve(42), 1_000, 'list claims')).resolves.toBe(42);
  });

  it('rejects with AdapterTimeoutError past the deadline', async () => {
    vi.useFakeTimers();
    try {
      const pending = withTimeout(new Promise<never>(() => {}), 50, 'list claims');
      const assertion = expect(pending).rejects.toThrow(new AdapterTimeoutError('list claims', 50));
      await vi.advanceTimersByTimeAsync(50);
      await assertion;
    } finally {
      vi.useRealTimers();
    }
  });
});
