/**
 * Unit tests for exponential backoff and retry
 *
 * @module tests/unit/utils/backoff
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { backoffSleep, calculateBackoffDelay, withRetry } from '../../../src/utils/backoff.js';

describe('calculateBackoffDelay', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should double per attempt without jitter', () => {
    const cfg = { baseDelayMs: 100, maxDelayMs: 10_000, jitterFraction: 0 };
    expect(calculateBackoffDelay(0, cfg)).toBe(100);
    expect(calculateBackoffDelay(1, cfg)).toBe(200);
    expect(calculateBackoffDelay(3, cfg)).toBe(800);
  });

  it('should cap at maxDelayMs', () => {
    expect(calculateBackoffDelay(10, { baseDelayMs: 100, maxDelayMs: 500, jitterFraction: 0 })).toBe(500);
  });

  it('should apply jitter within the configured fraction', () => {
    vi.spyOn(Math, 'random').mockReturnValue(1);
    expect(calculateBackoffDelay(0, { baseDelayMs: 100, jitterFraction: 0.25 })).toBe(125);
    vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(calculateBackoffDelay(0, { baseDelayMs: 100, jitterFraction: 0.25 })).toBe(75);
  });
});

describe('backoffSleep', () => {
  it('should resolve immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const started = Date.now();
    await backoffSleep(0, { baseDelayMs: 60_000, maxDelayMs: 60_000, signal: controller.signal });
    expect(Date.now() - started).toBeLessThan(1000);
  });
});

describe('withRetry', () => {
  const fast = { baseDelayMs: 0, maxDelayMs: 0, maxAttempts: 3 };

  it('should return the first successful result', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce('ok');
    await expect(withRetry(fn, () => true, fast)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should rethrow non-retryable errors at once', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('fatal'));
    await expect(withRetry(fn, () => false, fast)).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should throw the last error after exhausting attempts', async () => {
    let calls = 0;
    const fn = async (): Promise<string> => {
      calls++;
      throw new Error(`failure ${calls}`);
    };
    await expect(withRetry(fn, () => true, fast)).rejects.toThrow('failure 3');
    expect(calls).toBe(3);
  });
});
