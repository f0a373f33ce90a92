/**
 * Unit tests for the circuit breaker and the rate limiter
 *
 * @module tests/unit/llm/circuit-breaker
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CircuitBreaker, CircuitBreakerOpenError, isServerError } from '../../../src/services/llm/circuit-breaker.js';
import { estimateTokens, LLMRateLimiter } from '../../../src/services/llm/rate-limiter.js';

const serverFailure = (): Promise<never> => Promise.reject(new Error('Ollama API error 503: Service Unavailable.'));
const clientFailure = (): Promise<never> => Promise.reject(new Error('invalid prompt'));
const ok = (): Promise<string> => Promise.resolve('ok');

describe('isServerError', () => {
  it('should recognise status codes, network and overload messages', () => {
    expect(isServerError(new Error('Ollama API error 502: Bad Gateway.'))).toBe(true);
    expect(isServerError(new Error('connect ECONNREFUSED 127.0.0.1:11434'))).toBe(true);
    expect(isServerError(new Error('llm request timed out after 10ms'))).toBe(true);
    expect(isServerError(new Error('server overloaded'))).toBe(true);
  });

  it('should read the cause', () => {
    const cause = Object.assign(new Error('socket closed'), { code: 'ECONNRESET' });
    expect(isServerError(new Error('request failed', { cause }))).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isServerError(new Error('Ollama API error 400: Bad Request.'))).toBe(false);
    expect(isServerError('503')).toBe(false);
  });
});

describe('CircuitBreaker', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T00:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function breaker(): CircuitBreaker {
    return new CircuitBreaker({ failureThreshold: 2, recoveryTimeMs: 1000, halfOpenSuccessThreshold: 2, name: 'Test' });
  }

  it('should open after consecutive server failures', async () => {
    const cb = breaker();
    await expect(cb.execute(serverFailure)).rejects.toThrow('503');
    expect(cb.getState()).toBe('CLOSED');
    await expect(cb.execute(serverFailure)).rejects.toThrow('503');
    expect(cb.getState()).toBe('OPEN');

    const fn = vi.fn(ok);
    await expect(cb.execute(fn)).rejects.toThrow(CircuitBreakerOpenError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('should ignore client-side failures', async () => {
    const cb = breaker();
    await expect(cb.execute(clientFailure)).rejects.toThrow('invalid prompt');
    await expect(cb.execute(clientFailure)).rejects.toThrow('invalid prompt');
    expect(cb.getStatus()).toMatchObject({ state: 'CLOSED', failureCount: 0 });
  });

  it('should reset the failure count on success', async () => {
    const cb = breaker();
    await expect(cb.execute(serverFailure)).rejects.toThrow();
    await cb.execute(ok);
    await expect(cb.execute(serverFailure)).rejects.toThrow();
    expect(cb.getState()).toBe('CLOSED');
  });

  it('should report time to recovery while open', async () => {
    const cb = breaker();
    await expect(cb.execute(serverFailure)).rejects.toThrow();
    await expect(cb.execute(serverFailure)).rejects.toThrow();
    vi.advanceTimersByTime(400);

    expect(cb.getStatus()).toMatchObject({ state: 'OPEN', consecutiveTrips: 1, timeToRecovery: 600 });
    await expect(cb.execute(ok)).rejects.toThrow('Test circuit breaker is OPEN. Try again in 1s');
  });

  it('should close after enough half-open successes', async () => {
    const cb = breaker();
    await expect(cb.execute(serverFailure)).rejects.toThrow();
    await expect(cb.execute(serverFailure)).rejects.toThrow();
    vi.advanceTimersByTime(1000);

    expect(cb.getState()).toBe('HALF_OPEN');
    await cb.execute(ok);
    expect(cb.getState()).toBe('HALF_OPEN');
    await cb.execute(ok);
    expect(cb.getStatus()).toMatchObject({ state: 'CLOSED', consecutiveTrips: 0 });
  });

  it('should reopen on a half-open failure with a doubled recovery window', async () => {
    const cb = breaker();
    await expect(cb.execute(serverFailure)).rejects.toThrow();
    await expect(cb.execute(serverFailure)).rejects.toThrow();
    vi.advanceTimersByTime(1000);

    await expect(cb.execute(serverFailure)).rejects.toThrow();
    expect(cb.getState()).toBe('OPEN');
    expect(cb.getRecoveryTimeMs()).toBe(2000);
    vi.advanceTimersByTime(1999);
    expect(cb.isOpen()).toBe(true);
    vi.advanceTimersByTime(1);
    expect(cb.getState()).toBe('HALF_OPEN');
  });

  it('should return to CLOSED on reset', async () => {
    const cb = breaker();
    await expect(cb.execute(serverFailure)).rejects.toThrow();
    await expect(cb.execute(serverFailure)).rejects.toThrow();
    cb.reset();
    expect(cb.getStatus()).toEqual({
      state: 'CLOSED',
      failureCount: 0,
      consecutiveTrips: 0,
      lastFailureTime: null,
      timeToRecovery: null,
    });
  });
});

describe('LLMRateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T00:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should estimate four characters per token', () => {
    expect(estimateTokens(10)).toBe(3);
    expect(estimateTokens(0)).toBe(0);
  });

  it('should hold a request until the window rolls over', async () => {
    const limiter = new LLMRateLimiter({ requestsPerMinute: 2, tokensPerMinute: 1_000_000 });
    await limiter.acquire(10);
    await limiter.acquire(10);
    expect(limiter.isLimited()).toBe(true);

    let acquired = false;
    const third = limiter.acquire(10).then(() => {
      acquired = true;
    });
    await vi.advanceTimersByTimeAsync(59_999);
    expect(acquired).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await third;

    expect(acquired).toBe(true);
    expect(limiter.getStatus()).toMatchObject({ requestsRemaining: 1, tokensRemaining: 999_990 });
  });

  it('should stop waiting for the window when the caller aborts', async () => {
    const limiter = new LLMRateLimiter({ requestsPerMinute: 1, tokensPerMinute: 1000 });
    await limiter.acquire(10);

    const controller = new AbortController();
    const waiting = limiter.acquire(10, controller.signal);
    const rejection = expect(waiting).rejects.toMatchObject({ name: 'ServiceRequestError', code: 'CANCELLED' });
    await vi.advanceTimersByTimeAsync(1_000);
    controller.abort();
    await rejection;

    expect(limiter.getStatus()).toMatchObject({ requestsRemaining: 0, tokensRemaining: 990, resetInMs: 59_000 });
  });

  it('should drop an aborted caller queued behind another waiter', async () => {
    const limiter = new LLMRateLimiter({ requestsPerMinute: 1, tokensPerMinute: 1000 });
    await limiter.acquire(10);

    const first = limiter.acquire(10);
    const controller = new AbortController();
    const second = limiter.acquire(20, controller.signal);
    const rejection = expect(second).rejects.toMatchObject({ code: 'CANCELLED' });
    controller.abort();
    await rejection;

    await vi.advanceTimersByTimeAsync(60_000);
    await first;
    expect(limiter.getStatus()).toMatchObject({ requestsRemaining: 0, tokensRemaining: 990 });
  });

  it('should reject at once when the signal is already aborted', async () => {
    const limiter = new LLMRateLimiter({ requestsPerMinute: 10, tokensPerMinute: 1000 });
    await expect(limiter.acquire(10, AbortSignal.abort())).rejects.toMatchObject({ code: 'CANCELLED' });
    expect(limiter.getStatus().requestsRemaining).toBe(10);
  });

  it('should hold a request that would exceed the token budget', async () => {
    const limiter = new LLMRateLimiter({ requestsPerMinute: 100, tokensPerMinute: 100 });
    await limiter.acquire(80);

    let acquired = false;
    const second = limiter.acquire(30).then(() => {
      acquired = true;
    });
    await vi.advanceTimersByTimeAsync(30_000);
    expect(acquired).toBe(false);
    await vi.advanceTimersByTimeAsync(30_000);
    await second;
    expect(limiter.getStatus().tokensRemaining).toBe(70);
  });

  it('should let a single oversized request through an empty window', async () => {
    const limiter = new LLMRateLimiter({ requestsPerMinute: 10, tokensPerMinute: 100 });
    await limiter.acquire(500);
    expect(limiter.getStatus().tokensRemaining).toBe(0);
  });

  it('should correct the reservation with actual usage', async () => {
    const limiter = new LLMRateLimiter({ requestsPerMinute: 10, tokensPerMinute: 1000 });
    await limiter.acquire(400);
    limiter.recordUsage(400, 150);
    expect(limiter.getStatus()).toMatchObject({ requestsRemaining: 9, tokensRemaining: 850 });
  });

  it('should roll the window after a minute', async () => {
    const limiter = new LLMRateLimiter({ requestsPerMinute: 1, tokensPerMinute: 1000 });
    await limiter.acquire(10);
    vi.advanceTimersByTime(60_000);
    expect(limiter.isLimited()).toBe(false);
    expect(limiter.getStatus().requestsRemaining).toBe(1);
  });
});
