/**
 * Request and token rate limiter for the LLM endpoint
 *
 * Fixed one-minute window. acquire() calls are chained on a promise queue
 * so concurrent batch workers cannot all pass the check before any of
 * them increments the counters. A caller's signal ends its wait with a
 * CANCELLED ServiceRequestError and reserves nothing.
 */

import { ServiceRequestError } from './http.js';

export interface RateLimits {
  requestsPerMinute: number;
  tokensPerMinute: number;
}

export interface RateLimiterStatus {
  requestsRemaining: number;
  tokensRemaining: number;
  resetInMs: number;
}

const WINDOW_MS = 60_000;

export class LLMRateLimiter {
  private requestCount = 0;
  private tokenCount = 0;
  private windowStart = Date.now();
  private acquireQueue: Promise<void> = Promise.resolve();

  constructor(private readonly limits: RateLimits) {}

  /**
   * Wait until a request of `estimatedTokens` fits in the current window,
   * then reserve it.
   */
  async acquire(estimatedTokens: number, signal?: AbortSignal): Promise<void> {
    const previous = this.acquireQueue;
    let release: () => void = () => undefined;
    this.acquireQueue = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await untilAborted(previous, signal);
      await this.reserve(estimatedTokens, signal);
    } finally {
      // A caller that gave up early still hands over only after the one ahead of it
      void previous.then(release);
    }
  }

  /**
   * Correct the reservation once the real token usage is known
   */
  recordUsage(estimatedTokens: number, actualTokens: number): void {
    this.tokenCount = Math.max(0, this.tokenCount + actualTokens - estimatedTokens);
  }

  getStatus(): RateLimiterStatus {
    this.rollWindow();
    return {
      requestsRemaining: Math.max(0, this.limits.requestsPerMinute - this.requestCount),
      tokensRemaining: Math.max(0, this.limits.tokensPerMinute - this.tokenCount),
      resetInMs: Math.max(0, WINDOW_MS - (Date.now() - this.windowStart)),
    };
  }

  isLimited(): boolean {
    this.rollWindow();
    return this.requestCount >= this.limits.requestsPerMinute;
  }

  reset(): void {
    this.requestCount = 0;
    this.tokenCount = 0;
    this.windowStart = Date.now();
  }

  private rollWindow(): void {
    if (Date.now() - this.windowStart >= WINDOW_MS) {
      this.reset();
    }
  }

  private async reserve(estimatedTokens: number, signal?: AbortSignal): Promise<void> {
    this.rollWindow();

    const overRequests = this.requestCount >= this.limits.requestsPerMinute;
    const overTokens =
      this.requestCount > 0 && this.tokenCount + estimatedTokens > this.limits.tokensPerMinute;

    if (overRequests || overTokens) {
      const waitTime = WINDOW_MS - (Date.now() - this.windowStart);
      if (waitTime > 0) {
        console.error(`[RateLimiter] Limit reached, waiting ${waitTime}ms`);
        await sleep(waitTime, signal);
      }
      this.reset();
    }

    this.requestCount++;
    this.tokenCount += estimatedTokens;
  }
}

function cancelled(): ServiceRequestError {
  return new ServiceRequestError('llm request cancelled', { code: 'CANCELLED', retryable: false, service: 'llm' });
}

function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(cancelled());
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(cancelled());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelled());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(cancelled());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Rough token estimate: ~4 characters per token
 */
export function estimateTokens(textLength: number): number {
  return Math.ceil(textLength / 4);
}
