/**
 * Exponential Backoff with Jitter
 *
 * Delay doubles each attempt from baseDelayMs up to maxDelayMs, with
 * +/- jitterFraction randomness. Used by the extraction client for
 * transient LLM failures.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Total attempts including the first call (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25) */
  jitterFraction: number;
  /** Aborts pending sleeps and stops further attempts */
  signal?: AbortSignal;
  /** Log tag used for retry messages */
  label?: string;
}

const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  maxAttempts: 3,
  jitterFraction: 0.25,
};

/**
 * Delay for a zero-indexed attempt: min(base * 2^attempt, max) +/- jitter.
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const cappedDelay = Math.min(cfg.baseDelayMs * Math.pow(2, attempt), cfg.maxDelayMs);
  const jitter = (Math.random() * 2 - 1) * cappedDelay * cfg.jitterFraction;
  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Sleep for the backoff duration of `attempt`. Resolves early when the
 * signal aborts; the caller checks the signal afterwards.
 */
export function backoffSleep(attempt: number, config?: Partial<BackoffConfig>): Promise<void> {
  const delay = calculateBackoffDelay(attempt, config);
  const signal = config?.signal;
  console.error(`[Backoff] ${config?.label ?? 'retry'} attempt ${attempt + 1}: waiting ${delay}ms`);

  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, delay);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `fn` with retries. Errors rejected by `shouldRetry` are re-thrown
 * immediately; the last error is thrown once attempts are exhausted.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  config?: Partial<BackoffConfig>
): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error) || cfg.signal?.aborted) throw error;
      if (attempt < cfg.maxAttempts - 1) {
        await backoffSleep(attempt, cfg);
        if (cfg.signal?.aborted) throw error;
      }
    }
  }

  throw lastError;
}
