/**
 * JSON-over-HTTP helper for the Ollama endpoints
 *
 * Each call carries its own timeout via AbortController and is also
 * aborted when the caller's job signal fires.
 */

import { CircuitBreakerOpenError, isServerError } from './circuit-breaker.js';

export type ServiceRequestErrorCode =
  | 'HTTP_ERROR'
  | 'NETWORK_ERROR'
  | 'TIMEOUT'
  | 'INVALID_RESPONSE'
  | 'CANCELLED';

/**
 * Failure talking to an external model service
 */
export class ServiceRequestError extends Error {
  public readonly code: ServiceRequestErrorCode;
  public readonly retryable: boolean;
  public readonly status?: number;
  public readonly service: string;

  constructor(
    message: string,
    options: {
      code: ServiceRequestErrorCode;
      retryable: boolean;
      service: string;
      status?: number;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options.cause });
    this.name = 'ServiceRequestError';
    this.code = options.code;
    this.retryable = options.retryable;
    this.status = options.status;
    this.service = options.service;
  }
}

/**
 * Whether a failed call is worth retrying: timeouts, network errors,
 * HTTP 429 and 5xx. An open circuit is not retried.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof ServiceRequestError) return error.retryable;
  if (error instanceof CircuitBreakerOpenError) return false;
  return isServerError(error);
}

export interface PostJsonOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  /** Service name used in messages, e.g. "llm" */
  service: string;
}

/**
 * POST `body` as JSON and return the parsed response body.
 *
 * @throws ServiceRequestError on timeout, cancellation, network failure,
 * non-2xx status or a body that is not JSON
 */
export async function postJson(url: string, body: unknown, options: PostJsonOptions): Promise<unknown> {
  const { service, timeoutMs, signal } = options;
  if (signal?.aborted) {
    throw new ServiceRequestError(`${service} request cancelled`, {
      code: 'CANCELLED',
      retryable: false,
      service,
    });
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = (): void => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  let status = 0;
  let text: string;
  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: controller.signal,
    });
    status = response.status;
    text = await response.text();
    if (!response.ok) {
      throw new ServiceRequestError(
        `Ollama API error ${response.status}: ${response.statusText}. ${text.slice(0, 200)}`,
        {
          code: 'HTTP_ERROR',
          retryable: response.status === 429 || response.status >= 500,
          service,
          status: response.status,
        }
      );
    }
  } catch (error) {
    if (error instanceof ServiceRequestError) throw error;
    if (timedOut) {
      throw new ServiceRequestError(`${service} request timed out after ${timeoutMs}ms`, {
        code: 'TIMEOUT',
        retryable: true,
        service,
        cause: error,
      });
    }
    if (signal?.aborted) {
      throw new ServiceRequestError(`${service} request cancelled`, {
        code: 'CANCELLED',
        retryable: false,
        service,
        cause: error,
      });
    }
    throw new ServiceRequestError(
      `${service} request failed: ${error instanceof Error ? error.message : String(error)}`,
      { code: 'NETWORK_ERROR', retryable: true, service, cause: error }
    );
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onAbort);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ServiceRequestError(`${service} returned a non-JSON body (HTTP ${status})`, {
      code: 'INVALID_RESPONSE',
      retryable: false,
      service,
      status,
      cause: error,
    });
  }
}
