/**
 * Ollama LLM Client
 *
 * Implements LLMProvider against a locally running Ollama instance using
 * /api/generate in JSON mode. Requests pass the rate limiter and the
 * circuit breaker; retries are left to the caller so that the retry policy
 * lives in one place (the extraction client).
 *
 * Start Ollama and pull a text model before use:
 *   ollama serve
 *   ollama pull llama3.1
 */

import { z } from 'zod';
import type { LLMProvider, LLMRequest, LLMResponse } from '../../models/ports.js';
import { CircuitBreaker, type CircuitBreakerStatus } from './circuit-breaker.js';
import { type LLMConfig, type LLMConfigInput, loadLLMConfig } from './config.js';
import { postJson, ServiceRequestError } from './http.js';
import { estimateTokens, LLMRateLimiter, type RateLimiterStatus } from './rate-limiter.js';

const OllamaGenerateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
  done: z.boolean().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export interface LLMClientStatus {
  model: string;
  baseUrl: string;
  circuitBreaker: CircuitBreakerStatus;
  rateLimiter: RateLimiterStatus;
}

export class OllamaLLMClient implements LLMProvider {
  readonly config: LLMConfig;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly rateLimiter: LLMRateLimiter;

  constructor(config?: LLMConfig | LLMConfigInput) {
    this.config = loadLLMConfig(config);
    this.circuitBreaker = new CircuitBreaker({ ...this.config.circuitBreaker, name: 'LLM' });
    this.rateLimiter = new LLMRateLimiter(this.config.rateLimit);
  }

  async generate(request: LLMRequest): Promise<LLMResponse> {
    const startTime = Date.now();
    const estimated = estimateTokens(request.prompt.length) + this.config.maxOutputTokens;
    await this.rateLimiter.acquire(estimated, request.signal);

    const data = await this.circuitBreaker.execute(() =>
      postJson(
        `${this.config.baseUrl}/api/generate`,
        {
          model: this.config.model,
          prompt: request.prompt,
          stream: false,
          format: 'json',
          options: {
            temperature: this.config.temperature,
            num_predict: this.config.maxOutputTokens,
          },
        },
        { timeoutMs: this.config.requestTimeoutMs, signal: request.signal, service: 'llm' }
      )
    );

    const parsed = OllamaGenerateResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ServiceRequestError('llm response is missing the "response" field', {
        code: 'INVALID_RESPONSE',
        retryable: false,
        service: 'llm',
      });
    }

    const inputTokens = parsed.data.prompt_eval_count ?? 0;
    const outputTokens = parsed.data.eval_count ?? 0;
    this.rateLimiter.recordUsage(estimated, inputTokens + outputTokens);

    return {
      text: parsed.data.response,
      model: parsed.data.model ?? this.config.model,
      inputTokens,
      outputTokens,
      processingTimeMs: Date.now() - startTime,
    };
  }

  getStatus(): LLMClientStatus {
    return {
      model: this.config.model,
      baseUrl: this.config.baseUrl,
      circuitBreaker: this.circuitBreaker.getStatus(),
      rateLimiter: this.rateLimiter.getStatus(),
    };
  }

  reset(): void {
    this.circuitBreaker.reset();
    this.rateLimiter.reset();
  }
}
