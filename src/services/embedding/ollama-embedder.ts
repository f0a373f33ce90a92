/**
 * OllamaEmbeddingClient - EmbeddingProvider backed by Ollama /api/embed
 *
 * Any failure surfaces as EmbeddingError; callers in the retrieval path
 * treat it as "service unavailable" and continue without examples.
 *
 * @module services/embedding/ollama-embedder
 */

import { z } from 'zod';
import type { EmbeddingProvider } from '../../models/ports.js';
import { CircuitBreaker, type CircuitBreakerStatus } from '../llm/circuit-breaker.js';
import { type LLMConfig, type LLMConfigInput, loadLLMConfig } from '../llm/config.js';
import { postJson } from '../llm/http.js';

export type EmbeddingErrorCode = 'SERVICE_UNAVAILABLE' | 'EMPTY_INPUT' | 'INVALID_RESPONSE';

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EmbeddingError';
    Error.captureStackTrace?.(this, EmbeddingError);
  }
}

const OllamaEmbedResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number())).min(1),
});

/** nomic-embed-text context window is 8192 tokens; stay well inside it */
const MAX_EMBED_CHARS = 8000;

export class OllamaEmbeddingClient implements EmbeddingProvider {
  readonly model: string;
  private readonly config: LLMConfig;
  private readonly circuitBreaker: CircuitBreaker;

  constructor(config?: LLMConfig | LLMConfigInput) {
    this.config = loadLLMConfig(config);
    this.model = this.config.embeddingModel;
    this.circuitBreaker = new CircuitBreaker({ ...this.config.circuitBreaker, name: 'Embedding' });
  }

  /**
   * @throws EmbeddingError
   */
  async embed(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const input = text.trim().slice(0, MAX_EMBED_CHARS);
    if (input.length === 0) {
      throw new EmbeddingError('Cannot embed empty text', 'EMPTY_INPUT');
    }

    let data: unknown;
    try {
      data = await this.circuitBreaker.execute(() =>
        postJson(
          `${this.config.baseUrl}/api/embed`,
          { model: this.model, input },
          { timeoutMs: this.config.embedTimeoutMs, signal, service: 'embedding' }
        )
      );
    } catch (error) {
      throw new EmbeddingError(
        `Embedding service unavailable: ${error instanceof Error ? error.message : String(error)}`,
        'SERVICE_UNAVAILABLE',
        { model: this.model, baseUrl: this.config.baseUrl }
      );
    }

    const parsed = OllamaEmbedResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new EmbeddingError('Embedding response has no embeddings', 'INVALID_RESPONSE', {
        model: this.model,
      });
    }

    return Float32Array.from(parsed.data.embeddings[0]);
  }

  getStatus(): { model: string; baseUrl: string; circuitBreaker: CircuitBreakerStatus } {
    return {
      model: this.model,
      baseUrl: this.config.baseUrl,
      circuitBreaker: this.circuitBreaker.getStatus(),
    };
  }
}
