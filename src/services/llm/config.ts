/**
 * Ollama LLM + embedding configuration
 *
 * Environment variables:
 *   OLLAMA_BASE_URL          — Ollama server URL (default: http://localhost:11434)
 *   OLLAMA_MODEL             — Text model used for extraction (default: llama3.1)
 *   OLLAMA_EMBED_MODEL       — Embedding model (default: nomic-embed-text)
 *   OLLAMA_TEMPERATURE       — Generation temperature (default: 0.1)
 *   OLLAMA_MAX_OUTPUT_TOKENS — num_predict per request (default: 4096)
 *   OLLAMA_TIMEOUT_MS        — Per-request timeout for generation (default: 60000)
 *   OLLAMA_EMBED_TIMEOUT_MS  — Per-request timeout for embeddings (default: 15000)
 *   OLLAMA_RPM               — Requests per minute ceiling (default: 120)
 */

import { z } from 'zod';
import { parseFloatEnv, parseIntEnv, stringEnv } from '../../utils/env.js';

export const OLLAMA_MODELS = {
  LLAMA3_1: 'llama3.1',
  QWEN2_5: 'qwen2.5',
  NOMIC_EMBED: 'nomic-embed-text',
} as const;

export const LLMConfigSchema = z.object({
  baseUrl: z.string().url().default('http://localhost:11434'),
  model: z.string().min(1).default(OLLAMA_MODELS.LLAMA3_1),
  embeddingModel: z.string().min(1).default(OLLAMA_MODELS.NOMIC_EMBED),

  // Low temperature keeps extraction deterministic
  temperature: z.number().min(0).max(2).default(0.1),
  maxOutputTokens: z.number().int().min(1).default(4096),

  requestTimeoutMs: z.number().int().min(1).default(60_000),
  embedTimeoutMs: z.number().int().min(1).default(15_000),

  rateLimit: z
    .object({
      requestsPerMinute: z.number().int().min(1).default(120),
      tokensPerMinute: z.number().int().min(1).default(1_000_000),
    })
    .default({}),

  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().min(1).default(5),
      recoveryTimeMs: z.number().int().min(0).default(60_000),
      halfOpenSuccessThreshold: z.number().int().min(1).default(2),
    })
    .default({}),
});

export type LLMConfig = z.infer<typeof LLMConfigSchema>;

export type LLMConfigInput = z.input<typeof LLMConfigSchema>;

/**
 * Load LLM configuration from environment variables, with explicit
 * overrides taking precedence.
 */
export function loadLLMConfig(overrides?: LLMConfigInput): LLMConfig {
  const envConfig: LLMConfigInput = {
    baseUrl: stringEnv('OLLAMA_BASE_URL'),
    model: stringEnv('OLLAMA_MODEL'),
    embeddingModel: stringEnv('OLLAMA_EMBED_MODEL'),
    temperature: parseFloatEnv('OLLAMA_TEMPERATURE'),
    maxOutputTokens: parseIntEnv('OLLAMA_MAX_OUTPUT_TOKENS'),
    requestTimeoutMs: parseIntEnv('OLLAMA_TIMEOUT_MS'),
    embedTimeoutMs: parseIntEnv('OLLAMA_EMBED_TIMEOUT_MS'),
    rateLimit: { requestsPerMinute: parseIntEnv('OLLAMA_RPM') },
  };

  return LLMConfigSchema.parse({
    ...envConfig,
    ...overrides,
    rateLimit: { ...envConfig.rateLimit, ...overrides?.rateLimit },
    circuitBreaker: { ...overrides?.circuitBreaker },
  });
}
