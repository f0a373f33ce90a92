/**
 * Ollama LLM client exports
 */

export { OllamaLLMClient, type LLMClientStatus } from './client.js';
export { loadLLMConfig, LLMConfigSchema, OLLAMA_MODELS, type LLMConfig, type LLMConfigInput } from './config.js';
export {
  CircuitBreaker,
  CircuitBreakerOpenError,
  isServerError,
  type CircuitState,
  type CircuitBreakerStatus,
} from './circuit-breaker.js';
export { LLMRateLimiter, estimateTokens, type RateLimiterStatus } from './rate-limiter.js';
export { postJson, ServiceRequestError, isTransientError } from './http.js';
