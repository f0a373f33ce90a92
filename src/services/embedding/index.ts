export {
  OllamaEmbeddingClient,
  EmbeddingError,
  type EmbeddingErrorCode,
} from './ollama-embedder.js';
