/**
 * Server context
 *
 * Builds the object graph behind the MCP tools: database, example store,
 * retriever, extraction engine, feedback recorder and curator. Everything is
 * constructed explicitly and passed down; there are no module-level
 * singletons, so tests can build a context over fakes and `:memory:`.
 *
 * @module server/context
 */

import type { EmbeddingProvider, LLMProvider } from '../models/index.js';
import { OllamaEmbeddingClient } from '../services/embedding/index.js';
import { ExampleStore } from '../services/examples/example-store.js';
import {
  ExtractionClient,
  ExtractionEngine,
  type ExtractorConfig,
  type ExtractorConfigInput,
  loadExtractorConfig,
} from '../services/extraction/index.js';
import { FeedbackRecorder, QualityCurator } from '../services/feedback/index.js';
import { type LLMConfigInput, loadLLMConfig, OllamaLLMClient } from '../services/llm/index.js';
import { FileSourceTextProvider, JsonTemplateSchemaProvider } from '../services/providers/index.js';
import { SimilarityRetriever } from '../services/retrieval/similarity-retriever.js';
import { ExampleDatabase } from '../services/storage/index.js';

export interface ServerContext {
  config: ExtractorConfig;
  database: ExampleDatabase;
  store: ExampleStore;
  llm: LLMProvider;
  embedder: EmbeddingProvider | null;
  retriever: SimilarityRetriever;
  engine: ExtractionEngine;
  feedback: FeedbackRecorder;
  curator: QualityCurator;
  templates: JsonTemplateSchemaProvider;
  startedAt: string;
}

export interface ServerContextOptions {
  config?: ExtractorConfigInput;
  llmConfig?: LLMConfigInput;
  /** Defaults to an Ollama client built from llmConfig */
  llm?: LLMProvider;
  /** Defaults to an Ollama embedding client; null disables retrieval embeddings */
  embedder?: EmbeddingProvider | null;
  /** Defaults to a database opened at config.databasePath */
  database?: ExampleDatabase;
}

/**
 * @throws ZodError for invalid configuration
 * @throws DatabaseError / MigrationError when the database cannot be opened
 */
export function createServerContext(options: ServerContextOptions = {}): ServerContext {
  const config = loadExtractorConfig(options.config);
  const llmConfig = loadLLMConfig(options.llmConfig);

  const database = options.database ?? ExampleDatabase.open(config.databasePath);
  const store = new ExampleStore(database);
  const llm = options.llm ?? new OllamaLLMClient(llmConfig);
  const embedder = options.embedder === undefined ? new OllamaEmbeddingClient(llmConfig) : options.embedder;

  const retriever = new SimilarityRetriever(store, embedder, config.retrieval);
  const templates = new JsonTemplateSchemaProvider(config.templatesDir);

  const engine = new ExtractionEngine({
    config,
    extractionClient: new ExtractionClient(llm, config.extraction),
    store,
    retriever,
    embedder,
    sourceTextProvider: new FileSourceTextProvider(),
    templateSchemaProvider: templates,
  });

  return {
    config,
    database,
    store,
    llm,
    embedder,
    retriever,
    engine,
    feedback: new FeedbackRecorder(database, store, embedder, config.learning),
    curator: new QualityCurator(store, embedder, config.curation),
    templates,
    startedAt: new Date().toISOString(),
  };
}
