/**
 * Shared test fixtures
 *
 * In-memory example stores, schema entry builders and in-process stand-ins
 * for the LLM and embedding services. No network, no server.
 *
 * @module tests/unit/helpers
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { z } from 'zod';
import type { Example, NewExample } from '../../src/models/example.js';
import { type FieldSchemaEntry, FieldSchemaEntrySchema } from '../../src/models/field-schema.js';
import type { EmbeddingProvider, LLMProvider, LLMRequest, LLMResponse } from '../../src/models/ports.js';
import { createServerContext, type ServerContext } from '../../src/server/context.js';
import { ExampleStore } from '../../src/services/examples/example-store.js';
import { loadExtractorConfig, type ExtractorConfig, type ExtractorConfigInput } from '../../src/services/extraction/config.js';
import { ExampleDatabase } from '../../src/services/storage/database/service.js';
import { hashContext } from '../../src/utils/hash.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEMP DIRECTORIES
// ═══════════════════════════════════════════════════════════════════════════════

/** Matched by tests/global-teardown.ts */
export const TEMP_DIR_PREFIX = 'rfx-test-';

export function createTempDir(label: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${TEMP_DIR_PREFIX}${label}-`));
}

export function cleanupTempDir(dir: string | undefined): void {
  if (dir && fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE
// ═══════════════════════════════════════════════════════════════════════════════

export interface TestStore {
  database: ExampleDatabase;
  store: ExampleStore;
}

export function createMemoryStore(): TestStore {
  const database = ExampleDatabase.open(':memory:');
  return { database, store: new ExampleStore(database) };
}

export function safeClose(database: ExampleDatabase | undefined): void {
  if (database?.isOpen()) database.close();
}

export function newExample(overrides: Partial<NewExample> = {}): NewExample {
  return {
    domain_category: 'filling',
    variant: 'standard',
    field_name: 'psi',
    input_context: 'Compressed air supply 80 PSI',
    expected_output: '80 PSI',
    confidence_score: 0.8,
    source: 'seed',
    ...overrides,
  };
}

/**
 * Fully populated Example for code that never touches the database
 */
export function makeExample(overrides: Partial<Example> = {}): Example {
  const inputContext = overrides.input_context ?? 'Compressed air supply 80 PSI';
  return {
    id: 'example-1',
    domain_category: 'filling',
    variant: 'standard',
    field_name: 'psi',
    input_context: inputContext,
    context_hash: hashContext(inputContext),
    expected_output: '80 PSI',
    confidence_score: 0.8,
    usage_count: 0,
    success_count: 0,
    source: 'seed',
    embedding: null,
    embedding_model: null,
    deprioritized: false,
    deprioritized_at: null,
    version: 0,
    created_at: '2026-01-01T00:00:00.000Z',
    last_used_at: null,
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

type FieldOverrides = Partial<z.input<typeof FieldSchemaEntrySchema>>;

/**
 * Validated schema entry; type defaults to text
 */
export function field(name: string, overrides: FieldOverrides = {}): FieldSchemaEntry {
  return FieldSchemaEntrySchema.parse({ name, type: 'text', ...overrides });
}

export function booleanField(name: string, overrides: FieldOverrides = {}): FieldSchemaEntry {
  return field(name, { ...overrides, type: 'boolean' });
}

/**
 * Engine configuration with retries that never sleep
 */
export function testConfig(overrides: ExtractorConfigInput = {}): ExtractorConfig {
  return loadExtractorConfig({
    databasePath: ':memory:',
    ...overrides,
    extraction: { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0, ...overrides.extraction },
  });
}

/**
 * Server context over `:memory:` with the given model stand-ins
 */
export function createTestContext(
  llm: LLMProvider,
  options: { embedder?: EmbeddingProvider | null; templatesDir?: string; config?: ExtractorConfigInput } = {}
): ServerContext {
  return createServerContext({
    config: {
      databasePath: ':memory:',
      ...(options.templatesDir !== undefined && { templatesDir: options.templatesDir }),
      ...options.config,
      extraction: { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0, ...options.config?.extraction },
    },
    llm,
    embedder: options.embedder === undefined ? null : options.embedder,
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODEL SERVICE STAND-INS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Bag-of-words embedder: one dimension per vocabulary word, valued by the
 * number of times the word occurs in the text.
 */
export class KeywordEmbedder implements EmbeddingProvider {
  readonly calls: string[] = [];
  failWith: Error | null = null;

  constructor(
    private readonly vocabulary: string[],
    readonly model: string = 'test-embed'
  ) {}

  async embed(text: string): Promise<Float32Array> {
    this.calls.push(text);
    if (this.failWith) throw this.failWith;
    return this.vectorFor(text);
  }

  vectorFor(text: string): Float32Array {
    const tokens = text.toLowerCase().split(/[^a-z0-9]+/);
    return Float32Array.from(this.vocabulary.map((word) => tokens.filter((t) => t === word).length));
  }
}

/** Reply text, or an error to throw, for the n-th call */
export type LLMScript = (request: LLMRequest, call: number) => string | Error;

export class ScriptedLLM implements LLMProvider {
  readonly requests: LLMRequest[] = [];

  constructor(private readonly script: LLMScript) {}

  async generate(request: LLMRequest): Promise<LLMResponse> {
    const call = this.requests.length;
    this.requests.push(request);
    const reply = this.script(request, call);
    if (reply instanceof Error) throw reply;
    return { text: reply, model: 'scripted', inputTokens: 0, outputTokens: 0, processingTimeMs: 0 };
  }
}

/**
 * Replies in order; the last reply repeats once the list is exhausted.
 */
export function queuedLLM(replies: Array<string | Error>): ScriptedLLM {
  return new ScriptedLLM((_request, call) => replies[Math.min(call, replies.length - 1)]);
}

/**
 * Answers every requested field from `values`; unknown fields get "".
 */
export function answeringLLM(values: Record<string, unknown>): ScriptedLLM {
  return new ScriptedLLM((request) =>
    JSON.stringify(Object.fromEntries(request.fieldNames.map((name) => [name, values[name] ?? ''])))
  );
}
