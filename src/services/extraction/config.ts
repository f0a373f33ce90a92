/**
 * Extraction engine configuration
 *
 * Environment variables:
 *   EXTRACTOR_DB_PATH              — SQLite file for the example store
 *   EXTRACTOR_TEMPLATES_DIR        — Directory of <variant>.json field schemas
 *   EXTRACTOR_BATCH_MAX_FIELDS     — Max fields per batch (default: 40)
 *   EXTRACTOR_BATCH_MAX_TOKENS     — Estimated field-descriptor token budget per batch (default: 6000)
 *   EXTRACTOR_RETRIEVAL_K          — Examples per field (default: 2, capped by maxK = 3)
 *   EXTRACTOR_MIN_SIMILARITY       — Minimum cosine similarity for an example (default: 0.35)
 *   EXTRACTOR_MAX_SOURCE_CHARS     — Source window per prompt (default: 20000)
 *   EXTRACTOR_CONCURRENCY          — Batches in flight (default: 3)
 *   EXTRACTOR_MAX_RETRIES          — Retries on transient LLM errors (default: 2)
 *   EXTRACTOR_FUZZY_THRESHOLD      — Evidence fuzzy-match similarity floor (default: 0.85)
 *   EXTRACTOR_LEARNING_ENABLED     — Promote confident verified results (default: true)
 *   EXTRACTOR_MIN_SUCCESS_RATE     — Curation floor (default: 0.4)
 *   EXTRACTOR_MIN_USAGE            — Uses before curation judges an example (default: 5)
 */

import { join } from 'path';
import { z } from 'zod';
import { DEFAULT_DATABASE_PATH } from '../storage/index.js';
import { parseBoolEnv, parseFloatEnv, parseIntEnv, stringEnv } from '../../utils/env.js';

const unit = z.number().min(0).max(1);

export const ExtractorConfigSchema = z.object({
  databasePath: z.string().min(1).default(DEFAULT_DATABASE_PATH),
  templatesDir: z.string().min(1).default(join(process.cwd(), 'templates')),

  batching: z
    .object({
      maxFieldsPerBatch: z.number().int().min(1).default(40),
      maxPromptTokens: z.number().int().min(1).default(6000),
    })
    .default({}),

  retrieval: z
    .object({
      k: z.number().int().min(1).default(2),
      maxK: z.number().int().min(1).default(3),
      minSimilarity: z.number().min(-1).max(1).default(0.35),
      similarityWeight: unit.default(0.7),
      qualityWeight: unit.default(0.3),
    })
    .default({}),

  prompt: z
    .object({
      maxSourceChars: z.number().int().min(500).default(20_000),
      exampleContextChars: z.number().int().min(50).default(300),
      contextSnippetChars: z.number().int().min(100).default(2000),
      maxContextLineItems: z.number().int().min(0).default(5),
    })
    .default({}),

  extraction: z
    .object({
      concurrency: z.number().int().min(1).max(16).default(3),
      maxRetries: z.number().int().min(0).max(5).default(2),
      baseDelayMs: z.number().int().min(0).default(1000),
      maxDelayMs: z.number().int().min(0).default(10_000),
    })
    .default({}),

  evidence: z
    .object({
      fuzzyThreshold: z.number().min(0.5).max(1).default(0.85),
      /** Relative tolerance when comparing converted unit quantities */
      numericTolerance: z.number().min(0).max(0.1).default(0.01),
    })
    .default({}),

  learning: z
    .object({
      enabled: z.boolean().default(true),
      promotionConfidenceFloor: unit.default(0.85),
      promotedExampleConfidence: unit.default(0.75),
      correctionConfidence: unit.default(0.85),
      minTextLength: z.number().int().min(1).default(3),
    })
    .default({}),

  curation: z
    .object({
      minSuccessRate: unit.default(0.4),
      minUsageForCuration: z.number().int().min(1).default(5),
    })
    .default({}),
});

export type ExtractorConfig = z.infer<typeof ExtractorConfigSchema>;

export type ExtractorConfigInput = z.input<typeof ExtractorConfigSchema>;

/**
 * Load engine configuration from environment variables, with explicit
 * overrides taking precedence section by section.
 *
 * @throws Error for malformed numeric or boolean environment variables
 * @throws ZodError for out-of-range values
 */
export function loadExtractorConfig(overrides?: ExtractorConfigInput): ExtractorConfig {
  const env: ExtractorConfigInput = {
    databasePath: stringEnv('EXTRACTOR_DB_PATH'),
    templatesDir: stringEnv('EXTRACTOR_TEMPLATES_DIR'),
    batching: {
      maxFieldsPerBatch: parseIntEnv('EXTRACTOR_BATCH_MAX_FIELDS'),
      maxPromptTokens: parseIntEnv('EXTRACTOR_BATCH_MAX_TOKENS'),
    },
    retrieval: {
      k: parseIntEnv('EXTRACTOR_RETRIEVAL_K'),
      minSimilarity: parseFloatEnv('EXTRACTOR_MIN_SIMILARITY'),
    },
    prompt: { maxSourceChars: parseIntEnv('EXTRACTOR_MAX_SOURCE_CHARS') },
    extraction: {
      concurrency: parseIntEnv('EXTRACTOR_CONCURRENCY'),
      maxRetries: parseIntEnv('EXTRACTOR_MAX_RETRIES'),
    },
    evidence: { fuzzyThreshold: parseFloatEnv('EXTRACTOR_FUZZY_THRESHOLD') },
    learning: { enabled: parseBoolEnv('EXTRACTOR_LEARNING_ENABLED') },
    curation: {
      minSuccessRate: parseFloatEnv('EXTRACTOR_MIN_SUCCESS_RATE'),
      minUsageForCuration: parseIntEnv('EXTRACTOR_MIN_USAGE'),
    },
  };

  return ExtractorConfigSchema.parse({
    databasePath: overrides?.databasePath ?? env.databasePath,
    templatesDir: overrides?.templatesDir ?? env.templatesDir,
    batching: { ...env.batching, ...overrides?.batching },
    retrieval: { ...env.retrieval, ...overrides?.retrieval },
    prompt: { ...env.prompt, ...overrides?.prompt },
    extraction: { ...env.extraction, ...overrides?.extraction },
    evidence: { ...env.evidence, ...overrides?.evidence },
    learning: { ...env.learning, ...overrides?.learning },
    curation: { ...env.curation, ...overrides?.curation },
  });
}
