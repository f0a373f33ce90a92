/**
 * Seed the example store from a JSON file of curated examples.
 *
 * File format:
 *   { "examples": [ { "domain_category", "variant", "field_name",
 *                     "input_context", "expected_output", "confidence_score"? } ] }
 *
 * Entries whose (field_name, context) pair is already stored are skipped,
 * so seeding the same file twice is a no-op.
 *
 * @module examples/seed
 */

import fs from 'fs';
import { z } from 'zod';
import type { EmbeddingProvider } from '../../models/ports.js';
import { hashContext } from '../../utils/hash.js';
import { IdentifierSchema, validateInput, ValidationError } from '../../utils/validation.js';
import type { ExampleStore } from './example-store.js';

const SEED_CONFIDENCE = 0.8;

export const SeedFileSchema = z.object({
  examples: z.array(
    z.object({
      domain_category: IdentifierSchema,
      variant: IdentifierSchema,
      field_name: IdentifierSchema,
      input_context: z.string().trim().min(1),
      expected_output: z.string(),
      confidence_score: z.number().min(0).max(1).default(SEED_CONFIDENCE),
    })
  ),
});

export interface SeedReport {
  inserted: number;
  skipped: number;
  withEmbedding: number;
}

/**
 * @throws ValidationError when the file is missing, not JSON, or malformed
 */
export function readSeedFile(filePath: string): z.infer<typeof SeedFileSchema> {
  if (!fs.existsSync(filePath)) {
    throw new ValidationError(`Seed file not found: ${filePath}`, { filePath });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ValidationError(
      `Seed file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { filePath }
    );
  }
  return validateInput(SeedFileSchema, parsed);
}

export async function seedExamples(
  store: ExampleStore,
  embedder: EmbeddingProvider | null,
  filePath: string
): Promise<SeedReport> {
  const { examples } = readSeedFile(filePath);
  const report: SeedReport = { inserted: 0, skipped: 0, withEmbedding: 0 };
  let canEmbed = embedder !== null;

  for (const seed of examples) {
    if (store.findByContext(seed.field_name, hashContext(seed.input_context))) {
      report.skipped++;
      continue;
    }

    let embedding: Float32Array | null = null;
    if (canEmbed && embedder) {
      try {
        embedding = await embedder.embed(seed.input_context);
      } catch (error) {
        console.error(
          `[Seed] Embedding unavailable, remaining examples stored without vectors: ${error instanceof Error ? error.message : String(error)}`
        );
        canEmbed = false;
      }
    }

    store.put({ ...seed, source: 'seed', embedding, embedding_model: embedding && embedder ? embedder.model : null });
    report.inserted++;
    if (embedding) report.withEmbedding++;
  }

  console.error(`[Seed] Inserted ${report.inserted} example(s), skipped ${report.skipped} duplicate(s)`);
  return report;
}
