/**
 * Unit tests for seeding the example store from JSON
 *
 * @module tests/unit/examples/seed
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { ExampleStore } from '../../../src/services/examples/example-store.js';
import { seedExamples } from '../../../src/services/examples/seed.js';
import { ExampleDatabase } from '../../../src/services/storage/database/service.js';
import { ValidationError } from '../../../src/utils/validation.js';
import { cleanupTempDir, createMemoryStore, createTempDir, KeywordEmbedder, safeClose } from '../helpers.js';

const BUNDLED_SEED = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../data/seed-examples.json');

describe('seedExamples', () => {
  let database: ExampleDatabase;
  let store: ExampleStore;
  let tempDir: string;

  beforeEach(() => {
    ({ database, store } = createMemoryStore());
    tempDir = createTempDir('seed');
  });

  afterEach(() => {
    safeClose(database);
    cleanupTempDir(tempDir);
  });

  function writeSeed(content: unknown): string {
    const file = path.join(tempDir, 'seed.json');
    fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
    return file;
  }

  const entry = {
    domain_category: 'filling',
    variant: 'standard',
    field_name: 'psi',
    input_context: 'Air supply 80 PSI',
    expected_output: '80 PSI',
  };

  it('should insert every example of the bundled seed file', async () => {
    const embedder = new KeywordEmbedder(['psi', 'pet', 'conveyor']);
    const report = await seedExamples(store, embedder, BUNDLED_SEED);

    expect(report).toEqual({ inserted: 6, skipped: 0, withEmbedding: 6 });
    expect(store.list({ include_deprioritized: true, limit: 100 }).every((e) => e.source === 'seed')).toBe(true);
  });

  it('should skip entries already stored for the same context', async () => {
    const file = writeSeed({ examples: [entry] });
    await seedExamples(store, null, file);
    const report = await seedExamples(store, null, file);
    expect(report).toEqual({ inserted: 0, skipped: 1, withEmbedding: 0 });
  });

  it('should default confidence to 0.8', async () => {
    await seedExamples(store, null, writeSeed({ examples: [entry] }));
    const [example] = store.list();
    expect(example.confidence_score).toBe(0.8);
    expect(example.embedding).toBeNull();
  });

  it('should store the embedding model with each vector', async () => {
    const embedder = new KeywordEmbedder(['air', 'psi'], 'seed-model');
    await seedExamples(store, embedder, writeSeed({ examples: [entry] }));
    const [example] = store.list();
    expect(example.embedding).toEqual(Float32Array.from([1, 1]));
    expect(example.embedding_model).toBe('seed-model');
  });

  it('should stop embedding after the first failure and keep inserting', async () => {
    const embedder = new KeywordEmbedder(['psi']);
    embedder.failWith = new Error('service down');
    const file = writeSeed({
      examples: [entry, { ...entry, field_name: 'voltage', input_context: '480V supply' }],
    });

    const report = await seedExamples(store, embedder, file);
    expect(report).toEqual({ inserted: 2, skipped: 0, withEmbedding: 0 });
    expect(embedder.calls).toHaveLength(1);
  });

  it('should reject a missing file', async () => {
    await expect(seedExamples(store, null, path.join(tempDir, 'none.json'))).rejects.toThrow('Seed file not found');
  });

  it('should reject invalid JSON', async () => {
    await expect(seedExamples(store, null, writeSeed('{ not json'))).rejects.toThrow('Seed file is not valid JSON');
  });

  it('should reject entries without a field name', async () => {
    const file = writeSeed({ examples: [{ ...entry, field_name: '' }] });
    await expect(seedExamples(store, null, file)).rejects.toThrow(ValidationError);
  });
});
