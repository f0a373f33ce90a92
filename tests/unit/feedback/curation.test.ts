/**
 * Unit tests for the quality curation pass
 *
 * @module tests/unit/feedback/curation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ExampleStore } from '../../../src/services/examples/example-store.js';
import { QualityCurator } from '../../../src/services/feedback/curation.js';
import { ExampleDatabase } from '../../../src/services/storage/database/service.js';
import { createMemoryStore, KeywordEmbedder, newExample, safeClose } from '../helpers.js';

const CONFIG = { minSuccessRate: 0.4, minUsageForCuration: 5 };

describe('QualityCurator', () => {
  let database: ExampleDatabase;
  let store: ExampleStore;
  let embedder: KeywordEmbedder;

  beforeEach(() => {
    ({ database, store } = createMemoryStore());
    embedder = new KeywordEmbedder(['air', 'psi']);
  });

  afterEach(() => {
    safeClose(database);
  });

  function seedUsage(id: string, usage: number, successes: number): void {
    for (let i = 0; i < usage; i++) store.recordUsage(id);
    for (let i = 0; i < successes; i++) store.recordFeedback(id, true);
  }

  function embedded(context: string, model = 'test-embed'): string {
    return store.put(
      newExample({ input_context: context, embedding: Float32Array.from([1, 0]), embedding_model: model })
    );
  }

  describe('deprioritization', () => {
    it('should deprioritize an example whose success rate fell below the floor', async () => {
      const poor = embedded('Air supply 80 PSI');
      seedUsage(poor, 10, 2);

      const report = await new QualityCurator(store, embedder, CONFIG).runCuration();

      expect(report.deprioritized).toBe(1);
      const example = store.get(poor);
      expect(example?.deprioritized).toBe(true);
      expect(example?.deprioritized_at).not.toBeNull();
    });

    it('should leave examples with too few uses alone', async () => {
      const young = embedded('Air supply 90 PSI');
      seedUsage(young, 4, 0);

      const report = await new QualityCurator(store, embedder, CONFIG).runCuration();
      expect(report.deprioritized).toBe(0);
      expect(store.get(young)?.deprioritized).toBe(false);
    });

    it('should restore an example whose rate recovered', async () => {
      const recovered = embedded('Air supply 100 PSI');
      store.setDeprioritized(recovered, true);
      seedUsage(recovered, 5, 5);

      const report = await new QualityCurator(store, embedder, CONFIG).runCuration();
      expect(report.restored).toBe(1);
      expect(store.get(recovered)?.deprioritized).toBe(false);
      expect(store.get(recovered)?.deprioritized_at).toBeNull();
    });

    it('should never delete examples', async () => {
      const poor = embedded('Air supply 80 PSI');
      seedUsage(poor, 10, 0);
      embedded('Air supply 90 PSI');

      const report = await new QualityCurator(store, embedder, CONFIG).runCuration();
      expect(report.scanned).toBe(2);
      expect(store.list({ include_deprioritized: true })).toHaveLength(2);
    });
  });

  describe('embedding backfill', () => {
    it('should embed examples without a vector or with another model', async () => {
      const missing = store.put(newExample({ input_context: 'Air supply 80 PSI' }));
      const stale = embedded('Air only', 'old-model');
      embedded('Already current');

      const report = await new QualityCurator(store, embedder, CONFIG).runCuration();

      expect(report.embeddingsBackfilled).toBe(2);
      expect(report.embeddingBackfillStopped).toBe(false);
      expect(embedder.calls).toEqual(['Air supply 80 PSI', 'Air only']);
      expect(Array.from(store.get(missing)?.embedding ?? [])).toEqual([1, 1]);
      expect(store.get(stale)?.embedding_model).toBe('test-embed');
    });

    it('should stop the backfill at the first embedding failure', async () => {
      store.put(newExample({ input_context: 'first' }));
      store.put(newExample({ input_context: 'second' }));
      store.put(newExample({ input_context: 'third' }));
      embedder.failWith = new Error('connection refused');

      const report = await new QualityCurator(store, embedder, CONFIG).runCuration();

      expect(embedder.calls).toHaveLength(1);
      expect(report.embeddingsBackfilled).toBe(0);
      expect(report.embeddingBackfillStopped).toBe(true);
      expect(report.scanned).toBe(3);
    });

    it('should still curate when no embedder is configured', async () => {
      const poor = store.put(newExample());
      seedUsage(poor, 10, 2);

      const report = await new QualityCurator(store, null, CONFIG).runCuration();
      expect(report).toMatchObject({ deprioritized: 1, embeddingsBackfilled: 0, embeddingBackfillStopped: false });
    });
  });
});
