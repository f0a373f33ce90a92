/**
 * Unit tests for the Feedback Recorder
 *
 * @module tests/unit/feedback/feedback-recorder
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ExampleStore } from '../../../src/services/examples/example-store.js';
import { classifyFeedback, FeedbackRecorder } from '../../../src/services/feedback/feedback-recorder.js';
import { ExampleDatabase } from '../../../src/services/storage/database/service.js';
import { hashContext } from '../../../src/utils/hash.js';
import { ValidationError } from '../../../src/utils/validation.js';
import { createMemoryStore, KeywordEmbedder, newExample, safeClose } from '../helpers.js';

const CONTEXT = 'Filler line 3\nSpeed 60 bottles per minute with capping';

describe('classifyFeedback', () => {
  it('should treat an empty correction as a rejection', () => {
    expect(classifyFeedback('80 PSI', '')).toBe('rejection');
    expect(classifyFeedback('80 PSI', '   ')).toBe('rejection');
  });

  it('should treat values equal after normalization as a confirmation', () => {
    expect(classifyFeedback('80 PSI', '80 psi')).toBe('confirmation');
    expect(classifyFeedback('Stainless  steel', 'stainless-steel')).toBe('confirmation');
  });

  it('should treat anything else as a correction', () => {
    expect(classifyFeedback('50 units/min', '60 units/min')).toBe('correction');
    expect(classifyFeedback('', 'YES')).toBe('correction');
  });
});

describe('FeedbackRecorder', () => {
  let database: ExampleDatabase;
  let store: ExampleStore;
  let embedder: KeywordEmbedder;
  let recorder: FeedbackRecorder;

  beforeEach(() => {
    ({ database, store } = createMemoryStore());
    embedder = new KeywordEmbedder(['speed', 'capping', 'air']);
    recorder = new FeedbackRecorder(database, store, embedder, { correctionConfidence: 0.85 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    safeClose(database);
  });

  const correction = {
    fieldName: 'production_speed',
    context: CONTEXT,
    originalValue: '50 units/min',
    correctedValue: '60 units/min',
    domainCategory: 'filling',
    variant: 'standard',
  };

  // ═══════════════════════════════════════════════════════════════════════════════
  // CORRECTIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('corrections', () => {
    it('should record feedback and learn a new example', async () => {
      const outcome = await recorder.recordFeedback(correction);

      expect(outcome.feedbackType).toBe('correction');
      expect(outcome.learned).toBe(true);
      expect(outcome.duplicateOf).toBeNull();
      expect(outcome.exampleAdjusted).toBe(false);

      const feedbackId = outcome.feedbackId ?? '';
      const record = database.getFeedback(feedbackId);
      expect(record).toMatchObject({
        field_name: 'production_speed',
        domain_category: 'filling',
        variant: 'standard',
        context_hash: hashContext(CONTEXT),
        original_prediction: '50 units/min',
        corrected_value: '60 units/min',
        feedback_type: 'correction',
        example_id: null,
        user_context: null,
      });

      const learned = store.get(outcome.learnedExampleId ?? '');
      expect(learned).toMatchObject({
        field_name: 'production_speed',
        input_context: CONTEXT,
        expected_output: '60 units/min',
        confidence_score: 0.85,
        source: 'correction',
        embedding_model: 'test-embed',
      });
      expect(Array.from(learned?.embedding ?? [])).toEqual([1, 1, 0]);
    });

    it('should not create a duplicate for a repeated correction', async () => {
      const first = await recorder.recordFeedback(correction);
      const second = await recorder.recordFeedback(correction);

      expect(second.learned).toBe(false);
      expect(second.learnedExampleId).toBeNull();
      expect(second.duplicateOf).toBe(first.learnedExampleId);
      expect(store.list()).toHaveLength(1);
      expect(database.listFeedbackByField('production_speed')).toHaveLength(2);

      const existing = store.get(first.learnedExampleId ?? '');
      expect(existing?.success_count).toBe(1);
      expect(existing?.usage_count).toBe(1);
    });

    it('should learn one example when the same correction arrives concurrently', async () => {
      const [first, second] = await Promise.all([
        recorder.recordFeedback(correction),
        recorder.recordFeedback(correction),
      ]);

      expect(embedder.calls).toHaveLength(2);
      expect(first.learned).toBe(true);
      expect(second.learned).toBe(false);
      expect(second.learnedExampleId).toBeNull();
      expect(second.duplicateOf).toBe(first.learnedExampleId);
      expect(store.list()).toHaveLength(1);

      const existing = store.get(first.learnedExampleId ?? '');
      expect(existing?.success_count).toBe(1);
      expect(existing?.usage_count).toBe(1);
    });

    it('should count a contradicting correction as a failure of the stored example', async () => {
      const first = await recorder.recordFeedback(correction);
      const second = await recorder.recordFeedback({ ...correction, correctedValue: '70 units/min' });

      expect(second.learned).toBe(false);
      expect(second.duplicateOf).toBe(first.learnedExampleId);
      const existing = store.get(first.learnedExampleId ?? '');
      expect(existing?.expected_output).toBe('60 units/min');
      expect(existing?.success_count).toBe(0);
      expect(existing?.usage_count).toBe(1);
    });

    it('should trim the learned value', async () => {
      const outcome = await recorder.recordFeedback({ ...correction, correctedValue: '  60 units/min ' });
      expect(store.get(outcome.learnedExampleId ?? '')?.expected_output).toBe('60 units/min');
    });

    it('should store the example without a vector when embedding fails', async () => {
      embedder.failWith = new Error('connection refused');
      const outcome = await recorder.recordFeedback(correction);
      const learned = store.get(outcome.learnedExampleId ?? '');
      expect(outcome.learned).toBe(true);
      expect(learned?.embedding).toBeNull();
      expect(learned?.embedding_model).toBeNull();
    });

    it('should store the example without a vector when no embedder is configured', async () => {
      const plain = new FeedbackRecorder(database, store, null, { correctionConfidence: 0.85 });
      const outcome = await plain.recordFeedback(correction);
      expect(store.get(outcome.learnedExampleId ?? '')?.embedding).toBeNull();
    });

    it('should default the scope when none is given', async () => {
      const outcome = await recorder.recordFeedback({
        fieldName: 'psi',
        context: CONTEXT,
        originalValue: '60',
        correctedValue: '80 PSI',
      });
      expect(store.get(outcome.learnedExampleId ?? '')).toMatchObject({
        domain_category: 'general',
        variant: 'default',
      });
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // LINKED EXAMPLES
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('linked examples', () => {
    it('should count a confirmation as a success of the linked example', async () => {
      const exampleId = store.put(newExample());
      const outcome = await recorder.recordFeedback({
        fieldName: 'psi',
        context: CONTEXT,
        originalValue: '80 PSI',
        correctedValue: '80 psi',
        exampleId,
      });

      expect(outcome.feedbackType).toBe('confirmation');
      expect(outcome.exampleAdjusted).toBe(true);
      expect(outcome.learned).toBe(false);
      expect(database.getFeedback(outcome.feedbackId ?? '')?.example_id).toBe(exampleId);
      expect(store.get(exampleId)).toMatchObject({ success_count: 1, usage_count: 1 });
    });

    it('should count a rejection as a failure of the linked example', async () => {
      const exampleId = store.put(newExample());
      const outcome = await recorder.recordFeedback({
        fieldName: 'psi',
        context: CONTEXT,
        originalValue: '80 PSI',
        correctedValue: '',
        exampleId,
      });

      expect(outcome.feedbackType).toBe('rejection');
      expect(outcome.exampleAdjusted).toBe(true);
      expect(outcome.learned).toBe(false);
      expect(store.get(exampleId)).toMatchObject({ success_count: 0, usage_count: 1 });
    });

    it('should record feedback without a link for an unknown example', async () => {
      const outcome = await recorder.recordFeedback({ ...correction, exampleId: 'missing' });
      expect(outcome.exampleAdjusted).toBe(false);
      expect(database.getFeedback(outcome.feedbackId ?? '')?.example_id).toBeNull();
      expect(outcome.learned).toBe(true);
    });

    it('should honor an explicit feedback type', async () => {
      const outcome = await recorder.recordFeedback({ ...correction, feedbackType: 'rejection' });
      expect(outcome.feedbackType).toBe('rejection');
      expect(outcome.learned).toBe(false);
      expect(store.list()).toEqual([]);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // ERRORS
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('errors', () => {
    it('should reject an empty context', async () => {
      await expect(recorder.recordFeedback({ ...correction, context: '   ' })).rejects.toThrow(ValidationError);
    });

    it('should report persistence failures instead of throwing', async () => {
      vi.spyOn(database, 'insertFeedback').mockImplementation(() => {
        throw new Error('database is locked');
      });
      const outcome = await recorder.recordFeedback(correction);
      expect(outcome).toMatchObject({
        feedbackId: null,
        learned: false,
        learnedExampleId: null,
        error: 'database is locked',
      });
      expect(store.list()).toEqual([]);
    });
  });
});
