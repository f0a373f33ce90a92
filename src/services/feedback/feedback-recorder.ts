/**
 * Feedback Recorder
 *
 * Records user feedback on extracted values and feeds it back into the
 * example store: the originating example is scored, and a correction
 * becomes a new high-confidence example unless the same (field, context)
 * pair is already stored.
 *
 * Persistence failures are logged and reported through the outcome
 * (`learned: false`); they are never thrown to the caller.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/feedback/feedback-recorder
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { Example } from '../../models/example.js';
import type { EmbeddingProvider } from '../../models/ports.js';
import type { FeedbackType } from '../../models/feedback.js';
import { hashContext } from '../../utils/hash.js';
import { normalizeForMatch } from '../../utils/text.js';
import { IdentifierSchema, validateInput } from '../../utils/validation.js';
import type { ExampleStore } from '../examples/example-store.js';
import type { ExampleDatabase } from '../storage/database/service.js';

export const FeedbackInputSchema = z.object({
  fieldName: IdentifierSchema,
  /** Document context the value was extracted from (ExtractionResult.context) */
  context: z.string().trim().min(1, 'context must not be empty'),
  originalValue: z.string(),
  correctedValue: z.string(),
  domainCategory: IdentifierSchema.default('general'),
  variant: IdentifierSchema.default('default'),
  exampleId: z.string().trim().min(1).optional(),
  feedbackType: z.enum(['correction', 'confirmation', 'rejection']).optional(),
  userContext: z.string().max(2000).optional(),
});

export type FeedbackInput = z.input<typeof FeedbackInputSchema>;

export interface FeedbackOutcome {
  feedbackId: string | null;
  feedbackType: FeedbackType;
  /** Counters of the originating example were updated */
  exampleAdjusted: boolean;
  /** A new example was created from the correction */
  learned: boolean;
  learnedExampleId: string | null;
  /** Existing example sharing the field and context, when one was found */
  duplicateOf: string | null;
  error?: string;
}

export interface FeedbackConfig {
  correctionConfidence: number;
}

/**
 * confirmation when the values agree after normalization, rejection when
 * the corrected value is empty, otherwise correction
 */
export function classifyFeedback(originalValue: string, correctedValue: string): FeedbackType {
  if (correctedValue.trim() === '') return 'rejection';
  if (normalizeForMatch(originalValue) === normalizeForMatch(correctedValue)) return 'confirmation';
  return 'correction';
}

export class FeedbackRecorder {
  constructor(
    private readonly database: ExampleDatabase,
    private readonly store: ExampleStore,
    private readonly embedder: EmbeddingProvider | null,
    private readonly config: FeedbackConfig
  ) {}

  /**
   * @throws ValidationError for malformed input
   */
  async recordFeedback(input: FeedbackInput): Promise<FeedbackOutcome> {
    const feedback = validateInput(FeedbackInputSchema, input);
    const feedbackType = feedback.feedbackType ?? classifyFeedback(feedback.originalValue, feedback.correctedValue);
    const contextHash = hashContext(feedback.context);

    const outcome: FeedbackOutcome = {
      feedbackId: null,
      feedbackType,
      exampleAdjusted: false,
      learned: false,
      learnedExampleId: null,
      duplicateOf: null,
    };

    try {
      let exampleId: string | null = null;
      if (feedback.exampleId) {
        if (this.store.get(feedback.exampleId)) {
          exampleId = feedback.exampleId;
        } else {
          console.error(`[Feedback] Unknown example ${feedback.exampleId}, recording feedback without link`);
        }
      }

      outcome.feedbackId = this.database.insertFeedback({
        id: uuidv4(),
        field_name: feedback.fieldName,
        domain_category: feedback.domainCategory,
        variant: feedback.variant,
        context_hash: contextHash,
        original_prediction: feedback.originalValue,
        corrected_value: feedback.correctedValue,
        feedback_type: feedbackType,
        example_id: exampleId,
        user_context: feedback.userContext ?? null,
        timestamp: new Date().toISOString(),
      });

      if (exampleId) {
        outcome.exampleAdjusted = this.store.recordFeedback(exampleId, feedbackType === 'confirmation');
      }

      if (feedbackType !== 'correction' || feedback.correctedValue.trim() === '') {
        return outcome;
      }

      const existing = this.store.findByContext(feedback.fieldName, contextHash);
      if (existing) {
        return this.settleExisting(existing, feedback.correctedValue, exampleId, outcome);
      }

      const embedding = await this.embedContext(feedback.context);
      const learnedId = this.store.putIfAbsent({
        domain_category: feedback.domainCategory,
        variant: feedback.variant,
        field_name: feedback.fieldName,
        input_context: feedback.context,
        expected_output: feedback.correctedValue.trim(),
        confidence_score: this.config.correctionConfidence,
        source: 'correction',
        embedding,
        embedding_model: embedding && this.embedder ? this.embedder.model : null,
      });
      if (!learnedId) {
        // Another session stored this context while the embedding was computed
        const stored = this.store.findByContext(feedback.fieldName, contextHash);
        return stored ? this.settleExisting(stored, feedback.correctedValue, exampleId, outcome) : outcome;
      }
      outcome.learnedExampleId = learnedId;
      outcome.learned = true;
      console.error(`[Feedback] Learned correction for ${feedback.fieldName} as example ${outcome.learnedExampleId}`);
      return outcome;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Feedback] Failed to persist feedback for ${feedback.fieldName}: ${message}`);
      return { ...outcome, learned: false, learnedExampleId: null, error: message };
    }
  }

  /**
   * A correction for a context that already has an example counts as a
   * success on it when it holds the corrected value, a failure otherwise.
   */
  private settleExisting(
    existing: Example,
    correctedValue: string,
    exampleId: string | null,
    outcome: FeedbackOutcome
  ): FeedbackOutcome {
    outcome.duplicateOf = existing.id;
    const holdsCorrection = normalizeForMatch(existing.expected_output) === normalizeForMatch(correctedValue);
    if (existing.id !== exampleId) {
      this.store.recordFeedback(existing.id, holdsCorrection);
    }
    console.error(
      `[Feedback] ${existing.field_name}: example ${existing.id} already covers this context (${holdsCorrection ? 'confirmed' : 'contradicted'})`
    );
    return outcome;
  }

  private async embedContext(context: string): Promise<Float32Array | null> {
    if (!this.embedder) return null;
    try {
      return await this.embedder.embed(context);
    } catch (error) {
      console.error(
        `[Feedback] Embedding unavailable, example stored without vector: ${error instanceof Error ? error.message : String(error)}`
      );
      return null;
    }
  }
}
