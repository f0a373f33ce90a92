/**
 * Extraction Client
 *
 * Sends one batch prompt to the LLM provider and returns validated values.
 * Transient failures are retried with exponential backoff; a response that
 * fails validation gets one repair round, after which the offending fields
 * fall back to their empty value and are flagged low confidence.
 *
 * A batch that cannot be completed is reported as failed or cancelled and
 * never throws, so other batches are unaffected.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/extraction/extraction-client
 */

import { emptyValue, type FieldValue } from '../../models/field-value.js';
import type { LLMProvider } from '../../models/ports.js';
import { withRetry } from '../../utils/backoff.js';
import { isTransientError } from '../llm/http.js';
import { buildRepairPrompt, type PromptViolation } from './prompt-assembler.js';
import { parseJsonObject, validateBatchResponse } from './response-validator.js';
import type { Batch } from './schema-partitioner.js';

export type BatchStatus = 'completed' | 'failed' | 'cancelled';

export interface BatchExtraction {
  batch: Batch;
  status: BatchStatus;
  /** Empty unless status is 'completed' */
  values: Map<string, FieldValue>;
  /** Fields defaulted after the repair round */
  lowConfidence: Set<string>;
  violations: PromptViolation[];
  unknownKeys: string[];
  repaired: boolean;
  /** LLM calls made, retries and the repair round included */
  attempts: number;
  error?: string;
  durationMs: number;
}

export interface ExtractionClientConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export class ExtractionClient {
  constructor(
    private readonly llm: LLMProvider,
    private readonly config: ExtractionClientConfig
  ) {}

  async extractBatch(batch: Batch, prompt: string, signal?: AbortSignal): Promise<BatchExtraction> {
    const startTime = Date.now();
    let attempts = 0;
    const finish = (partial: Omit<BatchExtraction, 'batch' | 'attempts' | 'durationMs'>): BatchExtraction => ({
      batch,
      attempts,
      durationMs: Date.now() - startTime,
      ...partial,
    });
    const failure = (status: 'failed' | 'cancelled', error: string): BatchExtraction =>
      finish({
        status,
        values: new Map(),
        lowConfidence: new Set(),
        violations: [],
        unknownKeys: [],
        repaired: false,
        error,
      });

    const fieldNames = batch.fields.map((f) => f.name);
    const call = async (text: string): Promise<string> => {
      const response = await withRetry(
        () => {
          attempts++;
          return this.llm.generate({ prompt: text, fieldNames, signal });
        },
        (error) => !signal?.aborted && isTransientError(error),
        {
          maxAttempts: this.config.maxRetries + 1,
          baseDelayMs: this.config.baseDelayMs,
          maxDelayMs: this.config.maxDelayMs,
          signal,
          label: `LLM ${batch.id}`,
        }
      );
      return response.text;
    };

    let first: string;
    try {
      if (signal?.aborted) return failure('cancelled', 'cancelled before start');
      first = await call(prompt);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (signal?.aborted) return failure('cancelled', message);
      console.error(`[ExtractionClient] ${batch.id} failed after ${attempts} attempt(s): ${message}`);
      return failure('failed', message);
    }

    const firstParsed = parseJsonObject(first);
    const firstValidation = firstParsed.ok ? validateBatchResponse(batch.fields, firstParsed.value) : null;

    if (firstValidation && firstValidation.violations.length === 0) {
      return finish({
        status: 'completed',
        values: firstValidation.values,
        lowConfidence: new Set(),
        violations: [],
        unknownKeys: firstValidation.unknownKeys,
        repaired: false,
      });
    }

    const violations: PromptViolation[] = firstValidation
      ? firstValidation.violations
      : [{ field: '(response)', message: firstParsed.ok ? 'invalid' : firstParsed.error }];
    console.error(`[ExtractionClient] ${batch.id}: ${violations.length} violation(s), requesting repair`);

    let second: string;
    try {
      second = await call(buildRepairPrompt(prompt, violations));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (signal?.aborted) return failure('cancelled', message);
      if (!firstValidation) return failure('failed', message);
      console.error(`[ExtractionClient] ${batch.id} repair call failed, keeping first response: ${message}`);
      return finish(this.withDefaults(batch, firstValidation.values, firstValidation.violations, firstValidation.unknownKeys));
    }

    const secondParsed = parseJsonObject(second);
    if (!secondParsed.ok) {
      if (!firstValidation) {
        return failure('failed', `unparseable response after repair: ${secondParsed.error}`);
      }
      return finish(this.withDefaults(batch, firstValidation.values, firstValidation.violations, firstValidation.unknownKeys));
    }

    const repairedValidation = validateBatchResponse(batch.fields, secondParsed.value);
    // Fields that were valid first time and broke in the repair keep their first value
    const merged = new Map(repairedValidation.values);
    const stillOffending: PromptViolation[] = [];
    for (const violation of repairedValidation.violations) {
      const earlier = firstValidation?.values.get(violation.field);
      if (earlier) {
        merged.set(violation.field, earlier);
      } else {
        stillOffending.push(violation);
      }
    }

    return finish(this.withDefaults(batch, merged, stillOffending, repairedValidation.unknownKeys));
  }

  private withDefaults(
    batch: Batch,
    values: Map<string, FieldValue>,
    violations: PromptViolation[],
    unknownKeys: string[]
  ): Omit<BatchExtraction, 'batch' | 'attempts' | 'durationMs'> {
    const completed = new Map<string, FieldValue>();
    const lowConfidence = new Set<string>();
    for (const field of batch.fields) {
      const value = values.get(field.name);
      if (value) {
        completed.set(field.name, value);
      } else {
        completed.set(field.name, emptyValue(field.type));
        lowConfidence.add(field.name);
      }
    }
    if (lowConfidence.size > 0) {
      console.error(`[ExtractionClient] ${batch.id}: defaulted ${lowConfidence.size} field(s) after repair`);
    }
    return {
      status: 'completed',
      values: completed,
      lowConfidence,
      violations,
      unknownKeys,
      repaired: true,
    };
  }
}
