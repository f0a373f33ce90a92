/**
 * Extraction Engine
 *
 * Orchestrates one extraction run:
 *
 *   partition -> per batch (bounded pool): retrieve examples -> assemble prompt
 *   -> LLM + validation -> evidence verification -> merge -> post-processing
 *   -> optional promotion of confident, evidence-backed values into the store
 *
 * A run never throws on partial failure. Fields of failed or cancelled
 * batches are returned as unresolved; every other field carries its own
 * status, evidence and confidence.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/extraction/engine
 */

import { z } from 'zod';
import { type FieldSchemaEntry, FieldSchemaSchema } from '../../models/field-schema.js';
import {
  emptyValue,
  type FieldFlag,
  type FieldMap,
  type FieldResult,
  type FieldValue,
  deriveStatus,
  formatValue,
  valuesEqual,
} from '../../models/field-value.js';
import {
  type EmbeddingProvider,
  LineItemSchema,
  type SourceTextProvider,
  type TemplateSchemaProvider,
} from '../../models/ports.js';
import { hashContext } from '../../utils/hash.js';
import { IdentifierSchema, validateInput } from '../../utils/validation.js';
import type { ExampleStore } from '../examples/example-store.js';
import type { RetrievedExample, SimilarityRetriever } from '../retrieval/similarity-retriever.js';
import { CONFIDENCE, estimateConfidence } from './confidence.js';
import type { ExtractorConfig } from './config.js';
import { EvidenceVerifier } from './evidence-verifier.js';
import type { BatchExtraction, BatchStatus, ExtractionClient } from './extraction-client.js';
import { applyPostProcessing, type PostProcessingChange } from './post-processing.js';
import { buildContextSnippet, buildExtractionPrompt } from './prompt-assembler.js';
import { type Batch, partitionSchema } from './schema-partitioner.js';
import { TaskPool } from './task-pool.js';

// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST / RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export const ExtractionRequestSchema = z.object({
  sourceText: z.string(),
  lineItems: z.array(LineItemSchema).default([]),
  schema: FieldSchemaSchema,
  domainCategory: IdentifierSchema,
  variant: IdentifierSchema,
  /** Examples per field; clamped to the retrieval maxK */
  k: z.number().int().min(1).optional(),
});

export type ExtractionRequest = z.input<typeof ExtractionRequestSchema>;

export interface ExtractionOptions {
  signal?: AbortSignal;
  /** Promote confident results into the example store (default: config.learning.enabled) */
  learnFromResults?: boolean;
}

export interface BatchReport {
  id: string;
  index: number;
  fieldCount: number;
  status: BatchStatus;
  attempts: number;
  repaired: boolean;
  exampleCount: number;
  durationMs: number;
  error?: string;
}

export interface ExtractionResult {
  fields: FieldMap;
  batches: BatchReport[];
  /** Unresolved and zero-evidence fields, in schema order */
  reviewQueue: string[];
  /** Document context used for retrieval and later feedback */
  context: string;
  contextHash: string;
  cancelled: boolean;
  warnings: string[];
  postProcessing: PostProcessingChange[];
  promotedExamples: string[];
  durationMs: number;
}

/**
 * Raised when an operation needs a collaborator the engine was built without
 */
export class ExtractionConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExtractionConfigurationError';
  }
}

export interface ExtractionEngineDeps {
  config: ExtractorConfig;
  extractionClient: ExtractionClient;
  store?: ExampleStore | null;
  retriever?: SimilarityRetriever | null;
  embedder?: EmbeddingProvider | null;
  sourceTextProvider?: SourceTextProvider | null;
  templateSchemaProvider?: TemplateSchemaProvider | null;
}

interface BatchRun {
  extraction: BatchExtraction;
  examples: Map<string, RetrievedExample[]>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export class ExtractionEngine {
  private readonly pool: TaskPool;

  constructor(private readonly deps: ExtractionEngineDeps) {
    this.pool = new TaskPool(deps.config.extraction.concurrency);
  }

  /**
   * @throws ValidationError for a malformed request or a schema with duplicate field names
   */
  async extractFields(input: ExtractionRequest, options: ExtractionOptions = {}): Promise<ExtractionResult> {
    const startTime = Date.now();
    const request = validateInput(ExtractionRequestSchema, input);
    const { config } = this.deps;
    const { signal } = options;

    const batches = partitionSchema(request.schema, config.batching);
    const context = buildContextSnippet(request.sourceText, request.lineItems, {
      maxLineItems: config.prompt.maxContextLineItems,
      maxChars: config.prompt.contextSnippetChars,
    });
    const contextHash = hashContext(context);

    console.error(
      `[Engine] Extracting ${request.schema.length} field(s) in ${batches.length} batch(es) ` +
        `for ${request.domainCategory}/${request.variant}`
    );

    const tasks = batches.map((batch) => async (taskSignal: AbortSignal): Promise<BatchRun> => {
      const examples = this.deps.retriever
        ? await this.deps.retriever.retrieve(
            {
              context,
              fieldNames: batch.fields.map((f) => f.name),
              domainCategory: request.domainCategory,
              variant: request.variant,
            },
            { k: request.k, signal: taskSignal }
          )
        : new Map<string, RetrievedExample[]>();

      const prompt = buildExtractionPrompt(
        {
          batch,
          sourceText: request.sourceText,
          lineItems: request.lineItems,
          examples,
          domainCategory: request.domainCategory,
          variant: request.variant,
        },
        config.prompt
      );
      const extraction = await this.deps.extractionClient.extractBatch(batch, prompt, taskSignal);
      return { extraction, examples };
    });

    const outcomes = await this.pool.run(tasks, signal);
    const runs = outcomes.map((outcome, i): BatchRun => {
      if (outcome.status === 'fulfilled') return outcome.value;
      const batch = batches[i];
      if (outcome.status === 'skipped') return { extraction: unfinished(batch, 'cancelled', 'not started'), examples: new Map() };
      const message = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
      console.error(`[Engine] ${batch.id} failed: ${message}`);
      return { extraction: unfinished(batch, 'failed', message), examples: new Map() };
    });

    const verifier = new EvidenceVerifier(
      { text: request.sourceText, lineItems: request.lineItems },
      config.evidence
    );
    const fields = this.mergeBatches(request.schema, runs, verifier);
    const warnings = collectBatchWarnings(runs);

    const postProcessing = this.applyRules(request.schema, fields);
    warnings.push(...postProcessing.warnings);

    const cancelled = signal?.aborted ?? false;
    const learn = options.learnFromResults ?? config.learning.enabled;
    const promotedExamples = learn
      ? await this.promote(fields, {
          context,
          domainCategory: request.domainCategory,
          variant: request.variant,
          signal,
        })
      : [];

    const reviewQueue = [...fields.values()]
      .filter((f) => f.status === 'unresolved' || f.status === 'zero_evidence')
      .map((f) => f.name);

    const result: ExtractionResult = {
      fields,
      batches: runs.map(({ extraction, examples }) => ({
        id: extraction.batch.id,
        index: extraction.batch.index,
        fieldCount: extraction.batch.fields.length,
        status: extraction.status,
        attempts: extraction.attempts,
        repaired: extraction.repaired,
        exampleCount: [...examples.values()].reduce((sum, list) => sum + list.length, 0),
        durationMs: extraction.durationMs,
        ...(extraction.error !== undefined ? { error: extraction.error } : {}),
      })),
      reviewQueue,
      context,
      contextHash,
      cancelled,
      warnings,
      postProcessing: postProcessing.changes,
      promotedExamples,
      durationMs: Date.now() - startTime,
    };

    const failed = result.batches.filter((b) => b.status !== 'completed').length;
    console.error(
      `[Engine] Done in ${result.durationMs}ms: ${batches.length - failed}/${batches.length} batch(es) completed, ` +
        `${reviewQueue.length} field(s) for review${cancelled ? ' (cancelled)' : ''}`
    );
    return result;
  }

  /**
   * Load source and schema through the configured providers, then extract.
   *
   * @throws ExtractionConfigurationError when either provider is missing
   */
  async extractDocument(
    handle: string,
    variant: string,
    domainCategory: string,
    options: ExtractionOptions & { k?: number } = {}
  ): Promise<ExtractionResult> {
    const { sourceTextProvider, templateSchemaProvider } = this.deps;
    if (!sourceTextProvider || !templateSchemaProvider) {
      throw new ExtractionConfigurationError(
        'extractDocument requires both a source text provider and a template schema provider'
      );
    }

    const [source, schema] = await Promise.all([
      sourceTextProvider.getSource(handle),
      templateSchemaProvider.getSchema(variant),
    ]);

    return this.extractFields(
      {
        sourceText: source.text,
        lineItems: source.lineItems,
        schema,
        domainCategory,
        variant,
        k: options.k,
      },
      options
    );
  }

  private mergeBatches(schema: FieldSchemaEntry[], runs: BatchRun[], verifier: EvidenceVerifier): FieldMap {
    const byField = new Map<string, BatchRun>();
    for (const run of runs) {
      for (const field of run.extraction.batch.fields) {
        byField.set(field.name, run);
      }
    }

    const fields: FieldMap = new Map();
    for (const entry of schema) {
      const run = byField.get(entry.name);
      if (!run) continue;
      const { extraction, examples } = run;
      const exampleIds = (examples.get(entry.name) ?? []).map((e) => e.example.id);

      if (extraction.status !== 'completed') {
        fields.set(entry.name, {
          name: entry.name,
          value: emptyValue(entry.type),
          status: 'unresolved',
          flags: ['unresolved'],
          evidence_backed: false,
          evidence: null,
          batch_id: extraction.batch.id,
          confidence: CONFIDENCE.UNRESOLVED,
          example_ids: exampleIds,
        });
        continue;
      }

      const raw = extraction.values.get(entry.name) ?? emptyValue(entry.type);
      const verification = verifier.verify(entry, raw);
      const defaulted = extraction.lowConfidence.has(entry.name);

      const flags: FieldFlag[] = [];
      if (defaulted) flags.push('low_confidence');
      if (verification.zeroEvidence) {
        flags.push('zero_evidence');
        console.error(`[Engine] ${entry.name}: no evidence for "${formatValue(raw)}", reset to empty`);
      }

      fields.set(entry.name, {
        name: entry.name,
        value: verification.value,
        status: deriveStatus(flags),
        flags,
        evidence_backed: verification.evidenceBacked,
        evidence: verification.evidence,
        batch_id: extraction.batch.id,
        confidence: estimateConfidence(verification.value, verification.evidence, { defaulted }),
        example_ids: exampleIds,
      });
    }
    return fields;
  }

  /**
   * Run the rule chain over resolved fields and write changed values back.
   */
  private applyRules(
    schema: FieldSchemaEntry[],
    fields: FieldMap
  ): { changes: PostProcessingChange[]; warnings: string[] } {
    const resolved = new Map<string, FieldValue>();
    for (const field of fields.values()) {
      if (field.status !== 'unresolved') resolved.set(field.name, field.value);
    }

    const outcome = applyPostProcessing(schema, resolved);
    for (const change of outcome.changes) {
      const field = fields.get(change.field);
      const value = outcome.values.get(change.field);
      if (!field || !value || valuesEqual(field.value, value)) continue;

      const updated: FieldResult = { ...field, value };
      if (change.rule === 'exclusive_group') {
        updated.evidence = null;
        updated.evidence_backed = false;
        updated.confidence = CONFIDENCE.BOOLEAN_NO;
      } else if (change.rule === 'summary') {
        updated.evidence = null;
        updated.evidence_backed = false;
        updated.confidence = value.value === '' ? CONFIDENCE.EMPTY : CONFIDENCE.DERIVED;
      }
      fields.set(change.field, updated);
    }

    return { changes: outcome.changes, warnings: outcome.warnings };
  }

  /**
   * Save confident, evidence-backed values as new examples. A persistence
   * failure stops promotion for the rest of the run.
   */
  private async promote(
    fields: FieldMap,
    scope: { context: string; domainCategory: string; variant: string; signal?: AbortSignal }
  ): Promise<string[]> {
    const { store, embedder, config } = this.deps;
    if (!store) return [];

    const candidates = [...fields.values()].filter((field) => isPromotable(field, config.learning));
    if (candidates.length === 0) return [];

    let embedding: Float32Array | null = null;
    if (embedder && !scope.signal?.aborted) {
      try {
        embedding = await embedder.embed(scope.context, scope.signal);
      } catch (error) {
        console.error(
          `[Engine] Embedding unavailable for promoted examples, curation will backfill: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    const promoted: string[] = [];
    for (const field of candidates) {
      try {
        const id = store.putIfAbsent({
          domain_category: scope.domainCategory,
          variant: scope.variant,
          field_name: field.name,
          input_context: scope.context,
          expected_output: formatValue(field.value),
          confidence_score: config.learning.promotedExampleConfidence,
          source: 'extraction',
          embedding,
          embedding_model: embedding && embedder ? embedder.model : null,
        });
        if (id) promoted.push(id);
      } catch (error) {
        console.error(
          `[Engine] Learning disabled for this run after persistence error: ${error instanceof Error ? error.message : String(error)}`
        );
        break;
      }
    }

    if (promoted.length > 0) {
      console.error(`[Engine] Promoted ${promoted.length} verified value(s) to examples`);
    }
    return promoted;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

export function isPromotable(
  field: FieldResult,
  learning: Pick<ExtractorConfig['learning'], 'promotionConfidenceFloor' | 'minTextLength'>
): boolean {
  if (field.status !== 'ok' || !field.evidence_backed) return false;
  if (field.confidence < learning.promotionConfidenceFloor) return false;
  if (field.value.type === 'boolean') return field.value.value;
  return field.value.value.trim().length >= learning.minTextLength;
}

function unfinished(batch: Batch, status: 'failed' | 'cancelled', error: string): BatchExtraction {
  return {
    batch,
    status,
    values: new Map(),
    lowConfidence: new Set(),
    violations: [],
    unknownKeys: [],
    repaired: false,
    attempts: 0,
    error,
    durationMs: 0,
  };
}

function collectBatchWarnings(runs: BatchRun[]): string[] {
  const warnings: string[] = [];
  for (const { extraction } of runs) {
    if (extraction.status === 'failed') {
      warnings.push(`${extraction.batch.id} failed: ${extraction.error ?? 'unknown error'}`);
    }
    if (extraction.unknownKeys.length > 0) {
      warnings.push(`${extraction.batch.id} returned undeclared keys: ${extraction.unknownKeys.join(', ')}`);
    }
  }
  return warnings;
}
