/**
 * Example Store
 *
 * Persists extraction examples with their quality metrics and serves ranked
 * lookups. Usage and success counters are updated with per-record
 * optimistic versioning: read counters and version, compute the new values,
 * write them only if the version is unchanged, retry on conflict.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module examples/example-store
 */

import { v4 as uuidv4 } from 'uuid';
import type { Example, ExampleCounters, ExampleFilter, NewExample } from '../../models/example.js';
import { ExampleDatabase } from '../storage/database/service.js';
import { DatabaseError, DatabaseErrorCode } from '../storage/database/types.js';
import { hashContext } from '../../utils/hash.js';
import { clamp } from '../../utils/math.js';
import { ValidationError } from '../../utils/validation.js';
import { rankExamples } from './ranking.js';

/** Attempts before a counter update gives up on repeated version conflicts */
const MAX_CAS_ATTEMPTS = 8;

const SCAN_PAGE_SIZE = 500;

type CounterUpdate = (current: ExampleCounters) => {
  usage_count: number;
  success_count: number;
  touch: boolean;
};

export class ExampleStore {
  constructor(private readonly database: ExampleDatabase) {}

  /**
   * Store a new example. The context hash is derived from input_context and
   * confidence_score is clamped into [0, 1].
   *
   * @returns The new example ID
   * @throws ValidationError for blank identifying fields
   * @throws DatabaseError if the insert fails
   */
  put(example: NewExample): string {
    return this.database.insertExample(this.toRecord(example));
  }

  /**
   * Store a new example unless one already covers its (field_name, context).
   *
   * @returns The new example ID, or null when the context is already covered
   */
  putIfAbsent(example: NewExample): string | null {
    const record = this.toRecord(example);
    return this.database.insertExampleIfAbsent(record) ? record.id : null;
  }

  private toRecord(example: NewExample): Example {
    for (const key of ['domain_category', 'variant', 'field_name', 'input_context'] as const) {
      if (example[key].trim() === '') {
        throw new ValidationError(`Example ${key} must not be empty`);
      }
    }

    return {
      id: uuidv4(),
      domain_category: example.domain_category,
      variant: example.variant,
      field_name: example.field_name,
      input_context: example.input_context,
      context_hash: hashContext(example.input_context),
      expected_output: example.expected_output,
      confidence_score: clamp(example.confidence_score, 0, 1),
      usage_count: 0,
      success_count: 0,
      source: example.source,
      embedding: example.embedding ?? null,
      embedding_model: example.embedding ? (example.embedding_model ?? null) : null,
      deprioritized: false,
      deprioritized_at: null,
      version: 0,
      created_at: new Date().toISOString(),
      last_used_at: null,
    };
  }

  get(id: string): Example | null {
    return this.database.getExample(id);
  }

  /**
   * Active examples for a field ranked by quality, at most `limit`.
   */
  getByField(domainCategory: string, variant: string, fieldName: string, limit: number): Example[] {
    if (limit <= 0) return [];
    const candidates = this.database.listActiveExamplesByField(domainCategory, variant, fieldName);
    return rankExamples(candidates).slice(0, limit);
  }

  /**
   * Active examples with embeddings for any of the given fields
   */
  listCandidates(domainCategory: string, variant: string, fieldNames: string[]): Example[] {
    if (fieldNames.length === 0) return [];
    return this.database.listRetrievalCandidates(domainCategory, variant, fieldNames);
  }

  findByContext(fieldName: string, contextHash: string): Example | null {
    return this.database.findExampleByContext(fieldName, contextHash);
  }

  list(filter?: ExampleFilter): Example[] {
    return this.database.listExamples(filter);
  }

  /**
   * Iterate every example, deprioritized ones included, in insertion order.
   * Pages are fully read before they are yielded, so callers may write to the
   * store while iterating.
   */
  *scanAll(): Generator<Example> {
    let afterRowid = 0;
    for (;;) {
      const page = this.database.scanExamplePage(afterRowid, SCAN_PAGE_SIZE);
      if (page.length === 0) return;
      for (const entry of page) {
        yield entry.example;
      }
      afterRowid = page[page.length - 1].rowid;
    }
  }

  /**
   * Count one retrieval of the example.
   *
   * @returns false (and logs) when the example does not exist
   */
  recordUsage(id: string): boolean {
    return this.updateCounters(id, 'usage', (current) => ({
      usage_count: current.usage_count + 1,
      success_count: current.success_count,
      touch: true,
    }));
  }

  /**
   * Apply feedback outcome. Success increments success_count; failure leaves
   * it unchanged. usage_count is raised when needed so that it stays above
   * success_count after a failure and never below it after a success.
   *
   * @returns false (and logs) when the example does not exist
   */
  recordFeedback(id: string, isSuccess: boolean): boolean {
    return this.updateCounters(id, isSuccess ? 'success' : 'failure', (current) => {
      if (isSuccess) {
        const success = current.success_count + 1;
        return {
          usage_count: Math.max(current.usage_count, success),
          success_count: success,
          touch: false,
        };
      }
      return {
        usage_count: Math.max(current.usage_count, current.success_count + 1),
        success_count: current.success_count,
        touch: false,
      };
    });
  }

  setEmbedding(id: string, vector: Float32Array, model: string): boolean {
    return this.database.setExampleEmbedding(id, vector, model);
  }

  setDeprioritized(id: string, deprioritized: boolean): boolean {
    return this.database.setExampleDeprioritized(id, deprioritized);
  }

  listFieldNames(): string[] {
    return this.database.listExampleFieldNames();
  }

  private updateCounters(id: string, label: string, update: CounterUpdate): boolean {
    for (let attempt = 0; attempt < MAX_CAS_ATTEMPTS; attempt++) {
      const current = this.database.getExampleCounters(id);
      if (!current) {
        console.error(`[ExampleStore] ${label} update ignored: unknown example ${id}`);
        return false;
      }

      const next = update(current);
      const written = this.database.compareAndSetCounters(id, current.version, {
        usage_count: next.usage_count,
        success_count: next.success_count,
        last_used_at: next.touch ? new Date().toISOString() : null,
      });
      if (written) return true;

      console.error(
        `[ExampleStore] Version conflict on example ${id} (attempt ${attempt + 1}/${MAX_CAS_ATTEMPTS}), retrying`
      );
    }

    throw new DatabaseError(
      `Gave up updating counters for example ${id} after ${MAX_CAS_ATTEMPTS} version conflicts`,
      DatabaseErrorCode.CONCURRENT_UPDATE_CONFLICT
    );
  }
}
