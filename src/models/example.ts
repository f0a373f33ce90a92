/**
 * Extraction example with quality metrics.
 *
 * Examples are never hard-deleted; curation only sets `deprioritized`,
 * which removes them from ranking and retrieval.
 */

export type ExampleSource = 'extraction' | 'correction' | 'seed' | 'manual';

export interface Example {
  id: string;
  domain_category: string;
  variant: string;
  field_name: string;
  input_context: string;
  /** hashContext(input_context) */
  context_hash: string;
  expected_output: string;
  /** Always within [0, 1] */
  confidence_score: number;
  usage_count: number;
  /** Never exceeds usage_count */
  success_count: number;
  source: ExampleSource;
  embedding: Float32Array | null;
  embedding_model: string | null;
  deprioritized: boolean;
  deprioritized_at: string | null;
  /** Optimistic concurrency counter, bumped on every update */
  version: number;
  created_at: string;
  last_used_at: string | null;
}

export interface NewExample {
  domain_category: string;
  variant: string;
  field_name: string;
  input_context: string;
  expected_output: string;
  confidence_score: number;
  source: ExampleSource;
  embedding?: Float32Array | null;
  embedding_model?: string | null;
}

/**
 * Counters read and written under optimistic versioning
 */
export interface ExampleCounters {
  id: string;
  usage_count: number;
  success_count: number;
  version: number;
}

export interface ExampleFilter {
  domain_category?: string;
  variant?: string;
  field_name?: string;
  include_deprioritized?: boolean;
  limit?: number;
  offset?: number;
}
