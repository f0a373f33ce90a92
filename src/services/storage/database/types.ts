/**
 * Type definitions for ExampleDatabase
 *
 * Contains row types, statistics shapes and the database error class.
 */

import type { ExampleSource } from '../../../models/example.js';
import type { FeedbackType } from '../../../models/feedback.js';

/**
 * Error codes for database operations
 */
export enum DatabaseErrorCode {
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  DATABASE_LOCKED = 'DATABASE_LOCKED',
  EXAMPLE_NOT_FOUND = 'EXAMPLE_NOT_FOUND',
  FOREIGN_KEY_VIOLATION = 'FOREIGN_KEY_VIOLATION',
  CONSTRAINT_VIOLATION = 'CONSTRAINT_VIOLATION',
  CONCURRENT_UPDATE_CONFLICT = 'CONCURRENT_UPDATE_CONFLICT',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
}

/**
 * Custom error class for database operations
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/**
 * Raw examples row as returned by better-sqlite3
 */
export interface ExampleRow {
  id: string;
  domain_category: string;
  variant: string;
  field_name: string;
  input_context: string;
  context_hash: string;
  expected_output: string;
  confidence_score: number;
  usage_count: number;
  success_count: number;
  source: ExampleSource;
  embedding: Buffer | null;
  embedding_model: string | null;
  deprioritized: number;
  deprioritized_at: string | null;
  version: number;
  created_at: string;
  last_used_at: string | null;
}

export interface FeedbackRow {
  id: string;
  field_name: string;
  domain_category: string | null;
  variant: string | null;
  context_hash: string | null;
  original_prediction: string;
  corrected_value: string;
  feedback_type: FeedbackType;
  example_id: string | null;
  user_context: string | null;
  timestamp: string;
}

/**
 * Per-field quality breakdown
 */
export interface FieldQualityStats {
  field_name: string;
  total_examples: number;
  active_examples: number;
  avg_confidence: number;
  usage_count: number;
  success_count: number;
  /** null until the field's examples have been used */
  success_rate: number | null;
}

export interface CategoryQualityStats {
  domain_category: string;
  variant: string;
  total_examples: number;
  avg_confidence: number;
}

/**
 * Example store quality statistics for monitoring surfaces
 */
export interface QualityStats {
  total_examples: number;
  active_examples: number;
  deprioritized_examples: number;
  examples_with_embedding: number;
  /** Sum of successes over sum of uses; null when nothing has been used */
  success_rate: number | null;
  /** null when the store is empty */
  avg_confidence: number | null;
  per_field_breakdown: FieldQualityStats[];
  by_category: CategoryQualityStats[];
  /** high >= 0.9, medium >= 0.7, low < 0.7 */
  quality_distribution: {
    high: number;
    medium: number;
    low: number;
  };
  feedback_counts: Record<FeedbackType, number>;
}
