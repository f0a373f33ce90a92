/**
 * Row to model converters for ExampleDatabase
 *
 * Embeddings are stored as little-endian float32 BLOBs.
 */

import type { Example } from '../../../models/example.js';
import type { FeedbackRecord } from '../../../models/feedback.js';
import type { ExampleRow, FeedbackRow } from './types.js';

export function embeddingToBuffer(vector: Float32Array): Buffer {
  const buffer = Buffer.alloc(vector.length * 4);
  for (let i = 0; i < vector.length; i++) {
    buffer.writeFloatLE(vector[i], i * 4);
  }
  return buffer;
}

/**
 * Copies out of the BLOB; SQLite buffers are not guaranteed 4-byte aligned.
 */
export function bufferToEmbedding(buffer: Buffer): Float32Array {
  const length = Math.floor(buffer.byteLength / 4);
  const vector = new Float32Array(length);
  for (let i = 0; i < length; i++) {
    vector[i] = buffer.readFloatLE(i * 4);
  }
  return vector;
}

export function rowToExample(row: ExampleRow): Example {
  return {
    id: row.id,
    domain_category: row.domain_category,
    variant: row.variant,
    field_name: row.field_name,
    input_context: row.input_context,
    context_hash: row.context_hash,
    expected_output: row.expected_output,
    confidence_score: row.confidence_score,
    usage_count: row.usage_count,
    success_count: row.success_count,
    source: row.source,
    embedding: row.embedding ? bufferToEmbedding(row.embedding) : null,
    embedding_model: row.embedding_model,
    deprioritized: row.deprioritized === 1,
    deprioritized_at: row.deprioritized_at,
    version: row.version,
    created_at: row.created_at,
    last_used_at: row.last_used_at,
  };
}

export function rowToFeedback(row: FeedbackRow): FeedbackRecord {
  return { ...row };
}
