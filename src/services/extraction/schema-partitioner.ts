/**
 * Schema Partitioner
 *
 * Splits a field schema into ordered batches bounded by a field count and an
 * estimated prompt-token budget. Fields of the same sub-subsection stay
 * together unless the group alone exceeds a bound.
 *
 * @module services/extraction/schema-partitioner
 */

import { type FieldSchemaEntry, sectionKey } from '../../models/field-schema.js';
import { estimateTokens } from '../llm/rate-limiter.js';
import { ValidationError } from '../../utils/validation.js';
import { describeField } from './field-descriptor.js';

export interface Batch {
  id: string;
  index: number;
  fields: FieldSchemaEntry[];
  estimatedTokens: number;
}

export interface PartitionLimits {
  maxFieldsPerBatch: number;
  maxPromptTokens: number;
}

interface SizedField {
  entry: FieldSchemaEntry;
  tokens: number;
}

export function estimateFieldTokens(entry: FieldSchemaEntry): number {
  // +1 for the newline joining descriptors
  return estimateTokens(describeField(entry).length + 1);
}

/**
 * @throws ValidationError when a field name occurs more than once or a limit is not positive
 */
export function partitionSchema(schema: FieldSchemaEntry[], limits: PartitionLimits): Batch[] {
  if (limits.maxFieldsPerBatch < 1 || limits.maxPromptTokens < 1) {
    throw new ValidationError('Batch limits must be positive', { ...limits });
  }

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const entry of schema) {
    if (seen.has(entry.name)) duplicates.add(entry.name);
    seen.add(entry.name);
  }
  if (duplicates.size > 0) {
    throw new ValidationError(`Duplicate field names in schema: ${[...duplicates].join(', ')}`, {
      duplicates: [...duplicates],
    });
  }

  const groups = groupConsecutive(schema);
  const chunks: SizedField[][] = [];
  let current: SizedField[] = [];
  let currentTokens = 0;

  const fits = (count: number, tokens: number): boolean =>
    count <= limits.maxFieldsPerBatch && tokens <= limits.maxPromptTokens;

  for (const group of groups) {
    const groupTokens = sumTokens(group);

    if (fits(current.length + group.length, currentTokens + groupTokens)) {
      current.push(...group);
      currentTokens += groupTokens;
      continue;
    }

    if (current.length > 0) {
      chunks.push(current);
      current = [];
      currentTokens = 0;
    }

    if (fits(group.length, groupTokens)) {
      current = [...group];
      currentTokens = groupTokens;
      continue;
    }

    // Oversized group: split in order; the tail stays open for the next group
    for (const field of group) {
      if (current.length > 0 && !fits(current.length + 1, currentTokens + field.tokens)) {
        chunks.push(current);
        current = [];
        currentTokens = 0;
      }
      current.push(field);
      currentTokens += field.tokens;
    }
  }

  if (current.length > 0) chunks.push(current);

  return chunks.map((chunk, index) => ({
    id: `batch-${index}`,
    index,
    fields: chunk.map((f) => f.entry),
    estimatedTokens: sumTokens(chunk),
  }));
}

function groupConsecutive(schema: FieldSchemaEntry[]): SizedField[][] {
  const groups: SizedField[][] = [];
  let lastKey: string | null = null;
  for (const entry of schema) {
    const key = sectionKey(entry);
    const sized: SizedField = { entry, tokens: estimateFieldTokens(entry) };
    if (key === lastKey && groups.length > 0) {
      groups[groups.length - 1].push(sized);
    } else {
      groups.push([sized]);
      lastKey = key;
    }
  }
  return groups;
}

function sumTokens(fields: SizedField[]): number {
  let total = 0;
  for (const f of fields) total += f.tokens;
  return total;
}
