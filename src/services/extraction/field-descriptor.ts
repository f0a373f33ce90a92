/**
 * One-line field descriptors as they appear in the prompt. The partitioner
 * sizes batches from the same text, so estimates track the real prompt.
 */

import type { FieldSchemaEntry } from '../../models/field-schema.js';
import { BOOLEAN_FALSE, BOOLEAN_TRUE } from '../../models/field-value.js';
import { readableFieldName } from '../../utils/text.js';

export function describeFieldType(entry: FieldSchemaEntry): string {
  switch (entry.type) {
    case 'boolean':
      return `${BOOLEAN_TRUE}/${BOOLEAN_FALSE}`;
    case 'enumerated':
      return `one of [${(entry.options ?? []).map((o) => JSON.stringify(o)).join(', ')}] or ""`;
    case 'text':
      return entry.unit ? `text (unit: ${entry.unit})` : 'text';
  }
}

export function describeField(entry: FieldSchemaEntry): string {
  const parts = [`- "${entry.name}" (${describeFieldType(entry)})`];
  parts.push(entry.description ? entry.description : readableFieldName(entry.name));

  const hints = [...(entry.positiveIndicators ?? []), ...(entry.synonyms ?? [])];
  if (hints.length > 0) {
    parts.push(`look for: ${hints.join(', ')}`);
  }
  if (entry.negativeIndicators && entry.negativeIndicators.length > 0) {
    parts.push(`NO if: ${entry.negativeIndicators.join(', ')}`);
  }
  return parts.join(' | ');
}
