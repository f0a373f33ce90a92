/**
 * Tagged field values and per-field extraction results.
 */

import type { FieldSchemaEntry, FieldType } from './field-schema.js';

/** Empty enumerated values are represented by '' */
export type FieldValue =
  | { type: 'text'; value: string }
  | { type: 'boolean'; value: boolean }
  | { type: 'enumerated'; value: string };

export type FieldFlag = 'low_confidence' | 'zero_evidence' | 'unresolved';

export type FieldStatus = 'ok' | FieldFlag;

export type EvidenceKind = 'exact' | 'numeric' | 'fuzzy' | 'indicator';

export interface EvidenceMatch {
  kind: EvidenceKind;
  /** Source text that supported the value */
  matched: string;
  /** 1 for exact/numeric/indicator matches, edit-distance similarity for fuzzy */
  similarity: number;
  indicators?: string[];
}

export interface FieldResult {
  name: string;
  value: FieldValue;
  status: FieldStatus;
  flags: FieldFlag[];
  evidence_backed: boolean;
  evidence: EvidenceMatch | null;
  batch_id: string;
  confidence: number;
  /** Examples shown to the LLM for this field */
  example_ids: string[];
}

/** Ordered by schema position */
export type FieldMap = Map<string, FieldResult>;

export const BOOLEAN_TRUE = 'YES';
export const BOOLEAN_FALSE = 'NO';

export function emptyValue(type: FieldType): FieldValue {
  switch (type) {
    case 'boolean':
      return { type, value: false };
    case 'text':
      return { type, value: '' };
    case 'enumerated':
      return { type, value: '' };
  }
}

export function isEmptyValue(value: FieldValue): boolean {
  return value.type === 'boolean' ? !value.value : value.value.trim() === '';
}

/**
 * Render a value the way templates and prompts see it: booleans as YES/NO.
 */
export function formatValue(value: FieldValue): string {
  if (value.type === 'boolean') return value.value ? BOOLEAN_TRUE : BOOLEAN_FALSE;
  return value.value;
}

/**
 * Build a tagged value for `entry` from a stored string (example output,
 * feedback value). Booleans accept YES/TRUE/1; anything else is NO.
 */
export function valueFromString(entry: Pick<FieldSchemaEntry, 'type'>, raw: string): FieldValue {
  const trimmed = raw.trim();
  switch (entry.type) {
    case 'boolean':
      return { type: 'boolean', value: ['YES', 'TRUE', '1'].includes(trimmed.toUpperCase()) };
    case 'text':
      return { type: 'text', value: trimmed };
    case 'enumerated':
      return { type: 'enumerated', value: trimmed };
  }
}

export function valuesEqual(a: FieldValue, b: FieldValue): boolean {
  return a.type === b.type && a.value === b.value;
}

/**
 * Most severe flag wins.
 */
export function deriveStatus(flags: readonly FieldFlag[]): FieldStatus {
  if (flags.includes('unresolved')) return 'unresolved';
  if (flags.includes('zero_evidence')) return 'zero_evidence';
  if (flags.includes('low_confidence')) return 'low_confidence';
  return 'ok';
}
