/**
 * Per-field confidence estimation from the verification outcome.
 *
 * @module services/extraction/confidence
 */

import type { EvidenceMatch, FieldValue } from '../../models/field-value.js';

export const CONFIDENCE = {
  EXACT: 0.9,
  NUMERIC: 0.85,
  FUZZY: 0.7,
  INDICATOR: 0.85,
  MULTIPLE_INDICATORS: 0.95,
  BOOLEAN_NO: 0.75,
  EMPTY: 0.3,
  PLACEHOLDER: 0.2,
  DEFAULTED_CAP: 0.3,
  /** Summary fields rebuilt from other selections */
  DERIVED: 0.8,
  UNRESOLVED: 0,
} as const;

const PLACEHOLDERS = new Set([
  'n/a',
  'na',
  'not applicable',
  'not specified',
  'not selected',
  'none selected',
  'to be determined',
  'tbd',
  'pending',
  'not available',
  'unknown',
  'not provided',
]);

export function isPlaceholder(text: string): boolean {
  return PLACEHOLDERS.has(text.trim().toLowerCase());
}

export function estimateConfidence(
  value: FieldValue,
  evidence: EvidenceMatch | null,
  options: { defaulted?: boolean } = {}
): number {
  let confidence: number;

  if (value.type !== 'boolean' && isPlaceholder(value.value)) {
    confidence = CONFIDENCE.PLACEHOLDER;
  } else if (evidence) {
    switch (evidence.kind) {
      case 'exact':
        confidence = CONFIDENCE.EXACT;
        break;
      case 'numeric':
        confidence = CONFIDENCE.NUMERIC;
        break;
      case 'fuzzy':
        confidence = CONFIDENCE.FUZZY;
        break;
      case 'indicator':
        confidence =
          (evidence.indicators?.length ?? 0) >= 2 ? CONFIDENCE.MULTIPLE_INDICATORS : CONFIDENCE.INDICATOR;
        break;
    }
  } else if (value.type === 'boolean') {
    confidence = CONFIDENCE.BOOLEAN_NO;
  } else {
    confidence = CONFIDENCE.EMPTY;
  }

  return options.defaulted ? Math.min(confidence, CONFIDENCE.DEFAULTED_CAP) : confidence;
}
