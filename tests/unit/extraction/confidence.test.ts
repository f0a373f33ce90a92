/**
 * Unit tests for per-field confidence estimation
 *
 * @module tests/unit/extraction/confidence
 */

import { describe, it, expect } from 'vitest';
import { CONFIDENCE, estimateConfidence, isPlaceholder } from '../../../src/services/extraction/confidence.js';

describe('estimateConfidence', () => {
  const filled = { type: 'text' as const, value: '80 PSI' };

  it('should score by evidence kind', () => {
    expect(estimateConfidence(filled, { kind: 'exact', matched: '80 PSI', similarity: 1 })).toBe(CONFIDENCE.EXACT);
    expect(estimateConfidence(filled, { kind: 'numeric', matched: '6 bar', similarity: 1 })).toBe(0.85);
    expect(estimateConfidence(filled, { kind: 'fuzzy', matched: '80 PS', similarity: 0.9 })).toBe(0.7);
  });

  it('should reward several indicators', () => {
    const yes = { type: 'boolean' as const, value: true };
    expect(
      estimateConfidence(yes, { kind: 'indicator', matched: 'glass', similarity: 1, indicators: ['glass'] })
    ).toBe(0.85);
    expect(
      estimateConfidence(yes, {
        kind: 'indicator',
        matched: 'glass',
        similarity: 1,
        indicators: ['glass', 'glass bottles'],
      })
    ).toBe(0.95);
  });

  it('should score values without evidence by type', () => {
    expect(estimateConfidence({ type: 'boolean', value: false }, null)).toBe(0.75);
    expect(estimateConfidence({ type: 'text', value: '' }, null)).toBe(0.3);
  });

  it('should score placeholders lowest', () => {
    expect(estimateConfidence({ type: 'text', value: 'N/A' }, { kind: 'exact', matched: 'N/A', similarity: 1 })).toBe(
      0.2
    );
  });

  it('should cap defaulted fields', () => {
    expect(estimateConfidence({ type: 'boolean', value: false }, null, { defaulted: true })).toBe(0.3);
  });
});

describe('isPlaceholder', () => {
  it('should recognise common placeholders', () => {
    expect(isPlaceholder(' TBD ')).toBe(true);
    expect(isPlaceholder('Not specified')).toBe(true);
    expect(isPlaceholder('80 PSI')).toBe(false);
  });
});
