/**
 * Unit tests for numeric helpers
 *
 * @module tests/unit/utils/math
 */

import { describe, it, expect } from 'vitest';
import { clamp, cosineSimilarity, roundTo, safeMax } from '../../../src/utils/math.js';

describe('safeMax', () => {
  it('should return undefined for an empty array', () => {
    expect(safeMax([])).toBeUndefined();
  });

  it('should handle arrays larger than the spread argument limit', () => {
    const values = Array.from({ length: 200_000 }, (_, i) => i);
    expect(safeMax(values)).toBe(199_999);
  });
});

describe('clamp', () => {
  it('should clamp into range', () => {
    expect(clamp(1.5, 0, 1)).toBe(1);
    expect(clamp(-2, 0, 1)).toBe(0);
    expect(clamp(0.4, 0, 1)).toBe(0.4);
  });

  it('should collapse NaN to the minimum', () => {
    expect(clamp(NaN, 0, 1)).toBe(0);
  });
});

describe('cosineSimilarity', () => {
  it('should be 1 for parallel vectors', () => {
    expect(cosineSimilarity([1, 2, 0], [2, 4, 0])).toBeCloseTo(1, 10);
  });

  it('should be 0 for orthogonal vectors and zero vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('should throw on a dimension mismatch', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vector dimension mismatch: 1 vs 2');
  });
});

describe('roundTo', () => {
  it('should round to the requested digits', () => {
    expect(roundTo(0.123456)).toBe(0.1235);
    expect(roundTo(2 / 3, 2)).toBe(0.67);
  });
});
