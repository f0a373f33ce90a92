/**
 * Example quality ranking
 *
 * quality = 0.6 * confidence_score + 0.4 * success_rate, where an unused
 * example (0/0) has a neutral success rate of 0.5. Ties go to the newer
 * example.
 *
 * @module examples/ranking
 */

import type { Example } from '../../models/example.js';
import { clamp } from '../../utils/math.js';

export const QUALITY_WEIGHTS = {
  confidence: 0.6,
  successRate: 0.4,
} as const;

export const NEUTRAL_SUCCESS_RATE = 0.5;

export function successRate(example: Pick<Example, 'usage_count' | 'success_count'>): number {
  if (example.usage_count === 0) return NEUTRAL_SUCCESS_RATE;
  return clamp(example.success_count / example.usage_count, 0, 1);
}

export function qualityScore(
  example: Pick<Example, 'confidence_score' | 'usage_count' | 'success_count'>
): number {
  return (
    QUALITY_WEIGHTS.confidence * example.confidence_score +
    QUALITY_WEIGHTS.successRate * successRate(example)
  );
}

/**
 * Newer first; equal timestamps keep their incoming order.
 */
export function compareRecency(a: Pick<Example, 'created_at'>, b: Pick<Example, 'created_at'>): number {
  if (a.created_at === b.created_at) return 0;
  return a.created_at > b.created_at ? -1 : 1;
}

/**
 * Sort by quality descending, then recency. Input is expected newest-first
 * (the database order) so that the stable sort resolves exact ties by
 * insertion order.
 */
export function rankExamples(examples: Example[]): Example[] {
  return [...examples].sort((a, b) => {
    const diff = qualityScore(b) - qualityScore(a);
    if (Math.abs(diff) > 1e-9) return diff;
    return compareRecency(a, b);
  });
}
