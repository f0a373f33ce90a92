/**
 * Numeric helpers shared by ranking, retrieval and statistics.
 *
 * The min/max helpers iterate instead of spreading, since spreading a large
 * array into Math.max hits V8's argument limit.
 */

/**
 * Maximum value in a numeric array, or `undefined` for an empty array.
 */
export function safeMax(arr: number[]): number | undefined {
  if (arr.length === 0) return undefined;
  let max = arr[0];
  for (let i = 1; i < arr.length; i++) {
    if (arr[i] > max) max = arr[i];
  }
  return max;
}

/**
 * Clamp `value` into [min, max]. NaN collapses to `min`.
 */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

/**
 * Cosine similarity of two equal-length vectors.
 * Returns 0 when either vector has zero magnitude.
 *
 * @throws Error if the vectors differ in length
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Round to `digits` decimal places (for reporting).
 */
export function roundTo(value: number, digits: number = 4): number {
  const factor = Math.pow(10, digits);
  return Math.round(value * factor) / factor;
}
