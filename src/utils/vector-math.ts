/**
 * Vector math for dense and sparse similarity.
 */

import type { SparseVector } from '../core/types.js';

/**
 * Compute the dot product of two vectors.
 */
export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Compute the L2 norm of a vector.
 */
export function norm(a: readonly number[]): number {
  return Math.sqrt(dot(a, a));
}

/**
 * Cosine similarity between two vectors. Returns [-1, 1].
 * A zero vector has similarity 0 with everything.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const d = dot(a, b);
  const na = norm(a);
  const nb = norm(b);
  if (na === 0 || nb === 0) return 0;
  // Clamp to [-1, 1] to handle floating point errors
  return Math.max(-1, Math.min(1, d / (na * nb)));
}

/**
 * Dot product of two sparse vectors with ascending indices.
 *
 * `weight` scales each overlapping term, e.g. by inverse document frequency.
 */
export function sparseDot(
  a: SparseVector,
  b: SparseVector,
  weight?: (index: number) => number,
): number {
  let sum = 0;
  let i = 0;
  let j = 0;
  while (i < a.indices.length && j < b.indices.length) {
    const ai = a.indices[i];
    const bj = b.indices[j];
    if (ai === bj) {
      const w = weight ? weight(ai) : 1;
      sum += a.values[i] * b.values[j] * w;
      i++;
      j++;
    } else if (ai < bj) {
      i++;
    } else {
      j++;
    }
  }
  return sum;
}
