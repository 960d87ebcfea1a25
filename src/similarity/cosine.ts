/**
 * Cosine Similarity
 *
 * Score between two embedding vectors in [-1, 1].
 */

import { DimensionMismatchError } from '../errors/index.js';
import type { Vector } from '../nodes/types.js';

/**
 * Cosine similarity = (a·b) / (‖a‖‖b‖).
 *
 * Both vectors must have the same length and a non-zero norm; anything
 * else means they cannot be compared (typically vectors from two different
 * models), so this throws instead of guessing a score.
 *
 * @throws DimensionMismatchError
 */
export function cosineSimilarity(a: Vector, b: Vector): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(
      `Cannot compare vectors of different dimensionality (${a.length} vs ${b.length})`
    );
  }

  let dot = 0;
  let sumSqA = 0;
  let sumSqB = 0;

  a.forEach((ai, i) => {
    const bi = b[i] ?? 0;
    dot += ai * bi;
    sumSqA += ai * ai;
    sumSqB += bi * bi;
  });

  if (sumSqA === 0 || sumSqB === 0) {
    throw new DimensionMismatchError('Cannot compare a zero-norm vector');
  }

  return dot / Math.sqrt(sumSqA * sumSqB);
}
