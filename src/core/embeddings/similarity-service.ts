/**
 * Vector similarity
 *
 * @module
 */

/**
 * Cosine similarity of two vectors. Vectors of different length, or with a
 * zero magnitude, score 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    return 0;
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  a.forEach((aVal, i) => {
    const bVal = b[i] ?? 0;
    dotProduct += aVal * bVal;
    normA += aVal * aVal;
    normB += bVal * bVal;
  });

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}

/**
 * Scales a vector to unit length; the zero vector is returned unchanged.
 */
export function normalize(vector: readonly number[]): number[] {
  const magnitude = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  return magnitude === 0 ? [...vector] : vector.map((value) => value / magnitude);
}
