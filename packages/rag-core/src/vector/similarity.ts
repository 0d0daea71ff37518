/**
 * Vector similarity engine
 * Pure comparison of fixed-length numeric vectors
 */

/**
 * Candidate position in the scanned corpus with its cosine score
 */
export type ScoredIndex = {
  index: number;
  score: number;
};

/**
 * Cosine similarity in [-1, 1]
 * Returns 0 for mismatched lengths, empty vectors or a zero magnitude
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * L2 distance, or Number.MAX_VALUE when the vectors are incomparable
 */
export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return Number.MAX_VALUE;
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }

  return Math.sqrt(sum);
}

/**
 * Scale to unit L2 norm; empty and all-zero vectors come back unchanged
 */
export function normalize(v: number[]): number[] {
  if (v.length === 0) {
    return v;
  }

  let norm = 0;
  for (const value of v) {
    norm += value * value;
  }
  norm = Math.sqrt(norm);

  if (norm === 0) {
    return v;
  }

  return v.map(value => value / norm);
}

/**
 * Rank vectors against a query by cosine similarity
 * Keeps scores >= threshold, orders by score desc then index asc, truncates to k
 */
export function topKBySimilarity(
  query: readonly number[],
  vectors: ReadonlyArray<readonly number[]>,
  k: number,
  threshold: number
): ScoredIndex[] {
  if (k <= 0 || vectors.length === 0) {
    return [];
  }

  const scored: ScoredIndex[] = [];

  vectors.forEach((vector, index) => {
    const score = cosineSimilarity(query, vector);
    if (score >= threshold) {
      scored.push({ index, score });
    }
  });

  scored.sort((a, b) => b.score - a.score || a.index - b.index);

  return scored.slice(0, k);
}
