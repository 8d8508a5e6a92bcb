import type { EmbeddingVector } from '../types/embeddings.js';

/**
 * Compute cosine similarity between two embedding vectors.
 *
 * Returns a value in the range [-1, 1]:
 * - 1.0: Identical direction (most similar)
 * - 0.0: Orthogonal (unrelated)
 * - -1.0: Opposite direction (most dissimilar)
 *
 * @throws Error if vectors have different lengths or are empty
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length === 0 || b.length === 0) {
    throw new Error('Vectors must not be empty');
  }

  if (a.length !== b.length) {
    throw new Error(`Vectors must have same length: got ${a.length} and ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);

  // Zero vectors are unrelated to everything, not NaN
  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}

/**
 * Cosine similarity mapped onto [0, 1] for scoring.
 *
 * Negative similarity is treated as unrelated. Empty or mismatched
 * vectors (e.g. stored while embeddings were unavailable) score 0.
 */
export function similarityScore(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return 0;
  }
  const raw = cosineSimilarity(a, b);
  if (Number.isNaN(raw)) return 0;
  return Math.min(1, Math.max(0, raw));
}
