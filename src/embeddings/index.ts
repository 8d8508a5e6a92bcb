/**
 * Embedding infrastructure for semantic similarity.
 *
 * - Cosine similarity for comparing embedding vectors
 * - Heuristic feature-hashing embedder (the default provider)
 * - Exact-string LRU embedding cache
 */

export { cosineSimilarity, similarityScore } from './cosine-similarity.js';
export { HeuristicEmbedder, DEFAULT_EMBEDDING_DIMENSION, fnv1a } from './heuristic-embedder.js';
export { EmbeddingCache } from './embedding-cache.js';
