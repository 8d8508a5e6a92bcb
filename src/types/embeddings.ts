/**
 * Type definitions for the embedding infrastructure.
 */

/**
 * Embedding vector. Stored as a regular number array for JSON
 * serialization compatibility.
 */
export type EmbeddingVector = number[];

/**
 * Anything that can turn text into a fixed-size vector.
 *
 * Implementations may be remote or slow; callers wrap `embed` with a
 * timeout and treat any rejection as "embeddings unavailable".
 */
export interface EmbeddingProvider {
  embed(text: string): Promise<EmbeddingVector>;
}

/**
 * Counters reported by the semantic matcher.
 */
export interface EmbeddingStats {
  cacheHits: number;
  cacheMisses: number;
  cacheSize: number;
  /** Calls answered with null because the provider failed or timed out */
  degradedCalls: number;
}
