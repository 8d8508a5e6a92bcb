/**
 * SemanticMatcher - embedding-based text similarity.
 *
 * Wraps an EmbeddingProvider with an exact-string LRU cache and a
 * per-call timeout. Any provider failure (throw, timeout, malformed
 * vector) is absorbed: `embed()` answers null, the matcher reports
 * itself degraded, and every similarity it computes is 0. Callers never
 * see an embedding error.
 *
 * @example
 * ```ts
 * const matcher = new SemanticMatcher(new HeuristicEmbedder());
 * const matches = await matcher.mostSimilar('find tutorials', examples, 0.5);
 * // => [{ candidate: 'search for tutorials', index: 3, score: 0.71 }, ...]
 * ```
 */

import { EmbeddingCache } from '../embeddings/embedding-cache.js';
import { similarityScore } from '../embeddings/cosine-similarity.js';
import { EmbeddingUnavailableError, withTimeout } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { EmbeddingProvider, EmbeddingStats, EmbeddingVector } from '../types/embeddings.js';

// ============================================================================
// Types
// ============================================================================

export interface SemanticMatcherOptions {
  /** LRU cap; undefined means unbounded */
  cacheSize?: number;
  /** Per-embedding timeout in milliseconds */
  timeoutMs?: number;
  logger?: Logger;
}

/** A candidate string with its similarity to the query */
export interface SimilarityMatch {
  candidate: string;
  /** Position of the candidate in the input list */
  index: number;
  score: number;
}

/** A document with its similarity to the query */
export interface ScoredDocument<T> {
  document: T;
  index: number;
  score: number;
}

/** A pre-embedded item for rankVectors() */
export interface VectorItem<T> {
  item: T;
  vector: EmbeddingVector;
}

const DEFAULT_TIMEOUT_MS = 2000;

// ============================================================================
// SemanticMatcher
// ============================================================================

export class SemanticMatcher {
  private readonly cache: EmbeddingCache;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private degraded = false;
  private degradedCalls = 0;

  constructor(
    private readonly provider: EmbeddingProvider,
    options: SemanticMatcherOptions = {},
  ) {
    this.cache = new EmbeddingCache(options.cacheSize);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Embed text, or null when the provider is unavailable.
   *
   * Successful vectors are cached by exact text; failures are not, so a
   * recovered provider is retried on the next call.
   */
  async embed(text: string): Promise<EmbeddingVector | null> {
    const cached = this.cache.get(text);
    if (cached !== undefined) return cached;

    try {
      const vector = await withTimeout(this.provider.embed(text), this.timeoutMs, 'embedding');
      if (!isUsableVector(vector)) {
        throw new EmbeddingUnavailableError('Provider returned an empty or non-numeric vector');
      }
      this.cache.set(text, vector);
      this.degraded = false;
      return vector;
    } catch (err) {
      this.degraded = true;
      this.degradedCalls++;
      this.logger.warn('embedding unavailable, semantic scores degrade to 0', { error: err });
      return null;
    }
  }

  /** True when the most recent provider call failed. */
  isDegraded(): boolean {
    return this.degraded;
  }

  /**
   * Similarity of two texts in [0, 1]. Symmetric and deterministic for
   * a deterministic provider; 0 when either side cannot be embedded.
   */
  async similarity(a: string, b: string): Promise<number> {
    const va = await this.embed(a);
    if (va === null) return 0;
    const vb = await this.embed(b);
    if (vb === null) return 0;
    return similarityScore(va, vb);
  }

  /**
   * Candidates scoring at least `threshold`, best first. Equal scores
   * keep declaration order.
   */
  async mostSimilar(
    query: string,
    candidates: readonly string[],
    threshold = 0,
  ): Promise<SimilarityMatch[]> {
    const ranked = await this.search(query, candidates, candidates.length);
    return ranked
      .filter((hit) => hit.score >= threshold)
      .map((hit) => ({ candidate: hit.document, index: hit.index, score: hit.score }));
  }

  /**
   * Top-K documents by similarity to the query.
   *
   * @param getText - Extracts the text to embed; defaults to String(document)
   */
  async search<T>(
    query: string,
    documents: readonly T[],
    topK: number,
    getText: (document: T) => string = String,
  ): Promise<ScoredDocument<T>[]> {
    if (documents.length === 0 || topK <= 0) return [];

    const queryVector = await this.embed(query);
    if (queryVector === null) return [];

    const items: VectorItem<number>[] = [];
    for (let i = 0; i < documents.length; i++) {
      const vector = await this.embed(getText(documents[i]));
      if (vector === null) return [];
      items.push({ item: i, vector });
    }

    return this.rankVectors(queryVector, items, topK).map((hit) => ({
      document: documents[hit.document],
      index: hit.document,
      score: hit.score,
    }));
  }

  /**
   * Rank pre-embedded items against a query vector. Items with an empty
   * vector score 0.
   */
  rankVectors<T>(
    queryVector: EmbeddingVector,
    items: readonly VectorItem<T>[],
    topK: number,
  ): ScoredDocument<T>[] {
    const scored = items.map((entry, index) => ({
      document: entry.item,
      index,
      score: similarityScore(queryVector, entry.vector),
    }));
    // Array.prototype.sort is stable, so ties keep declaration order
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, Math.max(0, topK));
  }

  stats(): EmbeddingStats {
    const cache = this.cache.getStats();
    return {
      cacheHits: cache.hits,
      cacheMisses: cache.misses,
      cacheSize: cache.size,
      degradedCalls: this.degradedCalls,
    };
  }
}

function isUsableVector(value: unknown): value is EmbeddingVector {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((v) => typeof v === 'number' && Number.isFinite(v))
  );
}
