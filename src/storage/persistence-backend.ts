/**
 * Persistence backend contract consumed by long-term memory and
 * preferences.
 *
 * Keys are flat strings namespaced by prefix (`ltm:<scope>:<id>`,
 * `preferences:<scope>`). Values are plain JSON data; callers validate
 * what they load. `query` ranks stored values that carry an `embedding`
 * array against a query vector.
 */

import { z } from 'zod';
import { similarityScore } from '../embeddings/cosine-similarity.js';
import type { EmbeddingVector } from '../types/embeddings.js';

export interface QueryOptions {
  /** Only consider keys starting with this prefix */
  keyPrefix?: string;
}

export interface PersistedMatch {
  key: string;
  value: unknown;
  score: number;
}

export interface PersistenceBackend {
  save(key: string, value: unknown): Promise<void>;
  /** Resolves to undefined for an unknown key */
  load(key: string): Promise<unknown>;
  /** Resolves to false when the key was not stored */
  delete(key: string): Promise<boolean>;
  query(vector: EmbeddingVector, topK: number, options?: QueryOptions): Promise<PersistedMatch[]>;
}

// ============================================================================
// Key helpers
// ============================================================================

export function longTermKey(scope: string, id: string): string {
  return `ltm:${scope}:${id}`;
}

export function longTermPrefix(scope: string): string {
  return `ltm:${scope}:`;
}

export function preferencesKey(scope: string): string {
  return `preferences:${scope}`;
}

// ============================================================================
// Shared ranking
// ============================================================================

const EmbeddedValueSchema = z.object({ embedding: z.array(z.number()).min(1) }).passthrough();

/**
 * Rank key/value pairs by similarity of their `embedding` to `vector`.
 *
 * Values without a usable embedding are skipped. Ordering is score
 * descending, then iteration order.
 */
export function rankStoredValues(
  entries: Iterable<[string, unknown]>,
  vector: EmbeddingVector,
  topK: number,
  options: QueryOptions = {},
): PersistedMatch[] {
  if (topK <= 0 || vector.length === 0) return [];

  const scored: Array<PersistedMatch & { order: number }> = [];
  let order = 0;
  for (const [key, value] of entries) {
    if (options.keyPrefix !== undefined && !key.startsWith(options.keyPrefix)) continue;
    const parsed = EmbeddedValueSchema.safeParse(value);
    if (!parsed.success) continue;
    scored.push({ key, value, score: similarityScore(vector, parsed.data.embedding), order: order++ });
  }

  return scored
    .sort((a, b) => b.score - a.score || a.order - b.order)
    .slice(0, topK)
    .map(({ key, value, score }) => ({ key, value, score }));
}
