/**
 * Exact-string embedding cache with least-recently-used eviction.
 *
 * Keys are the raw input text. A Map preserves insertion order, so
 * re-inserting on access keeps the least recently used entry first.
 */

import type { EmbeddingVector } from '../types/embeddings.js';

export class EmbeddingCache {
  private entries = new Map<string, EmbeddingVector>();
  private hits = 0;
  private misses = 0;

  /**
   * @param maxEntries - Cap on cached vectors; `undefined` means unbounded
   */
  constructor(private readonly maxEntries?: number) {
    if (maxEntries !== undefined && (!Number.isInteger(maxEntries) || maxEntries < 0)) {
      throw new Error(`Cache size must be a non-negative integer, got ${maxEntries}`);
    }
  }

  get(text: string): EmbeddingVector | undefined {
    const vector = this.entries.get(text);
    if (vector === undefined) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    this.entries.delete(text);
    this.entries.set(text, vector);
    return vector;
  }

  set(text: string, vector: EmbeddingVector): void {
    if (this.maxEntries === 0) return;
    this.entries.delete(text);
    this.entries.set(text, vector);
    if (this.maxEntries !== undefined) {
      while (this.entries.size > this.maxEntries) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
      }
    }
  }

  has(text: string): boolean {
    return this.entries.has(text);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): { hits: number; misses: number; size: number } {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }
}
