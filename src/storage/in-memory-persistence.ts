import type { EmbeddingVector } from '../types/embeddings.js';
import {
  rankStoredValues,
  type PersistedMatch,
  type PersistenceBackend,
  type QueryOptions,
} from './persistence-backend.js';

/**
 * Map-backed persistence for tests and single-process use.
 *
 * Values are cloned on the way in and out, so callers never share
 * mutable state with the store.
 */
export class InMemoryPersistence implements PersistenceBackend {
  private readonly data = new Map<string, unknown>();

  async save(key: string, value: unknown): Promise<void> {
    this.data.set(key, structuredClone(value));
  }

  async load(key: string): Promise<unknown> {
    return this.data.has(key) ? structuredClone(this.data.get(key)) : undefined;
  }

  async delete(key: string): Promise<boolean> {
    return this.data.delete(key);
  }

  async query(vector: EmbeddingVector, topK: number, options?: QueryOptions): Promise<PersistedMatch[]> {
    return rankStoredValues(this.data.entries(), vector, topK, options).map((match) => ({
      ...match,
      value: structuredClone(match.value),
    }));
  }

  /** Stored keys in insertion order. */
  keys(): string[] {
    return [...this.data.keys()];
  }

  get size(): number {
    return this.data.size;
  }
}
