/**
 * Append-only semantic store.
 *
 * Entries are embedded through the SemanticMatcher when stored. Nothing
 * is evicted implicitly: `prune()` is the only way entries leave, and
 * every prune is logged with the number removed. Pruned entries that were
 * already flushed are never recalled from the archive again and are
 * deleted from the backend on the next `flush()`.
 *
 * When a persistence backend is attached, `search()` also ranks archived
 * entries from earlier sessions of the same scope and merges them by id.
 */

import { randomUUID } from 'crypto';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { SemanticMatcher } from '../semantic/semantic-matcher.js';
import {
  longTermKey,
  longTermPrefix,
  type PersistenceBackend,
} from '../storage/persistence-backend.js';
import {
  LongTermEntrySchema,
  type LongTermEntry,
  type LongTermEntryType,
  type LongTermHit,
} from '../types/memory.js';

// ============================================================================
// Types
// ============================================================================

export interface StoreInput {
  type: LongTermEntryType;
  content: string;
  metadata?: Record<string, unknown>;
}

/** Remove entries older than `maxAgeMs` relative to `now`. */
export interface PruneByAge {
  maxAgeMs: number;
  now?: number;
}

/**
 * Keep at most `maxCount` entries: the newest, or with
 * `keepMostRelevant` the most accessed (newer first on ties).
 */
export interface PruneByCount {
  maxCount: number;
  keepMostRelevant?: boolean;
}

export type PruneOptions = PruneByAge | PruneByCount;

export interface LongTermMemoryOptions {
  /** Namespace for persisted keys, usually the user id */
  scope: string;
  matcher?: SemanticMatcher | null;
  backend?: PersistenceBackend | null;
  logger?: Logger;
  now?: () => number;
  idFactory?: () => string;
}

// ============================================================================
// LongTermMemory
// ============================================================================

export class LongTermMemory {
  readonly scope: string;
  private readonly matcher: SemanticMatcher | null;
  private readonly backend: PersistenceBackend | null;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly idFactory: () => string;
  private items: LongTermEntry[] = [];
  /** Ids written by flush() and not deleted since */
  private readonly flushedIds = new Set<string>();
  /** Ids pruned here; excluded from archived hits */
  private readonly prunedIds = new Set<string>();
  /** Pruned ids still stored in the backend */
  private readonly pendingDeletes = new Set<string>();

  constructor(options: LongTermMemoryOptions) {
    this.scope = options.scope;
    this.matcher = options.matcher ?? null;
    this.backend = options.backend ?? null;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.idFactory = options.idFactory ?? randomUUID;
  }

  /**
   * Embed and append an entry. Stored with an empty embedding when the
   * matcher is missing or degraded; such entries never rank in search.
   */
  async store(input: StoreInput): Promise<LongTermEntry> {
    const embedding = (await this.matcher?.embed(input.content)) ?? [];
    const entry: LongTermEntry = {
      id: this.idFactory(),
      type: input.type,
      content: input.content,
      embedding: [...embedding],
      metadata: { ...input.metadata },
      createdAt: this.now(),
      accessCount: 0,
    };
    this.items.push(entry);
    this.logger.debug('stored long-term entry', { id: entry.id, type: entry.type, embedded: embedding.length > 0 });
    return cloneEntry(entry);
  }

  /** Copies of the session's entries, in insertion order. */
  entries(): LongTermEntry[] {
    return this.items.map(cloneEntry);
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Nearest entries to the query, best first, as copies. Each hit's
   * access count is incremented before it is copied. Empty when
   * embeddings are unavailable.
   */
  async search(query: string, topK: number): Promise<LongTermHit[]> {
    if (!this.matcher || topK <= 0 || !query.trim()) return [];

    const queryVector = await this.matcher.embed(query);
    if (queryVector === null) return [];

    const local = this.matcher
      .rankVectors(
        queryVector,
        this.items
          .filter((entry) => entry.embedding.length > 0)
          .map((entry) => ({ item: entry, vector: entry.embedding })),
        topK,
      )
      .map((hit) => ({ entry: hit.document, score: hit.score }));

    const archived = await this.searchArchive(queryVector, topK);

    const byId = new Map<string, LongTermHit>();
    for (const hit of [...local, ...archived]) {
      const seen = byId.get(hit.entry.id);
      if (!seen || hit.score > seen.score) byId.set(hit.entry.id, hit);
    }

    const localIds = new Set(this.items.map((entry) => entry.id));
    const merged = [...byId.values()]
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);

    return merged.map((hit) => {
      hit.entry.accessCount++;
      if (localIds.has(hit.entry.id)) {
        return { entry: cloneEntry(hit.entry), score: hit.score };
      }
      this.logger.debug('archived entry recalled', { id: hit.entry.id });
      return hit;
    });
  }

  /**
   * Explicitly remove entries.
   *
   * @returns Number of entries removed
   */
  prune(options: PruneOptions): number {
    const previous = this.items;
    const before = previous.length;

    if ('maxAgeMs' in options) {
      const cutoff = (options.now ?? this.now()) - options.maxAgeMs;
      this.items = this.items.filter((entry) => entry.createdAt >= cutoff);
    } else {
      const maxCount = Math.max(0, options.maxCount);
      if (this.items.length > maxCount) {
        const ranked = this.items
          .map((entry, position) => ({ entry, position }))
          .sort((a, b) =>
            options.keepMostRelevant
              ? b.entry.accessCount - a.entry.accessCount ||
                b.entry.createdAt - a.entry.createdAt ||
                b.position - a.position
              : b.entry.createdAt - a.entry.createdAt || b.position - a.position,
          );
        const kept = new Set(ranked.slice(0, maxCount).map((r) => r.entry));
        this.items = this.items.filter((entry) => kept.has(entry));
      }
    }

    const survivors = new Set(this.items);
    for (const entry of previous) {
      if (survivors.has(entry)) continue;
      this.prunedIds.add(entry.id);
      if (this.flushedIds.has(entry.id)) this.pendingDeletes.add(entry.id);
    }

    const removed = before - this.items.length;
    this.logger.info('pruned long-term memory', {
      scope: this.scope,
      strategy: 'maxAgeMs' in options ? 'age' : options.keepMostRelevant ? 'relevance' : 'recency',
      removed,
      remaining: this.items.length,
    });
    return removed;
  }

  /**
   * Delete pruned entries from the backend, then write every remaining
   * entry under `ltm:<scope>:<id>`.
   *
   * @returns Number of entries written
   */
  async flush(backend: PersistenceBackend | null = this.backend): Promise<number> {
    if (!backend) return 0;
    for (const id of [...this.pendingDeletes]) {
      await backend.delete(longTermKey(this.scope, id));
      this.pendingDeletes.delete(id);
      this.flushedIds.delete(id);
    }
    for (const entry of this.items) {
      await backend.save(longTermKey(this.scope, entry.id), entry);
      this.flushedIds.add(entry.id);
    }
    return this.items.length;
  }

  // --------------------------------------------------------------------------
  // Internal
  // --------------------------------------------------------------------------

  private async searchArchive(queryVector: number[], topK: number): Promise<LongTermHit[]> {
    if (!this.backend) return [];
    try {
      const matches = await this.backend.query(queryVector, topK + this.pendingDeletes.size, {
        keyPrefix: longTermPrefix(this.scope),
      });
      const hits: LongTermHit[] = [];
      for (const match of matches) {
        const parsed = LongTermEntrySchema.safeParse(match.value);
        if (parsed.success && this.prunedIds.has(parsed.data.id)) continue;
        if (parsed.success) {
          hits.push({ entry: parsed.data, score: match.score });
        } else {
          this.logger.warn('skipping invalid archived entry', { key: match.key });
        }
      }
      return hits;
    } catch (err) {
      this.logger.warn('archive search failed, using session entries only', { error: err });
      return [];
    }
  }
}

function cloneEntry(entry: LongTermEntry): LongTermEntry {
  return { ...entry, embedding: [...entry.embedding], metadata: { ...entry.metadata } };
}
