/**
 * JSONL-file persistence backend.
 *
 * Every save appends one `{ key, value, savedAt }` line and every delete
 * a `{ key, deleted: true, savedAt }` tombstone; on load the last line
 * per key wins. Writes are serialized through a queue so concurrent
 * saves never interleave. `compact()` rewrites the file with one line
 * per key (write to temp, then rename).
 *
 * File format: one JSON object per line (JSONL)
 */

import { appendFile, mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { SerialQueue } from '../concurrency/serial-queue.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { EmbeddingVector } from '../types/embeddings.js';
import {
  rankStoredValues,
  type PersistedMatch,
  type PersistenceBackend,
  type QueryOptions,
} from './persistence-backend.js';

const PersistedLineSchema = z.object({
  key: z.string().min(1),
  value: z.unknown(),
  /** Unix ms */
  savedAt: z.number(),
  deleted: z.literal(true).optional(),
});

export class JsonlPersistence implements PersistenceBackend {
  private readonly filePath: string;
  private readonly logger: Logger;
  private readonly writes = new SerialQueue();
  private index: Promise<Map<string, unknown>> | null = null;

  /**
   * @param filePath - Path to the JSONL store, created on first save
   */
  constructor(filePath: string, options: { logger?: Logger } = {}) {
    this.filePath = filePath;
    this.logger = options.logger ?? silentLogger;
  }

  async save(key: string, value: unknown): Promise<void> {
    const index = await this.loadIndex();
    await this.append({ key, value, savedAt: Date.now() });
    index.delete(key);
    index.set(key, structuredClone(value));
  }

  async delete(key: string): Promise<boolean> {
    const index = await this.loadIndex();
    if (!index.has(key)) return false;
    await this.append({ key, deleted: true, savedAt: Date.now() });
    index.delete(key);
    return true;
  }

  async load(key: string): Promise<unknown> {
    const index = await this.loadIndex();
    return index.has(key) ? structuredClone(index.get(key)) : undefined;
  }

  async query(vector: EmbeddingVector, topK: number, options?: QueryOptions): Promise<PersistedMatch[]> {
    const index = await this.loadIndex();
    return rankStoredValues(index.entries(), vector, topK, options).map((match) => ({
      ...match,
      value: structuredClone(match.value),
    }));
  }

  /**
   * Rewrite the file keeping only the latest line per key.
   *
   * @returns Number of lines dropped
   */
  async compact(): Promise<number> {
    return this.writes.run(async () => {
      const { entries, lineCount } = await this.readFileEntries();
      const content = [...entries].map(([key, value]) => JSON.stringify({ key, value, savedAt: Date.now() })).join('\n');

      const tempPath = `${this.filePath}.${Date.now()}-${Math.random().toString(36).slice(2)}.tmp`;
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, content ? content + '\n' : '', 'utf-8');
      await rename(tempPath, this.filePath);

      this.index = Promise.resolve(entries);
      return lineCount - entries.size;
    });
  }

  // --------------------------------------------------------------------------
  // Internal
  // --------------------------------------------------------------------------

  private async append(record: z.input<typeof PersistedLineSchema>): Promise<void> {
    const line = JSON.stringify(record) + '\n';
    await this.writes.run(async () => {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, line, 'utf-8');
    });
  }

  private async loadIndex(): Promise<Map<string, unknown>> {
    if (!this.index) {
      this.index = this.readFileEntries().then((result) => result.entries);
    }
    return this.index;
  }

  /**
   * Replay the file. Missing file -> empty; malformed lines are skipped
   * with a warning.
   */
  private async readFileEntries(): Promise<{ entries: Map<string, unknown>; lineCount: number }> {
    const entries = new Map<string, unknown>();
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return { entries, lineCount: 0 };
      }
      throw err;
    }

    let lineCount = 0;
    for (const line of content.split('\n')) {
      if (!line.trim()) continue;
      lineCount++;

      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        this.logger.warn('skipping malformed line', { file: this.filePath, line: lineCount });
        continue;
      }
      const parsed = PersistedLineSchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.warn('skipping invalid record', { file: this.filePath, line: lineCount });
        continue;
      }
      // Re-insert so iteration order follows the latest write
      entries.delete(parsed.data.key);
      if (!parsed.data.deleted) entries.set(parsed.data.key, parsed.data.value);
    }
    return { entries, lineCount };
  }
}
