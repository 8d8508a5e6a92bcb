import { describe, it, expect } from 'vitest';
import { MemoryConsolidator } from './memory-consolidator.js';
import { ContextualMemory } from './contextual-memory.js';
import { createTurn } from './turn.js';
import { InMemoryPersistence } from '../storage/in-memory-persistence.js';
import { createLogger } from '../logging/logger.js';
import { unknownIntent } from '../types/intent.js';
import type { EmbeddingVector } from '../types/embeddings.js';
import type { PersistedMatch, PersistenceBackend } from '../storage/persistence-backend.js';

/** Yields between operations and records the namespace of every save. */
class RecordingBackend implements PersistenceBackend {
  readonly saved: string[] = [];
  private readonly inner = new InMemoryPersistence();

  async save(key: string, value: unknown): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, 1));
    this.saved.push(key.split(':').slice(0, 2).join(':'));
    await this.inner.save(key, value);
  }

  load(key: string): Promise<unknown> {
    return this.inner.load(key);
  }

  delete(key: string): Promise<boolean> {
    return this.inner.delete(key);
  }

  query(vector: EmbeddingVector, topK: number): Promise<PersistedMatch[]> {
    return this.inner.query(vector, topK);
  }
}

async function memoryWithImportantTurn(scope: string) {
  const memory = new ContextualMemory({ sessionId: `${scope}-session`, scope });
  await memory.addTurn(
    createTurn({
      utterance: { text: 'remember this', timestamp: 1000, sessionId: `${scope}-session` },
      intent: unknownIntent({ category: 'conversational', confidence: 0.9 }),
      important: true,
    }),
  );
  return memory;
}

describe('MemoryConsolidator', () => {
  it('serializes flushes from concurrent sessions', async () => {
    const backend = new RecordingBackend();
    const consolidator = new MemoryConsolidator(backend);
    const a = await memoryWithImportantTurn('user-a');
    const b = await memoryWithImportantTurn('user-b');

    const pending = [consolidator.flush(a), consolidator.flush(b)];
    expect(consolidator.pending).toBe(2);
    await Promise.all(pending);

    expect(backend.saved).toEqual(['preferences:user-a', 'ltm:user-a', 'preferences:user-b', 'ltm:user-b']);
    expect(consolidator.pending).toBe(0);
  });

  it('consolidates several memories and logs a report', async () => {
    const lines: string[] = [];
    const backend = new InMemoryPersistence();
    const consolidator = new MemoryConsolidator(backend, {
      logger: createLogger('consolidator', { write: (line) => lines.push(line) }),
    });
    const memories = [await memoryWithImportantTurn('user-a'), await memoryWithImportantTurn('user-b')];

    expect(await consolidator.consolidate(memories)).toEqual({ sessions: 2, pruned: 0, entriesWritten: 2 });
    expect(backend.size).toBe(4);
    expect(lines).toEqual(['[consolidator] INFO consolidation complete {"sessions":2,"pruned":0,"entriesWritten":2}']);
  });

  it('prunes before flushing when asked', async () => {
    const backend = new InMemoryPersistence();
    const consolidator = new MemoryConsolidator(backend);
    const memories = [await memoryWithImportantTurn('user-a'), await memoryWithImportantTurn('user-b')];

    expect(await consolidator.consolidate(memories, { maxCount: 0 })).toEqual({
      sessions: 2,
      pruned: 2,
      entriesWritten: 0,
    });
    expect(memories.map((m) => m.longTerm.size)).toEqual([0, 0]);
  });

  it('deletes pruned entries that an earlier pass flushed', async () => {
    const backend = new InMemoryPersistence();
    const consolidator = new MemoryConsolidator(backend);
    const memory = await memoryWithImportantTurn('user-a');
    await consolidator.flush(memory);
    expect(backend.size).toBe(2);

    expect(await consolidator.consolidate([memory], { maxCount: 0 })).toEqual({
      sessions: 1,
      pruned: 1,
      entriesWritten: 0,
    });
    expect(backend.keys()).toEqual(['preferences:user-a']);
  });

  it('prunes a single memory under the lock', async () => {
    const consolidator = new MemoryConsolidator(new InMemoryPersistence());
    const memory = await memoryWithImportantTurn('user-a');
    expect(await consolidator.prune(memory, { maxCount: 5 })).toBe(0);
    expect(await consolidator.prune(memory, { maxAgeMs: 0, now: Number.MAX_SAFE_INTEGER })).toBe(1);
    await consolidator.idle();
    expect(consolidator.pending).toBe(0);
  });
});
