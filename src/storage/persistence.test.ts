import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { InMemoryPersistence } from './in-memory-persistence.js';
import { JsonlPersistence } from './jsonl-persistence.js';
import { longTermKey, longTermPrefix, preferencesKey, rankStoredValues } from './persistence-backend.js';
import { createLogger } from '../logging/logger.js';

// ============================================================================
// Key helpers and ranking
// ============================================================================

describe('persistence keys', () => {
  it('namespaces long-term entries and preferences', () => {
    expect(longTermKey('user-1', 'abc')).toBe('ltm:user-1:abc');
    expect(longTermPrefix('user-1')).toBe('ltm:user-1:');
    expect(preferencesKey('user-1')).toBe('preferences:user-1');
  });
});

describe('rankStoredValues', () => {
  const entries: Array<[string, unknown]> = [
    ['ltm:a:1', { embedding: [1, 0], content: 'same' }],
    ['ltm:a:2', { embedding: [0, 1], content: 'orthogonal' }],
    ['ltm:b:1', { embedding: [1, 0], content: 'other scope' }],
    ['preferences:a', { records: [] }],
    ['ltm:a:3', { embedding: [1, 0], content: 'tie' }],
  ];

  it('skips values without an embedding and sorts by score then order', () => {
    const matches = rankStoredValues(entries, [1, 0], 10);
    expect(matches.map((m) => [m.key, m.score])).toEqual([
      ['ltm:a:1', 1],
      ['ltm:b:1', 1],
      ['ltm:a:3', 1],
      ['ltm:a:2', 0],
    ]);
  });

  it('filters by key prefix and honours topK', () => {
    const matches = rankStoredValues(entries, [1, 0], 1, { keyPrefix: 'ltm:b:' });
    expect(matches.map((m) => m.key)).toEqual(['ltm:b:1']);
  });

  it('returns nothing for an empty query vector or topK of 0', () => {
    expect(rankStoredValues(entries, [], 5)).toEqual([]);
    expect(rankStoredValues(entries, [1, 0], 0)).toEqual([]);
  });
});

// ============================================================================
// InMemoryPersistence
// ============================================================================

describe('InMemoryPersistence', () => {
  it('round-trips values and returns undefined for unknown keys', async () => {
    const store = new InMemoryPersistence();
    await store.save('preferences:a', { records: [1, 2] });
    expect(await store.load('preferences:a')).toEqual({ records: [1, 2] });
    expect(await store.load('missing')).toBeUndefined();
    expect(store.size).toBe(1);
  });

  it('does not share mutable state with callers', async () => {
    const store = new InMemoryPersistence();
    const value = { list: ['a'] };
    await store.save('k', value);
    value.list.push('b');
    expect(await store.load('k')).toEqual({ list: ['a'] });
  });

  it('queries stored embeddings', async () => {
    const store = new InMemoryPersistence();
    await store.save('ltm:s:1', { embedding: [0, 1] });
    await store.save('ltm:s:2', { embedding: [1, 0] });
    const matches = await store.query([1, 0], 1, { keyPrefix: 'ltm:s:' });
    expect(matches).toEqual([{ key: 'ltm:s:2', value: { embedding: [1, 0] }, score: 1 }]);
  });

  it('deletes keys', async () => {
    const store = new InMemoryPersistence();
    await store.save('ltm:s:1', { embedding: [1, 0] });
    expect(await store.delete('ltm:s:1')).toBe(true);
    expect(await store.delete('ltm:s:1')).toBe(false);
    expect(await store.query([1, 0], 5)).toEqual([]);
  });
});

// ============================================================================
// JsonlPersistence
// ============================================================================

describe('JsonlPersistence', () => {
  let tmpDir: string;
  let filePath: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'jsonl-persist-'));
    filePath = join(tmpDir, 'nested', 'store.jsonl');
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('appends one line per save and reloads the latest value per key', async () => {
    const store = new JsonlPersistence(filePath);
    await store.save('a', { n: 1 });
    await store.save('a', { n: 2 });
    await store.save('b', 'text');

    const lines = (await readFile(filePath, 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(3);

    const reopened = new JsonlPersistence(filePath);
    expect(await reopened.load('a')).toEqual({ n: 2 });
    expect(await reopened.load('b')).toBe('text');
    expect(await reopened.load('c')).toBeUndefined();
  });

  it('returns undefined when the file does not exist', async () => {
    expect(await new JsonlPersistence(filePath).load('a')).toBeUndefined();
  });

  it('serializes concurrent saves', async () => {
    const store = new JsonlPersistence(filePath);
    await Promise.all(Array.from({ length: 20 }, (_, i) => store.save(`k${i}`, i)));

    const reopened = new JsonlPersistence(filePath);
    for (let i = 0; i < 20; i++) {
      expect(await reopened.load(`k${i}`)).toBe(i);
    }
  });

  it('skips malformed lines with a warning', async () => {
    const lines: string[] = [];
    await writeFile(join(tmpDir, 'bad.jsonl'), 'not json\n{"key":"x"}\n{"key":"ok","value":1,"savedAt":0}\n', 'utf-8');
    const store = new JsonlPersistence(join(tmpDir, 'bad.jsonl'), {
      logger: createLogger('store', { write: (line) => lines.push(line) }),
    });

    expect(await store.load('ok')).toBe(1);
    expect(lines).toHaveLength(2);
    expect(lines[0].startsWith('[store] WARN skipping malformed line')).toBe(true);
    expect(lines[1].startsWith('[store] WARN skipping invalid record')).toBe(true);
  });

  it('ranks archived embeddings', async () => {
    const store = new JsonlPersistence(filePath);
    await store.save('ltm:u:1', { embedding: [1, 0], content: 'first' });
    await store.save('ltm:u:2', { embedding: [0.6, 0.8], content: 'second' });
    await store.save('preferences:u', { records: [] });

    const matches = await new JsonlPersistence(filePath).query([0, 1], 5, { keyPrefix: 'ltm:u:' });
    expect(matches.map((m) => m.key)).toEqual(['ltm:u:2', 'ltm:u:1']);
    expect(matches[0].score).toBeCloseTo(0.8, 10);
  });

  it('records deletes as tombstones that survive a reopen', async () => {
    const store = new JsonlPersistence(filePath);
    await store.save('ltm:u:1', { embedding: [1, 0] });
    await store.save('ltm:u:2', { embedding: [0, 1] });

    expect(await store.delete('ltm:u:1')).toBe(true);
    expect(await store.delete('missing')).toBe(false);
    expect(await store.load('ltm:u:1')).toBeUndefined();

    const lines = (await readFile(filePath, 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(3);
    expect(JSON.parse(lines[2])).toMatchObject({ key: 'ltm:u:1', deleted: true });

    const reopened = new JsonlPersistence(filePath);
    expect(await reopened.load('ltm:u:1')).toBeUndefined();
    expect((await reopened.query([1, 0], 5)).map((m) => m.key)).toEqual(['ltm:u:2']);
  });

  it('drops tombstones when compacting', async () => {
    const store = new JsonlPersistence(filePath);
    await store.save('a', 1);
    await store.save('b', 2);
    await store.delete('a');

    expect(await store.compact()).toBe(2);
    const lines = (await readFile(filePath, 'utf-8')).trim().split('\n');
    expect(lines.map((line) => JSON.parse(line).key)).toEqual(['b']);
  });

  it('compacts the file to one line per key', async () => {
    const store = new JsonlPersistence(filePath);
    await store.save('a', 1);
    await store.save('a', 2);
    await store.save('b', 3);

    expect(await store.compact()).toBe(1);
    const lines = (await readFile(filePath, 'utf-8')).trim().split('\n');
    expect(lines.map((line) => JSON.parse(line).key)).toEqual(['a', 'b']);
    expect(await store.load('a')).toBe(2);
  });
});
