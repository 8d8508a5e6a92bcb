import { describe, it, expect } from 'vitest';
import { SessionManager } from './session-manager.js';
import { SessionUnavailableError } from '../errors.js';
import { createTurn } from '../memory/turn.js';
import { InMemoryPersistence } from '../storage/in-memory-persistence.js';
import { CoreConfigSchema } from '../config/schema.js';
import { unknownIntent } from '../types/intent.js';
import type { Session } from './session.js';

function exampleTurn(session: Session, text = 'show me an example') {
  return createTurn({
    utterance: { text, timestamp: 1000, sessionId: session.id },
    intent: unknownIntent({ category: 'question', confidence: 0.9 }),
  });
}

function setup(options: { backend?: InMemoryPersistence; idleTimeoutMs?: number } = {}) {
  let t = 0;
  let nextId = 1;
  const manager = new SessionManager({
    config: CoreConfigSchema.parse({ promotionThreshold: 1, sessionIdleTimeoutMs: options.idleTimeoutMs ?? 1000 }),
    backend: options.backend,
    now: () => t,
    idFactory: () => `sess-${nextId++}`,
  });
  return { manager, setTime: (value: number) => (t = value) };
}

describe('SessionManager.start', () => {
  it('starts an active session with generated ids', async () => {
    const { manager, setTime } = setup();
    setTime(250);
    const session = await manager.start({ metadata: { channel: 'test' } });

    expect(session.info()).toEqual({
      id: 'sess-1',
      userId: 'sess-1',
      startedAt: 250,
      lastActivityAt: 250,
      metadata: { channel: 'test' },
      state: 'active',
    });
    expect(manager.activeSessions().map((s) => s.id)).toEqual(['sess-1']);
  });

  it('rejects a duplicate id', async () => {
    const { manager } = setup();
    await manager.start({ id: 'a' });
    await expect(manager.start({ id: 'a' })).rejects.toThrow('Session "a" is already active');
  });

  it('ensure returns the existing session', async () => {
    const { manager } = setup();
    const first = await manager.ensure('a');
    expect(await manager.ensure('a')).toBe(first);
    expect(manager.get('a')).toBe(first);
    expect(manager.get('b')).toBeUndefined();
  });

  it('gives each session its own services', async () => {
    const { manager } = setup();
    const a = await manager.start({ id: 'a' });
    const b = await manager.start({ id: 'b' });
    expect(a.memory).not.toBe(b.memory);
    expect(a.classifier).not.toBe(b.classifier);
    expect(a.router).not.toBe(b.router);
  });
});

describe('SessionManager.close', () => {
  it('stores a summary and flushes memory to the backend', async () => {
    const backend = new InMemoryPersistence();
    const { manager } = setup({ backend });
    const session = await manager.start({ id: 's-1', userId: 'u-1' });
    await session.run(() => session.memory.addTurn(exampleTurn(session)));

    const report = await manager.close('s-1', 'user ended');
    expect(report).toMatchObject({
      sessionId: 's-1',
      state: 'closed',
      reason: 'user ended',
      flush: { preferencesSaved: true, entriesWritten: 1 },
    });
    expect(report?.summaryEntryId).toEqual(expect.any(String));
    expect(backend.keys()).toEqual(['preferences:u-1', `ltm:u-1:${report?.summaryEntryId}`]);
    expect(session.memory.longTerm.entries()[0].content).toBe('Session s-1 (user ended): 1 turns; intents: question x1');
  });

  it('refuses further work and forgets the session', async () => {
    const { manager } = setup();
    const session = await manager.start({ id: 's-1' });
    await manager.close('s-1');

    expect(session.state).toBe('closed');
    expect(session.signal.aborted).toBe(true);
    expect(manager.get('s-1')).toBeUndefined();
    await expect(session.run(() => 'late')).rejects.toBeInstanceOf(SessionUnavailableError);
    expect(await manager.close('s-1')).toBeNull();
  });

  it('aborts in-flight work and waits for it before flushing', async () => {
    const { manager } = setup();
    const session = await manager.start({ id: 's-1' });

    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const work = session.run(async (signal) => {
      await gate;
      return signal.aborted;
    });

    const closing = manager.close('s-1');
    release();
    expect(await work).toBe(true);
    expect(await closing).toMatchObject({ state: 'closed', summaryEntryId: null });
  });

  it('restores preferences for the next session of the same user', async () => {
    const backend = new InMemoryPersistence();
    const { manager } = setup({ backend });
    const first = await manager.start({ id: 's-1', userId: 'u-1' });
    await first.run(() => first.memory.addTurn(exampleTurn(first)));
    await manager.close('s-1');

    const second = await manager.start({ id: 's-2', userId: 'u-1' });
    expect(second.memory.preferences.getActive().map((r) => [r.category, r.key, r.value])).toEqual([
      ['explanation_style', 'use_examples', true],
    ]);
  });

  it('keeps what overlapping sessions of one user each learned', async () => {
    const backend = new InMemoryPersistence();
    const { manager } = setup({ backend });
    const a = await manager.start({ id: 'a', userId: 'u' });
    const b = await manager.start({ id: 'b', userId: 'u' });
    await a.run(() => a.memory.addTurn(exampleTurn(a)));
    await b.run(() => b.memory.addTurn(exampleTurn(b, 'keep it short')));
    await manager.close('a');
    await manager.close('b');

    const c = await manager.start({ id: 'c', userId: 'u' });
    expect(c.memory.preferences.getActive().map((r) => [r.category, r.key, r.value])).toEqual([
      ['explanation_style', 'use_examples', true],
      ['explanation_style', 'concise', true],
    ]);
    expect(c.memory.preferences.interactionCounts()).toEqual({ question: 2 });
  });
});

describe('SessionManager.expireIdle', () => {
  it('expires sessions idle for at least the timeout', async () => {
    const { manager, setTime } = setup({ idleTimeoutMs: 1000 });
    await manager.start({ id: 'a' });
    setTime(500);
    await manager.start({ id: 'b' });

    const reports = await manager.expireIdle(1200);
    expect(reports).toEqual([
      {
        sessionId: 'a',
        state: 'expired',
        reason: 'idle timeout',
        summaryEntryId: null,
        flush: { preferencesSaved: false, entriesWritten: 0 },
      },
    ]);
    expect(manager.activeSessions().map((s) => s.id)).toEqual(['b']);
  });

  it('counts submitted work as activity', async () => {
    const { manager, setTime } = setup({ idleTimeoutMs: 1000 });
    const session = await manager.start({ id: 'a' });
    setTime(900);
    await session.run(() => undefined);
    expect(await manager.expireIdle(1500)).toEqual([]);
    expect((await manager.expireIdle(1900)).map((r) => r.sessionId)).toEqual(['a']);
  });
});

describe('SessionManager.closeAll', () => {
  it('closes every active session', async () => {
    const { manager } = setup();
    await manager.start({ id: 'a' });
    await manager.start({ id: 'b' });
    const reports = await manager.closeAll();
    expect(reports.map((r) => [r.sessionId, r.reason])).toEqual([
      ['a', 'shutdown'],
      ['b', 'shutdown'],
    ]);
    expect(manager.activeSessions()).toEqual([]);
  });
});
