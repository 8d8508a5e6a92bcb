/**
 * SessionManager - creates, tracks and tears down dialogue sessions.
 *
 * Each session gets its own classifier, matcher, router and memory. The
 * only things shared between sessions are read-only banks (labelled
 * examples, pattern rules), the embedding provider, and the persistence
 * backend, which is written through a single MemoryConsolidator.
 *
 * Closing a session, explicitly or by idle timeout, aborts in-flight work,
 * waits for its queue to drain, stores a session summary in long-term
 * memory and flushes preferences and entries to the backend.
 */

import { randomUUID } from 'crypto';
import { DEFAULT_CORE_CONFIG, type CoreConfig } from '../config/schema.js';
import type { ClassificationLogger } from '../intent/classification-logger.js';
import { IntentExampleBank } from '../intent/example-bank.js';
import { IntentClassifier } from '../intent/intent-classifier.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { ContextualMemory, type FlushResult } from '../memory/contextual-memory.js';
import { MemoryConsolidator } from '../memory/memory-consolidator.js';
import { IntentRouter } from '../routing/intent-router.js';
import type { RouteHandler } from '../routing/types.js';
import { SemanticMatcher } from '../semantic/semantic-matcher.js';
import type { PersistenceBackend } from '../storage/persistence-backend.js';
import type { EmbeddingProvider } from '../types/embeddings.js';
import { Session } from './session.js';
import type { SessionCloseReport, SessionInfo, StartSessionOptions } from './types.js';

export interface SessionManagerOptions {
  config?: CoreConfig;
  /** Shared by every session's matcher; null disables the semantic stage */
  provider?: EmbeddingProvider | null;
  backend?: PersistenceBackend | null;
  /** Registered on every session's router, in order */
  handlers?: readonly RouteHandler[];
  examples?: IntentExampleBank;
  auditLog?: ClassificationLogger | null;
  logger?: Logger;
  now?: () => number;
  idFactory?: () => string;
}

const NOTHING_FLUSHED: FlushResult = { preferencesSaved: false, entriesWritten: 0 };

export class SessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly config: CoreConfig;
  private readonly provider: EmbeddingProvider | null;
  private readonly backend: PersistenceBackend | null;
  private readonly consolidator: MemoryConsolidator | null;
  private readonly handlers: readonly RouteHandler[];
  private readonly examples: IntentExampleBank;
  private readonly auditLog: ClassificationLogger | null;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly idFactory: () => string;

  constructor(options: SessionManagerOptions = {}) {
    this.config = options.config ?? DEFAULT_CORE_CONFIG;
    this.provider = options.provider ?? null;
    this.backend = options.backend ?? null;
    this.logger = options.logger ?? silentLogger;
    this.consolidator = this.backend
      ? new MemoryConsolidator(this.backend, { logger: this.logger.child('consolidator') })
      : null;
    this.handlers = options.handlers ?? [];
    this.examples = options.examples ?? IntentExampleBank.load();
    this.auditLog = options.auditLog ?? null;
    this.now = options.now ?? Date.now;
    this.idFactory = options.idFactory ?? randomUUID;
  }

  /**
   * Start a session and restore the user's persisted preferences.
   *
   * @throws Error if a session with this id is already active
   */
  async start(options: StartSessionOptions = {}): Promise<Session> {
    const id = options.id ?? this.idFactory();
    if (this.sessions.has(id)) {
      throw new Error(`Session "${id}" is already active`);
    }
    const userId = options.userId ?? id;
    const logger = this.logger.child(`session:${id}`);

    const matcher = this.provider
      ? new SemanticMatcher(this.provider, {
          cacheSize: this.config.embeddingCacheSize,
          timeoutMs: this.config.embeddingTimeoutMs,
          logger: logger.child('semantic'),
        })
      : null;

    const session = new Session({
      id,
      userId,
      metadata: options.metadata ?? {},
      now: this.now,
      matcher,
      memory: new ContextualMemory({
        sessionId: id,
        scope: userId,
        settings: this.config,
        matcher,
        backend: this.backend,
        logger: logger.child('memory'),
        now: this.now,
      }),
      classifier: new IntentClassifier({
        matcher,
        settings: this.config,
        examples: this.examples,
        logger: logger.child('intent'),
        auditLog: this.auditLog,
      }),
      router: new IntentRouter({
        clarificationThreshold: this.config.clarificationThreshold,
        handlers: this.handlers,
        logger: logger.child('router'),
      }),
    });
    this.sessions.set(id, session);

    const restored = await session.memory.restore();
    this.logger.info('session started', { sessionId: id, userId, restoredPreferences: restored });
    return session;
  }

  /** The active session with this id. */
  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  /** The active session with this id, started when missing. */
  async ensure(id: string, options: Omit<StartSessionOptions, 'id'> = {}): Promise<Session> {
    return this.sessions.get(id) ?? this.start({ ...options, id });
  }

  /**
   * Tear a session down. Returns null for an unknown id.
   */
  async close(
    id: string,
    reason = 'closed',
    state: SessionCloseReport['state'] = 'closed',
  ): Promise<SessionCloseReport | null> {
    const session = this.sessions.get(id);
    if (!session) return null;

    this.sessions.delete(id);
    session.teardown(state);
    await session.idle();

    const summary = await session.memory.storeSessionSummary(reason);
    const flush = this.consolidator ? await this.consolidator.flush(session.memory) : NOTHING_FLUSHED;

    this.logger.info('session closed', {
      sessionId: id,
      state,
      reason,
      entriesWritten: flush.entriesWritten,
    });
    return { sessionId: id, state, reason, summaryEntryId: summary?.id ?? null, flush };
  }

  /**
   * Expire every session idle for at least `sessionIdleTimeoutMs`.
   *
   * @returns Reports for the expired sessions
   */
  async expireIdle(now: number = this.now()): Promise<SessionCloseReport[]> {
    const idle = [...this.sessions.values()].filter(
      (session) => now - session.lastActivityAt >= this.config.sessionIdleTimeoutMs,
    );
    const reports: SessionCloseReport[] = [];
    for (const session of idle) {
      const report = await this.close(session.id, 'idle timeout', 'expired');
      if (report) reports.push(report);
    }
    return reports;
  }

  /** Close every active session. */
  async closeAll(reason = 'shutdown'): Promise<SessionCloseReport[]> {
    const reports: SessionCloseReport[] = [];
    for (const id of [...this.sessions.keys()]) {
      const report = await this.close(id, reason);
      if (report) reports.push(report);
    }
    return reports;
  }

  activeSessions(): SessionInfo[] {
    return [...this.sessions.values()].map((session) => session.info());
  }
}
