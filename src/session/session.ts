/**
 * One dialogue session and the services it owns.
 *
 * Every piece of work for a session goes through its SerialQueue, so
 * turns are processed one at a time in submission order. Teardown aborts
 * the session's signal first; work still in flight checks the signal
 * and discards its results instead of writing them to memory.
 */

import { SerialQueue } from '../concurrency/serial-queue.js';
import { SessionUnavailableError } from '../errors.js';
import type { IntentClassifier } from '../intent/intent-classifier.js';
import type { ContextualMemory } from '../memory/contextual-memory.js';
import type { IntentRouter } from '../routing/intent-router.js';
import type { SemanticMatcher } from '../semantic/semantic-matcher.js';
import type { SessionInfo, SessionState } from './types.js';

export interface SessionServices {
  memory: ContextualMemory;
  classifier: IntentClassifier;
  matcher: SemanticMatcher | null;
  router: IntentRouter;
}

export interface SessionInit extends SessionServices {
  id: string;
  userId: string;
  metadata: Record<string, unknown>;
  now: () => number;
}

export class Session {
  readonly id: string;
  readonly userId: string;
  readonly startedAt: number;
  readonly metadata: Record<string, unknown>;
  readonly memory: ContextualMemory;
  readonly classifier: IntentClassifier;
  readonly matcher: SemanticMatcher | null;
  readonly router: IntentRouter;

  private readonly queue = new SerialQueue();
  private readonly controller = new AbortController();
  private readonly now: () => number;
  private lastActivity: number;
  private currentState: SessionState = 'active';

  constructor(init: SessionInit) {
    this.id = init.id;
    this.userId = init.userId;
    this.metadata = { ...init.metadata };
    this.memory = init.memory;
    this.classifier = init.classifier;
    this.matcher = init.matcher;
    this.router = init.router;
    this.now = init.now;
    this.startedAt = this.now();
    this.lastActivity = this.startedAt;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get lastActivityAt(): number {
    return this.lastActivity;
  }

  /** Aborted once the session is torn down. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Queue work for this session.
   *
   * @throws SessionUnavailableError if the session is no longer active
   */
  run<T>(task: (signal: AbortSignal) => Promise<T> | T): Promise<T> {
    if (this.currentState !== 'active') {
      return Promise.reject(new SessionUnavailableError(this.id, 'closed'));
    }
    this.lastActivity = this.now();
    return this.queue.run(() => task(this.controller.signal));
  }

  /** Resolves once all queued work has settled. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  /** Stop accepting work and abort what is in flight. Idempotent. */
  teardown(state: Exclude<SessionState, 'active'>): void {
    if (this.currentState !== 'active') return;
    this.currentState = state;
    this.controller.abort();
  }

  info(): SessionInfo {
    return {
      id: this.id,
      userId: this.userId,
      startedAt: this.startedAt,
      lastActivityAt: this.lastActivity,
      metadata: { ...this.metadata },
      state: this.currentState,
    };
  }
}
