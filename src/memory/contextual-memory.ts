/**
 * Contextual Memory
 *
 * Per-session facade over the three memory tiers:
 * - ShortTermMemory: the last N turns
 * - LongTermMemory: important interactions, feedback and summaries
 * - UserPreferences: learned explanation style and difficulty
 *
 * One instance belongs to one session and is driven sequentially by that
 * session's queue. Nothing here is shared across sessions.
 */

import { DEFAULT_CORE_CONFIG, type CoreConfig } from '../config/schema.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { SemanticMatcher } from '../semantic/semantic-matcher.js';
import { preferencesKey, type PersistenceBackend } from '../storage/persistence-backend.js';
import type { IntentCategory } from '../types/intent.js';
import type { AdaptiveContext, LongTermEntry, PreferenceRecord, Turn } from '../types/memory.js';
import {
  detectPolarity,
  evaluateRules,
  type FeedbackContext,
  type FeedbackPolarity,
  type PreferenceUpdate,
} from './feedback-rules.js';
import { LongTermMemory } from './long-term-memory.js';
import { ShortTermMemory } from './short-term-memory.js';
import { UserPreferences } from './user-preferences.js';

// ============================================================================
// Types
// ============================================================================

export type MemorySettings = Pick<CoreConfig, 'shortTermCapacity' | 'promotionThreshold' | 'longTermTopK'>;

export interface ContextualMemoryOptions {
  sessionId: string;
  /** Persistence namespace shared across a user's sessions; defaults to sessionId */
  scope?: string;
  settings?: Partial<MemorySettings>;
  matcher?: SemanticMatcher | null;
  backend?: PersistenceBackend | null;
  logger?: Logger;
  now?: () => number;
}

export interface FeedbackOutcome {
  polarity: FeedbackPolarity;
  matchedRules: string[];
  updates: PreferenceUpdate[];
  /** Id of the verbatim feedback entry when no rule matched */
  storedEntryId: string | null;
  /** Id of the long-term entry created from the previous turn on positive feedback */
  promotedEntryId: string | null;
}

export interface LearningSummary {
  sessionId: string;
  turnCount: number;
  currentTopic: IntentCategory | null;
  activePreferences: PreferenceRecord[];
  mostCommonIntent: IntentCategory | null;
  interactionCounts: Partial<Record<IntentCategory, number>>;
  feedback: Record<FeedbackPolarity, number>;
  longTermEntries: number;
}

export interface FlushResult {
  preferencesSaved: boolean;
  entriesWritten: number;
}

// ============================================================================
// ContextualMemory
// ============================================================================

/**
 * @example
 * ```ts
 * const memory = new ContextualMemory({ sessionId: 's-1', matcher });
 * await memory.addTurn(turn);
 * const context = await memory.getAdaptiveContext('how do I sort a list?');
 * ```
 */
export class ContextualMemory {
  readonly sessionId: string;
  readonly scope: string;
  readonly shortTerm: ShortTermMemory;
  readonly longTerm: LongTermMemory;
  readonly preferences: UserPreferences;

  private readonly settings: MemorySettings;
  private readonly backend: PersistenceBackend | null;
  private readonly logger: Logger;
  private turnCount = 0;
  private readonly feedbackCounts: Record<FeedbackPolarity, number> = { positive: 0, negative: 0, neutral: 0 };
  private readonly promotedTurns = new WeakSet<Turn>();

  constructor(options: ContextualMemoryOptions) {
    this.sessionId = options.sessionId;
    this.scope = options.scope ?? options.sessionId;
    this.settings = { ...DEFAULT_CORE_CONFIG, ...options.settings };
    this.backend = options.backend ?? null;
    this.logger = options.logger ?? silentLogger;

    this.shortTerm = new ShortTermMemory(this.settings.shortTermCapacity);
    this.longTerm = new LongTermMemory({
      scope: this.scope,
      matcher: options.matcher,
      backend: this.backend,
      logger: this.logger.child('long-term'),
      now: options.now,
    });
    this.preferences = new UserPreferences({
      promotionThreshold: this.settings.promotionThreshold,
      logger: this.logger.child('preferences'),
      now: options.now,
    });
  }

  /**
   * Record a completed turn: short-term append, long-term promotion when
   * flagged important, preference observations from the utterance, and
   * the intent interaction count.
   */
  async addTurn(turn: Turn): Promise<void> {
    this.shortTerm.add(turn);
    this.turnCount++;

    if (turn.important) {
      await this.promote(turn);
    }

    const { updates } = evaluateRules(turn.utterance.text, this.ruleInput({}, 'neutral'), false);
    this.applyUpdates(updates);
    this.preferences.recordInteraction(turn.intent.category);
  }

  /**
   * Context for the next classification or response.
   *
   * @param query - Ranks long-term entries against it; none without a query
   * @param candidateCategory - Continuation is checked against it; without
   *   one, continuation means the last two turns share a category
   */
  async getAdaptiveContext(query?: string, candidateCategory?: IntentCategory): Promise<AdaptiveContext> {
    const history = this.shortTerm.turns();
    const last = history.at(-1);

    let isTopicContinuation: boolean;
    if (candidateCategory !== undefined) {
      isTopicContinuation = this.shortTerm.isTopicContinuation(candidateCategory);
    } else {
      const previous = history.at(-2);
      isTopicContinuation =
        last !== undefined && previous !== undefined && last.intent.category === previous.intent.category;
    }

    return {
      sessionId: this.sessionId,
      shortTermHistory: history,
      isTopicContinuation,
      currentTopic: last?.intent.category ?? null,
      activePreferences: this.preferences.getActive(),
      relevantLongTerm: query ? await this.longTerm.search(query, this.settings.longTermTopK) : [],
    };
  }

  /**
   * Learn from explicit feedback about the previous answer.
   *
   * Recognized phrases update preferences through the rule table; anything
   * unmapped is kept verbatim as a `feedback` entry. Positive feedback also
   * promotes the previous turn to long-term memory.
   */
  async learnFromFeedback(text: string, context: FeedbackContext = {}): Promise<FeedbackOutcome> {
    const polarity = detectPolarity(text);
    const { matchedRules, updates } = evaluateRules(text, this.ruleInput(context, polarity), true);
    this.applyUpdates(updates);
    this.feedbackCounts[polarity]++;

    let storedEntryId: string | null = null;
    if (matchedRules.length === 0) {
      const entry = await this.longTerm.store({
        type: 'feedback',
        content: text,
        metadata: { ...context, polarity, sessionId: this.sessionId },
      });
      storedEntryId = entry.id;
    }

    let promotedEntryId: string | null = null;
    const last = this.shortTerm.last();
    if (polarity === 'positive' && last) {
      promotedEntryId = (await this.promote(last))?.id ?? null;
    }

    this.logger.debug('feedback processed', { polarity, matchedRules });
    return { polarity, matchedRules, updates, storedEntryId, promotedEntryId };
  }

  getLearningSummary(): LearningSummary {
    return {
      sessionId: this.sessionId,
      turnCount: this.turnCount,
      currentTopic: this.shortTerm.last()?.intent.category ?? null,
      activePreferences: this.preferences.getActive(),
      mostCommonIntent: this.preferences.mostCommonIntent(),
      interactionCounts: this.preferences.interactionCounts(),
      feedback: { ...this.feedbackCounts },
      longTermEntries: this.longTerm.size,
    };
  }

  /**
   * Store a one-line summary of the session as a `summary` entry.
   * Returns null when the session recorded no turns.
   */
  async storeSessionSummary(reason: string): Promise<LongTermEntry | null> {
    if (this.turnCount === 0) return null;

    const counts = Object.entries(this.preferences.interactionCounts())
      .map(([category, count]) => `${category} x${count}`)
      .join(', ');
    return this.longTerm.store({
      type: 'summary',
      content: `Session ${this.sessionId} (${reason}): ${this.turnCount} turns; intents: ${counts}`,
      metadata: { sessionId: this.sessionId, reason, turnCount: this.turnCount },
    });
  }

  /**
   * Save preferences and long-term entries to a backend. Preferences are
   * merged into whatever the backend already holds for this scope.
   */
  async flush(backend: PersistenceBackend | null = this.backend): Promise<FlushResult> {
    if (!backend) return { preferencesSaved: false, entriesWritten: 0 };
    const key = preferencesKey(this.scope);
    await backend.save(key, this.preferences.mergeInto(await backend.load(key)));
    this.preferences.markPersisted();
    const entriesWritten = await this.longTerm.flush(backend);
    this.logger.debug('memory flushed', { scope: this.scope, entriesWritten });
    return { preferencesSaved: true, entriesWritten };
  }

  /**
   * Load previously flushed preferences for this scope.
   *
   * @returns Whether a valid snapshot was found and applied
   */
  async restore(backend: PersistenceBackend | null = this.backend): Promise<boolean> {
    if (!backend) return false;
    const stored = await backend.load(preferencesKey(this.scope));
    if (stored === undefined) return false;
    return this.preferences.restore(stored);
  }

  clear(): void {
    this.shortTerm.clear();
  }

  // --------------------------------------------------------------------------
  // Internal
  // --------------------------------------------------------------------------

  private ruleInput(context: FeedbackContext, polarity: FeedbackPolarity) {
    return {
      context,
      polarity,
      lookup: (category: string, key: string) => this.preferences.get(category, key),
    };
  }

  private applyUpdates(updates: PreferenceUpdate[]): void {
    for (const update of updates) {
      this.preferences.learn(update.category, update.key, update.value);
    }
  }

  private async promote(turn: Turn): Promise<LongTermEntry | null> {
    if (this.promotedTurns.has(turn)) return null;
    this.promotedTurns.add(turn);
    return this.longTerm.store({
      type: 'interaction',
      content: `User: ${turn.utterance.text}\nAssistant: ${turn.response}`,
      metadata: { ...turn.metadata, category: turn.intent.category, sessionId: turn.utterance.sessionId },
    });
  }
}
