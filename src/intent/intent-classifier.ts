/**
 * Intent Classifier pipeline assembling all classification stages.
 *
 * 1. Pattern stage: declared rules, best rule per category
 * 2. Slot stage: slot extraction against each candidate's schema, a
 *    multiplicative penalty per missing required slot, and slot-only
 *    candidates when no rule matched at all
 * 3. Semantic stage (only when stages 1-2 are weak): best labelled
 *    example per category by embedding similarity
 * 4. Resolution: highest confidence, ties pattern > slot > semantic, then
 *    category priority; near-ties mark the intent ambiguous
 * 5. Topic-continuity boost from the previous turn's category
 * 6. Floor: anything weaker than the unknown floor becomes `unknown`
 *
 * classify() never throws and never returns null. It holds no
 * per-call mutable state, so identical text and context give identical
 * results and concurrent calls are safe.
 */

import { DEFAULT_CORE_CONFIG, type CoreConfig } from '../config/schema.js';
import { applySlotPenalty, extract, type ExtractionResult } from '../extraction/slot-extractor.js';
import { getSlotSchema, SLOT_SCHEMAS } from '../extraction/slot-schemas.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { SemanticMatcher } from '../semantic/semantic-matcher.js';
import {
  CATEGORY_PRIORITY,
  SOURCE_PRECEDENCE,
  clampConfidence,
  unknownIntent,
  type ClassificationContext,
  type Intent,
  type IntentAlternative,
  type IntentSource,
  type KnownCategory,
} from '../types/intent.js';
import type { ClassificationLogger } from './classification-logger.js';
import { IntentExampleBank } from './example-bank.js';
import { PATTERN_RULES, type PatternRule } from './pattern-rules.js';

// ============================================================================
// Types
// ============================================================================

export type ClassifierSettings = Pick<
  CoreConfig,
  | 'patternConfidence'
  | 'slotStageConfidence'
  | 'semanticTriggerThreshold'
  | 'semanticMatchThreshold'
  | 'unknownFloor'
  | 'contextBoost'
  | 'missingSlotPenalty'
  | 'ambiguityEpsilon'
>;

export interface IntentClassifierOptions {
  /** Semantic stage is skipped entirely without a matcher */
  matcher?: SemanticMatcher | null;
  settings?: Partial<ClassifierSettings>;
  rules?: readonly PatternRule[];
  examples?: IntentExampleBank;
  logger?: Logger;
  /** Optional JSONL audit trail */
  auditLog?: ClassificationLogger | null;
}

interface Candidate {
  category: KnownCategory;
  confidence: number;
  source: IntentSource;
  extraction: ExtractionResult;
}

export interface ClassifierModelInfo {
  ruleCount: number;
  rulesByCategory: Record<KnownCategory, number>;
  exampleCounts: Record<KnownCategory, number>;
  semanticEnabled: boolean;
  degraded: boolean;
  slotSchemas: string[];
}

// ============================================================================
// IntentClassifier
// ============================================================================

/**
 * @example
 * ```ts
 * const classifier = new IntentClassifier({ matcher: new SemanticMatcher(new HeuristicEmbedder()) });
 * const intent = await classifier.classify('search for TypeScript tutorials');
 * // => { category: 'fetch', confidence: 0.9, slots: { query: 'TypeScript tutorials', url: null }, source: 'pattern', ... }
 * ```
 */
export class IntentClassifier {
  private readonly settings: ClassifierSettings;
  private readonly rules: readonly PatternRule[];
  private readonly examples: IntentExampleBank;
  private readonly matcher: SemanticMatcher | null;
  private readonly logger: Logger;
  private readonly auditLog: ClassificationLogger | null;

  constructor(options: IntentClassifierOptions = {}) {
    this.settings = { ...DEFAULT_CORE_CONFIG, ...options.settings };
    this.rules = options.rules ?? PATTERN_RULES;
    this.examples = options.examples ?? IntentExampleBank.load();
    this.matcher = options.matcher ?? null;
    this.logger = options.logger ?? silentLogger;
    this.auditLog = options.auditLog ?? null;
  }

  /**
   * Pre-embed every labelled example so the first classification does
   * not pay for it. Optional.
   */
  async initialize(): Promise<void> {
    if (!this.matcher) return;
    for (const text of this.examples.texts()) {
      await this.matcher.embed(text);
    }
  }

  /**
   * Classify an utterance. Never throws; `unknown` with confidence 0 is
   * the floor.
   */
  async classify(text: string, context: ClassificationContext = {}, sessionId?: string): Promise<Intent> {
    let intent: Intent;
    try {
      intent = await this.classifyInternal(text, context);
    } catch (err) {
      this.logger.error('classification failed, returning unknown', { error: err });
      intent = unknownIntent();
    }

    if (this.auditLog) {
      await this.auditLog.log(intent, text, sessionId);
    }
    return intent;
  }

  getModelInfo(): ClassifierModelInfo {
    const rulesByCategory: Record<KnownCategory, number> = {
      command: 0,
      math: 0,
      code: 0,
      fetch: 0,
      question: 0,
      conversational: 0,
    };
    for (const rule of this.rules) {
      rulesByCategory[rule.category]++;
    }
    return {
      ruleCount: this.rules.length,
      rulesByCategory,
      exampleCounts: this.examples.countsByCategory(),
      semanticEnabled: this.matcher !== null,
      degraded: this.matcher?.isDegraded() ?? false,
      slotSchemas: Object.keys(SLOT_SCHEMAS),
    };
  }

  // --------------------------------------------------------------------------
  // Internal Pipeline
  // --------------------------------------------------------------------------

  private async classifyInternal(text: string, context: ClassificationContext): Promise<Intent> {
    const trimmed = text.trim();
    if (!trimmed) {
      return unknownIntent();
    }

    const extractions = new Map<KnownCategory, ExtractionResult>();
    const extractionFor = (category: KnownCategory): ExtractionResult => {
      let result = extractions.get(category);
      if (!result) {
        result = extract(trimmed, getSlotSchema(category), this.logger);
        extractions.set(category, result);
      }
      return result;
    };

    // ---- Stage 1 + 2: pattern rules with slot penalty ----
    const candidates: Candidate[] = [];
    for (const [category, confidence] of this.matchRules(trimmed)) {
      const extraction = extractionFor(category);
      candidates.push({
        category,
        confidence: applySlotPenalty(confidence, extraction.missingRequired.length, this.settings.missingSlotPenalty),
        source: 'pattern',
        extraction,
      });
    }

    // ---- Stage 2: slot-only candidates ----
    if (candidates.length === 0) {
      for (const category of CATEGORY_PRIORITY) {
        const schema = getSlotSchema(category);
        const required = schema.filter((slot) => slot.required).map((slot) => slot.name);
        if (required.length === 0) continue;
        const extraction = extractionFor(category);
        if (required.every((name) => extraction.patternFilled.includes(name))) {
          candidates.push({ category, confidence: this.settings.slotStageConfidence, source: 'slot', extraction });
        }
      }
    }

    // ---- Stage 3: semantic ----
    let degraded = false;
    const stageBest = candidates.reduce((max, c) => Math.max(max, c.confidence), 0);
    if (this.matcher && stageBest < this.settings.semanticTriggerThreshold) {
      const semantic = await this.semanticCandidates(trimmed, this.matcher);
      degraded = semantic.degraded;
      for (const { category, score } of semantic.best) {
        const extraction = extractionFor(category);
        candidates.push({
          category,
          confidence: applySlotPenalty(score, extraction.missingRequired.length, this.settings.missingSlotPenalty),
          source: 'semantic',
          extraction,
        });
      }
    }

    // ---- Stage 4: resolution ----
    const ranked = rankCandidates(candidates);
    const winner = ranked[0];
    const alternatives: IntentAlternative[] = ranked.slice(1).map((c) => ({
      category: c.category,
      confidence: clampConfidence(c.confidence),
      source: c.source,
    }));

    if (!winner) {
      return unknownIntent({ entities: extractionFor('conversational').entities, degraded });
    }

    const runnerUp = ranked[1];
    const ambiguous =
      runnerUp !== undefined && winner.confidence - runnerUp.confidence < this.settings.ambiguityEpsilon;
    if (ambiguous) {
      this.logger.debug('ambiguous classification', {
        text: trimmed,
        top: winner.category,
        runnerUp: runnerUp.category,
        gap: winner.confidence - runnerUp.confidence,
      });
    }

    // ---- Stage 5: topic continuity ----
    let confidence = winner.confidence;
    if (context.lastIntentCategory === winner.category) {
      confidence = Math.min(1, confidence + this.settings.contextBoost);
    }
    confidence = clampConfidence(confidence);

    // ---- Stage 6: floor ----
    if (confidence < this.settings.unknownFloor) {
      return unknownIntent({ entities: winner.extraction.entities, alternatives, degraded });
    }

    if (winner.extraction.missingRequired.length > 0) {
      this.logger.debug('missing required slots', {
        category: winner.category,
        missing: winner.extraction.missingRequired,
      });
    }

    return {
      category: winner.category,
      confidence,
      entities: winner.extraction.entities,
      slots: winner.extraction.slots,
      missingSlots: [...winner.extraction.missingRequired],
      source: winner.source,
      alternatives,
      ambiguous,
      degraded,
    };
  }

  /**
   * Best matching rule confidence per category.
   */
  private matchRules(text: string): Map<KnownCategory, number> {
    const best = new Map<KnownCategory, number>();
    for (const rule of this.rules) {
      if (!rule.pattern.test(text)) continue;
      const confidence = rule.confidence ?? this.settings.patternConfidence;
      if (confidence > (best.get(rule.category) ?? -1)) {
        best.set(rule.category, confidence);
      }
    }
    return best;
  }

  private async semanticCandidates(
    text: string,
    matcher: SemanticMatcher,
  ): Promise<{ best: Array<{ category: KnownCategory; score: number }>; degraded: boolean }> {
    const queryVector = await matcher.embed(text);
    if (queryVector === null) {
      return { best: [], degraded: true };
    }

    const examples = this.examples.examples;
    const matches = await matcher.mostSimilar(
      text,
      examples.map((e) => e.text),
      this.settings.semanticMatchThreshold,
    );

    const seen = new Set<KnownCategory>();
    const best: Array<{ category: KnownCategory; score: number }> = [];
    for (const match of matches) {
      const category = examples[match.index].category;
      if (seen.has(category)) continue;
      seen.add(category);
      best.push({ category, score: match.score });
    }
    return { best, degraded: matcher.isDegraded() };
  }
}

/**
 * One candidate per category (its strongest), best first: confidence
 * desc, then stage precedence, then category priority.
 */
function rankCandidates(candidates: Candidate[]): Candidate[] {
  const ordered = [...candidates].sort(
    (a, b) =>
      b.confidence - a.confidence ||
      SOURCE_PRECEDENCE[a.source] - SOURCE_PRECEDENCE[b.source] ||
      CATEGORY_PRIORITY.indexOf(a.category) - CATEGORY_PRIORITY.indexOf(b.category),
  );
  const seen = new Set<KnownCategory>();
  return ordered.filter((c) => {
    if (seen.has(c.category)) return false;
    seen.add(c.category);
    return true;
  });
}
