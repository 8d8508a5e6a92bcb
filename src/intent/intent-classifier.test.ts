/**
 * Tests for the IntentClassifier pipeline.
 *
 * Pattern-stage cases run without a matcher so every expected value
 * follows from the declared rules. Semantic cases use the deterministic
 * heuristic embedder or a failing provider.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { IntentClassifier } from './intent-classifier.js';
import { ClassificationLogger } from './classification-logger.js';
import { SemanticMatcher } from '../semantic/semantic-matcher.js';
import { HeuristicEmbedder } from '../embeddings/heuristic-embedder.js';
import { createLogger } from '../logging/logger.js';
import type { EmbeddingProvider } from '../types/embeddings.js';

const failingProvider: EmbeddingProvider = {
  embed: async () => {
    throw new Error('provider offline');
  },
};

// ============================================================================
// Pattern stage
// ============================================================================

describe('IntentClassifier - pattern stage', () => {
  const classifier = new IntentClassifier();

  it('classifies a web search with its query slot', async () => {
    const intent = await classifier.classify('search for TypeScript tutorials');
    expect(intent.category).toBe('fetch');
    expect(intent.confidence).toBe(0.9);
    expect(intent.source).toBe('pattern');
    expect(intent.slots).toEqual({ query: 'TypeScript tutorials', url: null });
    expect(intent.missingSlots).toEqual([]);
    expect(intent.alternatives).toEqual([{ category: 'code', confidence: 0.5, source: 'pattern' }]);
    expect(intent.ambiguous).toBe(false);
  });

  it('penalises a missing required slot', async () => {
    const intent = await classifier.classify('search for');
    expect(intent.category).toBe('fetch');
    expect(intent.confidence).toBeCloseTo(0.81, 10);
    expect(intent.missingSlots).toEqual(['query']);
  });

  it('breaks an equal-confidence tie by category priority', async () => {
    const intent = await classifier.classify('what is 12 * 4');
    expect(intent.category).toBe('math');
    expect(intent.slots.expression).toBe('12 * 4');
    expect(intent.ambiguous).toBe(true);
    expect(intent.alternatives[0]).toEqual({ category: 'question', confidence: 0.9, source: 'pattern' });
  });

  it('recognises a greeting', async () => {
    const intent = await classifier.classify('hello there');
    expect(intent.category).toBe('conversational');
    expect(intent.confidence).toBe(0.9);
  });

  it('treats "how are you" as small talk', async () => {
    expect((await classifier.classify('how are you')).category).toBe('conversational');
  });

  it('fills a command target', async () => {
    const intent = await classifier.classify('open spotify');
    expect(intent.category).toBe('command');
    expect(intent.slots.target).toBe('spotify');
    expect(intent.entities.application?.value).toBe('spotify');
  });
});

// ============================================================================
// Slot stage
// ============================================================================

describe('IntentClassifier - slot stage', () => {
  it('proposes a slot candidate when no rule matched', async () => {
    const classifier = new IntentClassifier();
    const intent = await classifier.classify('could you calculate 12 * 4 for me');
    expect(intent.category).toBe('math');
    expect(intent.source).toBe('slot');
    expect(intent.confidence).toBe(0.7);
    expect(intent.slots).toEqual({ expression: '12 * 4' });
  });
});

// ============================================================================
// Semantic stage
// ============================================================================

describe('IntentClassifier - semantic stage', () => {
  it('matches a labelled example when no rule applies', async () => {
    const classifier = new IntentClassifier({ matcher: new SemanticMatcher(new HeuristicEmbedder()) });
    const intent = await classifier.classify('nice to meet you');
    expect(intent.category).toBe('conversational');
    expect(intent.source).toBe('semantic');
    expect(intent.confidence).toBeCloseTo(1, 5);
    expect(intent.degraded).toBe(false);
  });

  it('degrades to unknown when the provider fails', async () => {
    const classifier = new IntentClassifier({ matcher: new SemanticMatcher(failingProvider) });
    const intent = await classifier.classify('nice to meet you');
    expect(intent.category).toBe('unknown');
    expect(intent.confidence).toBe(0);
    expect(intent.degraded).toBe(true);
  });

  it('skips the semantic stage when a rule is confident', async () => {
    const classifier = new IntentClassifier({ matcher: new SemanticMatcher(failingProvider) });
    const intent = await classifier.classify('hello there');
    expect(intent.category).toBe('conversational');
    expect(intent.degraded).toBe(false);
  });

  it('returns unknown below 0.5 for a typo-like input', async () => {
    const classifier = new IntentClassifier({ matcher: new SemanticMatcher(new HeuristicEmbedder()) });
    const intent = await classifier.classify('hlo');
    expect(intent.category).toBe('unknown');
    expect(intent.confidence).toBeLessThan(0.5);
  });
});

// ============================================================================
// Context, floor and robustness
// ============================================================================

describe('IntentClassifier - context and floor', () => {
  const classifier = new IntentClassifier();

  it('boosts confidence when the topic continues', async () => {
    const intent = await classifier.classify('hello there', { lastIntentCategory: 'conversational' });
    expect(intent.confidence).toBeCloseTo(1, 10);
  });

  it('does not boost a different topic', async () => {
    const intent = await classifier.classify('hello there', { lastIntentCategory: 'math' });
    expect(intent.confidence).toBe(0.9);
  });

  it('returns unknown with confidence 0 for empty input', async () => {
    for (const text of ['', '   ']) {
      const intent = await classifier.classify(text);
      expect(intent.category).toBe('unknown');
      expect(intent.confidence).toBe(0);
      expect(intent.source).toBe('fallback');
    }
  });

  it('falls back when the best candidate is under the floor', async () => {
    const weak = new IntentClassifier({
      rules: [{ name: 'weak', category: 'code', pattern: /zzz/, confidence: 0.2 }],
    });
    const intent = await weak.classify('zzz');
    expect(intent.category).toBe('unknown');
    expect(intent.confidence).toBe(0);
  });

  it('is idempotent for identical text and context', async () => {
    const semantic = new IntentClassifier({ matcher: new SemanticMatcher(new HeuristicEmbedder()) });
    const context = { lastIntentCategory: 'fetch' as const };
    const first = await semantic.classify('find me the latest news on rust', context);
    const second = await semantic.classify('find me the latest news on rust', context);
    expect(second).toEqual(first);
  });

  it('keeps confidence within [0, 1] for assorted inputs', async () => {
    const inputs = ['?', '!!!', '12 + 4', 'open', 'x'.repeat(500), 'what', '```', 'thanks!!'];
    for (const text of inputs) {
      const intent = await classifier.classify(text, { lastIntentCategory: 'question' });
      expect(intent.confidence).toBeGreaterThanOrEqual(0);
      expect(intent.confidence).toBeLessThanOrEqual(1);
      expect(intent.category).toBeTruthy();
    }
  });

  it('never throws when a rule blows up', async () => {
    class ExplodingPattern extends RegExp {
      override test(): boolean {
        throw new Error('boom');
      }
    }
    const lines: string[] = [];
    const broken = new IntentClassifier({
      rules: [{ name: 'broken', category: 'code', pattern: new ExplodingPattern('x') }],
      logger: createLogger('intent', { write: (line) => lines.push(line) }),
    });

    const intent = await broken.classify('anything');
    expect(intent.category).toBe('unknown');
    expect(lines[0].startsWith('[intent] ERROR classification failed')).toBe(true);
  });
});

// ============================================================================
// Model info and audit trail
// ============================================================================

describe('IntentClassifier - model info', () => {
  it('reports rule and example counts', () => {
    const info = new IntentClassifier().getModelInfo();
    expect(info.ruleCount).toBe(25);
    expect(info.rulesByCategory.math).toBe(5);
    expect(info.exampleCounts).toEqual({
      command: 10,
      math: 8,
      code: 9,
      fetch: 8,
      question: 8,
      conversational: 10,
    });
    expect(info.semanticEnabled).toBe(false);
  });
});

describe('IntentClassifier - audit log', () => {
  let tmpDir: string | undefined;

  afterEach(async () => {
    if (tmpDir) await rm(tmpDir, { recursive: true, force: true });
  });

  it('appends every classification to the audit trail', async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'intent-audit-'));
    const auditLog = new ClassificationLogger(tmpDir);
    const classifier = new IntentClassifier({ auditLog });

    await classifier.classify('hello there', {}, 'session-a');
    await classifier.classify('search for', {}, 'session-a');

    const entries = await auditLog.readAll();
    expect(entries.map((e) => [e.category, e.missingSlots])).toEqual([
      ['conversational', []],
      ['fetch', ['query']],
    ]);
    expect(entries[0].sessionId).toBe('session-a');
  });
});
