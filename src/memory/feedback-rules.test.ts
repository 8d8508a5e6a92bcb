import { describe, it, expect } from 'vitest';
import { detectPolarity, evaluateRules, type PreferenceLookup, type RuleInput } from './feedback-rules.js';
import type { PreferenceRecord } from '../types/memory.js';

function difficulty(value: string): PreferenceRecord {
  return {
    category: 'difficulty',
    key: 'level',
    value,
    confidence: 1,
    observationCount: 3,
    active: true,
    updatedAt: 1000,
  };
}

function input(overrides: Partial<RuleInput> = {}): RuleInput {
  return { context: {}, polarity: 'neutral', lookup: () => null, ...overrides };
}

describe('detectPolarity', () => {
  it('checks negative phrases before positive words', () => {
    expect(detectPolarity('that was not helpful at all')).toBe('negative');
    expect(detectPolarity('too confusing')).toBe('negative');
  });

  it('detects positive feedback', () => {
    expect(detectPolarity('thanks, that was great')).toBe('positive');
  });

  it('falls back to neutral', () => {
    expect(detectPolarity('ok')).toBe('neutral');
  });
});

describe('evaluateRules', () => {
  it('maps an example request to use_examples', () => {
    expect(evaluateRules('Show me an example', input(), false)).toEqual({
      matchedRules: ['example-request'],
      updates: [{ category: 'explanation_style', key: 'use_examples', value: true }],
    });
  });

  it('returns nothing for unmapped text', () => {
    expect(evaluateRules('what time is it', input(), true)).toEqual({ matchedRules: [], updates: [] });
  });

  it('raises difficulty from the medium default', () => {
    expect(evaluateRules('this is too easy', input(), false).updates).toEqual([
      { category: 'difficulty', key: 'level', value: 'hard' },
    ]);
  });

  it('lowers difficulty from the current preference', () => {
    const lookup: PreferenceLookup = () => difficulty('medium');
    expect(evaluateRules('way too hard', input({ lookup }), false).updates).toEqual([
      { category: 'difficulty', key: 'level', value: 'easy' },
    ]);
  });

  it('clamps difficulty at the ends of the scale', () => {
    expect(evaluateRules('too basic', input({ lookup: () => difficulty('hard') }), false).updates).toEqual([
      { category: 'difficulty', key: 'level', value: 'hard' },
    ]);
    expect(evaluateRules('too difficult', input({ lookup: () => difficulty('easy') }), false).updates).toEqual([
      { category: 'difficulty', key: 'level', value: 'easy' },
    ]);
  });

  it('treats an unrecognized stored difficulty as medium', () => {
    expect(evaluateRules('too simple', input({ lookup: () => difficulty('extreme') }), false).updates).toEqual([
      { category: 'difficulty', key: 'level', value: 'hard' },
    ]);
  });

  it('applies feedback rules only when asked', () => {
    const positive = input({ polarity: 'positive', context: { usedExamples: true } });
    expect(evaluateRules('great', positive, false).matchedRules).toEqual([]);
    expect(evaluateRules('great', positive, true).matchedRules).toEqual(['reinforce-examples']);
  });

  it('combines request and feedback rules in table order', () => {
    const negative = input({ polarity: 'negative', context: { detailedExplanation: true } });
    expect(evaluateRules('too much detail, keep it short', negative, true)).toEqual({
      matchedRules: ['summary-request', 'prefer-concise'],
      updates: [
        { category: 'explanation_style', key: 'concise', value: true },
        { category: 'explanation_style', key: 'concise', value: true },
      ],
    });
  });
});
