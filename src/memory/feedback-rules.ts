/**
 * Fixed rule table mapping recognizable phrases to preference updates.
 *
 * Request rules ("show me an example", "too hard") apply both to plain
 * utterances and to explicit feedback. Feedback rules apply only to
 * learnFromFeedback() and depend on its polarity and on what the
 * previous answer did.
 */

import type { PreferenceRecord, PreferenceValue } from '../types/memory.js';

// ============================================================================
// Types
// ============================================================================

export type FeedbackPolarity = 'positive' | 'negative' | 'neutral';

export interface PreferenceUpdate {
  category: string;
  key: string;
  value: PreferenceValue;
}

/** What the answer being judged did */
export interface FeedbackContext {
  usedExamples?: boolean;
  detailedExplanation?: boolean;
  [key: string]: unknown;
}

export type PreferenceLookup = (category: string, key: string) => PreferenceRecord | null;

export interface RuleInput {
  context: FeedbackContext;
  polarity: FeedbackPolarity;
  lookup: PreferenceLookup;
}

export interface FeedbackRule {
  name: string;
  /** request: utterances and feedback; feedback: learnFromFeedback only */
  scope: 'request' | 'feedback';
  matches(text: string, input: RuleInput): boolean;
  updates(input: RuleInput): PreferenceUpdate[];
}

export interface RuleEvaluation {
  matchedRules: string[];
  updates: PreferenceUpdate[];
}

// ============================================================================
// Polarity
// ============================================================================

const NEGATIVE =
  /\b(?:confusing|unclear|complicated|too\s+much|too\s+long|bad|wrong|useless|unhelpful|not\s+(?:helpful|clear|good|useful))\b/i;
const POSITIVE = /\b(?:good|great|perfect|helpful|clear|excellent|thanks|thank\s+you|nice|useful)\b/i;

/** Negative phrases are checked first so "not helpful" is negative. */
export function detectPolarity(text: string): FeedbackPolarity {
  if (NEGATIVE.test(text)) return 'negative';
  if (POSITIVE.test(text)) return 'positive';
  return 'neutral';
}

// ============================================================================
// Difficulty
// ============================================================================

export const DIFFICULTY_LEVELS = ['easy', 'medium', 'hard'] as const;

type DifficultyLevel = (typeof DIFFICULTY_LEVELS)[number];

function currentDifficulty(lookup: PreferenceLookup): DifficultyLevel {
  const value = lookup('difficulty', 'level')?.value;
  return DIFFICULTY_LEVELS.find((level) => level === value) ?? 'medium';
}

function shiftDifficulty(lookup: PreferenceLookup, step: 1 | -1): PreferenceUpdate[] {
  const index = DIFFICULTY_LEVELS.indexOf(currentDifficulty(lookup));
  const next = DIFFICULTY_LEVELS[Math.min(DIFFICULTY_LEVELS.length - 1, Math.max(0, index + step))];
  return [{ category: 'difficulty', key: 'level', value: next }];
}

// ============================================================================
// Rule table
// ============================================================================

function phrase(pattern: RegExp): (text: string) => boolean {
  return (text) => pattern.test(text);
}

export const FEEDBACK_RULES: readonly FeedbackRule[] = [
  {
    name: 'example-request',
    scope: 'request',
    matches: phrase(/\b(?:(?:show|give)\s+me\s+(?:an?\s+|some\s+)?examples?|for\s+example|with\s+examples?|example\s+please)\b/i),
    updates: () => [{ category: 'explanation_style', key: 'use_examples', value: true }],
  },
  {
    name: 'detail-request',
    scope: 'request',
    matches: phrase(/\b(?:more\s+detail(?:s|ed)?|in\s+detail|elaborate|go\s+deeper|explain\s+more)\b/i),
    updates: () => [{ category: 'explanation_style', key: 'detailed', value: true }],
  },
  {
    name: 'summary-request',
    scope: 'request',
    matches: phrase(/\b(?:summar(?:y|ize|ise)|tl;?dr|briefly|in\s+short|keep\s+it\s+short)\b/i),
    updates: () => [{ category: 'explanation_style', key: 'concise', value: true }],
  },
  {
    name: 'too-easy',
    scope: 'request',
    matches: phrase(/\btoo\s+(?:easy|simple|basic)\b/i),
    updates: ({ lookup }) => shiftDifficulty(lookup, 1),
  },
  {
    name: 'too-hard',
    scope: 'request',
    matches: phrase(/\btoo\s+(?:hard|difficult|advanced|complicated)\b/i),
    updates: ({ lookup }) => shiftDifficulty(lookup, -1),
  },
  {
    name: 'reinforce-examples',
    scope: 'feedback',
    matches: (_text, { polarity, context }) => polarity === 'positive' && context.usedExamples === true,
    updates: () => [{ category: 'explanation_style', key: 'use_examples', value: true }],
  },
  {
    name: 'prefer-concise',
    scope: 'feedback',
    matches: (_text, { polarity, context }) => polarity === 'negative' && context.detailedExplanation === true,
    updates: () => [{ category: 'explanation_style', key: 'concise', value: true }],
  },
];

/**
 * Evaluate the rule table against a text.
 *
 * @param includeFeedbackRules - false for plain utterances
 */
export function evaluateRules(
  text: string,
  input: RuleInput,
  includeFeedbackRules: boolean,
  rules: readonly FeedbackRule[] = FEEDBACK_RULES,
): RuleEvaluation {
  const matchedRules: string[] = [];
  const updates: PreferenceUpdate[] = [];
  for (const rule of rules) {
    if (rule.scope === 'feedback' && !includeFeedbackRules) continue;
    if (!rule.matches(text, input)) continue;
    matchedRules.push(rule.name);
    updates.push(...rule.updates(input));
  }
  return { matchedRules, updates };
}
