/**
 * Typed entity matchers, declared in priority order.
 *
 * Order matters only for overlap ties: when two matches cover the same
 * span length, the type declared earlier wins. `identifier` and `amount`
 * have no pattern of their own; they are refinements of `number`
 * decided from surrounding keywords.
 */

import type { EntityType } from '../types/intent.js';

// ============================================================================
// Regex Patterns
// ============================================================================

const MONTH =
  '(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)';

const WEEKDAY = '(?:monday|tuesday|wednesday|thursday|friday|saturday|sunday)';

/** http(s) URL; trailing sentence punctuation is left out of the match */
const URL_PATTERN = /\bhttps?:\/\/[^\s<>"']*[^\s<>"'.,;:!?)]/gi;

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

/**
 * Rooted or relative paths (`/etc/hosts`, `./src/a.ts`, `~/notes`,
 * `C:\dir\file`) and bare file names with a common extension.
 */
const FILE_PATH_PATTERN = new RegExp(
  [
    String.raw`(?<![\w/.~])(?:~|\.{1,2})?\/(?:[\w.-]+\/)*[\w.-]+`,
    String.raw`\b[A-Za-z]:\\(?:[\w.-]+\\)*[\w.-]+`,
    String.raw`\b[\w-]+\.(?:tsx?|jsx?|mjs|cjs|py|json|md|txt|csv|ya?ml|html|css|java|go|rs|cpp|c|h|sh|log|pdf|png|jpe?g|xml|toml)\b`,
  ].join('|'),
  'gi',
);

const TIME_PATTERN = /\b(?:(?:[01]?\d|2[0-3]):[0-5]\d(?::[0-5]\d)?(?:\s?[ap]m)?|(?:1[0-2]|0?[1-9])\s?[ap]m)\b/gi;

const DATE_PATTERN = new RegExp(
  [
    String.raw`\b\d{4}-\d{2}-\d{2}\b`,
    String.raw`\b\d{1,2}\/\d{1,2}\/\d{2,4}\b`,
    String.raw`\b(?:today|tomorrow|yesterday|tonight)\b`,
    String.raw`\b(?:next|this|last)\s+(?:${WEEKDAY}|week|month|year)\b`,
    String.raw`\b${MONTH}\.?\s+\d{1,2}(?:st|nd|rd|th)?(?:,?\s+\d{4})?\b`,
    String.raw`\b\d{1,2}(?:st|nd|rd|th)?\s+${MONTH}(?:\s+\d{4})?\b`,
    String.raw`\b(?:on\s+)?${WEEKDAY}\b`,
  ].join('|'),
  'gi',
);

const MONEY_PATTERN = new RegExp(
  [
    String.raw`[$€£₹]\s?\d[\d,]*(?:\.\d+)?(?:\s?(?:k|m|bn|million|billion)\b)?`,
    String.raw`\b\d[\d,]*(?:\.\d+)?\s?(?:dollars?|usd|eur|euros?|rupees?|inr|pounds?|gbp)\b`,
  ].join('|'),
  'gi',
);

const PERCENTAGE_PATTERN = /\b\d+(?:\.\d+)?\s?(?:%|percent\b)/gi;

/** `v2`, `v1.4.0-beta` or a bare three-part `1.2.3`; `3.14` stays a number */
const VERSION_PATTERN = /\bv\d+(?:\.\d+){0,3}(?:-[\w.]+)?\b|\b\d+\.\d+\.\d+(?:-[\w.]+)?\b/gi;

/** Optional leading '#' marks ticket-style references */
const NUMBER_PATTERN = /#?\b\d+(?:,\d{3})*(?:\.\d+)?\b/g;

export const KNOWN_APPLICATIONS: readonly string[] = [
  'chrome',
  'firefox',
  'safari',
  'vscode',
  'vs code',
  'terminal',
  'spotify',
  'discord',
  'slack',
  'docker',
  'git',
  'npm',
  'python',
  'minecraft',
  'notepad',
  'outlook',
  'zoom',
];

const APPLICATION_PATTERN = new RegExp(
  String.raw`\b(?:${KNOWN_APPLICATIONS.map((app) => app.replace(/\s+/g, String.raw`\s+`)).join('|')})\b`,
  'gi',
);

// ============================================================================
// Declared order
// ============================================================================

export type MatchedEntityType = Exclude<EntityType, 'identifier' | 'amount'>;

export interface EntityPattern {
  type: MatchedEntityType;
  pattern: RegExp;
}

/** Highest priority first. */
export const ENTITY_PATTERNS: readonly EntityPattern[] = [
  { type: 'url', pattern: URL_PATTERN },
  { type: 'email', pattern: EMAIL_PATTERN },
  { type: 'file_path', pattern: FILE_PATH_PATTERN },
  { type: 'time', pattern: TIME_PATTERN },
  { type: 'date', pattern: DATE_PATTERN },
  { type: 'money', pattern: MONEY_PATTERN },
  { type: 'percentage', pattern: PERCENTAGE_PATTERN },
  { type: 'version', pattern: VERSION_PATTERN },
  { type: 'number', pattern: NUMBER_PATTERN },
  { type: 'application', pattern: APPLICATION_PATTERN },
];

// ============================================================================
// Number disambiguation keywords
// ============================================================================

export const IDENTIFIER_KEYWORDS: ReadonlySet<string> = new Set([
  'id',
  'order',
  'ticket',
  'pnr',
  'issue',
  'booking',
  'reference',
  'ref',
  'invoice',
  'account',
  'tracking',
  'case',
  'pr',
]);

export const AMOUNT_KEYWORDS: ReadonlySet<string> = new Set([
  'price',
  'cost',
  'costs',
  'pay',
  'paid',
  'total',
  'amount',
  'budget',
  'spend',
  'spent',
  'fee',
  'bill',
  'charge',
  'salary',
  'dollars',
  'rupees',
]);

/** Tokens on each side of a number inspected for keywords */
export const KEYWORD_WINDOW = 3;
