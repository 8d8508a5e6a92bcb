/**
 * Regex-based entity extraction.
 *
 * Every declared matcher runs over the whole input. Overlapping spans are
 * resolved longest-match-wins; equal lengths go to the higher-priority
 * type, then the earlier start. Bare numbers are then refined into
 * `identifier` or `amount` by nearby keywords. The first surviving match
 * of each type is kept.
 */

import type { EntityMap, EntityType, EntityValue } from '../types/intent.js';
import {
  AMOUNT_KEYWORDS,
  ENTITY_PATTERNS,
  IDENTIFIER_KEYWORDS,
  KEYWORD_WINDOW,
} from './entity-patterns.js';

// ============================================================================
// Types
// ============================================================================

interface Candidate {
  type: EntityType;
  raw: string;
  start: number;
  end: number;
  priority: number;
}

export interface Token {
  word: string;
  start: number;
  end: number;
}

// ============================================================================
// extractEntities
// ============================================================================

/**
 * Extract typed entities from text.
 *
 * @returns Map of entity type to its first surviving match
 */
export function extractEntities(text: string): EntityMap {
  if (!text.trim()) return {};

  const candidates = collectCandidates(text);
  const survivors = resolveOverlaps(candidates);
  const tokens = tokenize(text);

  const entities: EntityMap = {};
  for (const candidate of survivors) {
    const type = candidate.type === 'number' ? refineNumber(candidate, tokens) : candidate.type;
    if (entities[type] !== undefined) continue;
    entities[type] = {
      type,
      value: normalizeValue(type, candidate.raw),
      raw: candidate.raw,
      start: candidate.start,
      end: candidate.end,
    };
  }
  return entities;
}

/**
 * All matches of all declared patterns, before overlap resolution.
 */
function collectCandidates(text: string): Candidate[] {
  const candidates: Candidate[] = [];
  ENTITY_PATTERNS.forEach(({ type, pattern }, priority) => {
    for (const match of text.matchAll(pattern)) {
      const raw = match[0];
      const start = match.index ?? 0;
      if (raw.length === 0) continue;
      candidates.push({ type, raw, start, end: start + raw.length, priority });
    }
  });
  return candidates;
}

/**
 * Greedy interval selection: longest first, then priority, then start.
 * Returned in text order.
 */
function resolveOverlaps(candidates: Candidate[]): Candidate[] {
  const ordered = [...candidates].sort(
    (a, b) =>
      (b.end - b.start) - (a.end - a.start) ||
      a.priority - b.priority ||
      a.start - b.start,
  );

  const accepted: Candidate[] = [];
  for (const candidate of ordered) {
    const overlaps = accepted.some((kept) => candidate.start < kept.end && kept.start < candidate.end);
    if (!overlaps) accepted.push(candidate);
  }
  return accepted.sort((a, b) => a.start - b.start);
}

// ============================================================================
// Number disambiguation
// ============================================================================

export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(/\S+/g)) {
    const start = match.index ?? 0;
    tokens.push({
      word: match[0].toLowerCase().replace(/^[^\p{L}\p{N}#]+|[^\p{L}\p{N}]+$/gu, ''),
      start,
      end: start + match[0].length,
    });
  }
  return tokens;
}

/**
 * Decide whether a bare number is an identifier, an amount, or just a
 * number, from keywords within KEYWORD_WINDOW tokens on either side.
 * The nearest keyword decides; identifier wins a distance tie.
 */
export function refineNumber(
  candidate: { raw: string; start: number; end: number },
  tokens: Token[],
): 'identifier' | 'amount' | 'number' {
  if (candidate.raw.startsWith('#')) return 'identifier';

  const first = tokens.findIndex((t) => t.end > candidate.start);
  if (first === -1) return 'number';
  let last = first;
  while (last + 1 < tokens.length && tokens[last + 1].start < candidate.end) last++;

  for (let d = 1; d <= KEYWORD_WINDOW; d++) {
    const nearby = [tokens[first - d], tokens[last + d]].filter((t): t is Token => t !== undefined);
    const words = nearby.map((t) => t.word);
    if (words.some((w) => IDENTIFIER_KEYWORDS.has(w))) return 'identifier';
    if (words.some((w) => AMOUNT_KEYWORDS.has(w))) return 'amount';
  }
  return 'number';
}

// ============================================================================
// Value normalisation
// ============================================================================

const MONEY_MULTIPLIERS: Record<string, number> = {
  k: 1e3,
  m: 1e6,
  million: 1e6,
  bn: 1e9,
  billion: 1e9,
};

function parseNumeric(raw: string): number | null {
  const match = raw.replace(/,/g, '').match(/\d+(?:\.\d+)?/);
  return match ? Number(match[0]) : null;
}

/**
 * Numeric types normalise to numbers; everything else to trimmed text.
 */
export function normalizeValue(type: EntityType, raw: string): EntityValue['value'] {
  switch (type) {
    case 'number':
    case 'amount':
    case 'percentage': {
      return parseNumeric(raw) ?? raw.trim();
    }
    case 'money': {
      const amount = parseNumeric(raw);
      if (amount === null) return raw.trim();
      const suffix = raw.toLowerCase().match(/(k|m|bn|million|billion)$/);
      return suffix ? amount * MONEY_MULTIPLIERS[suffix[1]] : amount;
    }
    case 'identifier':
      return raw.replace(/^#/, '');
    case 'application':
      return raw.toLowerCase().replace(/\s+/g, ' ');
    default:
      return raw.trim();
  }
}
