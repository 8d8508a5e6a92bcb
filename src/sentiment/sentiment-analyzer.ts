/**
 * Lexicon-based mood and intensity detection.
 *
 * Each mood scores 1 per keyword hit and 2 per phrase-pattern hit; the
 * best-scoring mood wins, earlier lexicon entries winning ties. Intensity
 * starts at 1, is multiplied by each intensifier word present, then gains
 * 0.2 per '!', 0.1 per '?' and 0.3 per all-caps word, capped.
 *
 * Pure: no state beyond the compiled lexicon.
 */

import {
  NEUTRAL_SENTIMENT,
  type Mood,
  type SentimentIndicator,
  type SentimentResult,
} from '../types/sentiment.js';
import { loadSentimentLexicon, type SentimentLexicon, type ToneRecommendation } from './lexicon.js';

// ============================================================================
// Constants
// ============================================================================

const KEYWORD_WEIGHT = 1;
const PATTERN_WEIGHT = 2;
/** Score at which confidence saturates at 1 */
const CONFIDENCE_SCALE = 5;
const NEUTRAL_CONFIDENCE = 0.5;
const MAX_INTENSITY = 3;

const EXCLAMATION_BOOST = 0.2;
const QUESTION_BOOST = 0.1;
const CAPS_BOOST = 0.3;

const POSITIVE_EMOJI = [':)', ':-)', ':D', '😊', '😄', '🙂'];
const NEGATIVE_EMOJI = [':(', ':-(', '😞', '😢', '🙁'];

// ============================================================================
// Types
// ============================================================================

interface CompiledMood {
  mood: Exclude<Mood, 'neutral'>;
  toneAdjustment: string;
  keywords: RegExp[];
  patterns: RegExp[];
}

export interface ToneAdvice extends ToneRecommendation {
  mood: Mood;
  /** Present when intensity exceeds 2 */
  intensityNote?: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word, case-insensitive match of a keyword or keyword phrase */
function keywordPattern(keyword: string): RegExp {
  return new RegExp(`(?<![\\w'])${escapeRegExp(keyword.toLowerCase())}(?![\\w'])`, 'i');
}

function isAllCapsWord(word: string): boolean {
  const letters = word.replace(/[^\p{L}]/gu, '');
  return letters.length > 1 && letters === letters.toUpperCase() && letters !== letters.toLowerCase();
}

// ============================================================================
// SentimentAnalyzer
// ============================================================================

export class SentimentAnalyzer {
  private readonly moods: CompiledMood[];
  private readonly intensifiers: Array<{ pattern: RegExp; multiplier: number }>;

  constructor(private readonly lexicon: SentimentLexicon = loadSentimentLexicon()) {
    this.moods = lexicon.moods.map((entry) => ({
      mood: entry.mood,
      toneAdjustment: entry.toneAdjustment,
      keywords: entry.keywords.map(keywordPattern),
      patterns: entry.patterns.map((source) => new RegExp(source, 'i')),
    }));
    this.intensifiers = Object.entries(lexicon.intensifiers).map(([word, multiplier]) => ({
      pattern: keywordPattern(word),
      multiplier,
    }));
  }

  analyze(text: string): SentimentResult {
    if (!text.trim()) {
      return { ...NEUTRAL_SENTIMENT, indicators: [], scores: {} };
    }

    const lower = text.toLowerCase();
    const scores: Partial<Record<Mood, number>> = {};
    let best: CompiledMood | null = null;
    let bestScore = 0;

    for (const mood of this.moods) {
      const score =
        mood.keywords.filter((k) => k.test(lower)).length * KEYWORD_WEIGHT +
        mood.patterns.filter((p) => p.test(lower)).length * PATTERN_WEIGHT;
      if (score > 0) {
        scores[mood.mood] = score;
      }
      if (score > bestScore) {
        best = mood;
        bestScore = score;
      }
    }

    const intensity = this.intensity(text);
    const indicators = this.indicators(text);

    if (best === null) {
      return { ...NEUTRAL_SENTIMENT, confidence: NEUTRAL_CONFIDENCE, intensity, indicators, scores };
    }

    return {
      mood: best.mood,
      intensity,
      confidence: Math.min(bestScore / CONFIDENCE_SCALE, 1),
      indicators,
      toneAdjustment: best.toneAdjustment,
      scores,
    };
  }

  /**
   * Emotional intensity of the raw text; 0 for empty text.
   */
  intensity(text: string): number {
    if (!text.trim()) return 0;

    let intensity = 1;
    for (const { pattern, multiplier } of this.intensifiers) {
      if (pattern.test(text)) intensity *= multiplier;
    }

    intensity += countOf(text, '!') * EXCLAMATION_BOOST;
    intensity += countOf(text, '?') * QUESTION_BOOST;
    intensity += text.split(/\s+/).filter(isAllCapsWord).length * CAPS_BOOST;

    return Math.min(intensity, MAX_INTENSITY);
  }

  indicators(text: string): SentimentIndicator[] {
    const indicators: SentimentIndicator[] = [];
    if (text.includes('!')) indicators.push('emphatic');
    if (text.includes('??')) indicators.push('very_confused');
    if (text.split(/\s+/).some(isAllCapsWord)) indicators.push('strong_emotion');
    if (text.includes('...') || text.includes('…')) indicators.push('uncertain');
    if (POSITIVE_EMOJI.some((e) => text.includes(e))) indicators.push('positive_emoji');
    if (NEGATIVE_EMOJI.some((e) => text.includes(e))) indicators.push('negative_emoji');
    return indicators;
  }

  /**
   * Response-shaping advice for a detected sentiment.
   */
  getToneRecommendation(sentiment: Pick<SentimentResult, 'mood' | 'intensity'>): ToneAdvice {
    const base = this.lexicon.recommendations[sentiment.mood] ?? {
      approach: sentiment.mood === 'neutral' ? 'balanced' : sentiment.mood,
      language: 'clear',
      suggestions: [],
    };
    const advice: ToneAdvice = { mood: sentiment.mood, ...base, suggestions: [...base.suggestions] };
    if (sentiment.intensity > 2) {
      advice.intensityNote = 'Strong emotion detected; respond with extra care';
    }
    return advice;
  }
}

function countOf(text: string, char: string): number {
  let count = 0;
  for (const c of text) {
    if (c === char) count++;
  }
  return count;
}
