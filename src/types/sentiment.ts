import { z } from 'zod';

export const MoodSchema = z.enum(['frustrated', 'confident', 'excited', 'curious', 'bored', 'neutral']);

export type Mood = z.infer<typeof MoodSchema>;

export type SentimentIndicator =
  | 'emphatic'
  | 'very_confused'
  | 'strong_emotion'
  | 'uncertain'
  | 'positive_emoji'
  | 'negative_emoji';

export interface SentimentResult {
  mood: Mood;
  /** >= 0, capped (3 by default) */
  intensity: number;
  /** Lexicon score of the winning mood normalised to [0, 1] */
  confidence: number;
  indicators: SentimentIndicator[];
  /** Suggested tone label for downstream response shaping */
  toneAdjustment: string;
  /** Raw weighted score per mood that had at least one hit */
  scores: Partial<Record<Mood, number>>;
}

export const NEUTRAL_SENTIMENT: SentimentResult = {
  mood: 'neutral',
  intensity: 0,
  confidence: 0,
  indicators: [],
  toneAdjustment: 'balanced',
  scores: {},
};
