import { z } from 'zod';
import { MoodSchema } from '../types/sentiment.js';
import { defaultBankPath, loadBank } from '../data/load-bank.js';

const ScoredMoodSchema = MoodSchema.exclude(['neutral']);

export const ToneRecommendationSchema = z.object({
  approach: z.string(),
  language: z.string(),
  suggestions: z.array(z.string()),
});

export type ToneRecommendation = z.infer<typeof ToneRecommendationSchema>;

export const SentimentLexiconSchema = z.object({
  version: z.number().int(),
  /** Declaration order breaks score ties */
  moods: z
    .array(
      z.object({
        mood: ScoredMoodSchema,
        toneAdjustment: z.string(),
        keywords: z.array(z.string().min(1)),
        patterns: z.array(z.string().min(1)),
      }),
    )
    .min(1),
  intensifiers: z.record(z.string(), z.number().positive()),
  recommendations: z.record(MoodSchema, ToneRecommendationSchema),
});

export type SentimentLexicon = z.infer<typeof SentimentLexiconSchema>;

export const DEFAULT_LEXICON_PATH = defaultBankPath('sentiment-lexicon.json');

export function loadSentimentLexicon(path: string = DEFAULT_LEXICON_PATH): SentimentLexicon {
  return loadBank(path, SentimentLexiconSchema);
}
