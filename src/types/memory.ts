/**
 * Type definitions for conversational memory.
 *
 * Defines Zod schemas and inferred types for:
 * - LongTermEntry (append-only semantic store record)
 * - PreferenceRecord (learned user preference)
 * and plain interfaces for Utterance, Turn and AdaptiveContext.
 *
 * Persisted shapes are schemas so that records read back from a
 * persistence backend can be validated before use.
 */

import { z } from 'zod';
import type { Intent, IntentCategory } from './intent.js';
import type { SentimentResult } from './sentiment.js';

// ============================================================================
// Turns
// ============================================================================

export interface Utterance {
  text: string;
  /** Unix ms */
  timestamp: number;
  sessionId: string;
}

/** One user-utterance / assistant-response pair. Frozen once created. */
export interface Turn {
  readonly utterance: Readonly<Utterance>;
  readonly response: string;
  readonly intent: Readonly<Intent>;
  readonly sentiment: Readonly<SentimentResult>;
  /** Unix ms */
  readonly timestamp: number;
  /** Promote to long-term memory when recorded */
  readonly important: boolean;
  readonly metadata: Readonly<Record<string, unknown>>;
}

// ============================================================================
// Long-term memory
// ============================================================================

export const LongTermEntryTypeSchema = z.enum(['interaction', 'feedback', 'fact', 'summary']);

export type LongTermEntryType = z.infer<typeof LongTermEntryTypeSchema>;

export const LongTermEntrySchema = z.object({
  id: z.string(),
  type: LongTermEntryTypeSchema,
  content: z.string(),
  /** Empty when the entry was stored while embeddings were unavailable */
  embedding: z.array(z.number()),
  metadata: z.record(z.string(), z.unknown()).default(() => ({})),
  /** Unix ms */
  createdAt: z.number(),
  accessCount: z.number().int().min(0).default(0),
});

export type LongTermEntry = z.infer<typeof LongTermEntrySchema>;

export interface LongTermHit {
  entry: LongTermEntry;
  score: number;
}

// ============================================================================
// Preferences
// ============================================================================

export const PreferenceValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export type PreferenceValue = z.infer<typeof PreferenceValueSchema>;

export const PreferenceRecordSchema = z.object({
  category: z.string(),
  key: z.string(),
  value: PreferenceValueSchema,
  confidence: z.number().min(0).max(1),
  observationCount: z.number().int().min(0),
  active: z.boolean(),
  /** Unix ms */
  updatedAt: z.number(),
});

export type PreferenceRecord = z.infer<typeof PreferenceRecordSchema>;

// ============================================================================
// Adaptive context
// ============================================================================

export interface AdaptiveContext {
  sessionId: string;
  shortTermHistory: Turn[];
  isTopicContinuation: boolean;
  currentTopic: IntentCategory | null;
  activePreferences: PreferenceRecord[];
  relevantLongTerm: LongTermHit[];
}
