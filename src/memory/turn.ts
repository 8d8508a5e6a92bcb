import type { Intent } from '../types/intent.js';
import { NEUTRAL_SENTIMENT, type SentimentResult } from '../types/sentiment.js';
import type { Turn, Utterance } from '../types/memory.js';

export interface TurnInput {
  utterance: Utterance;
  response?: string;
  intent: Intent;
  sentiment?: SentimentResult;
  /** Defaults to the utterance timestamp */
  timestamp?: number;
  important?: boolean;
  metadata?: Record<string, unknown>;
}

/**
 * Build a frozen Turn. Nested utterance, intent and metadata are copied
 * and frozen as well, so a recorded turn cannot change under memory.
 */
export function createTurn(input: TurnInput): Turn {
  return Object.freeze({
    utterance: Object.freeze({ ...input.utterance }),
    response: input.response ?? '',
    intent: Object.freeze({ ...input.intent }),
    sentiment: Object.freeze({ ...(input.sentiment ?? NEUTRAL_SENTIMENT) }),
    timestamp: input.timestamp ?? input.utterance.timestamp,
    important: input.important ?? false,
    metadata: Object.freeze({ ...input.metadata }),
  });
}
