export { ContextualMemory } from './contextual-memory.js';
export type {
  ContextualMemoryOptions,
  MemorySettings,
  FeedbackOutcome,
  LearningSummary,
  FlushResult,
} from './contextual-memory.js';
export { ShortTermMemory } from './short-term-memory.js';
export { LongTermMemory } from './long-term-memory.js';
export type {
  LongTermMemoryOptions,
  StoreInput,
  PruneOptions,
  PruneByAge,
  PruneByCount,
} from './long-term-memory.js';
export { UserPreferences, PreferencesSnapshotSchema } from './user-preferences.js';
export type { UserPreferencesOptions, PreferencesSnapshot } from './user-preferences.js';
export { FEEDBACK_RULES, DIFFICULTY_LEVELS, detectPolarity, evaluateRules } from './feedback-rules.js';
export type {
  FeedbackRule,
  FeedbackContext,
  FeedbackPolarity,
  PreferenceUpdate,
  RuleEvaluation,
} from './feedback-rules.js';
export { MemoryConsolidator } from './memory-consolidator.js';
export type { ConsolidationReport } from './memory-consolidator.js';
export { createTurn } from './turn.js';
export type { TurnInput } from './turn.js';
