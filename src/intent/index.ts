export { IntentClassifier } from './intent-classifier.js';
export type {
  IntentClassifierOptions,
  ClassifierSettings,
  ClassifierModelInfo,
} from './intent-classifier.js';
export { PATTERN_RULES } from './pattern-rules.js';
export type { PatternRule } from './pattern-rules.js';
export { IntentExampleBank, IntentExampleBankSchema, DEFAULT_EXAMPLES_PATH } from './example-bank.js';
export type { IntentExampleBankData, LabelledExample } from './example-bank.js';
export {
  ClassificationLogger,
  ClassificationLogEntrySchema,
  CLASSIFICATION_LOG_FILE,
} from './classification-logger.js';
export type { ClassificationLogEntry } from './classification-logger.js';
