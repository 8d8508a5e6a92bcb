export {
  longTermKey,
  longTermPrefix,
  preferencesKey,
  rankStoredValues,
} from './persistence-backend.js';
export type { PersistenceBackend, PersistedMatch, QueryOptions } from './persistence-backend.js';
export { InMemoryPersistence } from './in-memory-persistence.js';
export { JsonlPersistence } from './jsonl-persistence.js';
