export { SemanticMatcher } from './semantic-matcher.js';
export type {
  SemanticMatcherOptions,
  SimilarityMatch,
  ScoredDocument,
  VectorItem,
} from './semantic-matcher.js';
