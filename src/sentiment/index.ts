export { SentimentAnalyzer } from './sentiment-analyzer.js';
export type { ToneAdvice } from './sentiment-analyzer.js';
export {
  loadSentimentLexicon,
  SentimentLexiconSchema,
  DEFAULT_LEXICON_PATH,
} from './lexicon.js';
export type { SentimentLexicon, ToneRecommendation } from './lexicon.js';
