/**
 * Declared pattern rules per category.
 *
 * Structural rules match the grammar of a request (an arithmetic
 * expression, a leading wh-word, a CLI invocation) and score the
 * configured pattern confidence. Keyword hints carry their own, lower
 * confidence so they only decide when nothing structural matched.
 *
 * Precedence between categories never depends on declaration order
 * here: the best rule wins by confidence, then CATEGORY_PRIORITY.
 */

import type { KnownCategory } from '../types/intent.js';

export interface PatternRule {
  /** Stable identifier for logs and tests */
  name: string;
  category: KnownCategory;
  pattern: RegExp;
  /** Fixed confidence; omitted means the configured structural confidence */
  confidence?: number;
}

const OPERAND = String.raw`\(?-?\d+(?:\.\d+)?\)?`;
const OPERATOR = String.raw`(?:[-+*/^%×÷]|plus|minus|times|divided\s+by|multiplied\s+by)`;

export const PATTERN_RULES: readonly PatternRule[] = [
  // ---- command ----
  {
    name: 'cli-invocation',
    category: 'command',
    pattern:
      /\b(?:git\s+(?:clone|pull|push|commit|add|status|branch|checkout|merge)|npm\s+(?:install|run|start|build|test|init)|docker\s+(?:run|build|pull|push|ps|stop|start)|mvn\s+(?:clean|install|package|test)|gradlew?\s+(?:build|clean|run|test))\b/i,
  },
  {
    name: 'app-control',
    category: 'command',
    pattern: /^(?:please\s+)?(?:open|launch|start|close|quit|restart|kill|shut\s+down|turn\s+(?:on|off))\b/i,
  },
  {
    name: 'reminder',
    category: 'command',
    pattern: /^(?:please\s+)?(?:remind\s+me|set\s+an?\s+(?:timer|alarm|reminder))\b/i,
  },
  {
    name: 'action-hint',
    category: 'command',
    pattern: /\b(?:open|launch|install|uninstall)\b/i,
    confidence: 0.5,
  },

  // ---- math ----
  {
    name: 'arithmetic-expression',
    category: 'math',
    pattern: new RegExp(
      String.raw`^\s*(?:what(?:'s|\s+is)\s+|calculate\s+|compute\s+|evaluate\s+)?${OPERAND}(?:\s*${OPERATOR}\s*${OPERAND})+\s*[=?]?\s*$`,
      'i',
    ),
  },
  {
    name: 'math-verb',
    category: 'math',
    pattern: /^(?:please\s+)?(?:calculate|compute|evaluate|solve)\b/i,
  },
  {
    name: 'math-function',
    category: 'math',
    pattern: /\b(?:square\s+root|sqrt|factorial|derivative|integral)\s+of\b/i,
  },
  {
    name: 'percent-of',
    category: 'math',
    pattern: /\b\d+(?:\.\d+)?\s?%\s+of\s+\d/i,
  },
  {
    name: 'math-hint',
    category: 'math',
    pattern: /\b(?:equation|sum|product|average)\b/i,
    confidence: 0.45,
  },

  // ---- code ----
  {
    name: 'code-request',
    category: 'code',
    pattern:
      /\b(?:write|create|implement|generate|refactor|debug|fix)\b.*\b(?:function|class|method|script|code|program|algorithm|endpoint|regex|component|unit\s+test)s?\b/i,
  },
  {
    name: 'code-fence',
    category: 'code',
    pattern: /```/,
  },
  {
    name: 'error-report',
    category: 'code',
    pattern: /\b(?:TypeError|SyntaxError|ReferenceError|NullPointerException|stack\s+trace|segfault|compile\s+error)\b/i,
  },
  {
    name: 'language-hint',
    category: 'code',
    pattern: /\b(?:python|typescript|javascript|java|rust|golang)\b/i,
    confidence: 0.5,
  },

  // ---- fetch ----
  {
    name: 'web-search',
    category: 'fetch',
    pattern: /^(?:please\s+)?(?:search(?:\s+(?:the\s+web|online|google))?\s+for|look\s+up|google|find\s+me|fetch)\b/i,
  },
  {
    name: 'live-data',
    category: 'fetch',
    pattern: /\b(?:latest|current|today'?s)\s+(?:news|headlines|price|weather|score|updates?)\b/i,
  },
  {
    name: 'weather',
    category: 'fetch',
    pattern: /\bweather\s+(?:in|for|at)\b/i,
  },
  {
    name: 'search-hint',
    category: 'fetch',
    pattern: /\b(?:find|search|news)\b/i,
    confidence: 0.5,
  },

  // ---- question ----
  {
    name: 'wh-question',
    category: 'question',
    pattern: /^(?:what|who|where|when|why|which|how)\b/i,
  },
  {
    name: 'yes-no-question',
    category: 'question',
    pattern: /^(?:is|are|can|could|does|do|did|will|would|should)\b.*\?\s*$/i,
  },
  {
    name: 'explain',
    category: 'question',
    pattern: /^(?:please\s+)?(?:explain|describe|define|tell\s+me\s+about)\b/i,
  },
  {
    name: 'question-mark',
    category: 'question',
    pattern: /\?\s*$/,
    confidence: 0.5,
  },

  // ---- conversational ----
  {
    name: 'greeting',
    category: 'conversational',
    pattern: /^(?:hi|hello|hey|hiya|greetings|good\s+(?:morning|afternoon|evening))\b/i,
  },
  {
    name: 'thanks',
    category: 'conversational',
    pattern: /\b(?:thanks|thank\s+you|thx|cheers)\b/i,
  },
  {
    name: 'farewell',
    category: 'conversational',
    pattern: /^(?:bye|goodbye|see\s+you|good\s+night)\b/i,
  },
  {
    // Outranks the wh-question rule so "how are you" is small talk
    name: 'small-talk',
    category: 'conversational',
    pattern: /^how\s+(?:are\s+you|is\s+it\s+going|'?s\s+it\s+going)\b/i,
    confidence: 0.95,
  },
];
