/**
 * Built-in route handlers and adapters for bare handler functions.
 *
 * ClarificationHandler and FallbackHandler are the reserved ends of every
 * router chain: the first asks for what is missing before anything else
 * runs, the last answers everything nobody else took.
 */

import { DEFAULT_CORE_CONFIG } from '../config/schema.js';
import type { Intent, IntentCategory, KnownCategory } from '../types/intent.js';
import type {
  ClarificationRequest,
  FallbackResponse,
  HandlerFunction,
  RouteContext,
  RouteHandler,
} from './types.js';

export const CLARIFICATION_HANDLER = 'Clarification';
export const FALLBACK_HANDLER = 'Fallback';

// ============================================================================
// Adapters
// ============================================================================

/**
 * Wrap a function as a handler that accepts every intent. The function
 * declines by returning CANNOT_HANDLE.
 */
export function createHandler(name: string, fn: HandlerFunction): RouteHandler {
  return {
    name,
    canHandle: () => true,
    handle: fn,
  };
}

/**
 * Wrap a function as a handler for the given categories only.
 *
 * @example
 * ```ts
 * router.register(createCategoryHandler('Calculator', ['math'], (intent) => evaluate(intent.slots.expression)));
 * ```
 */
export function createCategoryHandler(
  name: string,
  categories: readonly IntentCategory[],
  fn: HandlerFunction,
): RouteHandler {
  const accepted = new Set(categories);
  return {
    name,
    canHandle: (intent) => accepted.has(intent.category),
    handle: fn,
  };
}

// ============================================================================
// Clarification
// ============================================================================

const CATEGORY_LABELS: Record<KnownCategory, string> = {
  command: 'to run a command',
  question: 'an answer to a question',
  math: 'a calculation',
  code: 'help with code',
  fetch: 'to look something up',
  conversational: 'to chat',
};

const MAX_SUGGESTIONS = 3;

function isKnown(category: IntentCategory): category is KnownCategory {
  return category !== 'unknown';
}

function formatList(items: readonly string[], conjunction: string): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} ${conjunction} ${items[items.length - 1]}`;
}

export class ClarificationHandler implements RouteHandler {
  readonly name = CLARIFICATION_HANDLER;

  constructor(private readonly threshold: number = DEFAULT_CORE_CONFIG.clarificationThreshold) {}

  canHandle(intent: Intent, context: RouteContext): boolean {
    return (
      intent.confidence < this.threshold ||
      intent.missingSlots.length > 0 ||
      context.needsClarification === true
    );
  }

  handle(intent: Intent): ClarificationRequest {
    const suggestedCategories = [
      ...new Set([intent.category, ...intent.alternatives.map((alt) => alt.category)].filter(isKnown)),
    ].slice(0, MAX_SUGGESTIONS);

    return {
      kind: 'clarification',
      message: clarificationMessage(intent.missingSlots, suggestedCategories),
      missingSlots: [...intent.missingSlots],
      suggestedCategories,
    };
  }
}

function clarificationMessage(missingSlots: readonly string[], suggestions: readonly KnownCategory[]): string {
  if (missingSlots.length > 0) {
    const pronoun = missingSlots.length === 1 ? 'it' : 'them';
    return `To do that I need the ${formatList(missingSlots, 'and')}. Could you provide ${pronoun}?`;
  }
  if (suggestions.length > 0) {
    return `I'm not sure I understood. Did you want ${formatList(suggestions.map((c) => CATEGORY_LABELS[c]), 'or')}?`;
  }
  return 'I need more information to help you properly. Could you please be more specific?';
}

// ============================================================================
// Fallback
// ============================================================================

export class FallbackHandler implements RouteHandler {
  readonly name = FALLBACK_HANDLER;

  canHandle(): boolean {
    return true;
  }

  handle(intent: Intent): FallbackResponse {
    return {
      kind: 'fallback',
      message: "I don't understand that yet. Could you rephrase it?",
      category: intent.category,
    };
  }
}
