/**
 * Type definitions for the intent router.
 *
 * A handler is anything with a name, a `canHandle` check and a `handle`
 * step. Both may be sync or async. `handle` can still decline by
 * returning CANNOT_HANDLE, which makes the router try the next handler.
 */

import type { EntityMap, Intent, KnownCategory } from '../types/intent.js';
import type { AdaptiveContext } from '../types/memory.js';
import type { SentimentResult } from '../types/sentiment.js';

// ============================================================================
// Handlers
// ============================================================================

/** Returned from `handle` to fall through to the next handler. */
export const CANNOT_HANDLE: unique symbol = Symbol('CANNOT_HANDLE');

export type CannotHandle = typeof CANNOT_HANDLE;

export interface RouteContext {
  sessionId?: string;
  adaptive?: AdaptiveContext;
  sentiment?: SentimentResult;
  /** Forces the clarification handler regardless of confidence */
  needsClarification?: boolean;
  /** Aborted when the owning session is torn down */
  signal?: AbortSignal;
  [key: string]: unknown;
}

export interface RouteHandler {
  readonly name: string;
  canHandle(intent: Intent, context: RouteContext): boolean | Promise<boolean>;
  handle(intent: Intent, entities: EntityMap, context: RouteContext): unknown;
}

/** Bare handler function for createHandler() and createCategoryHandler(). */
export type HandlerFunction = (intent: Intent, entities: EntityMap, context: RouteContext) => unknown;

// ============================================================================
// Results
// ============================================================================

export interface RouteResult {
  handledBy: string;
  /** Whatever the handler returned */
  result: unknown;
  /** Confidence of the routed intent */
  confidence: number;
  /** Handler names consulted, in order, ending with `handledBy` */
  attempted: string[];
  latencyMs: number;
}

export interface ClarificationRequest {
  kind: 'clarification';
  message: string;
  missingSlots: string[];
  suggestedCategories: KnownCategory[];
}

export interface FallbackResponse {
  kind: 'fallback';
  message: string;
  category: Intent['category'];
}

// ============================================================================
// Metrics
// ============================================================================

export interface HandlerMetrics {
  /** Times `handle` was invoked */
  calls: number;
  /** Calls that produced a result */
  handled: number;
  /** Throws from either `canHandle` or `handle` */
  failures: number;
  totalLatencyMs: number;
  lastLatencyMs: number | null;
}

export interface RouterMetrics {
  totalRoutes: number;
  handlers: Record<string, HandlerMetrics>;
  /** Handler names in priority order */
  chain: string[];
}
