export { IntentRouter } from './intent-router.js';
export type { IntentRouterOptions } from './intent-router.js';
export {
  ClarificationHandler,
  FallbackHandler,
  createHandler,
  createCategoryHandler,
  CLARIFICATION_HANDLER,
  FALLBACK_HANDLER,
} from './handlers.js';
export { CANNOT_HANDLE } from './types.js';
export type {
  CannotHandle,
  RouteContext,
  RouteHandler,
  HandlerFunction,
  RouteResult,
  ClarificationRequest,
  FallbackResponse,
  HandlerMetrics,
  RouterMetrics,
} from './types.js';
