/**
 * IntentRouter - ordered chain of route handlers.
 *
 * Handlers are consulted strictly in priority order and the first one
 * whose `canHandle` accepts the intent handles it. The chain always
 * starts with the ClarificationHandler and ends with the FallbackHandler;
 * registered handlers sit between them.
 *
 * A handler that throws is logged as a HandlerFailureError and treated as
 * declining. The fallback cannot decline: its failure ends routing with a
 * RouterExhaustedError.
 *
 * @example
 * ```ts
 * const router = new IntentRouter({ handlers: [webSearch] });
 * const { handledBy, result } = await router.route(intent);
 * ```
 */

import { DEFAULT_CORE_CONFIG } from '../config/schema.js';
import { HandlerFailureError, RouterExhaustedError } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { EntityMap, Intent } from '../types/intent.js';
import { ClarificationHandler, FallbackHandler } from './handlers.js';
import {
  CANNOT_HANDLE,
  type HandlerMetrics,
  type RouteContext,
  type RouteHandler,
  type RouteResult,
  type RouterMetrics,
} from './types.js';

export interface IntentRouterOptions {
  clarificationThreshold?: number;
  /** Handlers placed between the reserved ends, in order */
  handlers?: readonly RouteHandler[];
  /** Replaces the built-in FallbackHandler */
  fallback?: RouteHandler;
  logger?: Logger;
  /** Millisecond clock for latency */
  now?: () => number;
}

type Attempt = { status: 'handled'; result: unknown } | { status: 'declined' } | { status: 'failed' };

function emptyMetrics(): HandlerMetrics {
  return { calls: 0, handled: 0, failures: 0, totalLatencyMs: 0, lastLatencyMs: null };
}

export class IntentRouter {
  private readonly chain: RouteHandler[];
  private readonly clarification: RouteHandler;
  private readonly fallback: RouteHandler;
  private readonly metrics = new Map<string, HandlerMetrics>();
  private readonly logger: Logger;
  private readonly now: () => number;
  private totalRoutes = 0;

  constructor(options: IntentRouterOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => performance.now());
    this.clarification = new ClarificationHandler(
      options.clarificationThreshold ?? DEFAULT_CORE_CONFIG.clarificationThreshold,
    );
    this.fallback = options.fallback ?? new FallbackHandler();
    this.chain = [this.clarification, this.fallback];
    this.metrics.set(this.clarification.name, emptyMetrics());
    this.metrics.set(this.fallback.name, emptyMetrics());

    for (const handler of options.handlers ?? []) {
      this.register(handler);
    }
  }

  // --------------------------------------------------------------------------
  // Routing
  // --------------------------------------------------------------------------

  /**
   * Dispatch an intent to the first handler that takes it.
   *
   * @param entities - Defaults to the intent's own entities
   * @throws RouterExhaustedError when the fallback fails or declines
   */
  async route(intent: Intent, entities: EntityMap = intent.entities, context: RouteContext = {}): Promise<RouteResult> {
    const started = this.now();
    this.totalRoutes++;
    const attempted: string[] = [];

    // Snapshot so register/unregister during a route cannot skip or repeat handlers
    for (const handler of [...this.chain]) {
      attempted.push(handler.name);
      const attempt = await this.attempt(handler, intent, entities, context);

      if (attempt.status === 'handled') {
        const latencyMs = this.now() - started;
        this.logger.debug('intent routed', {
          handler: handler.name,
          category: intent.category,
          confidence: intent.confidence,
          latencyMs,
        });
        return { handledBy: handler.name, result: attempt.result, confidence: intent.confidence, attempted, latencyMs };
      }
      if (handler === this.fallback) {
        throw new RouterExhaustedError(`Fallback handler "${handler.name}" did not handle the intent`);
      }
    }

    throw new RouterExhaustedError('Router chain has no fallback handler');
  }

  private async attempt(
    handler: RouteHandler,
    intent: Intent,
    entities: EntityMap,
    context: RouteContext,
  ): Promise<Attempt> {
    const metrics = this.metricsFor(handler.name);
    let phase: 'canHandle' | 'handle' = 'canHandle';
    let callStarted = 0;

    try {
      if (!(await handler.canHandle(intent, context))) return { status: 'declined' };

      phase = 'handle';
      metrics.calls++;
      callStarted = this.now();
      const result = await handler.handle(intent, entities, context);
      this.recordLatency(metrics, callStarted);

      if (result === CANNOT_HANDLE) return { status: 'declined' };
      metrics.handled++;
      return { status: 'handled', result };
    } catch (err) {
      if (phase === 'handle') this.recordLatency(metrics, callStarted);
      metrics.failures++;
      const failure = new HandlerFailureError(handler.name, phase, err);
      if (handler === this.fallback) {
        throw new RouterExhaustedError(failure.message, failure);
      }
      this.logger.error('handler failed, trying next', { handler: handler.name, phase, error: failure });
      return { status: 'failed' };
    }
  }

  // --------------------------------------------------------------------------
  // Chain management
  // --------------------------------------------------------------------------

  /**
   * Insert a handler. Without a position it goes just before the
   * fallback; positions are clamped so the reserved ends stay in place.
   *
   * @throws Error if a handler with the same name is already registered
   */
  register(handler: RouteHandler, position?: number): void {
    if (this.chain.some((h) => h.name === handler.name)) {
      throw new Error(`Handler "${handler.name}" is already registered`);
    }
    const last = this.chain.length - 1;
    const index = position === undefined ? last : Math.min(last, Math.max(1, position));
    this.chain.splice(index, 0, handler);
    this.metrics.set(handler.name, emptyMetrics());
    this.logger.info('handler registered', { handler: handler.name, position: index });
  }

  /**
   * Remove a handler by name.
   *
   * @returns false for unknown names and for the reserved handlers
   */
  unregister(name: string): boolean {
    if (name === this.clarification.name || name === this.fallback.name) {
      this.logger.warn('cannot remove reserved handler', { handler: name });
      return false;
    }
    const index = this.chain.findIndex((h) => h.name === name);
    if (index === -1) return false;
    this.chain.splice(index, 1);
    this.metrics.delete(name);
    this.logger.info('handler removed', { handler: name });
    return true;
  }

  handlerNames(): string[] {
    return this.chain.map((h) => h.name);
  }

  getMetrics(): RouterMetrics {
    const handlers: Record<string, HandlerMetrics> = {};
    for (const handler of this.chain) {
      handlers[handler.name] = { ...this.metricsFor(handler.name) };
    }
    return { totalRoutes: this.totalRoutes, handlers, chain: this.handlerNames() };
  }

  // --------------------------------------------------------------------------
  // Internal
  // --------------------------------------------------------------------------

  private metricsFor(name: string): HandlerMetrics {
    let metrics = this.metrics.get(name);
    if (!metrics) {
      metrics = emptyMetrics();
      this.metrics.set(name, metrics);
    }
    return metrics;
  }

  private recordLatency(metrics: HandlerMetrics, started: number): void {
    const elapsed = this.now() - started;
    metrics.totalLatencyMs += elapsed;
    metrics.lastLatencyMs = elapsed;
  }
}
