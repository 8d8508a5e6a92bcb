/**
 * AssistantCore - the library surface of the dialogue core.
 *
 * Wires the stages together for one utterance:
 *
 * 1. Sentiment analysis (side channel, never changes routing)
 * 2. Decomposition into tasks and an execution plan
 * 3. Classification of each task, in execution order, with the previous
 *    task's category as topic context
 * 4. Routing of each classified task through the session's router
 * 5. One turn recorded in the session's memory
 *
 * All work for a session runs through that session's queue. If the
 * session is torn down while an utterance is in flight, the remaining
 * stages are skipped and nothing is written to memory; handler side
 * effects already applied stay applied.
 *
 * @example
 * ```ts
 * const core = new AssistantCore({ handlers: [webSearch] });
 * await core.startSession({ id: 's-1', userId: 'u-1' });
 * const outcome = await core.processUtterance('s-1', 'First search for tutorials, then summarize them');
 * await core.endSession('s-1');
 * ```
 */

import { DEFAULT_CORE_CONFIG, type CoreConfig } from '../config/schema.js';
import { createExecutionPlan } from '../decomposition/execution-plan.js';
import { QueryDecomposer } from '../decomposition/query-decomposer.js';
import { HeuristicEmbedder } from '../embeddings/heuristic-embedder.js';
import { SessionUnavailableError } from '../errors.js';
import { ClassificationLogger } from '../intent/classification-logger.js';
import { IntentExampleBank } from '../intent/example-bank.js';
import { IntentClassifier } from '../intent/intent-classifier.js';
import { createLogger, type Logger } from '../logging/logger.js';
import type { FeedbackOutcome, LearningSummary } from '../memory/contextual-memory.js';
import type { FeedbackContext } from '../memory/feedback-rules.js';
import { createTurn, type TurnInput } from '../memory/turn.js';
import { IntentRouter } from '../routing/intent-router.js';
import type { RouteContext, RouteHandler, RouteResult } from '../routing/types.js';
import { SemanticMatcher } from '../semantic/semantic-matcher.js';
import { SentimentAnalyzer } from '../sentiment/sentiment-analyzer.js';
import type { Session } from '../session/session.js';
import { SessionManager } from '../session/session-manager.js';
import type { SessionCloseReport, SessionInfo, StartSessionOptions } from '../session/types.js';
import type { PersistenceBackend } from '../storage/persistence-backend.js';
import type { EmbeddingProvider } from '../types/embeddings.js';
import type { ClassificationContext, EntityMap, Intent } from '../types/intent.js';
import type { AdaptiveContext, Turn } from '../types/memory.js';
import type { SentimentResult } from '../types/sentiment.js';
import type { ExecutionPlan, Task } from '../types/task.js';

// ============================================================================
// Types
// ============================================================================

export interface AssistantCoreOptions {
  config?: CoreConfig;
  /**
   * Embedding provider shared by all sessions. Defaults to the local
   * HeuristicEmbedder; null disables the semantic stage.
   */
  provider?: EmbeddingProvider | null;
  backend?: PersistenceBackend | null;
  /** Registered between the clarification and fallback handlers */
  handlers?: readonly RouteHandler[];
  logger?: Logger;
  now?: () => number;
  idFactory?: () => string;
}

export interface ProcessOptions {
  /** Promote the recorded turn to long-term memory */
  important?: boolean;
  metadata?: Record<string, unknown>;
}

/** One classified and routed task. `task` is null for blank input. */
export interface TaskOutcome {
  task: Task | null;
  intent: Intent;
  route: RouteResult;
}

export interface UtteranceOutcome {
  sessionId: string;
  sentiment: SentimentResult;
  tasks: Task[];
  plan: ExecutionPlan;
  /** In execution order */
  steps: TaskOutcome[];
  /** Null when the outcome was discarded */
  turn: Turn | null;
  /** The session was torn down before the turn was recorded */
  discarded: boolean;
}

// ============================================================================
// AssistantCore
// ============================================================================

export class AssistantCore {
  readonly config: CoreConfig;
  readonly sessions: SessionManager;
  private readonly sentiment = new SentimentAnalyzer();
  private readonly decomposer: QueryDecomposer;
  private readonly classifier: IntentClassifier;
  private readonly router: IntentRouter;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: AssistantCoreOptions = {}) {
    this.config = options.config ?? DEFAULT_CORE_CONFIG;
    this.logger = options.logger ?? createLogger('assistant', { level: this.config.logLevel });
    this.now = options.now ?? Date.now;

    const provider =
      options.provider === undefined ? new HeuristicEmbedder(this.config.embeddingDimension) : options.provider;
    const examples = IntentExampleBank.load();
    const auditLog = this.config.auditLogDir ? new ClassificationLogger(this.config.auditLogDir) : null;

    this.decomposer = new QueryDecomposer({ logger: this.logger.child('decomposer') });
    this.classifier = new IntentClassifier({
      matcher: provider
        ? new SemanticMatcher(provider, {
            cacheSize: this.config.embeddingCacheSize,
            timeoutMs: this.config.embeddingTimeoutMs,
            logger: this.logger.child('semantic'),
          })
        : null,
      settings: this.config,
      examples,
      logger: this.logger.child('intent'),
      auditLog,
    });
    this.router = new IntentRouter({
      clarificationThreshold: this.config.clarificationThreshold,
      handlers: options.handlers,
      logger: this.logger.child('router'),
    });
    this.sessions = new SessionManager({
      config: this.config,
      provider,
      backend: options.backend,
      handlers: options.handlers,
      examples,
      auditLog,
      logger: this.logger,
      now: this.now,
      idFactory: options.idFactory,
    });
  }

  // --------------------------------------------------------------------------
  // Stateless operations
  // --------------------------------------------------------------------------

  /** Classify one utterance. Never throws. */
  classifyIntent(text: string, context: ClassificationContext = {}): Promise<Intent> {
    return this.classifier.classify(text, context);
  }

  decomposeQuery(text: string): Task[] {
    return this.decomposer.decompose(text);
  }

  analyzeSentiment(text: string): SentimentResult {
    return this.sentiment.analyze(text);
  }

  /**
   * Route an intent. With `context.sessionId` the session's own router is
   * used, otherwise a shared one.
   */
  async route(intent: Intent, entities: EntityMap = intent.entities, context: RouteContext = {}): Promise<RouteResult> {
    const router = context.sessionId ? this.requireSession(context.sessionId).router : this.router;
    return router.route(intent, entities, context);
  }

  // --------------------------------------------------------------------------
  // Sessions
  // --------------------------------------------------------------------------

  async startSession(options: StartSessionOptions = {}): Promise<SessionInfo> {
    return (await this.sessions.start(options)).info();
  }

  endSession(sessionId: string, reason = 'closed'): Promise<SessionCloseReport | null> {
    return this.sessions.close(sessionId, reason);
  }

  expireIdleSessions(now?: number): Promise<SessionCloseReport[]> {
    return this.sessions.expireIdle(now);
  }

  /** Close every session, flushing their memory. */
  shutdown(): Promise<SessionCloseReport[]> {
    return this.sessions.closeAll('shutdown');
  }

  // --------------------------------------------------------------------------
  // Memory
  // --------------------------------------------------------------------------

  /**
   * @throws SessionUnavailableError for an unknown session
   */
  async getContext(sessionId: string, query?: string): Promise<AdaptiveContext> {
    const session = this.requireSession(sessionId);
    return session.run(() => session.memory.getAdaptiveContext(query));
  }

  /**
   * Record a turn produced outside processUtterance().
   *
   * @throws SessionUnavailableError for an unknown session
   */
  async recordTurn(sessionId: string, input: TurnInput): Promise<Turn> {
    const session = this.requireSession(sessionId);
    return session.run(async () => {
      const turn = createTurn(input);
      await session.memory.addTurn(turn);
      return turn;
    });
  }

  async learnFromFeedback(sessionId: string, text: string, context: FeedbackContext = {}): Promise<FeedbackOutcome> {
    const session = this.requireSession(sessionId);
    return session.run(() => session.memory.learnFromFeedback(text, context));
  }

  getLearningSummary(sessionId: string): LearningSummary {
    return this.requireSession(sessionId).memory.getLearningSummary();
  }

  // --------------------------------------------------------------------------
  // Pipeline
  // --------------------------------------------------------------------------

  /**
   * Run one utterance through the whole pipeline. The session is started
   * when it does not exist yet.
   */
  async processUtterance(sessionId: string, text: string, options: ProcessOptions = {}): Promise<UtteranceOutcome> {
    const session = await this.sessions.ensure(sessionId);
    return session.run((signal) => this.runPipeline(session, text, options, signal));
  }

  private async runPipeline(
    session: Session,
    text: string,
    options: ProcessOptions,
    signal: AbortSignal,
  ): Promise<UtteranceOutcome> {
    const timestamp = this.now();
    const sentiment = this.sentiment.analyze(text);
    const tasks = this.decomposer.decompose(text);
    const plan = createExecutionPlan(tasks);

    const units: Array<{ task: Task | null; text: string }> =
      tasks.length === 0 ? [{ task: null, text }] : plan.executionOrder.map((i) => ({ task: tasks[i], text: tasks[i].text }));

    const steps: TaskOutcome[] = [];
    const outcome = (discarded: boolean, turn: Turn | null): UtteranceOutcome => ({
      sessionId: session.id,
      sentiment,
      tasks,
      plan,
      steps,
      turn,
      discarded,
    });

    let lastIntentCategory = session.memory.shortTerm.last()?.intent.category ?? null;
    for (const unit of units) {
      if (signal.aborted) return this.discard(session, outcome);

      if (unit.task) unit.task.status = 'running';
      const intent = await session.classifier.classify(unit.text, { lastIntentCategory }, session.id);
      if (signal.aborted) return this.discard(session, outcome);

      const adaptive = await session.memory.getAdaptiveContext(unit.text, intent.category);
      const route = await session.router.route(intent, intent.entities, {
        sessionId: session.id,
        adaptive,
        sentiment,
        signal,
      });
      if (unit.task) unit.task.status = 'done';
      steps.push({ task: unit.task, intent, route });
      lastIntentCategory = intent.category;
    }

    if (signal.aborted) return this.discard(session, outcome);

    const turn = createTurn({
      utterance: { text, timestamp, sessionId: session.id },
      response: steps.map((step) => responseText(step.route.result)).filter(Boolean).join('\n'),
      intent: steps[0].intent,
      sentiment,
      timestamp,
      important: options.important,
      metadata: {
        ...options.metadata,
        tasks: tasks.length,
        handledBy: steps.map((step) => step.route.handledBy),
      },
    });
    await session.memory.addTurn(turn);
    return outcome(false, turn);
  }

  private discard(
    session: Session,
    outcome: (discarded: boolean, turn: Turn | null) => UtteranceOutcome,
  ): UtteranceOutcome {
    const result = outcome(true, null);
    for (const task of result.tasks) {
      if (task.status === 'pending' || task.status === 'running') task.status = 'skipped';
    }
    this.logger.info('discarded in-flight utterance', {
      sessionId: session.id,
      completedSteps: result.steps.length,
    });
    return result;
  }

  private requireSession(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionUnavailableError(sessionId, 'unknown');
    return session;
  }
}

/** Text of a handler result: strings as-is, objects by their `message`. */
function responseText(result: unknown): string {
  if (typeof result === 'string') return result;
  if (typeof result === 'object' && result !== null && 'message' in result && typeof result.message === 'string') {
    return result.message;
  }
  return '';
}
