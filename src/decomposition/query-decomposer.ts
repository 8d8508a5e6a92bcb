/**
 * Query Decomposer
 *
 * Splits compound utterances into an ordered task graph. Rules are tried
 * in a fixed order and the first that applies wins:
 *
 * 1. Sequencing connectives ("then", "after that", "finally") -> a chain
 *    where each task depends on the one before it
 * 2. Two or more imperative clauses joined by "and" or commas -> parallel
 *    tasks with no dependencies
 * 3. "if ... then ..." -> one conditional task carrying the condition and
 *    branch texts (branches are evaluated by the caller)
 * 4. "compare X and Y" -> two independent comparison tasks, one per subject
 * 5. Anything else -> one simple task holding the whole input
 *
 * Decomposition never invents or drops an action clause: the task texts
 * are the source clauses minus their connectives.
 */

import { silentLogger, type Logger } from '../logging/logger.js';
import type { ConditionalBranches, ExecutionPlan, Task, TaskKind } from '../types/task.js';
import { createExecutionPlan } from './execution-plan.js';

// ============================================================================
// Grammar
// ============================================================================

/**
 * "then" and "after that" split anywhere; "next" and "finally" only after
 * clause punctuation or "and", so "find the next train" stays whole.
 */
const SEQUENCE_MARKER =
  /(?:\s*[,;.]\s*|\s+)(?:and\s+)?(?:then|after\s+that|afterwards)\b[\s,]*|\s*[,;.]\s*(?:and\s+)?(?:next|finally|lastly)\b[\s,]*|\s+and\s+(?:next|finally|lastly)\b[\s,]*/gi;

const LEADING_ORDINAL = /^(?:first(?:ly)?|to\s+start(?:\s+with)?)\b[\s,]*/i;

const PARALLEL_SEPARATOR = /\s*[,;]\s*(?:and\s+)?|\s+and\s+/i;

const CONDITIONAL =
  /^if\s+(.+?)(?:\s*,\s*then\s+|\s*,\s*|\s+then\s+)(.+?)(?:\s*[,;]?\s*(?:otherwise|else)\s*,?\s+(.+))?$/i;

const COMPARISON = /^(?:please\s+)?compare\s+(.+?)\s+(?:and|with|to|vs\.?|versus)\s+(.+)$/i;

/** Verbs that open an imperative clause */
export const IMPERATIVE_VERBS: ReadonlySet<string> = new Set([
  'add',
  'book',
  'calculate',
  'call',
  'check',
  'close',
  'compute',
  'convert',
  'create',
  'delete',
  'download',
  'email',
  'explain',
  'fetch',
  'find',
  'generate',
  'get',
  'launch',
  'list',
  'look',
  'open',
  'play',
  'read',
  'remind',
  'run',
  'save',
  'search',
  'send',
  'set',
  'show',
  'start',
  'stop',
  'summarize',
  'tell',
  'translate',
  'write',
]);

// ============================================================================
// Helpers
// ============================================================================

function cleanClause(clause: string): string {
  return clause.trim().replace(/^[,;]+\s*/, '').replace(/[\s.,;!?]+$/, '').trim();
}

function startsImperative(clause: string): boolean {
  const first = clause
    .replace(/^(?:please|also)\s+/i, '')
    .split(/\s+/)[0]
    ?.toLowerCase();
  return first !== undefined && IMPERATIVE_VERBS.has(first);
}

function makeTask(text: string, index: number, kind: TaskKind, dependencies: number[] = []): Task {
  return { text, index, dependencies, status: 'pending', kind };
}

// ============================================================================
// QueryDecomposer
// ============================================================================

/**
 * @example
 * ```ts
 * const decomposer = new QueryDecomposer();
 * decomposer.decompose('First search for tutorials, then summarize them');
 * // => [{ text: 'search for tutorials', dependencies: [] }, { text: 'summarize them', dependencies: [0] }]
 * ```
 */
export class QueryDecomposer {
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Decompose an utterance into tasks. Blank input yields no tasks.
   */
  decompose(text: string): Task[] {
    const trimmed = cleanClause(text);
    if (!trimmed) return [];

    const isConditionalForm = /^if\b/i.test(trimmed);

    const tasks =
      (isConditionalForm ? null : this.splitSequential(trimmed)) ??
      (isConditionalForm ? null : this.splitParallel(trimmed)) ??
      this.matchConditional(trimmed) ??
      this.splitComparison(trimmed) ?? [makeTask(trimmed, 0, 'simple')];

    if (tasks.length > 1 || tasks[0].kind !== 'simple') {
      this.logger.debug('decomposed utterance', { kind: tasks[0].kind, tasks: tasks.length });
    }
    return tasks;
  }

  /**
   * Whether an utterance is compound, i.e. does not decompose to a single
   * simple task.
   */
  needsDecomposition(text: string): boolean {
    const tasks = this.decompose(text);
    return tasks.length > 1 || (tasks.length === 1 && tasks[0].kind !== 'simple');
  }

  createExecutionPlan(tasks: readonly Task[]): ExecutionPlan {
    return createExecutionPlan(tasks);
  }

  // --------------------------------------------------------------------------
  // Rules
  // --------------------------------------------------------------------------

  private splitSequential(text: string): Task[] | null {
    const parts = text.split(SEQUENCE_MARKER).map(cleanClause);
    if (parts.length < 2) return null;

    parts[0] = cleanClause(parts[0].replace(LEADING_ORDINAL, ''));
    const clauses = parts.filter((part) => part.length > 0);
    if (clauses.length < 2) return null;

    return clauses.map((clause, i) => makeTask(clause, i, 'sequential', i > 0 ? [i - 1] : []));
  }

  private splitParallel(text: string): Task[] | null {
    const clauses = text.split(PARALLEL_SEPARATOR).map(cleanClause);
    if (clauses.length < 2 || clauses.some((clause) => !clause || !startsImperative(clause))) {
      return null;
    }
    return clauses.map((clause, i) => makeTask(clause, i, 'parallel'));
  }

  private matchConditional(text: string): Task[] | null {
    const match = CONDITIONAL.exec(text);
    const condition = match?.[1];
    const thenBranch = match?.[2];
    const otherwise = match?.[3];
    if (!condition || !thenBranch) return null;

    const branches: ConditionalBranches = {
      condition: cleanClause(condition),
      thenBranch: cleanClause(thenBranch),
      elseBranch: otherwise ? cleanClause(otherwise) : null,
    };
    return [{ ...makeTask(text, 0, 'conditional'), conditional: branches }];
  }

  private splitComparison(text: string): Task[] | null {
    const match = COMPARISON.exec(text);
    const first = match?.[1];
    const second = match?.[2];
    if (!first || !second) return null;

    return [cleanClause(first), cleanClause(second)].map((subject, i) => ({
      ...makeTask(subject, i, 'comparison'),
      subject,
    }));
  }
}
