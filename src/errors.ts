/**
 * Error taxonomy for the dialogue core.
 *
 * Recoverable conditions (an unavailable embedding provider, a failing
 * route handler) are absorbed where they occur and only show up in
 * confidence and routing decisions. Invariant violations (a dependency
 * cycle, a router without its fallback) are thrown.
 */

/**
 * The embedding provider threw or did not answer in time.
 * Always caught by the SemanticMatcher, which degrades to score 0.
 */
export class EmbeddingUnavailableError extends Error {
  override name = 'EmbeddingUnavailableError' as const;

  constructor(message: string, cause?: unknown) {
    super(message);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * A task graph contains a dependency cycle.
 */
export class CycleDetectedError extends Error {
  override name = 'CycleDetectedError' as const;

  constructor(public readonly unresolved: number[]) {
    super(`Dependency cycle among tasks [${unresolved.join(', ')}]`);
  }
}

/**
 * A task references a position outside the task list. Forward
 * references inside the list are valid; only a cycle among them fails,
 * with a CycleDetectedError.
 */
export class UnknownDependencyError extends Error {
  override name = 'UnknownDependencyError' as const;

  constructor(
    public readonly taskIndex: number,
    public readonly dependency: number,
  ) {
    super(`Task ${taskIndex} depends on invalid task index ${dependency}`);
  }
}

/**
 * A route handler threw from canHandle() or handle().
 * The router logs it and moves on to the next handler.
 */
export class HandlerFailureError extends Error {
  override name = 'HandlerFailureError' as const;

  constructor(
    public readonly handlerName: string,
    public readonly phase: 'canHandle' | 'handle',
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Handler "${handlerName}" failed in ${phase}: ${reason}`);
    this.cause = cause;
  }
}

/**
 * The router chain ran out of handlers: the fallback failed or is missing.
 */
export class RouterExhaustedError extends Error {
  override name = 'RouterExhaustedError' as const;

  constructor(message: string, cause?: unknown) {
    super(message);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Work was submitted for a session that does not exist or was closed.
 */
export class SessionUnavailableError extends Error {
  override name = 'SessionUnavailableError' as const;

  constructor(
    public readonly sessionId: string,
    public readonly reason: 'unknown' | 'closed',
  ) {
    super(reason === 'unknown' ? `No session "${sessionId}"` : `Session "${sessionId}" is closed`);
  }
}

/**
 * Configuration could not be read or failed validation.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Race a promise against a timer.
 *
 * Rejects with EmbeddingUnavailableError when the timer fires first. The
 * timer is cleared either way so nothing is left pending.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new EmbeddingUnavailableError(`${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
