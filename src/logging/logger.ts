/**
 * Component-tagged logger.
 *
 * Lines go to stderr as `[component] LEVEL message {fields}` so they never
 * mix with a host program's stdout. Levels below the configured minimum
 * are dropped.
 *
 * @example
 * ```ts
 * const logger = createLogger('router', { level: 'debug' });
 * logger.warn('handler failed', { handler: 'WebSearch' });
 * // [router] WARN handler failed {"handler":"WebSearch"}
 * ```
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Derive a logger for a sub-component, e.g. `memory` -> `memory/long-term`. */
  child(component: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Line sink, defaults to process.stderr */
  write?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type EmitLevel = Exclude<LogLevel, 'silent'>;

function formatFields(fields: LogFields | undefined): string {
  if (!fields || Object.keys(fields).length === 0) return '';
  try {
    return ' ' + JSON.stringify(fields, (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value,
    );
  } catch {
    return ' {"fields":"unserializable"}';
  }
}

export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const minimum = LEVEL_ORDER[options.level ?? 'info'];
  const write = options.write ?? ((line: string) => {
    process.stderr.write(line + '\n');
  });

  const emit = (level: EmitLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < minimum) return;
    write(`[${component}] ${level.toUpperCase()} ${message}${formatFields(fields)}`);
  };

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
    child: (sub) => createLogger(`${component}/${sub}`, options),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger('silent', { level: 'silent' });

/**
 * Resolve the log level from the environment, falling back when unset or invalid.
 */
export function resolveLogLevel(
  env: NodeJS.ProcessEnv = process.env,
  fallback: LogLevel = 'info',
): LogLevel {
  const parsed = LogLevelSchema.safeParse(env.ASSISTANT_LOG_LEVEL?.toLowerCase());
  return parsed.success ? parsed.data : fallback;
}
