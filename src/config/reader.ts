/**
 * Config file reader with Zod validation.
 *
 * Missing file = all defaults. Invalid JSON or a schema violation throws a
 * ConfigError naming the offending field.
 *
 * @module config/reader
 */

import { readFile } from 'node:fs/promises';
import { ConfigError } from '../errors.js';
import { resolveLogLevel } from '../logging/logger.js';
import { CoreConfigSchema, DEFAULT_CORE_CONFIG } from './schema.js';
import type { CoreConfig } from './schema.js';

export const DEFAULT_CONFIG_PATH = 'dialogue-core.json';

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string[] {
  return issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Read and validate the config from disk.
 *
 * `ASSISTANT_LOG_LEVEL` in the environment overrides `logLevel`.
 *
 * @throws {ConfigError} On invalid JSON or validation failure
 */
export async function readCoreConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): Promise<CoreConfig> {
  let content: string;

  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return { ...DEFAULT_CORE_CONFIG, logLevel: resolveLogLevel(env, DEFAULT_CORE_CONFIG.logLevel) };
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  const result = CoreConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Config validation failed:\n${formatIssues(result.error.issues).join('\n')}`,
      result.error.issues[0]?.path.join('.'),
    );
  }

  return { ...result.data, logLevel: resolveLogLevel(env, result.data.logLevel) };
}

/**
 * Validate raw input against the config schema (no I/O).
 */
export function validateCoreConfig(
  raw: unknown,
): { valid: true; config: CoreConfig } | { valid: false; errors: string[] } {
  const result = CoreConfigSchema.safeParse(raw);
  if (result.success) {
    return { valid: true, config: result.data };
  }
  return { valid: false, errors: formatIssues(result.error.issues) };
}
