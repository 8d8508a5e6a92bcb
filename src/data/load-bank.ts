/**
 * Loader for the read-only JSON banks under data/.
 *
 * Banks are read once, synchronously, and validated with the caller's
 * schema. The path resolves relative to this module so it works from
 * both src/ and the compiled dist/ tree.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import type { z } from 'zod';

/**
 * Default location of a bank file: `<package root>/data/<fileName>`.
 */
export function defaultBankPath(fileName: string): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  return join(__dirname, '..', '..', 'data', fileName);
}

/**
 * Read and validate a JSON bank.
 *
 * @throws Error naming the file when it is unreadable, not JSON, or fails the schema
 */
export function loadBank<S extends z.ZodTypeAny>(path: string, schema: S): z.output<S> {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new Error(`Failed to read data bank: ${path}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in data bank: ${path}`);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid data bank ${path}: ${errors}`);
  }
  return result.data;
}
