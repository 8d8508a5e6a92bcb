// ============================================================================
// Classification Logger
// ============================================================================
// Structured JSONL audit trail of intent classifications. Records every
// result with category, confidence, source stage and timestamp. Errors
// during logging are reported on stderr and never reach the caller.

import { appendFile, readFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { IntentCategorySchema, IntentSourceSchema, type Intent } from '../types/intent.js';

export const CLASSIFICATION_LOG_FILE = 'classification-log.jsonl';

export const ClassificationLogEntrySchema = z.object({
  /** ISO 8601 timestamp */
  timestamp: z.string(),
  /** Raw user input */
  input: z.string(),
  category: IntentCategorySchema,
  /** Confidence score (0-1) */
  confidence: z.number().min(0).max(1),
  source: IntentSourceSchema,
  missingSlots: z.array(z.string()),
  ambiguous: z.boolean(),
  degraded: z.boolean(),
  /** Number of alternative candidates considered */
  alternativeCount: z.number().int().min(0),
  sessionId: z.string().optional(),
});

export type ClassificationLogEntry = z.infer<typeof ClassificationLogEntrySchema>;

/**
 * Append-only JSONL logger for the classification audit trail.
 *
 * @example
 * ```ts
 * const audit = new ClassificationLogger('.dialogue/audit');
 * await audit.log(intent, 'search for tutorials');
 * const entries = await audit.readAll();
 * ```
 */
export class ClassificationLogger {
  private logDir: string;
  private logFile: string;

  constructor(logDir: string) {
    this.logDir = logDir;
    this.logFile = join(logDir, CLASSIFICATION_LOG_FILE);
  }

  /**
   * Append a classification to the audit log. On error, writes to
   * stderr and returns without throwing.
   */
  async log(intent: Intent, input: string, sessionId?: string): Promise<void> {
    try {
      const entry: ClassificationLogEntry = {
        timestamp: new Date().toISOString(),
        input,
        category: intent.category,
        confidence: intent.confidence,
        source: intent.source,
        missingSlots: [...intent.missingSlots],
        ambiguous: intent.ambiguous,
        degraded: intent.degraded,
        alternativeCount: intent.alternatives.length,
        ...(sessionId !== undefined ? { sessionId } : {}),
      };

      await mkdir(this.logDir, { recursive: true });
      await appendFile(this.logFile, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      process.stderr.write(`[classification-logger] Failed to log: ${message}\n`);
    }
  }

  /**
   * Read every valid entry. Malformed or schema-invalid lines are
   * skipped; a missing file yields an empty array.
   */
  async readAll(): Promise<ClassificationLogEntry[]> {
    let content: string;
    try {
      content = await readFile(this.logFile, 'utf-8');
    } catch {
      return [];
    }

    const entries: ClassificationLogEntry[] = [];
    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed) continue;

      let raw: unknown;
      try {
        raw = JSON.parse(trimmed);
      } catch {
        continue;
      }
      const parsed = ClassificationLogEntrySchema.safeParse(raw);
      if (parsed.success) entries.push(parsed.data);
    }
    return entries;
  }
}
