/**
 * Single-writer consolidation of session memories into a backend.
 *
 * Flush and prune passes from any number of sessions go through one
 * SerialQueue, so a merge never interleaves with another writer.
 */

import { SerialQueue } from '../concurrency/serial-queue.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { PersistenceBackend } from '../storage/persistence-backend.js';
import type { ContextualMemory, FlushResult } from './contextual-memory.js';
import type { PruneOptions } from './long-term-memory.js';

export interface ConsolidationReport {
  sessions: number;
  pruned: number;
  entriesWritten: number;
}

export class MemoryConsolidator {
  private readonly lock = new SerialQueue();
  private readonly logger: Logger;

  constructor(
    private readonly backend: PersistenceBackend,
    options: { logger?: Logger } = {},
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  flush(memory: ContextualMemory): Promise<FlushResult> {
    return this.lock.run(() => memory.flush(this.backend));
  }

  prune(memory: ContextualMemory, options: PruneOptions): Promise<number> {
    return this.lock.run(() => memory.longTerm.prune(options));
  }

  /**
   * Prune (when options are given) and flush several memories as one
   * locked pass.
   */
  consolidate(memories: readonly ContextualMemory[], prune?: PruneOptions): Promise<ConsolidationReport> {
    return this.lock.run(async () => {
      const report: ConsolidationReport = { sessions: 0, pruned: 0, entriesWritten: 0 };
      for (const memory of memories) {
        if (prune) report.pruned += memory.longTerm.prune(prune);
        const result = await memory.flush(this.backend);
        report.entriesWritten += result.entriesWritten;
        report.sessions++;
      }
      this.logger.info('consolidation complete', { ...report });
      return report;
    });
  }

  /** Passes queued or running. */
  get pending(): number {
    return this.lock.size;
  }

  /** Resolves once every queued pass has settled. */
  idle(): Promise<void> {
    return this.lock.idle();
  }
}
