/**
 * Learned user preferences.
 *
 * Each (category, key, value) triple keeps its own observation count.
 * Confidence is min(1, count / promotionThreshold), so it never drops
 * under consistent observations, and a value becomes active exactly when
 * its count reaches the threshold.
 */

import { z } from 'zod';
import { silentLogger, type Logger } from '../logging/logger.js';
import { IntentCategorySchema, type IntentCategory } from '../types/intent.js';
import {
  PreferenceRecordSchema,
  type PreferenceRecord,
  type PreferenceValue,
} from '../types/memory.js';

export const PreferencesSnapshotSchema = z.object({
  version: z.literal(1),
  observations: z.array(PreferenceRecordSchema),
  interactions: z.array(z.tuple([IntentCategorySchema, z.number().int().min(0)])),
});

export type PreferencesSnapshot = z.infer<typeof PreferencesSnapshotSchema>;

export interface UserPreferencesOptions {
  promotionThreshold?: number;
  logger?: Logger;
  now?: () => number;
}

const DEFAULT_PROMOTION_THRESHOLD = 3;

function tripleKey(category: string, key: string, value: PreferenceValue): string {
  return JSON.stringify([category, key, value]);
}

export class UserPreferences {
  readonly promotionThreshold: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly observations = new Map<string, PreferenceRecord>();
  private readonly interactions = new Map<IntentCategory, number>();
  // Counts as of the last restore or merge, so a merge adds only what changed since.
  private persistedCounts = new Map<string, number>();
  private persistedInteractions = new Map<IntentCategory, number>();

  constructor(options: UserPreferencesOptions = {}) {
    this.promotionThreshold = options.promotionThreshold ?? DEFAULT_PROMOTION_THRESHOLD;
    if (!Number.isInteger(this.promotionThreshold) || this.promotionThreshold < 1) {
      throw new RangeError(`promotionThreshold must be a positive integer, got ${this.promotionThreshold}`);
    }
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Record one observation of a preference value.
   *
   * @returns The updated record for this exact value
   */
  learn(category: string, key: string, value: PreferenceValue): PreferenceRecord {
    const id = tripleKey(category, key, value);
    const count = (this.observations.get(id)?.observationCount ?? 0) + 1;
    const record: PreferenceRecord = {
      category,
      key,
      value,
      confidence: Math.min(1, count / this.promotionThreshold),
      observationCount: count,
      active: count >= this.promotionThreshold,
      updatedAt: this.now(),
    };
    this.observations.set(id, record);

    if (count === this.promotionThreshold) {
      this.logger.info('preference activated', { category, key, value });
    } else {
      this.logger.debug('preference observed', { category, key, value, count });
    }
    return { ...record };
  }

  /**
   * The leading value for (category, key): highest count, newest on ties.
   */
  get(category: string, key: string): PreferenceRecord | null {
    return pickLeading([...this.observations.values()].filter((r) => r.category === category && r.key === key));
  }

  /**
   * Active preferences, one value per (category, key), in first-learned
   * order of their (category, key).
   */
  getActive(): PreferenceRecord[] {
    const groups = new Map<string, PreferenceRecord[]>();
    for (const record of this.observations.values()) {
      if (!record.active) continue;
      const group = JSON.stringify([record.category, record.key]);
      const list = groups.get(group);
      if (list) list.push(record);
      else groups.set(group, [record]);
    }

    const active: PreferenceRecord[] = [];
    for (const records of groups.values()) {
      const leading = pickLeading(records);
      if (leading) active.push(leading);
    }
    return active;
  }

  /** Every observed value, in first-observed order. */
  records(): PreferenceRecord[] {
    return [...this.observations.values()].map((record) => ({ ...record }));
  }

  // --------------------------------------------------------------------------
  // Interaction patterns
  // --------------------------------------------------------------------------

  recordInteraction(category: IntentCategory): void {
    this.interactions.set(category, (this.interactions.get(category) ?? 0) + 1);
  }

  interactionCounts(): Partial<Record<IntentCategory, number>> {
    const counts: Partial<Record<IntentCategory, number>> = {};
    for (const [category, count] of this.interactions) {
      counts[category] = count;
    }
    return counts;
  }

  /** Most frequent intent category; the earliest seen wins a tie. */
  mostCommonIntent(): IntentCategory | null {
    let best: IntentCategory | null = null;
    let bestCount = 0;
    for (const [category, count] of this.interactions) {
      if (count > bestCount) {
        best = category;
        bestCount = count;
      }
    }
    return best;
  }

  // --------------------------------------------------------------------------
  // Persistence
  // --------------------------------------------------------------------------

  snapshot(): PreferencesSnapshot {
    return {
      version: 1,
      observations: this.records(),
      interactions: [...this.interactions],
    };
  }

  /**
   * Replace state with a previously taken snapshot. Invalid data is
   * rejected with a warning and leaves state untouched.
   *
   * @returns Whether the snapshot was applied
   */
  restore(data: unknown): boolean {
    const snapshot = this.parseSnapshot(data);
    if (!snapshot) return false;

    this.observations.clear();
    for (const record of snapshot.observations) {
      this.observations.set(
        tripleKey(record.category, record.key, record.value),
        this.withCount(record, record.observationCount),
      );
    }
    this.interactions.clear();
    for (const [category, count] of snapshot.interactions) {
      this.interactions.set(category, count);
    }
    this.markPersisted();
    return true;
  }

  /**
   * Fold the observations made since the last restore or
   * {@link markPersisted} into a stored snapshot, which another session
   * of the same user may have written in the meantime. Missing or invalid
   * stored data counts as empty. Local state is left as it is.
   */
  mergeInto(stored: unknown): PreferencesSnapshot {
    const base = stored === undefined ? null : this.parseSnapshot(stored);

    const observations = new Map<string, PreferenceRecord>();
    for (const record of base?.observations ?? []) {
      observations.set(tripleKey(record.category, record.key, record.value), record);
    }
    for (const [id, record] of this.observations) {
      const delta = record.observationCount - (this.persistedCounts.get(id) ?? 0);
      if (delta <= 0) continue;
      const count = (observations.get(id)?.observationCount ?? 0) + delta;
      observations.set(id, { ...record, observationCount: count });
    }

    const interactions = new Map<IntentCategory, number>(base?.interactions ?? []);
    for (const [category, count] of this.interactions) {
      const delta = count - (this.persistedInteractions.get(category) ?? 0);
      if (delta > 0) interactions.set(category, (interactions.get(category) ?? 0) + delta);
    }

    return {
      version: 1,
      observations: [...observations.values()].map((r) => this.withCount(r, r.observationCount)),
      interactions: [...interactions],
    };
  }

  /** Treat the current counts as saved; the next merge starts from here. */
  markPersisted(): void {
    this.persistedCounts = new Map([...this.observations].map(([id, r]) => [id, r.observationCount]));
    this.persistedInteractions = new Map(this.interactions);
  }

  private withCount(record: PreferenceRecord, count: number): PreferenceRecord {
    return {
      ...record,
      observationCount: count,
      confidence: Math.min(1, count / this.promotionThreshold),
      active: count >= this.promotionThreshold,
    };
  }

  private parseSnapshot(data: unknown): PreferencesSnapshot | null {
    const parsed = PreferencesSnapshotSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      this.logger.warn('ignoring invalid preferences snapshot', { issues });
      return null;
    }
    return parsed.data;
  }
}

function pickLeading(records: PreferenceRecord[]): PreferenceRecord | null {
  let leading: PreferenceRecord | null = null;
  for (const record of records) {
    if (
      !leading ||
      record.observationCount > leading.observationCount ||
      (record.observationCount === leading.observationCount && record.updatedAt > leading.updatedAt)
    ) {
      leading = record;
    }
  }
  return leading ? { ...leading } : null;
}
