/**
 * Type definitions for intents, entities and slots.
 *
 * Categories and entity types are Zod enums so persisted turns and audit
 * records can be validated on read.
 */

import { z } from 'zod';

// ============================================================================
// Categories
// ============================================================================

export const IntentCategorySchema = z.enum([
  'command',
  'question',
  'math',
  'code',
  'fetch',
  'conversational',
  'unknown',
]);

export type IntentCategory = z.infer<typeof IntentCategorySchema>;

/** Classifiable categories, highest priority first. `unknown` is never a candidate. */
export const CATEGORY_PRIORITY: readonly Exclude<IntentCategory, 'unknown'>[] = [
  'command',
  'math',
  'code',
  'fetch',
  'question',
  'conversational',
];

export type KnownCategory = (typeof CATEGORY_PRIORITY)[number];

/** Which classification stage produced the intent. */
export const IntentSourceSchema = z.enum(['pattern', 'slot', 'semantic', 'fallback']);

export type IntentSource = z.infer<typeof IntentSourceSchema>;

/** Stage precedence used to break confidence ties. Lower wins. */
export const SOURCE_PRECEDENCE: Record<IntentSource, number> = {
  pattern: 0,
  slot: 1,
  semantic: 2,
  fallback: 3,
};

// ============================================================================
// Entities and slots
// ============================================================================

export const EntityTypeSchema = z.enum([
  'url',
  'email',
  'file_path',
  'time',
  'date',
  'money',
  'percentage',
  'version',
  'amount',
  'identifier',
  'number',
  'application',
]);

export type EntityType = z.infer<typeof EntityTypeSchema>;

export const EntityValueSchema = z.object({
  type: EntityTypeSchema,
  /** Normalised value: numbers for numeric types, trimmed text otherwise */
  value: z.union([z.string(), z.number()]),
  /** Exact matched text */
  raw: z.string(),
  start: z.number().int(),
  end: z.number().int(),
});

export type EntityValue = z.infer<typeof EntityValueSchema>;

export type EntityMap = Partial<Record<EntityType, EntityValue>>;

/** Slot name -> filled value, or null when unfilled. */
export type SlotMap = Record<string, string | null>;

/**
 * A named, typed parameter an intent needs to be actionable.
 *
 * Patterns are tried in declaration order; the first one that matches
 * fills the slot from its first capture group. When none match, an
 * extracted entity of `entityType` fills it.
 */
export interface SlotDefinition {
  name: string;
  entityType?: EntityType;
  required: boolean;
  patterns: readonly RegExp[];
}

export type SlotSchema = readonly SlotDefinition[];

// ============================================================================
// Intent
// ============================================================================

export interface IntentAlternative {
  category: IntentCategory;
  confidence: number;
  source: IntentSource;
}

export interface Intent {
  category: IntentCategory;
  /** Always within [0, 1] */
  confidence: number;
  entities: EntityMap;
  slots: SlotMap;
  /** Required slots that stayed unfilled */
  missingSlots: string[];
  source: IntentSource;
  /** Runner-up candidates, best first */
  alternatives: IntentAlternative[];
  /** Top candidates were within the ambiguity epsilon */
  ambiguous: boolean;
  /** The semantic stage ran without a working embedding provider */
  degraded: boolean;
}

/** Context consulted by the classifier. */
export interface ClassificationContext {
  /** Category of the previous turn, for topic-continuity boosting */
  lastIntentCategory?: IntentCategory | null;
}

/** The guaranteed floor of classification. */
export function unknownIntent(overrides: Partial<Intent> = {}): Intent {
  return {
    category: 'unknown',
    confidence: 0,
    entities: {},
    slots: {},
    missingSlots: [],
    source: 'fallback',
    alternatives: [],
    ambiguous: false,
    degraded: false,
    ...overrides,
  };
}

/** Clamp a confidence value into [0, 1]; NaN becomes 0. */
export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
