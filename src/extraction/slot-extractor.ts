/**
 * Slot filling and the combined extract() entry point.
 *
 * Each slot tries its own ordered patterns first, then falls back to an
 * extracted entity of its expected type. Required slots left unfilled
 * are reported, never thrown.
 */

import { silentLogger, type Logger } from '../logging/logger.js';
import type { EntityMap, SlotMap, SlotSchema } from '../types/intent.js';
import { extractEntities } from './entity-extractor.js';

// ============================================================================
// Types
// ============================================================================

export interface SlotFillResult {
  slots: SlotMap;
  missingRequired: string[];
  /** Slots filled by one of their own patterns rather than an entity */
  patternFilled: string[];
}

export interface ExtractionResult {
  entities: EntityMap;
  slots: SlotMap;
  missingRequired: string[];
  patternFilled: string[];
}

// ============================================================================
// fillSlots
// ============================================================================

function cleanValue(value: string): string {
  return value
    .trim()
    .replace(/[\s.,!?;:]+$/, '')
    .replace(/^["'](.*)["']$/, '$1')
    .trim();
}

/**
 * Fill the slots of a schema from text and already-extracted entities.
 */
export function fillSlots(text: string, schema: SlotSchema, entities: EntityMap): SlotFillResult {
  const subject = text.trim().replace(/[.!?]+$/, '');
  const slots: SlotMap = {};
  const missingRequired: string[] = [];
  const patternFilled: string[] = [];

  for (const slot of schema) {
    let value: string | null = null;

    for (const pattern of slot.patterns) {
      const match = subject.match(pattern);
      const captured = match?.[1];
      if (captured === undefined) continue;
      const cleaned = cleanValue(captured);
      if (cleaned) {
        value = cleaned;
        patternFilled.push(slot.name);
        break;
      }
    }

    if (value === null && slot.entityType !== undefined) {
      const entity = entities[slot.entityType];
      if (entity) value = entity.raw;
    }

    slots[slot.name] = value;
    if (value === null && slot.required) {
      missingRequired.push(slot.name);
    }
  }

  return { slots, missingRequired, patternFilled };
}

// ============================================================================
// extract
// ============================================================================

/**
 * Extract entities and fill slots in one pass. Never throws: an internal
 * failure is logged and every required slot is reported missing.
 */
export function extract(text: string, schema: SlotSchema, logger: Logger = silentLogger): ExtractionResult {
  try {
    const entities = extractEntities(text);
    return { entities, ...fillSlots(text, schema, entities) };
  } catch (err) {
    logger.error('extraction failed', { error: err });
    return {
      entities: {},
      slots: Object.fromEntries(schema.map((slot) => [slot.name, null])),
      missingRequired: schema.filter((slot) => slot.required).map((slot) => slot.name),
      patternFilled: [],
    };
  }
}

/**
 * Confidence after the per-missing-slot penalty: confidence × factor^missing.
 */
export function applySlotPenalty(confidence: number, missingCount: number, factor: number): number {
  if (missingCount <= 0) return confidence;
  return confidence * Math.pow(factor, missingCount);
}
