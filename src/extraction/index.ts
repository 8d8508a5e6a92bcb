export { extractEntities, refineNumber, normalizeValue, tokenize } from './entity-extractor.js';
export type { Token } from './entity-extractor.js';
export { ENTITY_PATTERNS, KNOWN_APPLICATIONS } from './entity-patterns.js';
export type { EntityPattern } from './entity-patterns.js';
export { fillSlots, extract, applySlotPenalty } from './slot-extractor.js';
export type { SlotFillResult, ExtractionResult } from './slot-extractor.js';
export { SLOT_SCHEMAS, getSlotSchema, requiredSlots } from './slot-schemas.js';
