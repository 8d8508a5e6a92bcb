/**
 * Per-category slot schemas.
 *
 * Patterns are tried in declaration order; capture group 1 is the value.
 * A category with no entry here has no slots.
 */

import type { IntentCategory, SlotSchema } from '../types/intent.js';

/** Operators a math expression may contain, written or symbolic */
const OPERATOR = String.raw`(?:[-+*/^%x×÷]|plus|minus|times|divided\s+by|multiplied\s+by|over|mod)`;
const OPERAND = String.raw`\(?-?\d+(?:\.\d+)?\)?`;

export const SLOT_SCHEMAS: Partial<Record<IntentCategory, SlotSchema>> = {
  fetch: [
    {
      name: 'query',
      required: true,
      patterns: [
        /\b(?:search(?:\s+(?:the\s+web|online|google))?\s+for|look\s+up|google|find\s+me|find|fetch|get\s+me)\s+(.+)/i,
        /\b(?:latest|news|updates?)\s+(?:on|about|for)\s+(.+)/i,
        /\bwhat(?:'s|\s+is)\s+the\s+(?:weather|price|score|status)\s+(?:in|of|for)\s+(.+)/i,
      ],
    },
    { name: 'url', entityType: 'url', required: false, patterns: [] },
  ],
  math: [
    {
      name: 'expression',
      required: true,
      patterns: [
        new RegExp(String.raw`(${OPERAND}(?:\s*${OPERATOR}\s*${OPERAND})+)`, 'i'),
        /\b((?:square\s+root|sqrt|factorial|log|sin|cos|tan)\s+(?:of\s+)?-?\d+(?:\.\d+)?)/i,
        /\b(\d+(?:\.\d+)?\s?%\s+of\s+\d+(?:\.\d+)?)/i,
      ],
    },
  ],
  code: [
    {
      name: 'language',
      required: false,
      patterns: [/\b(python|typescript|javascript|java|rust|golang|go|c\+\+|c#|ruby|php|kotlin|swift|bash|sql)(?![\w+#])/i],
    },
    { name: 'file', entityType: 'file_path', required: false, patterns: [] },
  ],
  question: [
    {
      name: 'topic',
      required: false,
      patterns: [
        /\b(?:what|who|where|when|why|which)\s+(?:is|are|was|were|does|do|did)\s+(?:an?\s+|the\s+)?(.+)/i,
        /\bhow\s+(?:do|does|can|to)\s+(.+)/i,
        /\b(?:explain|describe|tell\s+me\s+about)\s+(.+)/i,
      ],
    },
  ],
  command: [
    {
      name: 'target',
      entityType: 'application',
      required: false,
      patterns: [/\b(?:open|launch|start|close|quit|run|restart)\s+(?:the\s+)?([\w .-]+?)(?:\s+(?:please|now|for\s+me))?$/i],
    },
    { name: 'time', entityType: 'time', required: false, patterns: [] },
  ],
};

export function getSlotSchema(category: IntentCategory): SlotSchema {
  return SLOT_SCHEMAS[category] ?? [];
}

export function requiredSlots(category: IntentCategory): string[] {
  return getSlotSchema(category)
    .filter((slot) => slot.required)
    .map((slot) => slot.name);
}
