/**
 * Zod schema for the dialogue core configuration.
 *
 * Every field has a `.default()` so `CoreConfigSchema.parse({})` returns a
 * complete config. The thresholds are tuning starting points rather than
 * derived values.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { LogLevelSchema } from '../logging/logger.js';

const unit = () => z.number().min(0).max(1);

export const CoreConfigSchema = z.object({
  // Memory
  shortTermCapacity: z.number().int().min(1).default(3),
  promotionThreshold: z.number().int().min(1).default(3),
  longTermTopK: z.number().int().min(0).default(3),
  sessionIdleTimeoutMs: z.number().int().min(1).default(30 * 60 * 1000),

  // Classification
  patternConfidence: unit().default(0.9),
  slotStageConfidence: unit().default(0.7),
  semanticTriggerThreshold: unit().default(0.6),
  semanticMatchThreshold: unit().default(0.5),
  unknownFloor: unit().default(0.3),
  contextBoost: unit().default(0.1),
  missingSlotPenalty: unit().default(0.9),
  ambiguityEpsilon: unit().default(0.05),

  // Routing
  clarificationThreshold: unit().default(0.6),

  // Embeddings
  embeddingTimeoutMs: z.number().int().min(1).default(2000),
  embeddingCacheSize: z.number().int().min(0).default(1000),
  embeddingDimension: z.number().int().min(8).default(384),

  // Ambient
  logLevel: LogLevelSchema.default('info'),
  auditLogDir: z.string().min(1).optional(),
});

export type CoreConfig = z.infer<typeof CoreConfigSchema>;

export const DEFAULT_CORE_CONFIG: CoreConfig = CoreConfigSchema.parse({});
