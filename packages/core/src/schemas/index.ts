/**
 * Zod validation schemas for tiered-context
 *
 * Runtime validation for builder configuration, interaction requests
 * and the identity profile read from disk.
 */

import { z } from 'zod';

import {
  DEFAULT_MEMORY_THRESHOLDS,
  DEFAULT_RECENT_CONVERSATION_LIMIT,
  DEFAULT_RETRIEVAL_TTL_MS,
  DEFAULT_SEMI_STATIC_TTL_MS,
} from '../constants.js';

// ============================================================================
// Primitive Schemas
// ============================================================================

export const PromptModeSchema = z.enum(['lite', 'standard', 'deep']);

export const SceneComplexitySchema = z.enum(['simple', 'medium', 'complex']);

// ============================================================================
// Builder Configuration
// ============================================================================

export const BuilderConfigSchema = z
  .object({
    mode: PromptModeSchema.default('standard'),

    // Memory index strategy
    enableMemoryIndex: z.boolean().default(true),
    memoryIndexCount: z.number().int().positive().default(30),
    memoryFulltextCount: z.number().int().positive().default(3),

    // Cache strategy
    enableCache: z.boolean().default(true),
    semiStaticCacheTtlMs: z
      .number()
      .int()
      .nonnegative()
      .default(DEFAULT_SEMI_STATIC_TTL_MS),
    retrievalCacheTtlMs: z
      .number()
      .int()
      .nonnegative()
      .default(DEFAULT_RETRIEVAL_TTL_MS),

    // Budget enforcement
    enableCompression: z.boolean().default(true),
    enableTokenCounting: z.boolean().default(true),

    // Dynamic layer
    recentConversationLimit: z
      .number()
      .int()
      .positive()
      .default(DEFAULT_RECENT_CONVERSATION_LIMIT),

    // Profile auto-selection
    autoAdjustMode: z.boolean().default(true),
    memoryCountThresholdLite: z
      .number()
      .int()
      .nonnegative()
      .default(DEFAULT_MEMORY_THRESHOLDS.lite),
    memoryCountThresholdStandard: z
      .number()
      .int()
      .nonnegative()
      .default(DEFAULT_MEMORY_THRESHOLDS.standard),
  })
  .refine(
    (config) =>
      config.memoryCountThresholdLite < config.memoryCountThresholdStandard,
    {
      message:
        'memoryCountThresholdLite must be lower than memoryCountThresholdStandard',
      path: ['memoryCountThresholdLite'],
    }
  );

export type BuilderConfig = z.infer<typeof BuilderConfigSchema>;
export type BuilderConfigInput = z.input<typeof BuilderConfigSchema>;

// ============================================================================
// Interaction Request
// ============================================================================

export const InteractionRequestSchema = z.object({
  interactionType: z.string().min(1),
  content: z.string().nullable().optional(),
  requestId: z.string().optional(),
  timestamp: z.string().datetime().optional(),
});

// ============================================================================
// Identity Profile (identity.json)
// ============================================================================

export const UserProfileSchema = z.object({
  nickname: z.string().min(1).default('friend'),
  birthday: z
    .string()
    .regex(/^\d{2}-\d{2}$/, 'birthday must use MM-DD')
    .optional(),
  relationship: z.string().default('friend'),
  timezone: z.string().default('UTC'),
  preferredLanguage: z.string().default('en'),
  customFacts: z.array(z.string()).default([]),
});

export const CharacterIdentitySchema = z.object({
  name: z.string().min(1),
  nickname: z.string().optional(),
  personalityArchetype: z.string().default('gentle_playful'),
  voiceStyle: z.string().default('casual'),
});

export const IdentityProfileSchema = z.object({
  userProfile: UserProfileSchema.default({}),
  character: CharacterIdentitySchema,
  hotReload: z
    .object({
      enabled: z.boolean().default(true),
      pollIntervalMs: z.number().int().positive().default(1000),
      debounceMs: z.number().int().nonnegative().default(1000),
    })
    .default({}),
});

export type UserProfile = z.infer<typeof UserProfileSchema>;
export type CharacterIdentity = z.infer<typeof CharacterIdentitySchema>;
export type IdentityProfile = z.infer<typeof IdentityProfileSchema>;

// ============================================================================
// Facts
// ============================================================================

export const UserPreferenceSchema = z.object({
  category: z.string().min(1),
  key: z.string().min(1),
  value: z.string(),
  confidence: z.number().min(0).max(1).default(1),
  evidenceCount: z.number().int().min(1).default(1),
  source: z.enum(['conversation', 'observation', 'explicit']).optional(),
});

export const BehaviorPatternSchema = z.object({
  patternType: z.string().min(1),
  description: z.string().min(1),
  frequency: z.enum(['daily', 'weekly', 'monthly']).optional(),
  confidence: z.number().min(0).max(1).default(0.5),
  sampleCount: z.number().int().min(1).default(1),
});

export type UserPreferenceInput = z.input<typeof UserPreferenceSchema>;
export type BehaviorPatternInput = z.input<typeof BehaviorPatternSchema>;
