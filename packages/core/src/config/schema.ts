import { z } from 'zod';
import { validatePattern } from '../utils/pattern-matching';
import {
  DEFAULT_CLASSIFICATION_TIERS,
  DEFAULT_PERMISSION_RULES,
  DEFAULT_PERMISSION_WEIGHT,
  DEFAULT_SCORING_WEIGHTS,
  DEFAULT_SENSITIVE_TAGS,
} from './defaults';

/**
 * Zod schemas for engine configuration
 * Every field has a default, so `{}` is a complete configuration.
 */

const PatternSchema = z
  .string()
  .min(1, 'Pattern cannot be empty')
  .refine(pattern => validatePattern(pattern) === null, {
    message: 'Wildcards are only supported as a prefix or suffix',
  });

const ContextValueSchema = z.union([z.string(), z.number(), z.boolean()]);

// =============================================================================
// Scoring
// =============================================================================

export const ScoringWeightsSchema = z
  .object({
    classification: z.number().min(0),
    sensitivity: z.number().min(0),
    businessImpact: z.number().min(0),
  })
  .refine(w => w.classification + w.sensitivity + w.businessImpact > 0, {
    message: 'At least one scoring weight must be positive',
  });

export const ScoringConfigSchema = z.object({
  /** Classification label -> tier; labels match case-insensitively */
  classificationTiers: z.record(z.number().int().min(0)).default(() => ({ ...DEFAULT_CLASSIFICATION_TIERS })),
  /** Tag -> weight; tags match case-insensitively */
  sensitiveTags: z.record(z.number().min(0).max(1)).default(() => ({ ...DEFAULT_SENSITIVE_TAGS })),
  weights: ScoringWeightsSchema.default(() => ({ ...DEFAULT_SCORING_WEIGHTS })),
  /** Resource id -> classification label, applied before the node's own attribute */
  classificationOverrides: z.record(z.string()).default(() => ({})),
});

export const PermissionStrengthConfigSchema = z.object({
  rules: z
    .array(z.object({ pattern: PatternSchema, weight: z.number().positive() }))
    .default(() => DEFAULT_PERMISSION_RULES.map(rule => ({ ...rule }))),
  defaultWeight: z.number().positive().default(DEFAULT_PERMISSION_WEIGHT),
});

// =============================================================================
// Engine
// =============================================================================

export const EngineConfigSchema = z
  .object({
    /** Identity id, or 'all' for every Identity node */
    targetIdentity: z.string().min(1).default('all'),
    maxTrustHops: z.number().int().min(0).default(3),
    /** Findings kept per identity; unlimited when omitted */
    topN: z.number().int().positive().optional(),
    actionsOfInterest: z
      .union([z.literal('all'), z.array(z.string().min(1)).min(1, 'At least one action is required')])
      .default('all'),
    concurrency: z.number().int().positive().default(4),
    /** 0 disables the per-identity deadline */
    identityTimeoutMs: z.number().int().min(0).default(5000),
    trustHopDecay: z.number().gt(0).max(1).default(0.5),
    /** Base request context for condition evaluation */
    context: z.record(ContextValueSchema).default(() => ({})),
    scoring: ScoringConfigSchema.default({}),
    permissionStrength: PermissionStrengthConfigSchema.default({}),
  })
  .strict();

// =============================================================================
// Type Inference
// =============================================================================

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;
export type PermissionStrengthConfig = z.infer<typeof PermissionStrengthConfigSchema>;

/** Query fields a caller may override per run */
export type BlastRadiusQuery = Partial<
  Pick<EngineConfig, 'targetIdentity' | 'maxTrustHops' | 'topN' | 'actionsOfInterest'>
>;
