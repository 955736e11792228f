/**
 * Config module
 */

export {
  EngineConfigSchema,
  ScoringConfigSchema,
  ScoringWeightsSchema,
  PermissionStrengthConfigSchema,
  type EngineConfig,
  type EngineConfigInput,
  type ScoringConfig,
  type PermissionStrengthConfig,
  type BlastRadiusQuery,
} from './schema';
export {
  DEFAULT_CLASSIFICATION_TIERS,
  DEFAULT_SENSITIVE_TAGS,
  DEFAULT_SCORING_WEIGHTS,
  DEFAULT_PERMISSION_RULES,
  DEFAULT_PERMISSION_WEIGHT,
} from './defaults';
export {
  loadConfigFile,
  parseConfig,
  parseConfigText,
  validateConfig,
  substituteEnvVars,
  toIssues,
  type Environment,
  type LoadConfigOptions,
} from './loader';
