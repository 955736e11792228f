/**
 * Default scoring tables
 */

/** Classification label -> tier; higher is more critical */
export const DEFAULT_CLASSIFICATION_TIERS: Record<string, number> = {
  public: 0,
  low: 0,
  internal: 1,
  medium: 1,
  confidential: 2,
  high: 2,
  restricted: 3,
  critical: 3,
};

/** Sensitivity tag -> weight in [0, 1] */
export const DEFAULT_SENSITIVE_TAGS: Record<string, number> = {
  pii: 1,
  phi: 1,
  pci: 1,
  secrets: 1,
  credentials: 1,
  financial: 0.8,
  'customer-data': 0.8,
  'source-code': 0.5,
};

export const DEFAULT_SCORING_WEIGHTS = {
  classification: 0.5,
  sensitivity: 0.3,
  businessImpact: 0.2,
};

/**
 * Action pattern -> permission weight. First match wins, so destructive
 * and administrative patterns come before read-only ones.
 */
export const DEFAULT_PERMISSION_RULES: Array<{ pattern: string; weight: number }> = [
  { pattern: 'admin*', weight: 3 },
  { pattern: 'delete*', weight: 2.5 },
  { pattern: 'write*', weight: 2 },
  { pattern: 'update*', weight: 2 },
  { pattern: 'create*', weight: 2 },
  { pattern: 'put*', weight: 2 },
  { pattern: 'read*', weight: 1 },
  { pattern: 'get*', weight: 1 },
  { pattern: 'list*', weight: 0.5 },
  { pattern: 'describe*', weight: 0.5 },
];

export const DEFAULT_PERMISSION_WEIGHT = 1;
