// Types
export * from './types';

// Errors
export * from './errors';

// Permission graph
export * from './graph';

// Statement evaluation
export * from './policy';

// Effective grants
export * from './resolver';

// Resource reachability
export * from './reachability';

// Criticality and permission strength
export * from './scoring';

// Ranking
export * from './ranking';

// Run orchestration
export * from './engine';

// Configuration
export * from './config';

// Snapshot loading
export * from './snapshot';

// Runtime helpers
export * from './runtime';

// OpenTelemetry tracing
export * from './telemetry';

// Logging
export { Logger, logger, type LogLevel } from './utils/logger';

// Pattern matching
export {
  compilePattern,
  validatePattern,
  matchesPattern,
  coversPattern,
  isLiteralPattern,
  type CompiledPattern,
  type PatternKind,
} from './utils/pattern-matching';
