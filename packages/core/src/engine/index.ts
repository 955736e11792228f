/**
 * Engine module
 */

export { BlastRadiusEngine, type BlastRadiusEngineOptions } from './blast-radius-engine';
export type {
  AnalyzeOptions,
  BlastRadiusEvents,
  BlastRadiusReport,
  IdentityOutcome,
  IdentityResult,
  OutcomeStatus,
  RunStats,
} from './types';
