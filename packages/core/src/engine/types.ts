/**
 * Types for blast radius runs
 */

import type { RankedFinding } from '../types';
import type { ResolutionWarning } from '../resolver';
import type { MemoCacheStats } from '../runtime';

export type OutcomeStatus = 'complete' | 'partial' | 'skipped' | 'failed' | 'cancelled';

export interface IdentityOutcome {
  identityId: string;
  status: OutcomeStatus;
  /** Why the identity is not complete */
  reason?: string;
  warnings: ResolutionWarning[];
  durationMs: number;
}

export interface IdentityResult {
  outcome: IdentityOutcome;
  /** Ranked, at most `topN` */
  findings: RankedFinding[];
}

export interface RunStats {
  identities: number;
  complete: number;
  partial: number;
  skipped: number;
  failed: number;
  cancelled: number;
  findings: number;
  durationMs: number;
  cache: MemoCacheStats;
}

export interface BlastRadiusReport {
  runId: string;
  startedAt: Date;
  completedAt: Date;
  /** One entry per selected identity, sorted by identity id */
  results: IdentityResult[];
  /** Every identity's findings ranked together */
  findings: RankedFinding[];
  outcomes: IdentityOutcome[];
  cancelled: boolean;
  stats: RunStats;
}

export interface AnalyzeOptions {
  signal?: AbortSignal;
}

export interface BlastRadiusEvents {
  'identity:completed': (result: IdentityResult) => void;
  'identity:failed': (outcome: IdentityOutcome) => void;
  'run:completed': (report: BlastRadiusReport) => void;
}
