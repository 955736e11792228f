/**
 * Blast Radius Engine
 *
 * Runs the per-identity pipeline (resolve, propagate, score, rank) over a
 * sealed graph with a pool of async workers. Identities fail in isolation:
 * a timeout yields partial findings, an unexpected error a failed outcome,
 * and cancellation keeps whatever completed before the abort.
 */

import { randomUUID } from 'crypto';
import { EventEmitter } from 'eventemitter3';
import type { Span } from '@opentelemetry/api';
import type { GraphNode, RankedFinding, RequestContext } from '../types';
import type { GraphStore } from '../graph';
import { boundaryOf, compareIds } from '../graph';
import { PolicyEvaluator, REQUEST_TIME_KEY } from '../policy';
import { PermissionResolver, collectActionUniverse, type InheritedSet } from '../resolver';
import { ReachabilityPropagator } from '../reachability';
import { CriticalityScorer, PermissionStrength } from '../scoring';
import { BlastRadiusRanker, mergeFindings } from '../ranking';
import { MemoCache, TraversalBudget, runPool, type Clock } from '../runtime';
import { validateConfig, type BlastRadiusQuery, type EngineConfig, type EngineConfigInput } from '../config';
import { CancelledError, NotFoundError, TimeoutError, errorMessage } from '../errors';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { runWithSpan, startIdentitySpan, endIdentitySpan } from '../telemetry/spans';
import type {
  AnalyzeOptions,
  BlastRadiusEvents,
  BlastRadiusReport,
  IdentityOutcome,
  IdentityResult,
  OutcomeStatus,
  RunStats,
} from './types';

export interface BlastRadiusEngineOptions {
  logger?: Logger;
  /** Millisecond clock for deadlines and durations */
  clock?: Clock;
}

/** Everything one run shares between its workers */
interface RunContext {
  graph: GraphStore;
  settings: EngineConfig;
  actions: string[];
  requestTime: string;
  resolver: PermissionResolver;
  propagator: ReachabilityPropagator;
  ranker: BlastRadiusRanker;
  signal?: AbortSignal;
  span: Span;
}

export class BlastRadiusEngine extends EventEmitter<BlastRadiusEvents> {
  readonly config: EngineConfig;
  private readonly evaluator = new PolicyEvaluator();
  private readonly scorer: CriticalityScorer;
  private readonly strength: PermissionStrength;
  private readonly log: Logger;
  private readonly clock: Clock;

  constructor(config: EngineConfigInput = {}, options: BlastRadiusEngineOptions = {}) {
    super();
    this.config = validateConfig(config);
    this.scorer = new CriticalityScorer(this.config.scoring);
    this.strength = new PermissionStrength(this.config.permissionStrength);
    this.log = (options.logger ?? defaultLogger).child({ component: 'engine' });
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Analyze every selected identity. The graph is sealed first and stays
   * read-only; the returned report covers every selected identity.
   */
  async analyze(
    graph: GraphStore,
    query: BlastRadiusQuery = {},
    options: AnalyzeOptions = {},
  ): Promise<BlastRadiusReport> {
    graph.seal();

    const settings = this.settingsFor(query);
    const runId = randomUUID();
    const startedAt = this.clock();
    const identities = this.selectIdentities(graph, settings);
    const actions =
      settings.actionsOfInterest === 'all'
        ? collectActionUniverse(graph, this.strength.representativeActions())
        : [...new Set(settings.actionsOfInterest)].sort(compareIds);

    const cache = new MemoCache<InheritedSet>();
    const resolver = new PermissionResolver(graph, { evaluator: this.evaluator, cache, logger: this.log });
    const propagator = new ReachabilityPropagator(graph, { logger: this.log });
    const ranker = new BlastRadiusRanker(graph, this.scorer, this.strength);

    this.log.info('Blast radius run started', {
      runId,
      identities: identities.length,
      actions: actions.length,
      maxTrustHops: settings.maxTrustHops,
    });

    const results: IdentityResult[] = new Array(identities.length);

    await runWithSpan(runId, identities.length, async span => {
      const run: RunContext = {
        graph,
        settings,
        actions,
        requestTime: new Date(startedAt).toISOString(),
        resolver,
        propagator,
        ranker,
        span,
        signal: options.signal,
      };

      const unstarted = await runPool(
        identities,
        async (identityId, index) => {
          results[index] = await this.analyzeIdentity(identityId, run);
        },
        { concurrency: settings.concurrency, signal: options.signal },
      );

      for (const index of unstarted) {
        results[index] = {
          outcome: this.outcome(identities[index], 'cancelled', this.clock(), [], 'Run cancelled before start'),
          findings: [],
        };
      }
    });

    const completedAt = this.clock();
    const outcomes = results.map(result => result.outcome);
    const findings = mergeFindings(results.map(result => result.findings));
    const report: BlastRadiusReport = {
      runId,
      startedAt: new Date(startedAt),
      completedAt: new Date(completedAt),
      results,
      findings,
      outcomes,
      cancelled: options.signal?.aborted ?? false,
      stats: summarize(outcomes, findings, completedAt - startedAt, cache),
    };

    this.log.info('Blast radius run completed', {
      runId,
      findings: findings.length,
      cancelled: report.cancelled,
      durationMs: report.stats.durationMs,
    });
    this.emit('run:completed', report);
    return report;
  }

  private async analyzeIdentity(identityId: string, run: RunContext): Promise<IdentityResult> {
    const started = this.clock();
    const span = startIdentitySpan(identityId, run.span);
    const result = await this.runIdentity(identityId, run, started);
    endIdentitySpan(span, result.outcome, result.findings.length);

    if (result.outcome.status === 'complete' || result.outcome.status === 'partial') {
      this.emit('identity:completed', result);
    } else {
      this.emit('identity:failed', result.outcome);
    }
    return result;
  }

  private async runIdentity(identityId: string, run: RunContext, started: number): Promise<IdentityResult> {
    const node = run.graph.findNode(identityId);
    if (!node || node.kind !== 'Identity') {
      const error = new NotFoundError(identityId, 'Identity');
      this.log.warn('Skipping identity', { identityId, reason: error.message });
      return { outcome: this.outcome(identityId, 'skipped', started, [], error.message), findings: [] };
    }

    const budget = new TraversalBudget({
      identityId,
      timeoutMs: run.settings.identityTimeoutMs,
      clock: this.clock,
      signal: run.signal,
    });
    const context = this.contextFor(node, run.requestTime);
    const resolveRequest = { actions: run.actions, context, budget };

    try {
      const permissions = await run.resolver.resolve(identityId, resolveRequest);
      const reach = await run.propagator.propagate(permissions, {
        maxTrustHops: run.settings.maxTrustHops,
        context,
        budget,
        resolveAssumedRole: roleId => run.resolver.resolve(roleId, resolveRequest),
      });
      const findings = run.ranker.rank(reach, {
        trustHopDecay: run.settings.trustHopDecay,
        topN: run.settings.topN,
      });
      const warnings = [...permissions.warnings, ...reach.warnings];

      this.log.debug('Identity analyzed', {
        identityId,
        resources: reach.resources.length,
        findings: findings.length,
        steps: budget.stepCount,
      });
      return {
        outcome: reach.incomplete
          ? this.outcome(identityId, 'partial', started, warnings, reach.reason)
          : this.outcome(identityId, 'complete', started, warnings),
        findings,
      };
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.log.warn('Identity timed out during resolution', { identityId, budgetMs: error.budgetMs });
        return { outcome: this.outcome(identityId, 'partial', started, [], error.message), findings: [] };
      }
      if (error instanceof CancelledError) {
        return { outcome: this.outcome(identityId, 'cancelled', started, [], error.message), findings: [] };
      }
      this.log.error(`Identity ${identityId} failed`, error);
      return { outcome: this.outcome(identityId, 'failed', started, [], errorMessage(error)), findings: [] };
    }
  }

  private settingsFor(query: BlastRadiusQuery): EngineConfig {
    const overrides = Object.fromEntries(
      Object.entries(query).filter(([, value]) => value !== undefined),
    );
    return Object.keys(overrides).length === 0 ? this.config : validateConfig({ ...this.config, ...overrides });
  }

  private selectIdentities(graph: GraphStore, settings: EngineConfig): string[] {
    if (settings.targetIdentity !== 'all') {
      return [settings.targetIdentity];
    }
    return [...graph.nodes('Identity')].map(node => node.id).sort(compareIds);
  }

  /**
   * Base context, then the principal's own keys, which cannot be overridden
   */
  private contextFor(identity: GraphNode, requestTime: string): RequestContext {
    const context: Record<string, string | number | boolean> = {
      [REQUEST_TIME_KEY]: requestTime,
      ...this.config.context,
    };
    for (const [key, value] of Object.entries(identity.attributes)) {
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        context[`identity.${key}`] = value;
      }
    }
    context['principal.id'] = identity.id;
    context['principal.boundary'] = boundaryOf(identity);
    return context;
  }

  private outcome(
    identityId: string,
    status: OutcomeStatus,
    started: number,
    warnings: IdentityOutcome['warnings'],
    reason?: string,
  ): IdentityOutcome {
    return {
      identityId,
      status,
      ...(reason !== undefined ? { reason } : {}),
      warnings,
      durationMs: Math.max(0, this.clock() - started),
    };
  }
}

function summarize(
  outcomes: readonly IdentityOutcome[],
  findings: readonly RankedFinding[],
  durationMs: number,
  cache: MemoCache<InheritedSet>,
): RunStats {
  const count = (status: OutcomeStatus): number =>
    outcomes.filter(outcome => outcome.status === status).length;
  return {
    identities: outcomes.length,
    complete: count('complete'),
    partial: count('partial'),
    skipped: count('skipped'),
    failed: count('failed'),
    cancelled: count('cancelled'),
    findings: findings.length,
    durationMs,
    cache: cache.getStats(),
  };
}
