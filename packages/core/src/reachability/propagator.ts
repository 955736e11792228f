/**
 * Reachability Propagator
 *
 * Expands effective grants into concrete resources:
 * 1. match each ALLOW pattern against resources in the principal's boundary
 * 2. descend CONTAINS edges from every match, stopping at resources a DENY
 *    covers for the same action
 * 3. cross TRUSTS edges breadth-first, up to `maxTrustHops`, and repeat the
 *    expansion inside each trusted boundary
 */

import type { EffectiveGrant, GraphNode, PathStep, RequestContext } from '../types';
import type { GraphStore } from '../graph';
import { boundaryOf, compareIds } from '../graph';
import type { ResolvedPermissions, ResolutionWarning } from '../resolver';
import { evaluateConditions } from '../policy';
import { TimeoutError } from '../errors';
import { TraversalBudget, unboundedBudget } from '../runtime';
import { compilePattern, matchesCompiled, type CompiledPattern } from '../utils/pattern-matching';
import { Logger, logger as defaultLogger } from '../utils/logger';
import type {
  PropagationRequest,
  ReachabilityResult,
  ReachedAction,
  ReachedResource,
} from './types';

interface QueueItem {
  resourceId: string;
  path: PathStep[];
}

interface Frontier {
  boundary: string;
  hops: number;
  trail: PathStep[];
}

interface ExpansionScope {
  allows: readonly EffectiveGrant[];
  denies: readonly EffectiveGrant[];
  boundary: string;
  hops: number;
  /** Steps leading up to the grant bearer's membership path */
  prefix: PathStep[];
}

type ReachMap = Map<string, { boundary: string; actions: Map<string, ReachedAction> }>;

export interface ReachabilityPropagatorConfig {
  logger?: Logger;
}

export class ReachabilityPropagator {
  private readonly log: Logger;

  constructor(
    private readonly graph: GraphStore,
    config: ReachabilityPropagatorConfig = {},
  ) {
    this.log = (config.logger ?? defaultLogger).child({ component: 'propagator' });
  }

  /**
   * Enumerate the resources reachable with `permissions`.
   * A timeout returns what was reached so far, flagged incomplete.
   */
  async propagate(
    permissions: ResolvedPermissions,
    request: PropagationRequest,
  ): Promise<ReachabilityResult> {
    const principal = this.graph.getNode(permissions.principalId);
    const budget = request.budget ?? unboundedBudget(principal.id);
    const home = boundaryOf(principal);
    const reached: ReachMap = new Map();
    const entered = new Map<string, number>([[home, 0]]);
    const warnings: ResolutionWarning[] = [];
    const origin: PathStep = { nodeId: principal.id, via: 'ORIGIN' };

    let incomplete = false;
    let reason: string | undefined;

    try {
      this.expand(
        { allows: permissions.allows, denies: permissions.denies, boundary: home, hops: 0, prefix: [origin] },
        reached,
        budget,
      );
      await this.crossTrusts(principal, permissions, request, budget, reached, entered, warnings, origin);
    } catch (error) {
      if (!(error instanceof TimeoutError)) {
        throw error;
      }
      incomplete = true;
      reason = error.message;
      this.log.warn('Propagation cut short', { principalId: principal.id, reached: reached.size });
    }

    return {
      identityId: principal.id,
      resources: toResources(reached),
      boundaries: entered,
      warnings,
      incomplete,
      ...(reason !== undefined ? { reason } : {}),
    };
  }

  private async crossTrusts(
    principal: GraphNode,
    permissions: ResolvedPermissions,
    request: PropagationRequest,
    budget: TraversalBudget,
    reached: ReachMap,
    entered: Map<string, number>,
    warnings: ResolutionWarning[],
    origin: PathStep,
  ): Promise<void> {
    const home = boundaryOf(principal);
    const sourced = new Set<string>([home]);
    let frontier: Frontier[] = [{ boundary: home, hops: 0, trail: [] }];
    // Resources reached through CONTAINS may live in other boundaries
    for (const boundary of reachedBoundaries(reached, 0)) {
      if (sourced.has(boundary)) continue;
      sourced.add(boundary);
      frontier.push({ boundary, hops: 0, trail: [] });
    }

    while (frontier.length > 0) {
      const next: Frontier[] = [];

      for (const current of frontier) {
        if (current.hops >= request.maxTrustHops || !this.isBoundary(current.boundary)) {
          continue;
        }

        for (const { edge, node } of this.graph.neighbors(current.boundary, 'TRUSTS')) {
          budget.tick();
          if (entered.has(node.id)) continue;

          const hops = current.hops + 1;
          const context: RequestContext = {
            ...request.context,
            'trust.source': current.boundary,
            'trust.target': node.id,
            'trust.hop': hops,
          };
          if (!evaluateConditions(edge.conditions, context)) continue;

          entered.set(node.id, hops);
          const trail: PathStep[] = [...current.trail, { nodeId: node.id, via: 'TRUSTS' }];
          const prefix: PathStep[] = [origin, ...trail];
          let allows: readonly EffectiveGrant[] = permissions.allows;
          let denies: readonly EffectiveGrant[] = permissions.denies;

          if (edge.assumeRole !== undefined && request.resolveAssumedRole) {
            const assumed = await request.resolveAssumedRole(edge.assumeRole);
            allows = assumed.allows;
            denies = [...permissions.denies, ...assumed.denies];
            warnings.push(...assumed.warnings);
            prefix.push({ nodeId: edge.assumeRole, via: 'ASSUMES' });
          }

          this.expand({ allows, denies, boundary: node.id, hops, prefix }, reached, budget);
          sourced.add(node.id);
          next.push({ boundary: node.id, hops, trail });
          for (const boundary of reachedBoundaries(reached, hops)) {
            if (sourced.has(boundary)) continue;
            sourced.add(boundary);
            next.push({ boundary, hops, trail });
          }
        }
      }

      frontier = next;
    }
  }

  /**
   * Seed from pattern matches, then walk CONTAINS breadth-first.
   * Items are bucketed by path length so the first visit is the shortest.
   */
  private expand(scope: ExpansionScope, reached: ReachMap, budget: TraversalBudget): void {
    const byAction = new Map<string, EffectiveGrant[]>();
    for (const grant of scope.allows) {
      const grants = byAction.get(grant.action) ?? [];
      grants.push(grant);
      byAction.set(grant.action, grants);
    }

    for (const [action, grants] of byAction) {
      const denyPatterns: CompiledPattern[] = scope.denies
        .filter(deny => deny.action === action)
        .map(deny => compilePattern(deny.resourcePattern));
      const isDenied = (resourceId: string): boolean =>
        denyPatterns.some(pattern => matchesCompiled(pattern, resourceId));

      const buckets: QueueItem[][] = [];
      const enqueue = (item: QueueItem): void => {
        (buckets[item.path.length] ??= []).push(item);
      };

      for (const grant of grants) {
        const memberSteps: PathStep[] = grant.path
          .slice(1)
          .map((nodeId): PathStep => ({ nodeId, via: 'MEMBER_OF' }));
        for (const resourceId of this.graph.resources.match(grant.resourcePattern, scope.boundary)) {
          budget.tick();
          enqueue({
            resourceId,
            path: [
              ...scope.prefix,
              ...memberSteps,
              { nodeId: resourceId, via: 'GRANTS', detail: grant.resourcePattern },
            ],
          });
        }
      }

      const seen = new Set<string>();
      for (let depth = 0; depth < buckets.length; depth++) {
        const bucket = buckets[depth];
        if (!bucket) continue;

        for (const item of bucket) {
          budget.tick();
          if (seen.has(item.resourceId)) continue;
          seen.add(item.resourceId);

          // Local deny blocks this resource and everything inherited below it
          if (isDenied(item.resourceId)) continue;

          record(reached, this.graph.getNode(item.resourceId), action, scope.hops, item.path);

          for (const { node } of this.graph.neighbors(item.resourceId, 'CONTAINS')) {
            if (seen.has(node.id)) continue;
            enqueue({
              resourceId: node.id,
              path: [...item.path, { nodeId: node.id, via: 'CONTAINS' }],
            });
          }
        }
      }
    }
  }

  private isBoundary(id: string): boolean {
    return this.graph.findNode(id)?.kind === 'Boundary';
  }
}

function record(
  reached: ReachMap,
  resource: GraphNode,
  action: string,
  trustHops: number,
  path: PathStep[],
): void {
  let entry = reached.get(resource.id);
  if (!entry) {
    entry = { boundary: boundaryOf(resource), actions: new Map() };
    reached.set(resource.id, entry);
  }

  const existing = entry.actions.get(action);
  if (
    !existing ||
    trustHops < existing.trustHops ||
    (trustHops === existing.trustHops && path.length < existing.path.length)
  ) {
    entry.actions.set(action, { action, trustHops, path });
  }
}

function reachedBoundaries(reached: ReachMap, trustHops: number): string[] {
  const boundaries = new Set<string>();
  for (const entry of reached.values()) {
    for (const action of entry.actions.values()) {
      if (action.trustHops === trustHops) {
        boundaries.add(entry.boundary);
        break;
      }
    }
  }
  return [...boundaries].sort(compareIds);
}

function toResources(reached: ReachMap): ReachedResource[] {
  return [...reached.entries()]
    .sort(([a], [b]) => compareIds(a, b))
    .map(([resourceId, entry]) => ({
      resourceId,
      boundary: entry.boundary,
      actions: [...entry.actions.values()].sort((a, b) => compareIds(a.action, b.action)),
    }));
}
