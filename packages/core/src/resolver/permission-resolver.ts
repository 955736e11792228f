/**
 * Permission Resolver
 *
 * Computes a principal's effective grants: the closure of its MEMBER_OF
 * ancestors, every statement those nodes hold, and a per-action decision
 * through the policy evaluator.
 */

import type { EffectiveGrant, Effect, GrantsEdge } from '../types';
import { PRINCIPAL_KINDS } from '../types';
import type { GraphStore } from '../graph';
import { compareIds } from '../graph';
import { PolicyEvaluator, evaluateConditions } from '../policy';
import { ResolutionError, TimeoutError } from '../errors';
import { MemoCache, TraversalBudget, unboundedBudget } from '../runtime';
import { Logger, logger as defaultLogger } from '../utils/logger';
import type {
  InheritedSet,
  ResolutionWarning,
  ResolveRequest,
  ResolvedPermissions,
  ScopedStatement,
} from './types';

export interface PermissionResolverConfig {
  evaluator?: PolicyEvaluator;
  /** Run-scoped memo of inherited statements; a fresh one when omitted */
  cache?: MemoCache<InheritedSet>;
  logger?: Logger;
}

const EMPTY_INHERITANCE: InheritedSet = { ancestors: new Map(), statements: [] };

export class PermissionResolver {
  private readonly evaluator: PolicyEvaluator;
  private readonly cache: MemoCache<InheritedSet>;
  private readonly log: Logger;

  constructor(
    private readonly graph: GraphStore,
    config: PermissionResolverConfig = {},
  ) {
    this.evaluator = config.evaluator ?? new PolicyEvaluator();
    this.cache = config.cache ?? new MemoCache<InheritedSet>();
    this.log = (config.logger ?? defaultLogger).child({ component: 'resolver' });
  }

  /**
   * Resolve the effective grants of an Identity, Group or Role.
   * Cyclic membership terminates; an unknown principal is a ResolutionError.
   */
  async resolve(principalId: string, request: ResolveRequest): Promise<ResolvedPermissions> {
    const principal = this.graph.findNode(principalId);
    if (!principal || !PRINCIPAL_KINDS.includes(principal.kind)) {
      throw new ResolutionError(`Principal not found: ${principalId}`, 'PRINCIPAL_NOT_FOUND');
    }
    const budget = request.budget ?? unboundedBudget(principalId);

    const parents = this.directParents(principalId);
    const inherited = parents.length === 0 ? EMPTY_INHERITANCE : await this.inherited(parents, budget);

    const ancestors = new Map<string, readonly string[]>([[principalId, [principalId]]]);
    for (const [ancestorId, path] of inherited.ancestors) {
      if (!ancestors.has(ancestorId)) {
        ancestors.set(ancestorId, [principalId, ...path]);
      }
    }

    const statements: ScopedStatement[] = [];
    for (const edge of this.graph.grants(principalId)) {
      statements.push(scopeStatement(edge, [principalId]));
    }
    for (const statement of inherited.statements) {
      // A membership cycle can lead back to the principal itself
      if (statement.bearerId === principalId) continue;
      statements.push({ ...statement, path: [principalId, ...statement.path] });
    }

    const { valid, warnings } = this.partition(principalId, statements);
    const { allows, denies } = this.decide(principalId, valid, request, budget);

    return {
      principalId,
      actions: request.actions,
      ancestors,
      allows,
      denies,
      warnings,
    };
  }

  /**
   * Shortest MEMBER_OF path from the principal to each ancestor
   */
  membershipClosure(principalId: string, budget?: TraversalBudget): Map<string, string[]> {
    const closure = new Map<string, string[]>([[principalId, [principalId]]]);
    const queue: string[] = [principalId];
    const guard = budget ?? unboundedBudget(principalId);

    for (let head = 0; head < queue.length; head++) {
      guard.tick();
      const current = queue[head];
      const currentPath = closure.get(current) ?? [current];
      for (const { node } of this.graph.neighbors(current, 'MEMBER_OF')) {
        if (closure.has(node.id)) continue;
        closure.set(node.id, [...currentPath, node.id]);
        queue.push(node.id);
      }
    }
    return closure;
  }

  private async inherited(parents: readonly string[], budget: TraversalBudget): Promise<InheritedSet> {
    const key = parents.join('\u0000');
    try {
      return await this.cache.getOrCompute(key, () => this.inherit(parents, budget));
    } catch (error) {
      // The shared entry was computed under another identity's budget, which ran out
      if (error instanceof TimeoutError && error.identityId !== budget.identityId) {
        return this.cache.getOrCompute(key, () => this.inherit(parents, budget));
      }
      throw error;
    }
  }

  private directParents(principalId: string): string[] {
    const parents = new Set<string>();
    for (const { node } of this.graph.neighbors(principalId, 'MEMBER_OF')) {
      parents.add(node.id);
    }
    return [...parents].sort(compareIds);
  }

  /**
   * BFS from a parent set; visited-set guarded so cyclic membership ends.
   * Statements come out ordered by non-decreasing path length.
   */
  private inherit(parents: readonly string[], budget: TraversalBudget): InheritedSet {
    const ancestors = new Map<string, readonly string[]>();
    const statements: ScopedStatement[] = [];
    const queue: string[] = [];

    for (const parent of parents) {
      ancestors.set(parent, [parent]);
      queue.push(parent);
    }

    for (let head = 0; head < queue.length; head++) {
      budget.tick();
      const current = queue[head];
      const path = ancestors.get(current) ?? [current];

      for (const edge of this.graph.grants(current)) {
        statements.push(scopeStatement(edge, path));
      }
      for (const { node } of this.graph.neighbors(current, 'MEMBER_OF')) {
        if (ancestors.has(node.id)) continue;
        ancestors.set(node.id, [...path, node.id]);
        queue.push(node.id);
      }
    }

    return { ancestors, statements };
  }

  /**
   * Split off malformed statements; each one becomes a warning and is skipped
   */
  private partition(
    principalId: string,
    statements: ScopedStatement[],
  ): { valid: ScopedStatement[]; warnings: ResolutionWarning[] } {
    const valid: ScopedStatement[] = [];
    const warnings: ResolutionWarning[] = [];

    for (const statement of statements) {
      const problem = this.evaluator.validateStatement(statement);
      if (problem === null) {
        valid.push(statement);
        continue;
      }
      warnings.push({ statementId: statement.statementId, bearerId: statement.bearerId, message: problem });
      this.log.warn('Skipping malformed statement', {
        principalId,
        statementId: statement.statementId,
        bearerId: statement.bearerId,
        problem,
      });
    }
    return { valid, warnings };
  }

  private decide(
    principalId: string,
    statements: ScopedStatement[],
    request: ResolveRequest,
    budget: TraversalBudget,
  ): { allows: EffectiveGrant[]; denies: EffectiveGrant[] } {
    const allows: EffectiveGrant[] = [];
    const denies: EffectiveGrant[] = [];

    for (const action of request.actions) {
      budget.tick();
      const applicable = statements.filter(statement => this.evaluator.matchesAction(statement, action));
      if (applicable.length === 0) continue;

      // Statements are ordered by path length, so the first hit is the shortest path
      const denied = new Set<string>();
      for (const statement of applicable) {
        if (statement.effect !== 'DENY' || denied.has(statement.resource)) continue;
        if (!evaluateConditions(statement.conditions, request.context)) continue;
        denied.add(statement.resource);
        denies.push(toGrant(principalId, action, 'DENY', statement));
      }

      const candidates = new Set<string>();
      for (const statement of applicable) {
        if (statement.effect === 'ALLOW') candidates.add(statement.resource);
      }

      for (const pattern of candidates) {
        budget.tick();
        const result = this.evaluator.evaluate(applicable, {
          action,
          resource: pattern,
          resourceIsPattern: true,
          context: request.context,
        });
        if (result.decision !== 'ALLOW') continue;

        // Broader allows are candidates of their own
        const source = result.allows.find(statement => statement.resource === pattern);
        if (source) {
          allows.push(toGrant(principalId, action, 'ALLOW', source));
        }
      }
    }

    return { allows: allows.sort(compareGrants), denies: denies.sort(compareGrants) };
  }
}

function scopeStatement(edge: GrantsEdge, path: readonly string[]): ScopedStatement {
  return {
    ...edge.statement,
    statementId: edge.statement.id ?? edge.id,
    bearerId: edge.from,
    path,
  };
}

function toGrant(
  principalId: string,
  action: string,
  effect: Effect,
  statement: ScopedStatement,
): EffectiveGrant {
  return {
    principalId,
    action,
    resourcePattern: statement.resource,
    effect,
    path: [...statement.path],
    statementId: statement.statementId,
  };
}

export function compareGrants(a: EffectiveGrant, b: EffectiveGrant): number {
  return compareIds(a.action, b.action) || compareIds(a.resourcePattern, b.resourcePattern);
}
