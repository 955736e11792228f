/**
 * Types for the permission resolver
 */

import type { EffectiveGrant, PolicyStatement, RequestContext } from '../types';
import type { TraversalBudget } from '../runtime';

/**
 * A statement reachable from a principal, with the membership path that
 * reaches its bearer
 */
export interface ScopedStatement extends PolicyStatement {
  statementId: string;
  bearerId: string;
  /** Node ids from the principal (or first parent) to the bearer */
  path: readonly string[];
}

/**
 * Statements and ancestors inherited through a set of direct parents.
 * Memoized per run, keyed by the sorted parent ids.
 */
export interface InheritedSet {
  /** Ancestor id -> shortest path starting at one of the parents */
  ancestors: ReadonlyMap<string, readonly string[]>;
  statements: readonly ScopedStatement[];
}

export interface ResolutionWarning {
  statementId: string;
  bearerId: string;
  message: string;
}

export interface ResolveRequest {
  actions: readonly string[];
  context: RequestContext;
  budget?: TraversalBudget;
}

export interface ResolvedPermissions {
  principalId: string;
  actions: readonly string[];
  /** Every ancestor (principal included) with its shortest membership path */
  ancestors: ReadonlyMap<string, readonly string[]>;
  /** ALLOW grants not overridden by any applicable DENY */
  allows: EffectiveGrant[];
  /** Every applicable DENY, per action and pattern */
  denies: EffectiveGrant[];
  warnings: ResolutionWarning[];
}
