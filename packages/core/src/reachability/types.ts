/**
 * Types for reachability propagation
 */

import type { PathStep, RequestContext } from '../types';
import type { ResolvedPermissions, ResolutionWarning } from '../resolver';
import type { TraversalBudget } from '../runtime';

export interface PropagationRequest {
  /** Trust edges crossed at most; 0 keeps the principal in its own boundary */
  maxTrustHops: number;
  context: RequestContext;
  budget?: TraversalBudget;
  /** Resolves the grants of a role assumed across a trust edge */
  resolveAssumedRole?: (roleId: string) => Promise<ResolvedPermissions>;
}

export interface ReachedAction {
  action: string;
  /** Fewest trust edges crossed to obtain the action */
  trustHops: number;
  /** Shortest justifying path at that hop count */
  path: PathStep[];
}

export interface ReachedResource {
  resourceId: string;
  boundary: string;
  /** Sorted by action */
  actions: ReachedAction[];
}

export interface ReachabilityResult {
  identityId: string;
  /** Sorted by resource id */
  resources: ReachedResource[];
  /** Boundary -> hop count at which it was entered */
  boundaries: ReadonlyMap<string, number>;
  /** Warnings from roles assumed across trust edges */
  warnings: ResolutionWarning[];
  incomplete: boolean;
  reason?: string;
}
