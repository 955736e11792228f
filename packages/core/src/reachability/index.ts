/**
 * Reachability module
 * Pattern expansion, containment traversal and trust hops.
 */

export { ReachabilityPropagator, type ReachabilityPropagatorConfig } from './propagator';
export type {
  PropagationRequest,
  ReachabilityResult,
  ReachedAction,
  ReachedResource,
} from './types';
