/**
 * Resolver module
 * Membership closure and effective grants, with run-scoped memoization.
 */

export { PermissionResolver, compareGrants, type PermissionResolverConfig } from './permission-resolver';
export { collectActionUniverse, ANY_ACTION } from './actions';
export type {
  InheritedSet,
  ResolutionWarning,
  ResolveRequest,
  ResolvedPermissions,
  ScopedStatement,
} from './types';
