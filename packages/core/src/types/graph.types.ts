/**
 * Graph Types for the Blast Radius Engine
 *
 * These types describe the permission graph (identities, groups, roles,
 * boundaries, resources), the policy statements attached to grant edges,
 * and the derived values produced by a resolution run.
 */

// =============================================================================
// Nodes
// =============================================================================

export type NodeKind = 'Identity' | 'Group' | 'Role' | 'Resource' | 'Boundary';

export type AttributeValue = string | number | boolean | null | string[];

export interface GraphNode {
  /** Globally unique, stable identifier */
  readonly id: string;
  /** Node variant, immutable after creation */
  readonly kind: NodeKind;
  /** Tags, classification, owner, boundary identifier, ... */
  readonly attributes: Readonly<Record<string, AttributeValue>>;
}

export interface NodeInput {
  id: string;
  kind: NodeKind;
  attributes?: Record<string, AttributeValue>;
}

/** Kinds that can hold permissions (directly or by membership) */
export const PRINCIPAL_KINDS: readonly NodeKind[] = ['Identity', 'Group', 'Role'];

// =============================================================================
// Policy statements
// =============================================================================

export type Effect = 'ALLOW' | 'DENY';

export type Decision = Effect | 'NOT_APPLICABLE';

export type ContextValue = string | number | boolean;

export type RequestContext = Readonly<Record<string, ContextValue>>;

/**
 * Closed set of condition kinds. Each kind is evaluated by explicit
 * matching in the policy evaluator.
 */
export type Condition =
  | { kind: 'equals'; key: string; value: ContextValue }
  | { kind: 'notEquals'; key: string; value: ContextValue }
  | { kind: 'in'; key: string; values: ContextValue[] }
  | { kind: 'prefix'; key: string; prefix: string }
  | { kind: 'exists'; key: string }
  | { kind: 'timeWindow'; key?: string; notBefore?: string; notAfter?: string };

export type ConditionKind = Condition['kind'];

export interface PolicyStatement {
  /** Optional statement id (sid) used in warnings and traces */
  id?: string;
  effect: Effect;
  /** Action patterns, e.g. `read`, `read*`, `*` */
  actions: string[];
  /** Pattern matched against resource identifiers */
  resource: string;
  conditions?: Condition[];
}

// =============================================================================
// Edges
// =============================================================================

export type EdgeType = 'MEMBER_OF' | 'GRANTS' | 'CONTAINS' | 'TRUSTS';

/** Edge types whose target is a node */
export type LinkEdgeType = Exclude<EdgeType, 'GRANTS'>;

export type Direction = 'out' | 'in';

interface EdgeBase {
  readonly id: string;
  readonly from: string;
}

export interface MemberOfEdge extends EdgeBase {
  readonly type: 'MEMBER_OF';
  readonly to: string;
}

export interface ContainsEdge extends EdgeBase {
  readonly type: 'CONTAINS';
  readonly to: string;
}

export interface TrustsEdge extends EdgeBase {
  readonly type: 'TRUSTS';
  readonly to: string;
  /** Conditions the request context must satisfy to cross */
  readonly conditions?: readonly Condition[];
  /** Role assumed inside the target boundary */
  readonly assumeRole?: string;
}

/** Anchored at its source; the statement's resource pattern is the target */
export interface GrantsEdge extends EdgeBase {
  readonly type: 'GRANTS';
  readonly statement: Readonly<PolicyStatement>;
}

export type LinkEdge = MemberOfEdge | ContainsEdge | TrustsEdge;

export type GraphEdge = LinkEdge | GrantsEdge;

export type EdgeInput =
  | { id?: string; type: 'MEMBER_OF'; from: string; to: string }
  | { id?: string; type: 'CONTAINS'; from: string; to: string }
  | {
      id?: string;
      type: 'TRUSTS';
      from: string;
      to: string;
      conditions?: Condition[];
      assumeRole?: string;
    }
  | { id?: string; type: 'GRANTS'; from: string; statement: PolicyStatement };

export interface Neighbor<E extends GraphEdge = LinkEdge> {
  edge: E;
  node: GraphNode;
}

// =============================================================================
// Derived values
// =============================================================================

export interface EffectiveGrant {
  principalId: string;
  action: string;
  resourcePattern: string;
  effect: Effect;
  /** Shortest membership path: principal first, grant bearer last */
  path: string[];
  /** Statement id, or the id of the GRANTS edge that carried it */
  statementId: string;
}

/** `ASSUMES` marks a role taken on after crossing a trust edge */
export type PathVia = EdgeType | 'ORIGIN' | 'ASSUMES';

export interface PathStep {
  nodeId: string;
  via: PathVia;
  /** Resource pattern that matched, on GRANTS steps */
  detail?: string;
}

export interface RankedFinding {
  identityId: string;
  resourceId: string;
  effectiveActions: string[];
  criticalityScore: number;
  permissionStrength: number;
  trustHops: number;
  trustHopDecay: number;
  compositeScore: number;
  path: PathStep[];
  /** Set when the identity's traversal was cut short by its time budget */
  incomplete: boolean;
}
