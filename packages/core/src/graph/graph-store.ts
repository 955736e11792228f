/**
 * GraphStore - In-memory permission graph
 *
 * Nodes are indexed by id; edges by (node id, edge type, direction), so a
 * traversal step touches only the adjacency list it needs and never copies
 * it. The store has no policy logic.
 */

import type {
  ContainsEdge,
  Direction,
  EdgeInput,
  EdgeType,
  GrantsEdge,
  GraphEdge,
  GraphNode,
  LinkEdgeType,
  MemberOfEdge,
  Neighbor,
  NodeInput,
  NodeKind,
  TrustsEdge,
} from '../types';
import {
  DanglingEdgeError,
  DuplicateNodeError,
  GraphSealedError,
  InvalidEdgeError,
  NotFoundError,
} from '../errors';
import { DEFAULT_BOUNDARY, ResourceIndex } from './resource-index';

export interface EdgeByType {
  MEMBER_OF: MemberOfEdge;
  GRANTS: GrantsEdge;
  CONTAINS: ContainsEdge;
  TRUSTS: TrustsEdge;
}

type AdjacencyLists = { [K in EdgeType]: EdgeByType[K][] };

interface Adjacency {
  out: AdjacencyLists;
  in: AdjacencyLists;
}

export interface GraphStats {
  nodes: Record<NodeKind, number>;
  edges: Record<EdgeType, number>;
}

/** Which node kinds each edge type may connect */
const EDGE_RULES: Record<LinkEdgeType, { from: NodeKind[]; to: NodeKind[] }> = {
  MEMBER_OF: { from: ['Identity', 'Group'], to: ['Group', 'Role'] },
  CONTAINS: { from: ['Resource'], to: ['Resource'] },
  TRUSTS: { from: ['Boundary'], to: ['Boundary'] },
};

const GRANT_BEARERS: NodeKind[] = ['Identity', 'Group', 'Role'];

function emptyLists(): AdjacencyLists {
  return { MEMBER_OF: [], GRANTS: [], CONTAINS: [], TRUSTS: [] };
}

/**
 * The boundary (account/tenant) a node lives in
 */
export function boundaryOf(node: GraphNode): string {
  const boundary = node.attributes.boundary;
  return typeof boundary === 'string' && boundary.length > 0 ? boundary : DEFAULT_BOUNDARY;
}

export class GraphStore {
  private readonly nodesById: Map<string, GraphNode> = new Map();
  private readonly adjacency: Map<string, Adjacency> = new Map();
  private readonly edgeCounts: Record<EdgeType, number> = {
    MEMBER_OF: 0,
    GRANTS: 0,
    CONTAINS: 0,
    TRUSTS: 0,
  };
  private readonly index = new ResourceIndex();
  private sealed = false;

  // ===========================================================================
  // Mutation
  // ===========================================================================

  addNode(input: NodeInput): GraphNode {
    this.assertMutable();
    if (this.nodesById.has(input.id)) {
      throw new DuplicateNodeError(input.id);
    }

    const attributes = { ...(input.attributes ?? {}) };
    for (const [key, value] of Object.entries(attributes)) {
      if (Array.isArray(value)) {
        attributes[key] = [...value];
      }
    }

    const node: GraphNode = Object.freeze({
      id: input.id,
      kind: input.kind,
      attributes: Object.freeze(attributes),
    });

    this.nodesById.set(node.id, node);
    this.adjacency.set(node.id, { out: emptyLists(), in: emptyLists() });
    if (node.kind === 'Resource') {
      this.index.add(node.id, boundaryOf(node));
    }
    return node;
  }

  addEdge(input: EdgeInput): GraphEdge {
    this.assertMutable();
    const id = input.id ?? `${input.type}:${this.edgeCounts[input.type] + 1}`;

    switch (input.type) {
      case 'GRANTS': {
        const source = this.requireEndpoint(input.type, input.from);
        if (!GRANT_BEARERS.includes(source.kind)) {
          throw new InvalidEdgeError(input.type, `${source.kind} ${source.id} cannot hold grants`);
        }
        const edge: GrantsEdge = Object.freeze({
          id,
          type: input.type,
          from: input.from,
          statement: Object.freeze({ ...input.statement }),
        });
        this.lists(input.from).out.GRANTS.push(edge);
        this.edgeCounts.GRANTS++;
        return edge;
      }
      case 'MEMBER_OF': {
        this.validateLink(input.type, input.from, input.to);
        const edge: MemberOfEdge = Object.freeze({ id, type: input.type, from: input.from, to: input.to });
        this.lists(input.from).out.MEMBER_OF.push(edge);
        this.lists(input.to).in.MEMBER_OF.push(edge);
        this.edgeCounts.MEMBER_OF++;
        return edge;
      }
      case 'CONTAINS': {
        this.validateLink(input.type, input.from, input.to);
        const edge: ContainsEdge = Object.freeze({ id, type: input.type, from: input.from, to: input.to });
        this.lists(input.from).out.CONTAINS.push(edge);
        this.lists(input.to).in.CONTAINS.push(edge);
        this.edgeCounts.CONTAINS++;
        return edge;
      }
      case 'TRUSTS': {
        this.validateLink(input.type, input.from, input.to);
        if (input.assumeRole !== undefined) {
          const role = this.requireEndpoint(input.type, input.assumeRole);
          if (role.kind !== 'Role') {
            throw new InvalidEdgeError(input.type, `assumed ${role.kind} ${role.id} is not a Role`);
          }
        }
        const edge: TrustsEdge = Object.freeze({
          id,
          type: input.type,
          from: input.from,
          to: input.to,
          ...(input.conditions ? { conditions: Object.freeze([...input.conditions]) } : {}),
          ...(input.assumeRole !== undefined ? { assumeRole: input.assumeRole } : {}),
        });
        this.lists(input.from).out.TRUSTS.push(edge);
        this.lists(input.to).in.TRUSTS.push(edge);
        this.edgeCounts.TRUSTS++;
        return edge;
      }
    }
  }

  /**
   * Make the store read-only for the rest of its life
   */
  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  // ===========================================================================
  // Lookup
  // ===========================================================================

  getNode(id: string): GraphNode {
    const node = this.nodesById.get(id);
    if (!node) {
      throw new NotFoundError(id);
    }
    return node;
  }

  findNode(id: string): GraphNode | undefined {
    return this.nodesById.get(id);
  }

  hasNode(id: string): boolean {
    return this.nodesById.has(id);
  }

  /**
   * Lazily iterate the nodes at the other end of `type` edges
   */
  *neighbors<T extends LinkEdgeType>(
    nodeId: string,
    type: T,
    direction: Direction = 'out',
  ): Generator<Neighbor<EdgeByType[T]>> {
    const adjacency = this.adjacency.get(nodeId);
    if (!adjacency) {
      throw new NotFoundError(nodeId);
    }
    const edges: EdgeByType[T][] = adjacency[direction][type];
    for (const edge of edges) {
      const otherId = direction === 'out' ? edge.to : edge.from;
      yield { edge, node: this.getNode(otherId) };
    }
  }

  /**
   * GRANTS edges held directly by a node, in insertion order
   */
  *grants(nodeId: string): Generator<GrantsEdge> {
    const adjacency = this.adjacency.get(nodeId);
    if (!adjacency) {
      throw new NotFoundError(nodeId);
    }
    yield* adjacency.out.GRANTS;
  }

  *nodes(kind?: NodeKind): Generator<GraphNode> {
    for (const node of this.nodesById.values()) {
      if (kind === undefined || node.kind === kind) {
        yield node;
      }
    }
  }

  *edges(type?: EdgeType): Generator<GraphEdge> {
    for (const adjacency of this.adjacency.values()) {
      if (type === undefined || type === 'GRANTS') yield* adjacency.out.GRANTS;
      if (type === undefined || type === 'MEMBER_OF') yield* adjacency.out.MEMBER_OF;
      if (type === undefined || type === 'CONTAINS') yield* adjacency.out.CONTAINS;
      if (type === undefined || type === 'TRUSTS') yield* adjacency.out.TRUSTS;
    }
  }

  get resources(): ResourceIndex {
    return this.index;
  }

  get size(): number {
    return this.nodesById.size;
  }

  getStats(): GraphStats {
    const nodes: Record<NodeKind, number> = { Identity: 0, Group: 0, Role: 0, Resource: 0, Boundary: 0 };
    for (const node of this.nodesById.values()) {
      nodes[node.kind]++;
    }
    return { nodes, edges: { ...this.edgeCounts } };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private assertMutable(): void {
    if (this.sealed) {
      throw new GraphSealedError();
    }
  }

  private lists(nodeId: string): Adjacency {
    const adjacency = this.adjacency.get(nodeId);
    if (!adjacency) {
      throw new NotFoundError(nodeId);
    }
    return adjacency;
  }

  private requireEndpoint(type: EdgeType, nodeId: string): GraphNode {
    const node = this.nodesById.get(nodeId);
    if (!node) {
      throw new DanglingEdgeError(type, nodeId);
    }
    return node;
  }

  private validateLink(type: LinkEdgeType, fromId: string, toId: string): void {
    const from = this.requireEndpoint(type, fromId);
    const to = this.requireEndpoint(type, toId);
    const rule = EDGE_RULES[type];
    if (!rule.from.includes(from.kind) || !rule.to.includes(to.kind)) {
      throw new InvalidEdgeError(type, `${from.kind} ${from.id} -> ${to.kind} ${to.id}`);
    }
  }
}
