import { GraphStore } from '../../src/graph';
import type { PolicyStatement } from '../../src/types';

/**
 * alice -> admins, admins may read and write db/*.
 * `denyWrite` adds a direct DENY write on db/customers to alice.
 */
export function adminsGraph(options: { denyWrite?: boolean } = {}): GraphStore {
  const graph = new GraphStore();
  graph.addNode({ id: 'alice', kind: 'Identity' });
  graph.addNode({ id: 'admins', kind: 'Group' });
  graph.addNode({ id: 'db/customers', kind: 'Resource', attributes: { classification: 'high' } });

  graph.addEdge({ type: 'MEMBER_OF', from: 'alice', to: 'admins' });
  graph.addEdge({
    type: 'GRANTS',
    from: 'admins',
    statement: { id: 'admins-db', effect: 'ALLOW', actions: ['read', 'write'], resource: 'db/*' },
  });
  if (options.denyWrite) {
    graph.addEdge({
      type: 'GRANTS',
      from: 'alice',
      statement: { id: 'alice-no-write', effect: 'DENY', actions: ['write'], resource: 'db/customers' },
    });
  }
  return graph;
}

/**
 * Boundaries acct-0 -> acct-1 -> ... -> acct-{length}, one `vault/<n>`
 * resource in every boundary after the first. alice lives in acct-0 and may
 * read vault/*.
 */
export function trustChainGraph(length = 4): GraphStore {
  const graph = new GraphStore();
  for (let i = 0; i <= length; i++) {
    graph.addNode({ id: `acct-${i}`, kind: 'Boundary' });
  }
  graph.addNode({ id: 'alice', kind: 'Identity', attributes: { boundary: 'acct-0' } });
  for (let i = 1; i <= length; i++) {
    graph.addNode({ id: `vault/${i}`, kind: 'Resource', attributes: { boundary: `acct-${i}` } });
    graph.addEdge({ type: 'TRUSTS', from: `acct-${i - 1}`, to: `acct-${i}` });
  }
  graph.addEdge({
    type: 'GRANTS',
    from: 'alice',
    statement: { id: 'alice-vault', effect: 'ALLOW', actions: ['read'], resource: 'vault/*' },
  });
  return graph;
}

/**
 * bucket contains bucket/private (contains bucket/private/key) and bucket/public
 */
export function bucketGraph(statements: PolicyStatement[]): GraphStore {
  const graph = new GraphStore();
  graph.addNode({ id: 'alice', kind: 'Identity' });
  for (const id of ['bucket', 'bucket/private', 'bucket/private/key', 'bucket/public']) {
    graph.addNode({ id, kind: 'Resource' });
  }
  graph.addEdge({ type: 'CONTAINS', from: 'bucket', to: 'bucket/private' });
  graph.addEdge({ type: 'CONTAINS', from: 'bucket/private', to: 'bucket/private/key' });
  graph.addEdge({ type: 'CONTAINS', from: 'bucket', to: 'bucket/public' });
  for (const statement of statements) {
    graph.addEdge({ type: 'GRANTS', from: 'alice', statement });
  }
  return graph;
}
