import { describe, it, expect } from 'vitest';
import { SnapshotParser, buildGraph } from '../../../src/snapshot';
import { DanglingEdgeError, SnapshotParseError } from '../../../src/errors';

describe('SnapshotParser', () => {
  const parser = new SnapshotParser();

  describe('parseYaml', () => {
    it('should parse nodes and edges', () => {
      const snapshot = parser.parseYaml(`
nodes:
  - id: alice
    kind: Identity
    attributes:
      boundary: prod
  - id: admins
    kind: Group
  - id: db/customers
    kind: Resource
    attributes:
      classification: high
      tags: [pii, customer-data]
edges:
  - type: MEMBER_OF
    from: alice
    to: admins
  - type: GRANTS
    from: admins
    statement:
      id: admins-db
      effect: allow
      actions: [read, write]
      resource: db/*
`);

      expect(snapshot.version).toBe(1);
      expect(snapshot.nodes).toHaveLength(3);
      expect(snapshot.nodes[2].attributes).toEqual({ classification: 'high', tags: ['pii', 'customer-data'] });
      expect(snapshot.edges[1]).toEqual({
        type: 'GRANTS',
        from: 'admins',
        statement: { id: 'admins-db', effect: 'ALLOW', actions: ['read', 'write'], resource: 'db/*' },
      });
    });

    it('should expand shorthand conditions', () => {
      const snapshot = parser.parseYaml(`
edges:
  - type: TRUSTS
    from: prod
    to: staging
    assumeRole: deployer
    conditions:
      principal.boundary: prod
      identity.team: [platform, sre]
`);

      expect(snapshot.edges[0]).toEqual({
        type: 'TRUSTS',
        from: 'prod',
        to: 'staging',
        assumeRole: 'deployer',
        conditions: [
          { kind: 'equals', key: 'principal.boundary', value: 'prod' },
          { kind: 'in', key: 'identity.team', values: ['platform', 'sre'] },
        ],
      });
    });

    it('should reject invalid YAML', () => {
      expect(() => parser.parseYaml('nodes: [unclosed')).toThrow(SnapshotParseError);
    });
  });

  describe('parseJson', () => {
    it('should accept tagged conditions', () => {
      const snapshot = parser.parseJson(
        JSON.stringify({
          edges: [
            {
              type: 'GRANTS',
              from: 'alice',
              statement: {
                effect: 'DENY',
                actions: ['*'],
                resource: '*',
                conditions: [{ kind: 'timeWindow', notAfter: '2024-01-01T00:00:00Z' }],
              },
            },
          ],
        }),
      );
      expect(snapshot.edges[0]).toMatchObject({
        statement: { conditions: [{ kind: 'timeWindow', notAfter: '2024-01-01T00:00:00Z' }] },
      });
    });

    it('should report issue paths', () => {
      try {
        parser.parseJson(JSON.stringify({ nodes: [{ id: 'alice', kind: 'User' }] }));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(SnapshotParseError);
        expect(error).toMatchObject({ issues: [{ path: 'nodes.0.kind' }] });
      }
    });

    it('should reject statements without actions', () => {
      expect(() =>
        parser.parse({ edges: [{ type: 'GRANTS', from: 'a', statement: { effect: 'ALLOW', actions: [], resource: '*' } }] }),
      ).toThrow('edges.0.statement.actions: At least one action is required');
    });

    it('should reject invalid JSON', () => {
      expect(() => parser.parseJson('{')).toThrow(SnapshotParseError);
    });
  });

  describe('parseNdjson', () => {
    it('should read one node or edge per line', () => {
      const snapshot = parser.parseNdjson(
        [
          '{"id":"alice","kind":"Identity"}',
          '',
          '{"id":"logs","kind":"Resource"}',
          '{"type":"GRANTS","from":"alice","statement":{"effect":"ALLOW","actions":["read"],"resource":"logs"}}',
        ].join('\n'),
      );
      expect(snapshot.nodes.map(node => node.id)).toEqual(['alice', 'logs']);
      expect(snapshot.edges).toHaveLength(1);
    });

    it('should report issues by line', () => {
      try {
        parser.parseNdjson(['{"id":"alice","kind":"Identity"}', 'not json', '{"id":"x"}', '{"type":"CONTAINS","from":"a"}'].join('\n'));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(SnapshotParseError);
        expect(error).toMatchObject({
          issues: [
            { path: 'line 2', message: 'Invalid JSON syntax' },
            { path: 'line 3', message: 'Expected a node (kind) or an edge (type)' },
            { path: 'line 4.to', message: 'Required' },
          ],
        });
      }
    });
  });
});

describe('buildGraph', () => {
  const parser = new SnapshotParser();

  it('should load nodes before edges', () => {
    const graph = buildGraph(
      parser.parse({
        edges: [{ type: 'CONTAINS', from: 'bucket', to: 'bucket/a' }],
        nodes: [
          { id: 'bucket', kind: 'Resource' },
          { id: 'bucket/a', kind: 'Resource' },
        ],
      }),
    );
    expect(graph.size).toBe(2);
    expect([...graph.neighbors('bucket', 'CONTAINS')].map(n => n.node.id)).toEqual(['bucket/a']);
  });

  it('should propagate construction errors', () => {
    expect(() => buildGraph(parser.parse({ edges: [{ type: 'MEMBER_OF', from: 'a', to: 'b' }] }))).toThrow(
      DanglingEdgeError,
    );
  });
});
