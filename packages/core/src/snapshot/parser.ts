import { parse as parseYaml } from 'yaml';
import { GraphStore } from '../graph';
import { SnapshotParseError, type ValidationIssue } from '../errors';
import {
  SnapshotEdgeSchema,
  SnapshotNodeSchema,
  SnapshotSchema,
  type Snapshot,
  type SnapshotEdge,
  type SnapshotNode,
} from './schema';

/**
 * Snapshot Parser
 *
 * Parses and validates graph snapshots from JSON, YAML or NDJSON.
 * NDJSON carries one node or edge per line: lines with a `kind` are nodes,
 * lines with a `type` are edges.
 */
export class SnapshotParser {
  parseJson(content: string): Snapshot {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new SnapshotParseError(
        `Failed to parse JSON: ${error instanceof Error ? error.message : String(error)}`,
        [{ path: '', message: 'Invalid JSON syntax' }],
      );
    }
    return this.parse(parsed);
  }

  parseYaml(content: string): Snapshot {
    let parsed: unknown;
    try {
      parsed = parseYaml(content);
    } catch (error) {
      throw new SnapshotParseError(
        `Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`,
        [{ path: '', message: 'Invalid YAML syntax' }],
      );
    }
    return this.parse(parsed);
  }

  parseNdjson(content: string): Snapshot {
    const nodes: SnapshotNode[] = [];
    const edges: SnapshotEdge[] = [];
    const issues: ValidationIssue[] = [];

    content.split(/\r?\n/).forEach((line, index) => {
      if (line.trim() === '') return;
      const where = `line ${index + 1}`;

      let record: unknown;
      try {
        record = JSON.parse(line);
      } catch {
        issues.push({ path: where, message: 'Invalid JSON syntax' });
        return;
      }

      if (isObject(record) && 'kind' in record) {
        const result = SnapshotNodeSchema.safeParse(record);
        if (result.success) {
          nodes.push(result.data);
        } else {
          issues.push(...result.error.errors.map(err => ({ path: joinPath(where, err.path), message: err.message })));
        }
      } else if (isObject(record) && 'type' in record) {
        const result = SnapshotEdgeSchema.safeParse(record);
        if (result.success) {
          edges.push(result.data);
        } else {
          issues.push(...result.error.errors.map(err => ({ path: joinPath(where, err.path), message: err.message })));
        }
      } else {
        issues.push({ path: where, message: 'Expected a node (kind) or an edge (type)' });
      }
    });

    if (issues.length > 0) {
      throw new SnapshotParseError(
        `Invalid snapshot: ${issues.map(issue => `${issue.path}: ${issue.message}`).join(', ')}`,
        issues,
      );
    }
    return { version: 1, nodes, edges };
  }

  /**
   * Validate an already parsed snapshot
   */
  parse(data: unknown): Snapshot {
    const result = SnapshotSchema.safeParse(data);

    if (!result.success) {
      const issues = result.error.errors.map(err => ({
        path: err.path.join('.'),
        message: err.message,
      }));

      throw new SnapshotParseError(
        `Invalid snapshot: ${issues.map(issue => `${issue.path}: ${issue.message}`).join(', ')}`,
        issues,
      );
    }

    return result.data;
  }
}

/**
 * Load a snapshot into a graph store. Nodes go in before edges, so edge
 * order in the snapshot does not matter; construction errors propagate.
 */
export function buildGraph(snapshot: Snapshot, graph: GraphStore = new GraphStore()): GraphStore {
  for (const node of snapshot.nodes) {
    graph.addNode(node);
  }
  for (const edge of snapshot.edges) {
    graph.addEdge(edge);
  }
  return graph;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function joinPath(prefix: string, path: ReadonlyArray<string | number>): string {
  return path.length > 0 ? `${prefix}.${path.join('.')}` : prefix;
}

// Default parser instance
export const snapshotParser = new SnapshotParser();
