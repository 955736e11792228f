/**
 * Snapshot module
 */

export { SnapshotParser, snapshotParser, buildGraph } from './parser';
export {
  SnapshotSchema,
  SnapshotNodeSchema,
  SnapshotEdgeSchema,
  PolicyStatementSchema,
  ConditionsSchema,
  type Snapshot,
  type SnapshotNode,
  type SnapshotEdge,
} from './schema';
