/**
 * Action universe used when a run asks for "all" actions
 */

import type { GraphStore } from '../graph';
import { compareIds } from '../graph';
import { compilePattern, matchesCompiled, validatePattern } from '../utils/pattern-matching';

/** Stands in for a bare `*` action when no representative covers it */
export const ANY_ACTION = '*';

/**
 * Every action named by a statement in the graph, sorted and deduplicated.
 *
 * A wildcard action is replaced by the `representatives` it matches, so a
 * `*` grant shows up as every action permission strength knows about. A
 * wildcard that matches none of them stands in for itself through its
 * literal part (`s3:*` becomes `s3:`), or `*` when it has none.
 */
export function collectActionUniverse(graph: GraphStore, representatives: readonly string[] = []): string[] {
  const actions = new Set<string>();
  for (const edge of graph.edges('GRANTS')) {
    if (edge.type !== 'GRANTS') continue;
    for (const action of edge.statement.actions) {
      if (validatePattern(action) !== null) continue;

      const pattern = compilePattern(action);
      if (pattern.kind === 'exact') {
        actions.add(action);
        continue;
      }

      const covered = representatives.filter(candidate => matchesCompiled(pattern, candidate));
      if (covered.length === 0) {
        actions.add(pattern.literal || ANY_ACTION);
      }
      for (const candidate of covered) {
        actions.add(candidate);
      }
    }
  }
  return [...actions].sort(compareIds);
}
