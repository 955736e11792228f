/**
 * Blast Radius Ranker
 *
 * Turns reached resources into findings ordered by
 * `criticality * permissionStrength * decay^trustHops`.
 */

import type { RankedFinding } from '../types';
import type { GraphStore } from '../graph';
import { compareIds } from '../graph';
import type { ReachabilityResult, ReachedAction } from '../reachability';
import { CriticalityScorer, PermissionStrength, roundScore } from '../scoring';

export interface RankOptions {
  /** Findings kept; all when omitted */
  topN?: number;
  trustHopDecay: number;
}

export class BlastRadiusRanker {
  constructor(
    private readonly graph: GraphStore,
    private readonly scorer: CriticalityScorer,
    private readonly strength: PermissionStrength,
  ) {}

  rank(reach: ReachabilityResult, options: RankOptions): RankedFinding[] {
    const findings: RankedFinding[] = [];

    for (const resource of reach.resources) {
      if (resource.actions.length === 0) continue;

      const criticalityScore = this.scorer.score(this.graph.getNode(resource.resourceId));
      const effectiveActions = resource.actions.map(reached => reached.action).sort(compareIds);
      const permissionStrength = this.strength.strength(effectiveActions);
      const justification = this.justify(resource.actions);

      findings.push({
        identityId: reach.identityId,
        resourceId: resource.resourceId,
        effectiveActions,
        criticalityScore,
        permissionStrength,
        trustHops: justification.trustHops,
        trustHopDecay: options.trustHopDecay,
        compositeScore: roundScore(
          criticalityScore * permissionStrength * Math.pow(options.trustHopDecay, justification.trustHops),
        ),
        path: justification.path,
        incomplete: reach.incomplete,
      });
    }

    findings.sort(compareFindings);
    return options.topN !== undefined ? findings.slice(0, options.topN) : findings;
  }

  /**
   * The action reached with the fewest trust hops justifies the finding;
   * among those the strongest, then the shortest path.
   */
  private justify(actions: readonly ReachedAction[]): ReachedAction {
    return actions.reduce((best, candidate) => {
      if (candidate.trustHops !== best.trustHops) {
        return candidate.trustHops < best.trustHops ? candidate : best;
      }
      const weightDelta = this.strength.weigh(candidate.action) - this.strength.weigh(best.action);
      if (weightDelta !== 0) {
        return weightDelta > 0 ? candidate : best;
      }
      if (candidate.path.length !== best.path.length) {
        return candidate.path.length < best.path.length ? candidate : best;
      }
      return compareIds(candidate.action, best.action) < 0 ? candidate : best;
    });
  }
}

/**
 * Composite desc, criticality desc, resource id asc
 */
export function compareFindings(a: RankedFinding, b: RankedFinding): number {
  return (
    b.compositeScore - a.compositeScore ||
    b.criticalityScore - a.criticalityScore ||
    compareIds(a.resourceId, b.resourceId)
  );
}

/**
 * Rank findings from several identities together; ties fall back to identity id
 */
export function mergeFindings(
  perIdentity: ReadonlyArray<readonly RankedFinding[]>,
  topN?: number,
): RankedFinding[] {
  const merged = perIdentity
    .flat()
    .sort((a, b) => compareFindings(a, b) || compareIds(a.identityId, b.identityId));
  return topN !== undefined ? merged.slice(0, topN) : merged;
}
