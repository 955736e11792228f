/**
 * Criticality Scorer
 *
 * Maps a resource's attributes to a score in [0, 100]:
 *
 *   100 * (wc * tier / maxTier + ws * maxTagWeight + wi * businessImpact) / (wc + ws + wi)
 *
 * Missing attributes contribute 0; unknown classifications and tags are
 * ignored rather than rejected.
 */

import type { AttributeValue, GraphNode } from '../types';
import type { ScoringConfig } from '../config/schema';

export interface CriticalityBreakdown {
  resourceId: string;
  classification: string | null;
  tier: number;
  /** Highest-weighted sensitive tag, if any */
  sensitiveTag: string | null;
  sensitivity: number;
  businessImpact: number;
  score: number;
}

export function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}

export class CriticalityScorer {
  // Own entries of the configured tables only
  private readonly tiers: Map<string, number>;
  private readonly sensitiveTags: Map<string, number>;
  private readonly overrides: Map<string, string>;
  private readonly maxTier: number;
  private readonly weightSum: number;

  constructor(private readonly config: ScoringConfig) {
    this.tiers = lowerCaseTable(config.classificationTiers);
    this.sensitiveTags = lowerCaseTable(config.sensitiveTags);
    this.overrides = new Map(Object.entries(config.classificationOverrides));
    this.maxTier = Math.max(0, ...this.tiers.values());
    const { classification, sensitivity, businessImpact } = config.weights;
    this.weightSum = classification + sensitivity + businessImpact;
  }

  score(resource: GraphNode): number {
    return this.explain(resource).score;
  }

  explain(resource: GraphNode): CriticalityBreakdown {
    const classification = this.classificationOf(resource);
    const tier = classification !== null ? this.tiers.get(classification) ?? 0 : 0;

    let sensitiveTag: string | null = null;
    let sensitivity = 0;
    for (const tag of readTags(resource.attributes.tags)) {
      const weight = this.sensitiveTags.get(tag);
      if (weight !== undefined && weight > sensitivity) {
        sensitiveTag = tag;
        sensitivity = weight;
      }
    }

    const businessImpact = readImpact(resource.attributes.businessImpact);
    const { weights } = this.config;
    const weighted =
      weights.classification * (this.maxTier > 0 ? tier / this.maxTier : 0) +
      weights.sensitivity * sensitivity +
      weights.businessImpact * businessImpact;

    return {
      resourceId: resource.id,
      classification,
      tier,
      sensitiveTag,
      sensitivity,
      businessImpact,
      score: this.weightSum > 0 ? roundScore((100 * weighted) / this.weightSum) : 0,
    };
  }

  private classificationOf(resource: GraphNode): string | null {
    const override = this.overrides.get(resource.id);
    if (override !== undefined) return override.toLowerCase();
    const value = resource.attributes.classification;
    return typeof value === 'string' && value.length > 0 ? value.toLowerCase() : null;
  }
}

function lowerCaseTable(table: Record<string, number>): Map<string, number> {
  return new Map(Object.entries(table).map(([key, value]): [string, number] => [key.toLowerCase(), value]));
}

function readTags(value: AttributeValue | undefined): string[] {
  if (Array.isArray(value)) {
    return value.map(tag => tag.trim().toLowerCase());
  }
  if (typeof value === 'string') {
    return value
      .split(',')
      .map(tag => tag.trim().toLowerCase())
      .filter(tag => tag.length > 0);
  }
  return [];
}

function readImpact(value: AttributeValue | undefined): number {
  const impact = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isFinite(impact)) return 0;
  return Math.min(1, Math.max(0, impact));
}
