import { describe, it, expect } from 'vitest';
import { CriticalityScorer, roundScore } from '../../../src/scoring';
import { ScoringConfigSchema } from '../../../src/config';
import type { AttributeValue, GraphNode } from '../../../src/types';

function resource(id: string, attributes: Record<string, AttributeValue> = {}): GraphNode {
  return { id, kind: 'Resource', attributes };
}

describe('CriticalityScorer', () => {
  const scorer = new CriticalityScorer(ScoringConfigSchema.parse({}));

  it('should score classification against the highest tier', () => {
    expect(scorer.score(resource('a', { classification: 'restricted' }))).toBe(50);
    expect(scorer.score(resource('a', { classification: 'high' }))).toBe(33.33);
    expect(scorer.score(resource('a', { classification: 'INTERNAL' }))).toBe(16.67);
  });

  it('should take the heaviest sensitive tag', () => {
    expect(scorer.score(resource('a', { tags: ['source-code', 'pii'] }))).toBe(30);
    expect(scorer.score(resource('a', { tags: 'financial, misc' }))).toBe(24);
    expect(scorer.score(resource('a', { classification: 'high', tags: ['pii'] }))).toBe(63.33);
  });

  it('should clamp business impact to [0, 1]', () => {
    expect(scorer.score(resource('a', { businessImpact: 0.5 }))).toBe(10);
    expect(scorer.score(resource('a', { businessImpact: '0.5' }))).toBe(10);
    expect(scorer.score(resource('a', { businessImpact: 7 }))).toBe(20);
    expect(scorer.score(resource('a', { businessImpact: -1 }))).toBe(0);
    expect(scorer.score(resource('a', { businessImpact: 'lots' }))).toBe(0);
  });

  it('should score missing or unknown metadata as zero', () => {
    expect(scorer.score(resource('a'))).toBe(0);
    expect(scorer.score(resource('a', { classification: 'mystery', tags: ['unknown'] }))).toBe(0);
  });

  it('should ignore labels and ids named after object members', () => {
    expect(scorer.score(resource('a', { classification: 'constructor', tags: ['toString'] }))).toBe(0);
    expect(scorer.score(resource('toString', { classification: 'high' }))).toBe(33.33);
    expect(scorer.explain(resource('__proto__'))).toMatchObject({ classification: null, tier: 0 });
  });

  it('should match configured labels and tags regardless of case', () => {
    const mixedCase = new CriticalityScorer(
      ScoringConfigSchema.parse({ classificationTiers: { Public: 0, High: 2 }, sensitiveTags: { PII: 1 } }),
    );
    expect(mixedCase.explain(resource('a', { classification: 'high', tags: ['pii'] }))).toMatchObject({
      tier: 2,
      sensitiveTag: 'pii',
      score: 80,
    });
  });

  it('should be monotonic in classification tier', () => {
    const scores = ['public', 'internal', 'confidential', 'restricted'].map(classification =>
      scorer.score(resource('a', { classification, tags: ['financial'], businessImpact: 0.3 })),
    );
    for (let i = 1; i < scores.length; i++) {
      expect(scores[i]).toBeGreaterThanOrEqual(scores[i - 1]);
    }
  });

  it('should prefer a configured override to the resource attribute', () => {
    const overridden = new CriticalityScorer(
      ScoringConfigSchema.parse({ classificationOverrides: { 'db/customers': 'critical' } }),
    );
    expect(overridden.score(resource('db/customers', { classification: 'low' }))).toBe(50);
    expect(overridden.score(resource('db/orders', { classification: 'low' }))).toBe(0);
  });

  it('should normalize by the configured weights', () => {
    const classificationOnly = new CriticalityScorer(
      ScoringConfigSchema.parse({ weights: { classification: 1, sensitivity: 0, businessImpact: 0 } }),
    );
    expect(classificationOnly.score(resource('a', { classification: 'critical', tags: ['pii'] }))).toBe(100);
  });

  it('should explain a score', () => {
    expect(scorer.explain(resource('db', { classification: 'high', tags: ['customer-data', 'pii'], businessImpact: 1 }))).toEqual({
      resourceId: 'db',
      classification: 'high',
      tier: 2,
      sensitiveTag: 'pii',
      sensitivity: 1,
      businessImpact: 1,
      score: 83.33,
    });
  });

  it('should round to two decimals', () => {
    expect(roundScore(33.333333)).toBe(33.33);
    expect(roundScore(66.666)).toBe(66.67);
  });
});
