import { describe, it, expect } from 'vitest';
import { evaluateCondition, evaluateConditions, validateCondition } from '../../../src/policy';
import { ResolutionError } from '../../../src/errors';

describe('conditions', () => {
  const context = {
    'principal.id': 'alice',
    'principal.boundary': 'prod-eu',
    'identity.mfa': true,
    'trust.hop': 2,
    'request.time': '2024-06-01T12:00:00Z',
  };

  it('should evaluate equals and notEquals', () => {
    expect(evaluateCondition({ kind: 'equals', key: 'principal.id', value: 'alice' }, context)).toBe(true);
    expect(evaluateCondition({ kind: 'equals', key: 'identity.mfa', value: 'true' }, context)).toBe(false);
    expect(evaluateCondition({ kind: 'notEquals', key: 'principal.id', value: 'bob' }, context)).toBe(true);
  });

  it('should treat an absent key as unsatisfied for every kind', () => {
    expect(evaluateCondition({ kind: 'equals', key: 'missing', value: 'x' }, context)).toBe(false);
    expect(evaluateCondition({ kind: 'notEquals', key: 'missing', value: 'x' }, context)).toBe(false);
    expect(evaluateCondition({ kind: 'in', key: 'missing', values: ['x'] }, context)).toBe(false);
    expect(evaluateCondition({ kind: 'prefix', key: 'missing', prefix: 'x' }, context)).toBe(false);
    expect(evaluateCondition({ kind: 'exists', key: 'missing' }, context)).toBe(false);
    expect(evaluateCondition({ kind: 'timeWindow', key: 'missing' }, context)).toBe(false);
  });

  it('should evaluate in, prefix and exists', () => {
    expect(evaluateCondition({ kind: 'in', key: 'trust.hop', values: [1, 2] }, context)).toBe(true);
    expect(evaluateCondition({ kind: 'in', key: 'trust.hop', values: ['2'] }, context)).toBe(false);
    expect(evaluateCondition({ kind: 'prefix', key: 'principal.boundary', prefix: 'prod-' }, context)).toBe(true);
    expect(evaluateCondition({ kind: 'prefix', key: 'trust.hop', prefix: '2' }, context)).toBe(false);
    expect(evaluateCondition({ kind: 'exists', key: 'identity.mfa' }, context)).toBe(true);
  });

  it('should not read inherited object properties', () => {
    expect(evaluateCondition({ kind: 'exists', key: 'toString' }, context)).toBe(false);
  });

  it('should evaluate time windows against request.time', () => {
    expect(
      evaluateCondition(
        { kind: 'timeWindow', notBefore: '2024-01-01T00:00:00Z', notAfter: '2024-12-31T23:59:59Z' },
        context,
      ),
    ).toBe(true);
    expect(evaluateCondition({ kind: 'timeWindow', notAfter: '2024-05-31T00:00:00Z' }, context)).toBe(false);
    expect(
      evaluateCondition({ kind: 'timeWindow', key: 'at', notBefore: '1970-01-01T00:00:01Z' }, { at: 5000 }),
    ).toBe(true);
  });

  it('should throw on an unparseable time bound', () => {
    expect(() => evaluateCondition({ kind: 'timeWindow', notBefore: 'soon' }, context)).toThrow(ResolutionError);
  });

  it('should require every condition', () => {
    expect(evaluateConditions(undefined, context)).toBe(true);
    expect(evaluateConditions([], context)).toBe(true);
    expect(
      evaluateConditions(
        [
          { kind: 'equals', key: 'principal.id', value: 'alice' },
          { kind: 'exists', key: 'missing' },
        ],
        context,
      ),
    ).toBe(false);
  });

  it('should validate conditions statically', () => {
    expect(validateCondition({ kind: 'exists', key: '' })).toBe('exists condition requires a key');
    expect(validateCondition({ kind: 'timeWindow', notBefore: 'soon' })).toBe('Invalid time bound: "soon"');
    expect(validateCondition({ kind: 'in', key: 'a', values: [] })).toBeNull();
  });
});
