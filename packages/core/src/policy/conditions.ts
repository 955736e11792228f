/**
 * Condition evaluation
 *
 * Conditions form a closed, tagged set; each kind is matched explicitly
 * against a flat request context. A key missing from the context never
 * satisfies a condition.
 */

import type { Condition, ContextValue, RequestContext } from '../types';
import { ResolutionError } from '../errors';

/** Context key read by `timeWindow` conditions without an explicit key */
export const REQUEST_TIME_KEY = 'request.time';

export function evaluateCondition(condition: Condition, context: RequestContext): boolean {
  switch (condition.kind) {
    case 'equals': {
      const actual = lookup(context, condition.key);
      return actual !== undefined && actual === condition.value;
    }
    case 'notEquals': {
      const actual = lookup(context, condition.key);
      return actual !== undefined && actual !== condition.value;
    }
    case 'in': {
      const actual = lookup(context, condition.key);
      return actual !== undefined && condition.values.includes(actual);
    }
    case 'prefix': {
      const actual = lookup(context, condition.key);
      return typeof actual === 'string' && actual.startsWith(condition.prefix);
    }
    case 'exists':
      return lookup(context, condition.key) !== undefined;
    case 'timeWindow':
      return evaluateTimeWindow(condition, context);
    default: {
      const unknown: never = condition;
      throw new ResolutionError(
        `Unsupported condition: ${JSON.stringify(unknown)}`,
        'MALFORMED_STATEMENT',
      );
    }
  }
}

export function evaluateConditions(
  conditions: readonly Condition[] | undefined,
  context: RequestContext,
): boolean {
  if (!conditions || conditions.length === 0) {
    return true;
  }
  return conditions.every(condition => evaluateCondition(condition, context));
}

function lookup(context: RequestContext, key: string): ContextValue | undefined {
  return Object.prototype.hasOwnProperty.call(context, key) ? context[key] : undefined;
}

function evaluateTimeWindow(
  condition: Extract<Condition, { kind: 'timeWindow' }>,
  context: RequestContext,
): boolean {
  const actual = lookup(context, condition.key ?? REQUEST_TIME_KEY);
  if (actual === undefined || typeof actual === 'boolean') {
    return false;
  }

  const at = typeof actual === 'number' ? actual : Date.parse(actual);
  if (Number.isNaN(at)) {
    return false;
  }

  if (condition.notBefore !== undefined && at < parseBound(condition.notBefore)) {
    return false;
  }
  if (condition.notAfter !== undefined && at > parseBound(condition.notAfter)) {
    return false;
  }
  return true;
}

function parseBound(value: string): number {
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    throw new ResolutionError(`Invalid time bound: "${value}"`, 'MALFORMED_STATEMENT');
  }
  return parsed;
}

/**
 * Static check of a condition, used to reject malformed statements up front
 */
export function validateCondition(condition: Condition): string | null {
  if (condition.kind !== 'timeWindow') {
    return condition.key.length === 0 ? `${condition.kind} condition requires a key` : null;
  }
  for (const bound of [condition.notBefore, condition.notAfter]) {
    if (bound !== undefined && Number.isNaN(Date.parse(bound))) {
      return `Invalid time bound: "${bound}"`;
    }
  }
  return null;
}
