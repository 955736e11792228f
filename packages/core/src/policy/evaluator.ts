/**
 * Policy Evaluator
 *
 * Decides a single (action, resource, context) request against a set of
 * policy statements using deny-overrides-allow:
 * - ANY matching deny -> DENY
 * - otherwise ANY matching allow -> ALLOW
 * - no match -> NOT_APPLICABLE (distinct from an explicit DENY)
 *
 * The outcome does not depend on statement order.
 */

import type { Decision, PolicyStatement, RequestContext } from '../types';
import {
  compilePattern,
  coversCompiled,
  matchesCompiled,
  type CompiledPattern,
} from '../utils/pattern-matching';
import { evaluateConditions, validateCondition } from './conditions';

export interface EvaluationRequest {
  action: string;
  /** Concrete resource id, or a resource pattern when `resourceIsPattern` is set */
  resource: string;
  resourceIsPattern?: boolean;
  context: RequestContext;
}

export interface EvaluationResult<S extends PolicyStatement = PolicyStatement> {
  decision: Decision;
  /** Matching allow statements, in input order */
  allows: S[];
  /** Matching deny statements, in input order */
  denies: S[];
}

export class PolicyEvaluator {
  private compiled: Map<string, CompiledPattern> = new Map();

  /**
   * Evaluate a request against statements.
   * Throws ResolutionError when a statement carries a malformed pattern.
   */
  evaluate<S extends PolicyStatement>(
    statements: readonly S[],
    request: EvaluationRequest,
  ): EvaluationResult<S> {
    const allows: S[] = [];
    const denies: S[] = [];

    for (const statement of statements) {
      if (!this.matches(statement, request)) {
        continue;
      }
      if (statement.effect === 'DENY') {
        denies.push(statement);
      } else {
        allows.push(statement);
      }
    }

    const decision: Decision =
      denies.length > 0 ? 'DENY' : allows.length > 0 ? 'ALLOW' : 'NOT_APPLICABLE';
    return { decision, allows, denies };
  }

  /**
   * Whether one statement applies to the request (effect ignored)
   */
  matches(statement: PolicyStatement, request: EvaluationRequest): boolean {
    if (!this.matchesAction(statement, request.action)) {
      return false;
    }

    const pattern = this.compile(statement.resource);
    const resourceMatches = request.resourceIsPattern
      ? coversCompiled(pattern, this.compile(request.resource))
      : matchesCompiled(pattern, request.resource);
    if (!resourceMatches) {
      return false;
    }

    return evaluateConditions(statement.conditions, request.context);
  }

  matchesAction(statement: PolicyStatement, action: string): boolean {
    return statement.actions.some(pattern => matchesCompiled(this.compile(pattern), action));
  }

  /**
   * Static validation of a statement's patterns and conditions.
   * Returns the first problem found, or null.
   */
  validateStatement(statement: PolicyStatement): string | null {
    if (statement.actions.length === 0) {
      return 'Statement has no actions';
    }
    for (const pattern of [...statement.actions, statement.resource]) {
      try {
        this.compile(pattern);
      } catch (error) {
        return error instanceof Error ? error.message : String(error);
      }
    }
    for (const condition of statement.conditions ?? []) {
      const problem = validateCondition(condition);
      if (problem) {
        return problem;
      }
    }
    return null;
  }

  private compile(pattern: string): CompiledPattern {
    let compiled = this.compiled.get(pattern);
    if (!compiled) {
      compiled = compilePattern(pattern);
      this.compiled.set(pattern, compiled);
    }
    return compiled;
  }
}
