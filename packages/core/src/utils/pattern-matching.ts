/**
 * Pattern Matching Utilities
 *
 * Shared wildcard patterns for actions and resource identifiers.
 *
 * Wildcard Specification:
 * - `*` alone matches any value
 * - `prefix*` matches values starting with `prefix`
 * - `*suffix` matches values ending with `suffix`
 * - `*part*` matches values containing `part`
 * - anything without `*` is an exact match
 *
 * A `*` anywhere other than the first or last character is malformed.
 */

import { ResolutionError } from '../errors';

export type PatternKind = 'any' | 'exact' | 'prefix' | 'suffix' | 'contains';

export interface CompiledPattern {
  readonly source: string;
  readonly kind: PatternKind;
  /** Pattern text with the wildcards stripped */
  readonly literal: string;
}

const WHITESPACE = /\s/;

/**
 * Compile a pattern, throwing ResolutionError if it is malformed.
 */
export function compilePattern(source: string): CompiledPattern {
  if (source.length === 0) {
    throw new ResolutionError('Pattern cannot be empty', 'MALFORMED_STATEMENT');
  }
  if (WHITESPACE.test(source)) {
    throw new ResolutionError(`Pattern contains whitespace: "${source}"`, 'MALFORMED_STATEMENT');
  }

  const leading = source.startsWith('*');
  const trailing = source.length > 1 && source.endsWith('*');
  const literal = source.slice(leading ? 1 : 0, trailing ? -1 : undefined);

  if (literal.includes('*')) {
    throw new ResolutionError(
      `Wildcards are only supported as a prefix or suffix: "${source}"`,
      'MALFORMED_STATEMENT',
    );
  }

  let kind: PatternKind;
  if (literal === '') {
    kind = 'any';
  } else if (leading && trailing) {
    kind = 'contains';
  } else if (leading) {
    kind = 'suffix';
  } else if (trailing) {
    kind = 'prefix';
  } else {
    kind = 'exact';
  }

  return { source, kind, literal };
}

/**
 * Returns the malformation message for a pattern, or null when it compiles.
 */
export function validatePattern(source: string): string | null {
  try {
    compilePattern(source);
    return null;
  } catch (error) {
    if (error instanceof ResolutionError) {
      return error.message;
    }
    throw error;
  }
}

export function matchesCompiled(pattern: CompiledPattern, value: string): boolean {
  switch (pattern.kind) {
    case 'any':
      return true;
    case 'exact':
      return value === pattern.literal;
    case 'prefix':
      return value.startsWith(pattern.literal);
    case 'suffix':
      return value.endsWith(pattern.literal);
    case 'contains':
      return value.includes(pattern.literal);
  }
}

/**
 * Matches a concrete value (action name, resource id) against a pattern.
 *
 * @example
 * matchesPattern('read*', 'readObject') // true
 * matchesPattern('db/*', 'db/customers') // true
 */
export function matchesPattern(pattern: string, value: string): boolean {
  return matchesCompiled(compilePattern(pattern), value);
}

/**
 * Whether every value matched by `specific` is also matched by `general`.
 *
 * Used when a statement is evaluated against a grant's resource pattern
 * rather than against a concrete resource: `DENY db/*` covers
 * `ALLOW db/customers*`, but `DENY db/customers` does not cover `ALLOW db/*`.
 */
export function coversCompiled(general: CompiledPattern, specific: CompiledPattern): boolean {
  if (general.kind === 'any') return true;
  if (specific.kind === 'exact') return matchesCompiled(general, specific.literal);

  switch (general.kind) {
    case 'exact':
      return false;
    case 'prefix':
      return specific.kind === 'prefix' && specific.literal.startsWith(general.literal);
    case 'suffix':
      return specific.kind === 'suffix' && specific.literal.endsWith(general.literal);
    case 'contains':
      return specific.kind !== 'any' && specific.literal.includes(general.literal);
  }
}

export function coversPattern(general: string, specific: string): boolean {
  return coversCompiled(compilePattern(general), compilePattern(specific));
}

/**
 * True when the pattern contains no wildcard
 */
export function isLiteralPattern(pattern: string): boolean {
  return !pattern.includes('*');
}
