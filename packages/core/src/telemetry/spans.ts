/**
 * Span definitions for blast radius runs
 *
 * blast_radius.run       one per analyze() call
 * blast_radius.identity  one per identity, child of the run span
 */

import type { Span } from '@opentelemetry/api';
import { SpanStatusCode } from '@opentelemetry/api';
import { createSpan, withSpan } from './index';
import type { IdentityOutcome } from '../engine/types';

export function runWithSpan<T>(
  runId: string,
  identityCount: number,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  return withSpan('blast_radius.run', fn, {
    'blast_radius.run_id': runId,
    'blast_radius.identities': identityCount,
  });
}

export function startIdentitySpan(identityId: string, parentSpan?: Span): Span {
  return createSpan('blast_radius.identity', { 'blast_radius.identity_id': identityId }, parentSpan);
}

/**
 * Record the outcome and end the span. Anything other than a complete or
 * skipped identity is an error status.
 */
export function endIdentitySpan(span: Span, outcome: IdentityOutcome, findings: number): void {
  span.setAttributes({
    'blast_radius.status': outcome.status,
    'blast_radius.findings': findings,
    'blast_radius.warnings': outcome.warnings.length,
  });
  if (outcome.status === 'complete' || outcome.status === 'skipped') {
    span.setStatus({ code: SpanStatusCode.OK });
  } else {
    span.setStatus({ code: SpanStatusCode.ERROR, message: outcome.reason ?? outcome.status });
  }
  span.end();
}
