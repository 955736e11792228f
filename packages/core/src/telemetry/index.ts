/**
 * OpenTelemetry tracing
 *
 * Spans go to whatever tracer provider the host application registered;
 * without one they are no-ops.
 */

import { trace, context, SpanStatusCode, type Tracer } from '@opentelemetry/api';
import type { Span, Attributes } from '@opentelemetry/api';

const TRACER_NAME = 'blast-radius';
const TRACER_VERSION = '0.1.0';

let globalTracer: Tracer | null = null;

/**
 * Use a specific tracer instead of the global provider's
 */
export function initializeTracer(tracer?: Tracer): Tracer {
  globalTracer = tracer ?? trace.getTracer(TRACER_NAME, TRACER_VERSION);
  return globalTracer;
}

export function getTracer(): Tracer {
  if (!globalTracer) {
    globalTracer = trace.getTracer(TRACER_NAME, TRACER_VERSION);
  }
  return globalTracer;
}

export function createSpan(name: string, attributes?: Attributes, parentSpan?: Span): Span {
  const parentContext = parentSpan ? trace.setSpan(context.active(), parentSpan) : undefined;
  return getTracer().startSpan(name, { attributes }, parentContext);
}

/**
 * Execute a function within a span context
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  attributes?: Attributes,
  parentSpan?: Span,
): Promise<T> {
  const span = createSpan(name, attributes, parentSpan);

  return context.with(trace.setSpan(context.active(), span), async () => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      setSpanError(span, error);
      throw error;
    } finally {
      span.end();
    }
  });
}

export function setSpanError(span: Span, error: unknown): void {
  const exception = error instanceof Error ? error : new Error(String(error));
  span.setStatus({ code: SpanStatusCode.ERROR, message: exception.message });
  span.recordException(exception);
}

export type { Span, Attributes };
