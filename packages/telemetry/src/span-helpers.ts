/**
 * Span helpers: run work inside an active span and record failures on it.
 *
 * Wraps OpenTelemetry's tracer.startActiveSpan with automatic:
 * - Attribute setting
 * - Error recording + status propagation
 * - Span ending (even on error)
 *
 * When no tracer provider is registered the work still runs inside a
 * no-op span.
 */

import { type Attributes, type Span, SpanStatusCode, trace } from "@opentelemetry/api";
import { TRACER_NAME } from "./constants.js";

function recordFailure(span: Span, error: unknown): void {
  if (error instanceof Error) {
    span.recordException(error);
  }
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: error instanceof Error ? error.message : String(error),
  });
}

/**
 * Execute an async function within a named OTel span.
 *
 * @throws Re-throws any error from fn after recording it on the span
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: () => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      recordFailure(span, error);
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Synchronous counterpart of {@link withSpan}.
 */
export function withSpanSync<T>(name: string, attributes: Attributes, fn: () => T): T {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, { attributes }, (span) => {
    try {
      const result = fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      recordFailure(span, error);
      throw error;
    } finally {
      span.end();
    }
  });
}
