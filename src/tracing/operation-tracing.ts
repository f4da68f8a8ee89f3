/**
 * operation-tracing.ts - OpenTelemetry spans for store operations
 *
 * What this file does:
 * Wraps a store operation (ensure, insert, search, ...) in a span named
 * "weaviate.<operation>" with the collection and any caller-supplied
 * attributes. The span is made active with context.with() so nested
 * work (HTTP requests, typed-client calls) inherits it across awaits.
 *
 * Error handling:
 * - Thrown errors: recorded with span.recordException(), status ERROR, rethrown
 * - Soft failures the operation reports in its return value (a false
 *   OperationResult, an ingestion report with warnings) keep status OK;
 *   the operation itself ran to completion
 */

import { SpanKind, SpanStatusCode, context, trace, type Attributes } from "@opentelemetry/api";
import { getTracer } from "./index";

export async function withOperationTracing<T>(
  operation: string,
  attributes: Attributes,
  fn: () => Promise<T>
): Promise<T> {
  const tracer = getTracer();

  // startActiveSpan with async callbacks doesn't reliably propagate context,
  // so the span is created manually and activated with context.with()
  const span = tracer.startSpan(`weaviate.${operation}`, {
    kind: SpanKind.INTERNAL,
    attributes: { "weaviate.operation": operation, ...attributes },
  });

  const activeContext = trace.setSpan(context.active(), span);

  return context.with(activeContext, async () => {
    try {
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      throw error;
    } finally {
      span.end();
    }
  });
}
