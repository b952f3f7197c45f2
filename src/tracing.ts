/**
 * OpenTelemetry spans around evaluations and batch runs.
 *
 * Without a registered tracer provider the OTel API is a no-op, so spans cost nothing
 * unless the host application configures an SDK.
 */

import { type Attributes, type Span, SpanStatusCode, trace } from '@opentelemetry/api';

const TRACER_NAME = 'batch-evals';

/**
 * Run `fn` inside an active span. Exceptions are recorded on the span and rethrown.
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      return await fn(span);
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
      throw e;
    } finally {
      span.end();
    }
  });
}
