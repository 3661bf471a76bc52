import {
  SpanStatusCode,
  trace,
  type Attributes,
  type Span,
  type SpanOptions,
  type Tracer,
} from "@opentelemetry/api";

import type { ApplianceInstrumentationOptions } from "./metrics.js";

export type ApplianceTracer = Tracer;

export interface RunWithSpanOptions {
  readonly spanOptions?: SpanOptions;
  readonly attributes?: Attributes;
}

export const getApplianceTracer = (options: ApplianceInstrumentationOptions = {}): Tracer =>
  trace.getTracer(options.name ?? "appliance-rest", options.version);

/**
 * Runs the callback inside an active span. A thrown error marks the span as failed and is rethrown.
 */
export const runWithSpan = async <T>(
  tracer: Tracer,
  name: string,
  callback: (span: Span) => Promise<T>,
  options: RunWithSpanOptions = {},
): Promise<T> =>
  tracer.startActiveSpan(name, options.spanOptions ?? {}, async (span) => {
    span.setAttributes(options.attributes ?? {});

    try {
      const result = await callback(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      if (error instanceof Error) {
        span.recordException(error);
      }
      throw error;
    } finally {
      span.end();
    }
  });

export { SpanStatusCode };
