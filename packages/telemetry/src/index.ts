export type { ApplianceInstrumentationOptions, ApplianceCounterOptions } from "./metrics.js";
export { getApplianceMeter, createApplianceCounter } from "./metrics.js";

export type {
  ApplianceLogger,
  ApplianceLoggerOptions,
  ApplianceLogLevel,
  ApplianceLogSink,
} from "./logging.js";
export { createApplianceLogger, isLogLevel } from "./logging.js";

export type { ApplianceTracer, RunWithSpanOptions } from "./tracing.js";
export { getApplianceTracer, runWithSpan, SpanStatusCode } from "./tracing.js";
