import { metrics, type Counter, type Meter } from "@opentelemetry/api";

export interface ApplianceInstrumentationOptions {
  readonly name?: string;
  readonly version?: string;
  readonly schemaUrl?: string;
}

const DEFAULT_INSTRUMENTATION_NAME = "appliance-rest";

export const getApplianceMeter = (options: ApplianceInstrumentationOptions = {}): Meter =>
  metrics.getMeter(options.name ?? DEFAULT_INSTRUMENTATION_NAME, options.version, {
    schemaUrl: options.schemaUrl,
  });

export interface ApplianceCounterOptions {
  readonly description?: string;
  readonly unit?: string;
  readonly instrumentation?: ApplianceInstrumentationOptions;
}

export const createApplianceCounter = (name: string, options: ApplianceCounterOptions = {}): Counter => {
  const { instrumentation, ...counterOptions } = options;
  return getApplianceMeter(instrumentation).createCounter(name, counterOptions);
};
