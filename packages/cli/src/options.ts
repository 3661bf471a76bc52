import { InvalidArgumentError } from "commander";

import { isLogLevel, type ApplianceLogLevel } from "@appliance-rest/telemetry";
import type { QueryParams } from "@appliance-rest/rest-client";

export const OUTPUT_FORMATS = ["json", "yaml"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const parseFormat = (value: string): OutputFormat => {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value);
  if (!format) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_FORMATS.join(", ")}`);
  }
  return format;
};

export const parseTimeout = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Timeout must be a positive number of milliseconds");
  }
  return parsed;
};

export const parseLogLevel = (value: string): ApplianceLogLevel => {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError("Expected one of: debug, info, warn, error");
  }
  return value;
};

export const parseDeviceId = (value: string): number | string => {
  const trimmed = value.trim();
  return /^\d+$/u.test(trimmed) ? Number.parseInt(trimmed, 10) : trimmed;
};

export const parseJson = (value: string): unknown => {
  try {
    return JSON.parse(value);
  } catch {
    throw new InvalidArgumentError("Payload must be valid JSON");
  }
};

export const collectParam = (value: string, previous: ReadonlyArray<string>): ReadonlyArray<string> => {
  if (!value.includes("=")) {
    throw new InvalidArgumentError("Query parameters take the form key=value");
  }
  return [...previous, value];
};

export const toQueryParams = (pairs: ReadonlyArray<string>): QueryParams | undefined => {
  if (pairs.length === 0) {
    return undefined;
  }

  const grouped = new Map<string, string[]>();
  for (const pair of pairs) {
    const separator = pair.indexOf("=");
    const key = pair.slice(0, separator);
    const values = grouped.get(key) ?? [];
    values.push(pair.slice(separator + 1));
    grouped.set(key, values);
  }

  const params: QueryParams = {};
  for (const [key, values] of grouped) {
    params[key] = values.length === 1 ? values[0] : values;
  }
  return params;
};
