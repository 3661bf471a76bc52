import type { UsageError } from "@appliance-rest/contracts";

export const createConfigError = (
  code: string,
  message: string,
  details?: Record<string, unknown>,
): UsageError => ({
  kind: "usage",
  code,
  message,
  details,
});
