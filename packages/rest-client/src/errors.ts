import type { AuthError, TransportError, UsageError } from "@appliance-rest/contracts";

export const createAuthError = (
  code: string,
  message: string,
  details?: Record<string, unknown>,
  retryable = false,
): AuthError => ({
  kind: "auth",
  code,
  message,
  details,
  retryable,
});

export const createUsageError = (
  code: string,
  message: string,
  details?: Record<string, unknown>,
): UsageError => ({
  kind: "usage",
  code,
  message,
  details,
});

const errorName = (cause: unknown): string | undefined =>
  typeof cause === "object" && cause !== null && "name" in cause && typeof cause.name === "string"
    ? cause.name
    : undefined;

const isTimeout = (cause: unknown): boolean => {
  const name = errorName(cause);
  return name === "TimeoutError" || name === "AbortError";
};

export const transportError = (cause: unknown, context: string): TransportError => {
  const message = cause instanceof Error ? cause.message : String(cause);
  if (isTimeout(cause)) {
    return {
      kind: "transport",
      code: "rest.timeout",
      message: `Timed out while ${context}`,
      details: { cause: message },
      retryable: true,
    };
  }

  return {
    kind: "transport",
    code: "rest.transport_failed",
    message: `Unexpected error while ${context}`,
    details: { cause: message },
    retryable: true,
  };
};
