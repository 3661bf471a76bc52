export interface DomainError {
  readonly code: string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface InfraError extends DomainError {
  readonly retryable?: boolean;
}

export type ApplianceError = DomainError | InfraError;

/**
 * The appliance rejected the credentials, or answered the login without an api key.
 */
export interface AuthError extends InfraError {
  readonly kind: "auth";
}

/**
 * The HTTP exchange never produced a usable response.
 */
export interface TransportError extends InfraError {
  readonly kind: "transport";
}

/**
 * The caller asked for something the client cannot do.
 */
export interface UsageError extends DomainError {
  readonly kind: "usage";
}

export type RestClientError = AuthError | TransportError | UsageError;
