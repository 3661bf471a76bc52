import type { CredentialSourcePort, DeviceId, SessionStorePort } from "@appliance-rest/contracts";
import type { ApplianceLogger, ApplianceTracer } from "@appliance-rest/telemetry";
import type { Counter } from "@opentelemetry/api";

export const HTTP_METHODS = ["GET", "POST", "PUT", "DELETE"] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export interface FetchRequestInit {
  readonly method?: string;
  readonly headers?: Record<string, string>;
  readonly body?: string;
  readonly signal?: AbortSignal;
}

export interface HeadersLike {
  forEach(callback: (value: string, key: string) => void): void;
}

export interface FetchResponseLike {
  readonly ok: boolean;
  readonly status: number;
  readonly headers: HeadersLike;
  text(): Promise<string>;
}

export interface FetchLike {
  (input: string, init?: FetchRequestInit): Promise<FetchResponseLike>;
}

export interface Clock {
  now(): Date;
}

export type QueryValue = string | number | boolean;

export type QueryParams = Record<string, QueryValue | ReadonlyArray<QueryValue> | undefined>;

export interface RestRequest {
  readonly resourcePath: string;
  /** One of GET, POST, PUT or DELETE, in any case. */
  readonly method: string;
  readonly payload?: unknown;
  readonly params?: QueryParams;
}

export interface RestResponse {
  readonly status: number;
  readonly ok: boolean;
  readonly headers: Record<string, string>;
  readonly body: string;
  /** The body parsed as JSON, when it is JSON. */
  readonly data?: unknown;
}

export interface ApplianceRestMetrics {
  readonly loginCounter: Counter;
  readonly renewalCounter: Counter;
  readonly requestCounter: Counter;
}

export interface ApplianceRestClientOptions {
  /** Appliance address. When set, username and password are used as given. */
  readonly host?: string;
  readonly username?: string;
  readonly password?: string;
  /** Device looked up in the credential source when no host is given. Defaults to 1. */
  readonly deviceId?: DeviceId;
  readonly credentialSource?: CredentialSourcePort;
  /** Defaults to "Admin Users". */
  readonly realm?: string;
  readonly sessionStore?: SessionStorePort;
  readonly fetch?: FetchLike;
  /** Per-call timeout. Defaults to 10 000 ms. */
  readonly timeoutMs?: number;
  /** Statuses that mean the token expired. Defaults to 401, 402, 403 and 404. */
  readonly expiredSessionStatuses?: ReadonlyArray<number>;
  /** Prefix paths that do not start with /api/ with /api/v1. */
  readonly prefixApiVersion?: boolean;
  readonly logger?: ApplianceLogger;
  readonly tracer?: ApplianceTracer;
  readonly metrics?: Partial<ApplianceRestMetrics>;
  readonly clock?: Clock;
}
