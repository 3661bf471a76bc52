import {
  err,
  ok,
  type AuthError,
  type RestClientError,
  type Result,
  type SessionIdentity,
  type SessionRecord,
  type SessionStorePort,
  type TransportError,
  type UsageError,
} from "@appliance-rest/contracts";
import { defaultSessionStore } from "@appliance-rest/session-memory";
import {
  createApplianceCounter,
  createApplianceLogger,
  getApplianceTracer,
  runWithSpan,
  type ApplianceLogger,
  type ApplianceTracer,
} from "@appliance-rest/telemetry";

import { createInsecureFetch } from "./default-fetch.js";
import { createAuthError, createUsageError, transportError } from "./errors.js";
import { resolveIdentity } from "./identity.js";
import { DEFAULT_EXPIRED_SESSION_STATUSES, withExpiredSessionRetry } from "./retry.js";
import type {
  ApplianceRestClientOptions,
  ApplianceRestMetrics,
  Clock,
  FetchLike,
  HttpMethod,
  QueryParams,
  RestRequest,
  RestResponse,
} from "./types.js";
import {
  API_VERSION,
  appendQuery,
  asString,
  basicAuthorization,
  isRecord,
  maskToken,
  parseHttpMethod,
  readHeaders,
  safeJsonParse,
  toUrl,
  withApiVersion,
} from "./utils.js";

export const DEFAULT_REALM = "Admin Users";

export const DEFAULT_TIMEOUT_MS = 10_000;

const JSON_HEADERS: Readonly<Record<string, string>> = {
  "content-type": "application/json",
  charset: "utf-8",
  accept: "application/json",
};

const VALID_TOKEN_STATUSES = new Set([200, 204]);

const defaultClock: Clock = {
  now: () => new Date(),
};

interface PreparedRequest {
  readonly method: HttpMethod;
  readonly resourcePath: string;
  readonly body?: string;
  readonly params?: QueryParams;
  readonly payload?: unknown;
}

interface OutgoingCall {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body?: string;
}

const resolveMetrics = (metrics?: Partial<ApplianceRestMetrics>): ApplianceRestMetrics => ({
  loginCounter:
    metrics?.loginCounter ??
    createApplianceCounter("appliance_rest_logins_total", {
      description: "Realm logins performed against appliances.",
    }),
  renewalCounter:
    metrics?.renewalCounter ??
    createApplianceCounter("appliance_rest_session_renewals_total", {
      description: "Sessions whose token was replaced after expiring or failing validation.",
    }),
  requestCounter:
    metrics?.requestCounter ??
    createApplianceCounter("appliance_rest_requests_total", {
      description: "REST calls executed against appliances.",
    }),
});

/**
 * Client for an appliance's admin REST API.
 *
 * Sessions are shared through the session store: every client built for the same host, username
 * and password reuses one token, and a renewal made by any of them is seen by all.
 */
export class ApplianceRestClient {
  private readonly options: ApplianceRestClientOptions;

  private readonly fetch: FetchLike;

  private readonly store: SessionStorePort;

  private readonly realm: string;

  private readonly timeoutMs: number;

  private readonly prefixApiVersion: boolean;

  private readonly logger: ApplianceLogger;

  private readonly tracer: ApplianceTracer;

  private readonly metrics: ApplianceRestMetrics;

  private readonly clock: Clock;

  private readonly dispatchWithRetry: (
    request: PreparedRequest,
  ) => Promise<Result<RestResponse, RestClientError>>;

  private identityResult?: Promise<Result<SessionIdentity, UsageError>>;

  private connected = false;

  constructor(options: ApplianceRestClientOptions = {}) {
    this.options = options;
    this.fetch = options.fetch ?? createInsecureFetch();
    this.store = options.sessionStore ?? defaultSessionStore;
    this.realm = options.realm ?? DEFAULT_REALM;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.prefixApiVersion = options.prefixApiVersion ?? false;
    this.logger = options.logger ?? createApplianceLogger({ name: "appliance-rest" });
    this.tracer = options.tracer ?? getApplianceTracer();
    this.metrics = resolveMetrics(options.metrics);
    this.clock = options.clock ?? defaultClock;

    const statuses = new Set(options.expiredSessionStatuses ?? DEFAULT_EXPIRED_SESSION_STATUSES);
    this.dispatchWithRetry = withExpiredSessionRetry((request: PreparedRequest) => this.dispatch(request), {
      statuses,
      renew: () => this.renewSession(),
      onExpired: (status) => {
        this.logger.info("rest.session.expired", { status });
      },
    });
  }

  /** Host and credentials this client authenticates with. */
  async identity(): Promise<Result<SessionIdentity, UsageError>> {
    this.identityResult ??= resolveIdentity(this.options);
    const result = await this.identityResult;
    if (!result.ok) {
      // resolve again on the next call
      this.identityResult = undefined;
    }
    return result;
  }

  /**
   * Attaches to the stored session for this identity.
   *
   * A stored token is reused when the validation probe accepts it and replaced through a fresh
   * login otherwise. An identity with no stored session logs in once; concurrent callers for it
   * wait on the store lock and then reuse the new token.
   */
  async connect(): Promise<Result<SessionRecord, RestClientError>> {
    const identity = await this.identity();
    if (!identity.ok) {
      return identity;
    }

    const target = identity.value;
    const result = await this.store.runExclusive(target, async () => {
      const existing = await this.store.find(target);
      if (!existing) {
        this.logger.info("rest.session.missing", { host: target.host });
        return this.loginAndStore(target);
      }

      if (await this.isTokenValid(existing.token)) {
        this.logger.info("rest.session.reused", {
          host: target.host,
          token: maskToken(existing.token),
        });
        return ok(existing);
      }

      this.logger.info("rest.session.invalid", { host: target.host });
      this.metrics.renewalCounter.add(1, { reason: "invalid" });
      return this.loginAndStore(target);
    });

    if (result.ok) {
      this.connected = true;
    }
    return result;
  }

  /** Performs the realm login and stores the new token for this identity. */
  async login(): Promise<Result<SessionRecord, RestClientError>> {
    const identity = await this.identity();
    if (!identity.ok) {
      return identity;
    }

    const target = identity.value;
    const result = await this.store.runExclusive(target, () => this.loginAndStore(target));
    if (result.ok) {
      this.connected = true;
    }
    return result;
  }

  /** Logs in again and replaces the stored token in place. */
  async renewSession(): Promise<Result<SessionRecord, RestClientError>> {
    this.metrics.renewalCounter.add(1, { reason: "expired" });
    this.logger.info("rest.session.renewing");
    return this.login();
  }

  /**
   * Probes the configuration endpoint with the token. Only 200 and 204 count as valid; any other
   * status or a failed call does not.
   */
  async isTokenValid(token: string): Promise<boolean> {
    const identity = await this.identity();
    if (!identity.ok) {
      return false;
    }

    const url = toUrl(identity.value.host, `${API_VERSION}/configuration/`);
    const response = await this.send(
      {
        method: "GET",
        url,
        headers: { ...JSON_HEADERS, authorization: basicAuthorization(token, "") },
      },
      "checking token validity",
    );

    if (!response.ok) {
      this.logger.warn("rest.token.check_failed", { url, error: response.error.message });
      return false;
    }

    const valid = VALID_TOKEN_STATUSES.has(response.value.status);
    this.logger.info("rest.token.checked", { url, status: response.value.status, valid });
    return valid;
  }

  /**
   * Executes one authenticated call. An authorization-class status renews the session and
   * replays the call once.
   */
  async executeRequest(request: RestRequest): Promise<Result<RestResponse, RestClientError>> {
    return runWithSpan(
      this.tracer,
      "appliance_rest.request",
      async (span) => {
        span.setAttribute("http.method", request.method);
        span.setAttribute("http.target", request.resourcePath);

        const prepared = this.prepare(request);
        if (!prepared.ok) {
          this.logger.error("rest.request.invalid", {
            method: request.method,
            resourcePath: request.resourcePath,
            code: prepared.error.code,
            error: prepared.error.message,
          });
          this.metrics.requestCounter.add(1, { method: request.method, outcome: "invalid" });
          return prepared;
        }

        const result = await this.dispatchWithRetry(prepared.value);
        if (result.ok) {
          span.setAttribute("http.status_code", result.value.status);
        } else {
          span.setAttribute("appliance_rest.error_code", result.error.code);
          this.logger.error("rest.request.failed", {
            method: prepared.value.method,
            resourcePath: prepared.value.resourcePath,
            code: result.error.code,
            error: result.error.message,
          });
        }
        this.metrics.requestCounter.add(1, {
          method: prepared.value.method,
          outcome: result.ok ? "ok" : "error",
        });
        return result;
      },
    );
  }

  get(resourcePath: string, params?: QueryParams): Promise<Result<RestResponse, RestClientError>> {
    return this.executeRequest({ resourcePath, method: "GET", params });
  }

  post(resourcePath: string, payload?: unknown): Promise<Result<RestResponse, RestClientError>> {
    return this.executeRequest({ resourcePath, method: "POST", payload });
  }

  put(resourcePath: string, payload: unknown): Promise<Result<RestResponse, RestClientError>> {
    return this.executeRequest({ resourcePath, method: "PUT", payload });
  }

  delete(resourcePath: string): Promise<Result<RestResponse, RestClientError>> {
    return this.executeRequest({ resourcePath, method: "DELETE" });
  }

  private prepare(request: RestRequest): Result<PreparedRequest, UsageError> {
    const method = parseHttpMethod(request.method);
    if (!method) {
      return err(
        createUsageError("rest.unsupported_method", `Invalid request method type: ${request.method}`, {
          method: request.method,
        }),
      );
    }

    const resourcePath = this.prefixApiVersion ? withApiVersion(request.resourcePath) : request.resourcePath;

    switch (method) {
      case "POST":
        return ok({ method, resourcePath, payload: request.payload, body: JSON.stringify(request.payload ?? null) });
      case "PUT":
        if (request.payload === undefined || request.payload === null) {
          return err(
            createUsageError("rest.payload_required", "PUT requests need a payload", { resourcePath }),
          );
        }
        return ok({ method, resourcePath, payload: request.payload, body: JSON.stringify(request.payload) });
      case "GET":
        return ok({ method, resourcePath, params: request.params });
      case "DELETE":
        return ok({ method, resourcePath });
    }
  }

  private async dispatch(request: PreparedRequest): Promise<Result<RestResponse, RestClientError>> {
    const session = await this.currentSession();
    if (!session.ok) {
      return session;
    }

    const url = appendQuery(toUrl(session.value.identity.host, request.resourcePath), request.params);
    this.logger.info("rest.request", {
      method: request.method,
      url,
      payload: request.payload,
      params: request.params,
    });

    const response = await this.send(
      {
        method: request.method,
        url,
        headers: { ...JSON_HEADERS, authorization: basicAuthorization(session.value.token, "") },
        body: request.body,
      },
      `executing ${request.method} ${request.resourcePath}`,
    );

    if (response.ok) {
      this.logger.info("rest.response", {
        method: request.method,
        url,
        status: response.value.status,
        body: response.value.body,
      });
    }
    return response;
  }

  private async currentSession(): Promise<Result<SessionRecord, RestClientError>> {
    if (this.connected) {
      const identity = await this.identity();
      if (!identity.ok) {
        return identity;
      }
      const stored = await this.store.find(identity.value);
      if (stored) {
        return ok(stored);
      }
    }

    return this.connect();
  }

  private async loginAndStore(identity: SessionIdentity): Promise<Result<SessionRecord, RestClientError>> {
    const token = await this.performLogin(identity);
    if (!token.ok) {
      this.metrics.loginCounter.add(1, { outcome: "error" });
      this.logger.error("rest.login.failed", {
        host: identity.host,
        username: identity.username,
        code: token.error.code,
        error: token.error.message,
      });
      return token;
    }

    this.metrics.loginCounter.add(1, { outcome: "ok" });
    const now = this.clock.now().toISOString();
    const existing = await this.store.find(identity);
    const record: SessionRecord = existing
      ? { ...existing, token: token.value, renewedAt: now, renewals: existing.renewals + 1 }
      : { identity, token: token.value, createdAt: now, renewedAt: now, renewals: 0 };

    const saved = await this.store.save(record);
    this.logger.info("rest.login.succeeded", {
      host: identity.host,
      username: identity.username,
      token: maskToken(saved.token),
      renewals: saved.renewals,
    });
    return ok(saved);
  }

  private async performLogin(identity: SessionIdentity): Promise<Result<string, AuthError | TransportError>> {
    return runWithSpan(
      this.tracer,
      "appliance_rest.login",
      async (span) => {
        span.setAttribute("appliance_rest.host", identity.host);

        const url = toUrl(identity.host, `${API_VERSION}/realm_auth`);
        this.logger.info("rest.login", { url, username: identity.username, realm: this.realm });

        const response = await this.send(
          {
            method: "POST",
            url,
            headers: { ...JSON_HEADERS, authorization: basicAuthorization(identity.username, identity.password) },
            body: JSON.stringify({ realm: this.realm }),
          },
          "signing in to the realm",
        );

        if (!response.ok) {
          return response;
        }

        span.setAttribute("http.status_code", response.value.status);
        if (!response.value.ok) {
          return err(
            createAuthError("rest.login_rejected", `Appliance returned status ${response.value.status} during login`, {
              status: response.value.status,
              body: response.value.data ?? response.value.body,
              realm: this.realm,
            }),
          );
        }

        const data = response.value.data;
        const token = isRecord(data) ? asString(data.api_key) : undefined;
        if (!token) {
          return err(
            createAuthError("rest.login_response_invalid", "Login response did not contain an api_key", {
              status: response.value.status,
              body: response.value.body,
            }),
          );
        }

        return ok(token);
      },
    );
  }

  private async send(call: OutgoingCall, context: string): Promise<Result<RestResponse, TransportError>> {
    try {
      const response = await this.fetch(call.url, {
        method: call.method,
        headers: call.headers,
        body: call.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      const body = await response.text();
      const { data } = safeJsonParse(body);
      return ok({
        status: response.status,
        ok: response.ok,
        headers: readHeaders(response.headers),
        body,
        data,
      });
    } catch (error) {
      return err(transportError(error, context));
    }
  }
}

export const createApplianceRestClient = (options?: ApplianceRestClientOptions): ApplianceRestClient =>
  new ApplianceRestClient(options);
