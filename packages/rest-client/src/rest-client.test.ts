import { beforeEach, describe, expect, it, vi } from "vitest";

import { ok, type CredentialSourcePort, type SessionStorePort } from "@appliance-rest/contracts";
import { createMemorySessionStore } from "@appliance-rest/session-memory";
import { createApplianceLogger, type ApplianceLogLevel } from "@appliance-rest/telemetry";

import { ApplianceRestClient } from "./rest-client.js";
import { FakeAppliance } from "./testing/fake-appliance.js";
import type { ApplianceRestClientOptions, FetchLike, FetchResponseLike } from "./types.js";

const quietLogger = () => createApplianceLogger({ level: "error", sink: () => undefined });

const basic = (user: string, pass: string) =>
  `Basic ${Buffer.from(`${user}:${pass}`, "utf8").toString("base64")}`;

const statusResponse = (status: number): FetchResponseLike => ({
  ok: status >= 200 && status < 300,
  status,
  headers: { forEach: () => undefined },
  text: async () => "",
});

describe("ApplianceRestClient", () => {
  let appliance: FakeAppliance;
  let store: SessionStorePort;

  const createClient = (overrides: ApplianceRestClientOptions = {}) =>
    new ApplianceRestClient({
      host: "10.0.0.1",
      username: "admin",
      password: "test-secret",
      fetch: appliance.fetch,
      sessionStore: store,
      logger: quietLogger(),
      ...overrides,
    });

  beforeEach(() => {
    appliance = new FakeAppliance();
    store = createMemorySessionStore();
  });

  describe("first request for a new identity", () => {
    it("logs in once and passes the response through", async () => {
      const client = createClient();

      const result = await client.get("/api/v1/system/info");

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.status).toBe(200);
      expect(result.value.data).toEqual({ path: "/api/v1/system/info", method: "GET" });
      expect(appliance.calls.map((call) => call.path)).toEqual(["/api/v1/realm_auth", "/api/v1/system/info"]);
      expect(appliance.loginCount).toBe(1);
    });

    it("signs in with Basic credentials and the realm, then calls with the token", async () => {
      const client = createClient();

      await client.get("/api/v1/system/info");

      const [login, call] = appliance.calls;
      expect(login?.method).toBe("POST");
      expect(login?.url).toBe("https://10.0.0.1/api/v1/realm_auth");
      expect(login?.headers.authorization).toBe(basic("admin", "test-secret"));
      expect(login?.body).toBe('{"realm":"Admin Users"}');
      expect(call?.headers).toEqual({
        "content-type": "application/json",
        charset: "utf-8",
        accept: "application/json",
        authorization: basic("token-1", ""),
      });
    });

    it("stores the session for the identity", async () => {
      const client = createClient();

      await client.get("/api/v1/system/info");

      const records = await store.list();
      expect(records).toHaveLength(1);
      expect(records[0]?.identity).toEqual({ host: "10.0.0.1", username: "admin", password: "test-secret" });
      expect(records[0]?.token).toBe("token-1");
      expect(records[0]?.renewals).toBe(0);
    });

    it("submits a configured realm", async () => {
      appliance = new FakeAppliance({ realm: "Operators" });
      const client = createClient({ realm: "Operators" });

      const result = await client.get("/api/v1/system/info");

      expect(result.ok && result.value.status).toBe(200);
      expect(appliance.calls[0]?.body).toBe('{"realm":"Operators"}');
    });
  });

  describe("retry on expiry", () => {
    it("renews the session once and replays the call after a 403", async () => {
      const client = createClient();
      await client.get("/api/v1/system/info");
      appliance.script("/api/v1/system/info", { status: 403, body: { message: "Forbidden" } });

      const result = await client.get("/api/v1/system/info");

      expect(result.ok && result.value.status).toBe(200);
      expect(appliance.calls.slice(2).map((call) => [call.path, call.principal])).toEqual([
        ["/api/v1/system/info", "token-1"],
        ["/api/v1/realm_auth", "admin"],
        ["/api/v1/system/info", "token-2"],
      ]);
      const [record] = await store.list();
      expect(record?.token).toBe("token-2");
      expect(record?.renewals).toBe(1);
    });

    it.each([401, 402, 403, 404])("treats status %i as an expired session", async (status) => {
      const client = createClient();
      appliance.script("/api/v1/system/info", { status });

      const result = await client.get("/api/v1/system/info");

      expect(result.ok && result.value.status).toBe(200);
      expect(appliance.loginCount).toBe(2);
    });

    it("returns the replayed response without retrying again", async () => {
      const client = createClient();
      appliance.script(
        "/api/v1/system/info",
        { status: 403 },
        { status: 403, body: { message: "still forbidden" } },
      );

      const result = await client.get("/api/v1/system/info");

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.status).toBe(403);
      expect(result.value.data).toEqual({ message: "still forbidden" });
      expect(appliance.calls.map((call) => call.path)).toEqual([
        "/api/v1/realm_auth",
        "/api/v1/system/info",
        "/api/v1/realm_auth",
        "/api/v1/system/info",
      ]);
    });

    it("does not retry other error statuses", async () => {
      const client = createClient();
      appliance.script("/api/v1/system/info", { status: 500 });

      const result = await client.get("/api/v1/system/info");

      expect(result.ok && result.value.status).toBe(500);
      expect(appliance.loginCount).toBe(1);
    });

    it("honours custom expired-session statuses", async () => {
      const client = createClient({ expiredSessionStatuses: [401] });
      appliance.script("/api/v1/system/info", { status: 404 });

      const result = await client.get("/api/v1/system/info");

      expect(result.ok && result.value.status).toBe(404);
      expect(appliance.loginCount).toBe(1);
    });

    it("returns the renewal error when the re-login fails", async () => {
      const client = createClient();
      await client.get("/api/v1/system/info");
      appliance.script("/api/v1/system/info", { status: 401 });
      appliance.answerLoginWith({ status: 503, body: { message: "unavailable" } });

      const result = await client.get("/api/v1/system/info");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("auth");
      expect(result.error.code).toBe("rest.login_rejected");
      expect(appliance.callsTo("/api/v1/system/info")).toHaveLength(2);
    });

    it("counts logins and renewals", async () => {
      const loginCounter = { add: vi.fn() };
      const renewalCounter = { add: vi.fn() };
      const client = createClient({ metrics: { loginCounter, renewalCounter } });
      appliance.script("/api/v1/system/info", { status: 401 });

      await client.get("/api/v1/system/info");

      expect(loginCounter.add.mock.calls).toEqual([
        [1, { outcome: "ok" }],
        [1, { outcome: "ok" }],
      ]);
      expect(renewalCounter.add.mock.calls).toEqual([[1, { reason: "expired" }]]);
    });
  });

  describe("session reuse", () => {
    it("reuses a valid cached token for a second client of the same identity", async () => {
      await createClient().get("/api/v1/system/info");

      const second = createClient();
      const result = await second.get("/api/v1/system/info");

      expect(result.ok && result.value.status).toBe(200);
      expect(appliance.loginCount).toBe(1);
      expect(appliance.callsTo("/api/v1/configuration/")).toHaveLength(1);
      expect(appliance.calls.at(-1)?.principal).toBe("token-1");
    });

    it("replaces an invalid cached token in place", async () => {
      const first = createClient();
      await first.get("/api/v1/system/info");
      appliance.revokeTokens();

      const second = createClient();
      const result = await second.get("/api/v1/system/info");

      expect(result.ok && result.value.status).toBe(200);
      const records = await store.list();
      expect(records).toHaveLength(1);
      expect(records[0]?.token).toBe("token-2");
      expect(records[0]?.renewals).toBe(1);

      await first.get("/api/v1/system/info");
      expect(appliance.calls.at(-1)?.principal).toBe("token-2");
      expect(appliance.loginCount).toBe(2);
    });

    it("keeps separate sessions for different identities", async () => {
      await createClient().get("/api/v1/system/info");
      await createClient({ host: "10.0.0.2" }).get("/api/v1/system/info");

      const records = await store.list();
      expect(records.map((record) => [record.identity.host, record.token])).toEqual([
        ["10.0.0.1", "token-1"],
        ["10.0.0.2", "token-2"],
      ]);
    });

    it("logs in once when two clients connect concurrently", async () => {
      const [first, second] = await Promise.all([
        createClient().get("/api/v1/system/info"),
        createClient().get("/api/v1/system/info"),
      ]);

      expect(first.ok && first.value.status).toBe(200);
      expect(second.ok && second.value.status).toBe(200);
      expect(appliance.loginCount).toBe(1);
      expect(appliance.callsTo("/api/v1/configuration/")).toHaveLength(1);
    });

    it("connects explicitly and reports the stored session", async () => {
      const result = await createClient().connect();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.token).toBe("token-1");
      expect(appliance.calls.map((call) => call.path)).toEqual(["/api/v1/realm_auth"]);
    });
  });

  describe("login failures", () => {
    it("returns a transport error when the login call fails", async () => {
      appliance.failLoginWith(new TypeError("fetch failed"));
      const client = createClient();

      const result = await client.get("/api/v1/system/info");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("transport");
      expect(result.error.code).toBe("rest.transport_failed");
      expect(result.error.details?.cause).toBe("fetch failed");
      expect(appliance.calls.map((call) => call.path)).toEqual(["/api/v1/realm_auth"]);
      expect(await store.list()).toEqual([]);
    });

    it("returns an auth error when the appliance rejects the credentials", async () => {
      const client = createClient({ password: "wrong" });

      const result = await client.get("/api/v1/system/info");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("auth");
      expect(result.error.code).toBe("rest.login_rejected");
      expect(result.error.details?.status).toBe(401);
      expect(result.error.details?.body).toEqual({ message: "Invalid credentials" });
      expect(appliance.loginCount).toBe(1);
    });

    it("returns an auth error when the login response has no api key", async () => {
      appliance.answerLoginWith({ status: 200, body: { token: "unexpected" } });

      const result = await createClient().login();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("rest.login_response_invalid");
    });

    it("times out calls that never answer", async () => {
      const hanging: FetchLike = (_input, init) =>
        new Promise((_resolve, reject) => {
          const signal = init?.signal;
          if (!signal) return;
          signal.addEventListener("abort", () => reject(signal.reason));
        });
      const client = createClient({ fetch: hanging, timeoutMs: 20 });

      const result = await client.get("/api/v1/system/info");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("rest.timeout");
      expect(result.error.kind).toBe("transport");
    });
  });

  describe("isTokenValid", () => {
    it.each([
      [200, true],
      [204, true],
      [401, false],
      [403, false],
      [500, false],
    ])("maps probe status %i to %s", async (status, expected) => {
      const client = createClient({ fetch: async () => statusResponse(status) });

      expect(await client.isTokenValid("token-x")).toBe(expected);
    });

    it("treats a failed probe as invalid", async () => {
      const client = createClient({
        fetch: async () => {
          throw new TypeError("fetch failed");
        },
      });

      expect(await client.isTokenValid("token-x")).toBe(false);
    });

    it("probes the configuration endpoint with the token as username", async () => {
      const client = createClient();

      expect(await client.isTokenValid("token-x")).toBe(false);
      expect(appliance.calls[0]?.url).toBe("https://10.0.0.1/api/v1/configuration/");
      expect(appliance.calls[0]?.headers.authorization).toBe(basic("token-x", ""));
    });
  });

  describe("request building", () => {
    it("appends query parameters to GET requests", async () => {
      const client = createClient();

      await client.get("/api/v1/users", { page: 2, tag: ["a", "b"], skip: undefined });

      expect(appliance.calls.at(-1)?.url).toBe("https://10.0.0.1/api/v1/users?page=2&tag=a&tag=b");
    });

    it("sends JSON payloads with POST and PUT", async () => {
      const client = createClient();

      await client.post("/api/v1/users", { name: "probe" });
      await client.put("/api/v1/users/1", { enabled: true });
      await client.post("/api/v1/refresh");

      const bodies = appliance.calls
        .filter((call) => call.path !== "/api/v1/realm_auth")
        .map((call) => [call.method, call.body]);
      expect(bodies).toEqual([
        ["POST", '{"name":"probe"}'],
        ["PUT", '{"enabled":true}'],
        ["POST", "null"],
      ]);
    });

    it("sends DELETE without a body", async () => {
      const client = createClient();

      const result = await client.delete("/api/v1/users/1");

      expect(result.ok && result.value.status).toBe(200);
      expect(appliance.calls.at(-1)?.method).toBe("DELETE");
      expect(appliance.calls.at(-1)?.body).toBeUndefined();
    });

    it("accepts methods in any case", async () => {
      const client = createClient();

      const result = await client.executeRequest({ resourcePath: "/api/v1/users", method: "get" });

      expect(result.ok && result.value.status).toBe(200);
      expect(appliance.calls.at(-1)?.method).toBe("GET");
    });

    it("rejects unsupported methods without calling the appliance", async () => {
      const client = createClient();

      const result = await client.executeRequest({ resourcePath: "/api/v1/users", method: "PATCH" });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("usage");
      expect(result.error.code).toBe("rest.unsupported_method");
      expect(appliance.calls).toHaveLength(0);
    });

    it("requires a payload for PUT", async () => {
      const client = createClient();

      const result = await client.executeRequest({ resourcePath: "/api/v1/users/1", method: "PUT" });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("rest.payload_required");
      expect(appliance.calls).toHaveLength(0);
    });

    it("prefixes the API version when asked to", async () => {
      const client = createClient({ prefixApiVersion: true });

      await client.get("/users");
      await client.get("/api/v2/things");

      expect(appliance.calls.slice(1).map((call) => call.path)).toEqual(["/api/v1/users", "/api/v2/things"]);
    });

    it("uses the path as given by default", async () => {
      const client = createClient();

      await client.get("/users");

      expect(appliance.calls.at(-1)?.url).toBe("https://10.0.0.1/users");
    });

    it("sends the token only to the session host, even for absolute URLs", async () => {
      const client = createClient();

      await client.get("https://collector.example.net/steal");

      const call = appliance.calls.at(-1);
      expect(call?.principal).toBe("token-1");
      expect(new URL(call?.url ?? "").host).toBe("10.0.0.1");
      expect(call?.url).toBe("https://10.0.0.1/https://collector.example.net/steal");
    });

    it("uses https for a host given with an http scheme", async () => {
      const client = createClient({ host: "http://10.0.0.1" });

      await client.get("/users");

      expect(appliance.calls.map((call) => call.url)).toEqual([
        "https://10.0.0.1/api/v1/realm_auth",
        "https://10.0.0.1/users",
      ]);
    });
  });

  describe("identity resolution", () => {
    it("looks the device up in the credential source when no host is given", async () => {
      const resolve = vi.fn<CredentialSourcePort["resolve"]>(async () =>
        ok({ host: "10.0.0.5", username: "admin", password: "test-secret" }),
      );
      const client = createClient({
        host: undefined,
        username: undefined,
        password: undefined,
        deviceId: 2,
        credentialSource: { resolve },
      });

      await client.get("/api/v1/system/info");
      await client.get("/api/v1/system/info");

      expect(resolve).toHaveBeenCalledTimes(1);
      expect(resolve).toHaveBeenCalledWith(2);
      expect(appliance.calls[0]?.url).toBe("https://10.0.0.5/api/v1/realm_auth");
    });

    it("requires credentials with an explicit host", async () => {
      const client = createClient({ password: undefined });

      const result = await client.get("/api/v1/system/info");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("rest.credentials_missing");
      expect(appliance.calls).toHaveLength(0);
    });

    it("requires a credential source without a host", async () => {
      const client = createClient({ host: undefined });

      const result = await client.connect();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("rest.credentials_missing");
      expect(result.error.details?.deviceId).toBe("1");
    });
  });

  describe("logging", () => {
    it("logs the login without the password and masks the token", async () => {
      const lines: Array<Record<string, unknown>> = [];
      const logger = createApplianceLogger({
        sink: (_level: ApplianceLogLevel, line: string) => {
          lines.push(JSON.parse(line) as Record<string, unknown>);
        },
      });
      const client = createClient({ logger });

      await client.login();

      const login = lines.find((line) => line.message === "rest.login");
      expect(login).toMatchObject({
        url: "https://10.0.0.1/api/v1/realm_auth",
        username: "admin",
        realm: "Admin Users",
      });
      expect(login?.password).toBeUndefined();
      const succeeded = lines.find((line) => line.message === "rest.login.succeeded");
      expect(succeeded?.token).toBe("toke…");
    });
  });
});
