import { HTTP_METHODS, type HeadersLike, type HttpMethod, type QueryParams, type QueryValue } from "./types.js";

export const API_VERSION = "/api/v1";

export const trimTrailingSlash = (value: string): string => value.replace(/\/+$/u, "");

export const ensureLeadingSlash = (value: string): string =>
  value.startsWith("/") ? value : `/${value}`;

// Always https, whatever scheme the host was given with.
export const toBaseUrl = (host: string): string =>
  `https://${trimTrailingSlash(host.replace(/^[a-z][a-z0-9+.-]*:\/\//iu, ""))}`;

export const toUrl = (host: string, path: string): string => `${toBaseUrl(host)}${ensureLeadingSlash(path)}`;

export const withApiVersion = (path: string): string => {
  const normalised = ensureLeadingSlash(path);
  return normalised.startsWith("/api/") ? normalised : `${API_VERSION}${normalised}`;
};

const isQueryList = (value: QueryValue | ReadonlyArray<QueryValue>): value is ReadonlyArray<QueryValue> =>
  typeof value === "object";

export const appendQuery = (url: string, params?: QueryParams): string => {
  if (!params) {
    return url;
  }

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) {
      continue;
    }
    const values = isQueryList(value) ? value : [value];
    for (const entry of values) {
      search.append(key, String(entry));
    }
  }

  const query = search.toString();
  if (!query) {
    return url;
  }
  return `${url}${url.includes("?") ? "&" : "?"}${query}`;
};

export const basicAuthorization = (username: string, password: string): string =>
  `Basic ${Buffer.from(`${username}:${password}`, "utf8").toString("base64")}`;

export const parseHttpMethod = (method: string): HttpMethod | undefined =>
  HTTP_METHODS.find((candidate) => candidate === method.trim().toUpperCase());

export const maskToken = (token: string): string =>
  token.length <= 4 ? "****" : `${token.slice(0, 4)}…`;

export const readHeaders = (headers: HeadersLike): Record<string, string> => {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key.toLowerCase()] = value;
  });
  return result;
};

export const safeJsonParse = (
  payload: string,
): { readonly data?: unknown; readonly error?: Error } => {
  if (!payload) {
    return { data: undefined };
  }

  try {
    return { data: JSON.parse(payload) };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    return { error: err };
  }
};

export const asString = (input: unknown): string | undefined =>
  typeof input === "string" && input.trim().length > 0 ? input : undefined;

export const isRecord = (input: unknown): input is Record<string, unknown> =>
  Boolean(input) && typeof input === "object" && !Array.isArray(input);
