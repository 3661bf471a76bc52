export type {
  ApplianceRestClientOptions,
  ApplianceRestMetrics,
  Clock,
  FetchLike,
  FetchRequestInit,
  FetchResponseLike,
  HeadersLike,
  HttpMethod,
  QueryParams,
  QueryValue,
  RestRequest,
  RestResponse,
} from "./types.js";
export { HTTP_METHODS } from "./types.js";

export {
  ApplianceRestClient,
  DEFAULT_REALM,
  DEFAULT_TIMEOUT_MS,
  createApplianceRestClient,
} from "./rest-client.js";
export { DEFAULT_EXPIRED_SESSION_STATUSES, withExpiredSessionRetry } from "./retry.js";
export type { ExpiredSessionRetryOptions } from "./retry.js";
export { resolveIdentity } from "./identity.js";
export { createInsecureFetch } from "./default-fetch.js";
export { API_VERSION } from "./utils.js";
