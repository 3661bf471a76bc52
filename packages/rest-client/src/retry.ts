import type { RestClientError, Result } from "@appliance-rest/contracts";

export const DEFAULT_EXPIRED_SESSION_STATUSES: ReadonlyArray<number> = [401, 402, 403, 404];

export interface ExpiredSessionRetryOptions {
  readonly statuses: ReadonlySet<number>;
  readonly renew: () => Promise<Result<unknown, RestClientError>>;
  readonly onExpired?: (status: number) => void;
}

/**
 * Wraps a dispatch so an authorization-class status renews the session and replays the call once.
 *
 * The replayed result is returned whatever its status. Errors from the first attempt and a failed
 * renewal are returned as they are, without a replay.
 */
export const withExpiredSessionRetry = <TArgs extends ReadonlyArray<unknown>, TResponse extends { readonly status: number }>(
  dispatch: (...args: TArgs) => Promise<Result<TResponse, RestClientError>>,
  options: ExpiredSessionRetryOptions,
): ((...args: TArgs) => Promise<Result<TResponse, RestClientError>>) => {
  return async (...args: TArgs) => {
    const first = await dispatch(...args);
    if (!first.ok || !options.statuses.has(first.value.status)) {
      return first;
    }

    options.onExpired?.(first.value.status);
    const renewed = await options.renew();
    if (!renewed.ok) {
      return renewed;
    }

    return dispatch(...args);
  };
};
