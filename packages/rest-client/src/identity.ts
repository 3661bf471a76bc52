import { err, ok, type Result, type SessionIdentity, type UsageError } from "@appliance-rest/contracts";

import { createUsageError } from "./errors.js";
import type { ApplianceRestClientOptions } from "./types.js";

type IdentityOptions = Pick<
  ApplianceRestClientOptions,
  "host" | "username" | "password" | "deviceId" | "credentialSource"
>;

/**
 * Explicit host and credentials win; otherwise the device is looked up in the credential source.
 */
export const resolveIdentity = async (
  options: IdentityOptions,
): Promise<Result<SessionIdentity, UsageError>> => {
  const host = options.host?.trim();
  if (host) {
    if (options.username === undefined || options.password === undefined) {
      return err(
        createUsageError("rest.credentials_missing", "Username and password are required with an explicit host", {
          host,
        }),
      );
    }
    return ok({ host, username: options.username, password: options.password });
  }

  if (!options.credentialSource) {
    return err(
      createUsageError(
        "rest.credentials_missing",
        "No host given and no credential source configured to look one up",
        { deviceId: String(options.deviceId ?? 1) },
      ),
    );
  }

  return options.credentialSource.resolve(options.deviceId ?? 1);
};
