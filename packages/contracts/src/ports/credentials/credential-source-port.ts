import type { UsageError } from "../../types/domain-error.js";
import type { Result } from "../../types/result.js";
import type { SessionIdentity } from "../../types/session.js";

export type DeviceId = number | string;

export interface CredentialSourcePort {
  resolve(deviceId: DeviceId): Promise<Result<SessionIdentity, UsageError>>;
}
