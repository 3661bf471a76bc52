import {
  ok,
  type CredentialSourcePort,
  type DeviceId,
  type Result,
  type SessionIdentity,
  type UsageError,
} from "@appliance-rest/contracts";

import { loadDeviceConfig, readDeviceSection } from "./device-config.js";
import type { DeviceConfig } from "./schema.js";

export class FileCredentialSource implements CredentialSourcePort {
  private config?: Promise<Result<DeviceConfig, UsageError>>;

  constructor(private readonly filePath: string) {}

  async resolve(deviceId: DeviceId): Promise<Result<SessionIdentity, UsageError>> {
    this.config ??= loadDeviceConfig(this.filePath);
    const config = await this.config;
    if (!config.ok) {
      return config;
    }

    const section = readDeviceSection(config.value, deviceId);
    if (!section.ok) {
      return section;
    }

    return ok({
      host: section.value.IP.MGMT,
      username: section.value.REST_ADMIN.USER,
      password: section.value.REST_ADMIN.PASSWORD,
    });
  }
}

export const createFileCredentialSource = (filePath: string): FileCredentialSource =>
  new FileCredentialSource(filePath);
