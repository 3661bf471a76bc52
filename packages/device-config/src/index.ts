export type { DeviceConfig, DeviceSection } from "./schema.js";
export { deviceSectionName, loadDeviceConfig, parseDeviceConfig, readDeviceSection } from "./device-config.js";
export { FileCredentialSource, createFileCredentialSource } from "./file-credential-source.js";
