import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parse as parseYaml } from "yaml";

import { err, ok, type DeviceId, type Result, type UsageError } from "@appliance-rest/contracts";

import { createConfigError } from "./errors.js";
import { deviceConfigSchema, deviceSectionSchema, formatIssues, type DeviceConfig, type DeviceSection } from "./schema.js";

type ConfigFormat = "json" | "yaml";

const SECTION_NAME_PATTERN = /^DEVICE(_\w+)?$/u;

/**
 * Device `1` lives under `DEVICE`, device `n` under `DEVICE_n`. A full section name passes through.
 */
export const deviceSectionName = (deviceId: DeviceId): string => {
  const raw = String(deviceId).trim();
  if (SECTION_NAME_PATTERN.test(raw)) {
    return raw;
  }
  return raw === "1" ? "DEVICE" : `DEVICE_${raw}`;
};

const parseContents = (contents: string, format: ConfigFormat): unknown =>
  format === "json" ? JSON.parse(contents) : parseYaml(contents);

const detectAndParse = (contents: string, filePath: string): unknown => {
  const extension = extname(filePath).toLowerCase();
  if (extension === ".json") {
    return parseContents(contents, "json");
  }
  if (extension === ".yaml" || extension === ".yml") {
    return parseContents(contents, "yaml");
  }
  try {
    return parseContents(contents, "json");
  } catch {
    return parseContents(contents, "yaml");
  }
};

export const parseDeviceConfig = (contents: string, filePath: string): Result<DeviceConfig, UsageError> => {
  let data: unknown;
  try {
    data = detectAndParse(contents, filePath);
  } catch (error) {
    return err(
      createConfigError("config.invalid", `Could not parse device configuration ${filePath}`, {
        cause: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  const parsed = deviceConfigSchema.safeParse(data);
  if (!parsed.success) {
    return err(
      createConfigError("config.invalid", `Device configuration ${filePath} must be a mapping of sections`, {
        issues: formatIssues(parsed.error),
      }),
    );
  }

  return ok(parsed.data);
};

export const loadDeviceConfig = async (filePath: string): Promise<Result<DeviceConfig, UsageError>> => {
  let contents: string;
  try {
    contents = await readFile(filePath, "utf8");
  } catch (error) {
    return err(
      createConfigError("config.unreadable", `Could not read device configuration ${filePath}`, {
        cause: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  return parseDeviceConfig(contents, filePath);
};

export const readDeviceSection = (config: DeviceConfig, deviceId: DeviceId): Result<DeviceSection, UsageError> => {
  const section = deviceSectionName(deviceId);
  if (!(section in config)) {
    return err(
      createConfigError("config.device_missing", `No ${section} section in device configuration`, {
        deviceId: String(deviceId),
        sections: Object.keys(config),
      }),
    );
  }

  const parsed = deviceSectionSchema.safeParse(config[section]);
  if (!parsed.success) {
    return err(
      createConfigError("config.invalid", `Section ${section} is missing REST admin settings`, {
        section,
        issues: formatIssues(parsed.error),
      }),
    );
  }

  return ok(parsed.data);
};
