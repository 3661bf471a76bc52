import { Command, CommanderError } from "commander";
import { stringify as stringifyYaml } from "yaml";

import type { RestClientError } from "@appliance-rest/contracts";
import { createFileCredentialSource } from "@appliance-rest/device-config";
import {
  DEFAULT_REALM,
  createApplianceRestClient,
  type ApplianceRestClient,
  type ApplianceRestClientOptions,
} from "@appliance-rest/rest-client";
import { createApplianceLogger, type ApplianceLogLevel } from "@appliance-rest/telemetry";

import {
  collectParam,
  parseDeviceId,
  parseFormat,
  parseJson,
  parseLogLevel,
  parseTimeout,
  toQueryParams,
  type OutputFormat,
} from "./options.js";

export const CONFIG_ENV_VAR = "APPLIANCE_REST_CONFIG";

/** Exit code for a call that completed with a non-2xx status. */
export const EXIT_HTTP_ERROR = 2;

export interface CliIo {
  readonly out: (text: string) => void;
  readonly err: (text: string) => void;
}

export interface CliDependencies {
  readonly io?: CliIo;
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly createClient?: (options: ApplianceRestClientOptions) => ApplianceRestClient;
}

interface GlobalOptions {
  readonly host?: string;
  readonly username?: string;
  readonly password?: string;
  readonly deviceId?: number | string;
  readonly config?: string;
  readonly realm?: string;
  readonly timeout?: number;
  readonly prefixApiVersion?: boolean;
  readonly logLevel: ApplianceLogLevel;
}

interface RequestOptions {
  readonly data?: unknown;
  readonly param: ReadonlyArray<string>;
  readonly format: OutputFormat;
}

interface ProbeOptions {
  readonly format: OutputFormat;
}

const defaultIo: CliIo = {
  out: (text) => {
    process.stdout.write(`${text}\n`);
  },
  err: (text) => {
    process.stderr.write(`${text}\n`);
  },
};

const render = (value: unknown, format: OutputFormat): string =>
  format === "json" ? JSON.stringify(value, null, 2) : stringifyYaml(value).trimEnd();

const describeError = (error: RestClientError) => ({
  error: {
    kind: error.kind,
    code: error.code,
    message: error.message,
    details: error.details,
  },
});

export const createProgram = (deps: CliDependencies = {}, setExitCode: (code: number) => void = () => undefined) => {
  const io = deps.io ?? defaultIo;
  const env = deps.env ?? process.env;
  const createClient = deps.createClient ?? createApplianceRestClient;

  const program = new Command();

  const buildClient = (): ApplianceRestClient => {
    const options = program.opts<GlobalOptions>();
    const configPath = options.config ?? env[CONFIG_ENV_VAR];
    return createClient({
      host: options.host,
      username: options.username,
      password: options.password,
      deviceId: options.deviceId,
      credentialSource: configPath ? createFileCredentialSource(configPath) : undefined,
      realm: options.realm,
      timeoutMs: options.timeout,
      prefixApiVersion: options.prefixApiVersion,
      logger: createApplianceLogger({
        name: "appliance-rest-cli",
        level: options.logLevel,
        sink: (_level, line) => io.err(line),
      }),
    });
  };

  const fail = (error: RestClientError): void => {
    io.err(JSON.stringify(describeError(error), null, 2));
    setExitCode(1);
  };

  program
    .name("appliance-rest")
    .description("Call an appliance's admin REST API with a cached session token")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    })
    .option("--host <host>", "Appliance address; skips the device configuration lookup")
    .option("--username <username>", "Admin username used with --host")
    .option("--password <password>", "Admin password used with --host")
    .option("--device-id <id>", "Device to read from the configuration file (1 is DEVICE)", parseDeviceId)
    .option("--config <path>", `Device configuration file (YAML or JSON), defaults to $${CONFIG_ENV_VAR}`)
    .option("--realm <realm>", "Authentication realm", DEFAULT_REALM)
    .option("--timeout <ms>", "Per-call timeout in milliseconds", parseTimeout)
    .option("--prefix-api-version", "Prefix paths outside /api/ with /api/v1")
    .option("--log-level <level>", "debug, info, warn or error", parseLogLevel, "warn");

  program
    .command("request")
    .description(`Execute one request; exits ${EXIT_HTTP_ERROR} when the appliance answers with a non-2xx status`)
    .argument("<method>", "GET, POST, PUT or DELETE")
    .argument("<path>", "Resource path, for example /api/v1/configuration/users")
    .option("--data <json>", "JSON payload for POST and PUT", parseJson)
    .option("--param <key=value>", "Query parameter for GET, repeatable", collectParam, [])
    .option("--format <format>", "Output format (json|yaml)", parseFormat, "json")
    .action(async (method: string, path: string, options: RequestOptions) => {
      const client = buildClient();
      const result = await client.executeRequest({
        resourcePath: path,
        method,
        payload: options.data,
        params: toQueryParams(options.param),
      });

      if (!result.ok) {
        fail(result.error);
        return;
      }

      io.out(render({ status: result.value.status, body: result.value.data ?? result.value.body }, options.format));
      if (!result.value.ok) {
        setExitCode(EXIT_HTTP_ERROR);
      }
    });

  program
    .command("probe")
    .description("Connect to the appliance and report whether the session token is valid")
    .option("--format <format>", "Output format (json|yaml)", parseFormat, "json")
    .action(async (options: ProbeOptions) => {
      const client = buildClient();
      const session = await client.connect();
      if (!session.ok) {
        fail(session.error);
        return;
      }

      const valid = await client.isTokenValid(session.value.token);
      io.out(
        render(
          {
            host: session.value.identity.host,
            username: session.value.identity.username,
            valid,
            renewals: session.value.renewals,
          },
          options.format,
        ),
      );
      if (!valid) {
        setExitCode(1);
      }
    });

  return program;
};

/** Runs the CLI against user arguments (without the node and script entries) and returns the exit code. */
export const runCli = async (argv: ReadonlyArray<string>, deps: CliDependencies = {}): Promise<number> => {
  let exitCode = 0;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
};
