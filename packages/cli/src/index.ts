export type { CliDependencies, CliIo } from "./program.js";
export { CONFIG_ENV_VAR, EXIT_HTTP_ERROR, createProgram, runCli } from "./program.js";
