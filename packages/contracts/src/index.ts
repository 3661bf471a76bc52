export * from "./types/domain-error.js";
export * from "./types/result.js";
export * from "./types/session.js";

export * from "./ports/sessions/session-store-port.js";
export * from "./ports/credentials/credential-source-port.js";
