import { Agent, fetch as undiciFetch } from "undici";

import type { FetchLike } from "./types.js";

let insecureAgent: Agent | undefined;

// Appliances ship self-signed certificates.
const getInsecureAgent = (): Agent => {
  insecureAgent ??= new Agent({ connect: { rejectUnauthorized: false } });
  return insecureAgent;
};

export const createInsecureFetch = (): FetchLike => async (input, init) => {
  const response = await undiciFetch(input, {
    method: init?.method,
    headers: init?.headers,
    body: init?.body,
    signal: init?.signal,
    dispatcher: getInsecureAgent(),
  });

  return {
    ok: response.ok,
    status: response.status,
    headers: response.headers,
    text: () => response.text(),
  };
};
