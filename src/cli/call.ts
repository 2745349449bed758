import type { Env } from "../config/provider-config.js";
import { handleRequest, parseRequestJson, type HostResponse } from "../host/protocol.js";
import type { Provider } from "../provider/provider.js";

export type CallOptions = {
  readonly provider: Provider;
  readonly input: string;
  readonly env: Env;
};

export const runCall = async (options: CallOptions): Promise<HostResponse> => {
  const request = parseRequestJson(options.input);
  if (request.isErr()) {
    return { ok: false, diagnostics: [request.error] };
  }
  return handleRequest(options.provider, request.value, options.env);
};
