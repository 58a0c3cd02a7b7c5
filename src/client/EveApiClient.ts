import { resolveClientOptions, type ClientOptions, type Env, type ResolvedClientOptions } from "../config.js";
import { err } from "../core/Errors.js";
import { getMethod } from "../methods/catalog.js";
import type { ApiResult } from "../types/result.js";
import { EveApiMethod } from "./EveApiMethod.js";
import { executeRequest, type RequestParameters, type SendOptions } from "./request.js";

/**
 * Shares one set of options (host, scheme, transport, logger) across calls.
 *
 *   const client = new EveApiClient({ timeoutMs: 5000 });
 *   const res = await client.request("SERVER_STATUS");
 *   if (res.ok) getText(res.value, "eveapi.result.onlinePlayers");
 */
export class EveApiClient {
  readonly options: ResolvedClientOptions;

  constructor(opts: ClientOptions = {}, env?: Env) {
    this.options = resolveClientOptions(opts, env);
  }

  async request(
    target: EveApiMethod | string,
    parameters: RequestParameters = {},
    send: SendOptions = {},
  ): Promise<ApiResult> {
    const method = typeof target === "string" ? getMethod(target) : target;
    if (!method) {
      return { ok: false, error: err("UNKNOWN_METHOD", `Unknown API method: ${String(target)}`) };
    }

    const cfg = method.apiHome ? { ...this.options, apiHome: method.apiHome } : this.options;
    return executeRequest(method.method, method.composeUrl(parameters), cfg, send);
  }
}
