import type { ResolvedClientOptions } from "../config.js";
import { toApiError, TransportError } from "../core/Errors.js";
import { normalizeXml } from "../parsing/normalize.js";
import type { ApiResult } from "../types/result.js";

export type ParameterValue = string | number | boolean;
export type RequestParameters = Readonly<Record<string, ParameterValue>>;

export interface SendOptions {
  /** Also hand back the raw response body as `raw`. */
  returnXml?: boolean;
}

/**
 * GET one API document and convert it. Never throws for transport, parse or
 * structure problems; those come back as `{ ok: false }`.
 */
export async function executeRequest(
  method: string,
  relativeUrl: string,
  cfg: ResolvedClientOptions,
  send: SendOptions = {},
): Promise<ApiResult> {
  const url = `${cfg.useHttps ? "https" : "http"}://${cfg.apiHome}${relativeUrl}`;
  cfg.logger.info(`Sending request to EVE API (${cfg.apiHome}) server: ${method}`);

  let raw: string | undefined;
  try {
    raw = await fetchBody(cfg, url);
    cfg.logger.debug(`Received ${raw.length} characters for ${method}`);

    const value = normalizeXml(raw, { maxDepth: cfg.maxDepth });
    return send.returnXml ? { ok: true, value, raw } : { ok: true, value };
  } catch (e: unknown) {
    const error = toApiError(e, method);
    cfg.logger.warn(`${method} failed (${error.code}): ${error.message}`);
    return send.returnXml && raw !== undefined ? { ok: false, error, raw } : { ok: false, error };
  }
}

/** Custom transports may throw anything; whatever is not a TransportError counts as a network failure. */
async function fetchBody(cfg: ResolvedClientOptions, url: string): Promise<string> {
  try {
    return await cfg.transport.get(url);
  } catch (e: unknown) {
    if (e instanceof TransportError) throw e;
    const reason = e instanceof Error ? e.message : String(e);
    throw new TransportError("NETWORK_ERROR", `GET ${url} failed: ${reason}`, undefined, { cause: e });
  }
}
