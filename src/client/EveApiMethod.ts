import { resolveClientOptions, type ClientOptions } from "../config.js";
import type { ApiResult } from "../types/result.js";
import { executeRequest, type RequestParameters, type SendOptions } from "./request.js";

/**
 * One API endpoint, e.g. `/account/Characters`.
 *
 *   const custom = new EveApiMethod("/api/CustomMethodName", "example.com");
 *   await custom.send({ param1: "value1" });
 *   // GET https://example.com/api/CustomMethodName.xml.aspx?param1=value1
 *
 * Without an `apiHome` the host comes from the client options, EVEAPI_HOST,
 * or the default host, in that order.
 */
export class EveApiMethod {
  readonly method: string;
  readonly apiHome: string | undefined;

  constructor(method: string, apiHome?: string) {
    this.method = method;
    this.apiHome = apiHome;
  }

  /**
   * `/account/Characters.xml.aspx?key=value`, or `/server/ServerStatus.xml.aspx`
   * when there are no parameters. Parameters are form-encoded in insertion order.
   */
  composeUrl(parameters: RequestParameters = {}): string {
    const query = new URLSearchParams();
    for (const [name, value] of Object.entries(parameters)) query.append(name, String(value));
    const qs = query.toString();
    return `${this.method}.xml.aspx${qs ? `?${qs}` : ""}`;
  }

  send(
    parameters: RequestParameters = {},
    options: ClientOptions & SendOptions = {},
  ): Promise<ApiResult> {
    const cfg = resolveClientOptions({ ...options, apiHome: this.apiHome ?? options.apiHome });
    return executeRequest(this.method, this.composeUrl(parameters), cfg, options);
  }
}
