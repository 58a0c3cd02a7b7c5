import axios, { AxiosError, type AxiosInstance } from "axios";
import { TransportError } from "../core/Errors.js";

export interface Transport {
  /**
   * GET `url` and resolve with the body text of a 200 response.
   * Reject with a TransportError; any other rejection is reported as NETWORK_ERROR.
   */
  get(url: string): Promise<string>;
}

export interface AxiosTransportOptions {
  timeoutMs: number;
  userAgent: string;
  /** Pre-built axios instance, e.g. one with a custom adapter. */
  instance?: AxiosInstance;
}

export function createAxiosTransport(opts: AxiosTransportOptions): Transport {
  const http = opts.instance ?? axios.create();

  return {
    async get(url: string): Promise<string> {
      try {
        const res = await http.get<string>(url, {
          timeout: opts.timeoutMs,
          responseType: "text",
          // keep the body untouched; status is checked below
          transformResponse: (data: unknown) => data,
          validateStatus: () => true,
          headers: { "User-Agent": opts.userAgent, Accept: "application/xml, text/xml" },
        });

        if (res.status !== 200) {
          throw new TransportError(
            "HTTP_STATUS_ERROR",
            `GET ${url} answered ${res.status} ${res.statusText}`.trim(),
            res.status,
          );
        }
        return typeof res.data === "string" ? res.data : String(res.data);
      } catch (e: unknown) {
        if (e instanceof TransportError) throw e;
        if (e instanceof AxiosError) {
          throw new TransportError("NETWORK_ERROR", `GET ${url} failed: ${e.message}`, undefined, {
            cause: e,
          });
        }
        throw e;
      }
    },
  };
}
