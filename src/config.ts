import { createAxiosTransport, type Transport } from "./client/transport.js";
import { DEFAULT_MAX_DEPTH } from "./core/NodeConverter.js";
import { consoleLogger, type Logger } from "./utils/logger.js";

export const DEFAULT_API_HOME = "api.eveonline.com";
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_USER_AGENT = "eve-xml-api/1.0";

export interface ClientOptions {
  /** API host name, without scheme. env: EVEAPI_HOST */
  apiHome?: string;
  /** default: true. env: EVEAPI_USE_HTTPS */
  useHttps?: boolean;
  /** env: EVEAPI_TIMEOUT_MS */
  timeoutMs?: number;
  userAgent?: string;
  maxDepth?: number;
  logger?: Logger;
  /** Replaces the axios transport built from the options above. */
  transport?: Transport;
}

export interface ResolvedClientOptions {
  apiHome: string;
  useHttps: boolean;
  timeoutMs: number;
  userAgent: string;
  maxDepth: number;
  logger: Logger;
  transport: Transport;
}

export type Env = Record<string, string | undefined>;

/** Explicit options win over environment variables, which win over defaults. */
export function resolveClientOptions(
  opts: ClientOptions = {},
  env: Env = process.env,
): ResolvedClientOptions {
  const fromEnv = readEnv(env);

  const timeoutMs = opts.timeoutMs ?? fromEnv.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const userAgent = opts.userAgent ?? DEFAULT_USER_AGENT;

  return {
    apiHome: opts.apiHome ?? fromEnv.apiHome ?? DEFAULT_API_HOME,
    useHttps: opts.useHttps ?? fromEnv.useHttps ?? true,
    timeoutMs,
    userAgent,
    maxDepth: opts.maxDepth ?? DEFAULT_MAX_DEPTH,
    logger: opts.logger ?? consoleLogger,
    transport: opts.transport ?? createAxiosTransport({ timeoutMs, userAgent }),
  };
}

function readEnv(env: Env): Pick<ClientOptions, "apiHome" | "useHttps" | "timeoutMs"> {
  const out: Pick<ClientOptions, "apiHome" | "useHttps" | "timeoutMs"> = {};

  const host = env.EVEAPI_HOST?.trim();
  if (host) out.apiHome = host;

  const https = env.EVEAPI_USE_HTTPS?.trim().toLowerCase();
  if (https) {
    if (https === "true" || https === "1") out.useHttps = true;
    else if (https === "false" || https === "0") out.useHttps = false;
    else throw new Error(`EVEAPI_USE_HTTPS must be true/false/1/0, got '${env.EVEAPI_USE_HTTPS}'`);
  }

  const timeout = env.EVEAPI_TIMEOUT_MS?.trim();
  if (timeout) {
    const n = Number(timeout);
    if (!Number.isInteger(n) || n <= 0) {
      throw new Error(`EVEAPI_TIMEOUT_MS must be a positive integer, got '${timeout}'`);
    }
    out.timeoutMs = n;
  }

  return out;
}
