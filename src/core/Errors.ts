import type { ApiError } from "../types/result.js";

export function err(
  code: ApiError["code"],
  message: string,
  details?: Record<string, unknown>,
  method?: string,
): ApiError {
  return { code, message, details, method };
}

export type ConversionErrorCode =
  | "MALFORMED_ROWSET"
  | "EMPTY_KEY_PATH"
  | "DEPTH_EXCEEDED";

/**
 * Raised while turning a document tree into a ResultMap. The response
 * structure did not match what the converter expects; nothing of the
 * partially built map is returned.
 */
export class ConversionError extends Error {
  readonly code: ConversionErrorCode;
  readonly path: ReadonlyArray<string>;

  constructor(code: ConversionErrorCode, message: string, path: ReadonlyArray<string> = []) {
    super(message);
    this.name = "ConversionError";
    this.code = code;
    this.path = path;
  }
}

export class XmlParseError extends Error {
  readonly line?: number;
  readonly col?: number;

  constructor(message: string, line?: number, col?: number) {
    super(message);
    this.name = "XmlParseError";
    this.line = line;
    this.col = col;
  }
}

export type TransportErrorCode = "NETWORK_ERROR" | "HTTP_STATUS_ERROR";

export class TransportError extends Error {
  readonly code: TransportErrorCode;
  readonly status?: number;

  constructor(code: TransportErrorCode, message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.code = code;
    this.status = status;
  }
}

/** Translate anything thrown below the client into an ApiError. */
export function toApiError(e: unknown, method?: string): ApiError {
  if (e instanceof TransportError) {
    return err(e.code, e.message, e.status === undefined ? undefined : { status: e.status }, method);
  }
  if (e instanceof XmlParseError) {
    return err("PARSE_ERROR", e.message, { line: e.line, col: e.col }, method);
  }
  if (e instanceof ConversionError) {
    return err(
      "MALFORMED_RESPONSE",
      e.message,
      { reason: e.code, path: e.path.join(".") },
      method,
    );
  }
  throw e;
}
