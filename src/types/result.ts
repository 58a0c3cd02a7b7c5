/** Leaf values are raw strings; everything else is a nested map. */
export type ResultValue = string | ResultMap;

export interface ResultMap {
  [key: string]: ResultValue;
}

export type ApiResult =
  | { ok: true; value: ResultMap; raw?: string }
  | { ok: false; error: ApiError; raw?: string };

export interface ApiError {
  code:
    | "NETWORK_ERROR"
    | "HTTP_STATUS_ERROR"
    | "PARSE_ERROR"
    | "MALFORMED_RESPONSE"
    | "UNKNOWN_METHOD";
  message: string;
  /** API method path the request was made for */
  method?: string;
  details?: Record<string, unknown>;
}

export type Lookup =
  | { kind: "leaf"; value: string }
  | { kind: "node"; value: ResultMap }
  | { kind: "absent" };
