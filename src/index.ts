export type { ResultMap, ResultValue, ApiResult, ApiError, Lookup } from "./types/result.js";
export type {
  DocumentNode,
  ElementNode,
  TextNode,
  XmlDocument,
  KeyPath,
} from "./types/internal.js";
export type { ClientOptions, ResolvedClientOptions } from "./config.js";
export type { Logger } from "./utils/logger.js";
export type { Transport } from "./client/transport.js";
export type { RequestParameters, ParameterValue, SendOptions } from "./client/request.js";
export type { ConvertOptions } from "./core/NodeConverter.js";
export type { ParseOptions } from "./parsing/xml.js";

export { mapWithPath } from "./core/PathMap.js";
export { deepMerge } from "./core/DeepMerge.js";
export { convertNode, convertDocument } from "./core/NodeConverter.js";
export { convertRowset } from "./core/RowsetConverter.js";
export { ConversionError, XmlParseError, TransportError } from "./core/Errors.js";
export * from "./core/vocabulary.js";
export { parseXmlDocument } from "./parsing/xml.js";
export { normalizeXml } from "./parsing/normalize.js";
export { lookupPath, getText, getAttributes } from "./utils/lookup.js";
export { parseEveDateTime } from "./utils/datetime.js";
export { consoleLogger, silentLogger } from "./utils/logger.js";
export { createAxiosTransport } from "./client/transport.js";
export { resolveClientOptions, DEFAULT_API_HOME } from "./config.js";
export { EveApiMethod } from "./client/EveApiMethod.js";
export { EveApiClient } from "./client/EveApiClient.js";
export { METHODS, getMethod, listMethods } from "./methods/catalog.js";

import type { ClientOptions } from "./config.js";
import { EveApiClient as EveApiClientClass } from "./client/EveApiClient.js";

export function createClient(opts: ClientOptions = {}) {
  return new EveApiClientClass(opts);
}
