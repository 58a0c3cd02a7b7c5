import type { ResultMap } from "../types/result.js";
import { convertDocument, type ConvertOptions } from "../core/NodeConverter.js";
import { parseXmlDocument } from "./xml.js";

/** XML text straight to a ResultMap. Throws XmlParseError or ConversionError. */
export function normalizeXml(xml: string, opts: ConvertOptions = {}): ResultMap {
  return convertDocument(parseXmlDocument(xml, { maxDepth: opts.maxDepth }), opts);
}
