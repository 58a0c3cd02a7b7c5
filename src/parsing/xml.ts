import { XMLParser, XMLValidator } from "fast-xml-parser";
import type { DocumentNode, XmlDocument } from "../types/internal.js";
import { XmlParseError } from "../core/Errors.js";
import { DEFAULT_MAX_DEPTH } from "../core/NodeConverter.js";
import { setEntry } from "../utils/entries.js";

const TEXT_NODE = "#text";
const ATTRS_NODE = ":@";

export interface ParseOptions {
  /** Element nesting the caller will accept. default: 256 */
  maxDepth?: number;
}

/**
 * Document tree reader:
 * - ordered output, so mixed text/element children keep document order
 * - attributes and text stay raw strings (no number/boolean parsing)
 * - character references are decoded in both `&#39;` and `&#x41;` form
 * - whitespace is preserved here; the converter decides what is blank
 * - declaration, processing instructions and comments are dropped
 * - namespace prefixes are kept as part of the tag name
 *
 * The parser's own nesting cap sits just above `maxDepth`, so a document one
 * level too deep still reaches the converter and fails there as DEPTH_EXCEEDED.
 */
function createParser(maxDepth: number): XMLParser {
  const options = {
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: "",
    textNodeName: TEXT_NODE,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    htmlEntities: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    maxNestedTags: maxDepth + 2,
  };
  return new XMLParser(options);
}

export function parseXmlDocument(xml: string, opts: ParseOptions = {}): XmlDocument {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    const { msg, line, col } = valid.err;
    throw new XmlParseError(`Invalid XML at ${line}:${col}: ${msg}`, line, col);
  }

  let parsed: unknown;
  try {
    parsed = createParser(opts.maxDepth ?? DEFAULT_MAX_DEPTH).parse(xml);
  } catch (e: unknown) {
    throw new XmlParseError(`Unreadable XML: ${e instanceof Error ? e.message : String(e)}`);
  }
  return { children: toNodes(parsed) };
}

function toNodes(raw: unknown): DocumentNode[] {
  if (!Array.isArray(raw)) return [];
  const list: unknown[] = raw;
  const nodes: DocumentNode[] = [];

  for (const entry of list) {
    if (!isRecord(entry)) continue;

    if (TEXT_NODE in entry) {
      nodes.push({ kind: "text", value: String(entry[TEXT_NODE]) });
      continue;
    }

    const tagName = Object.keys(entry).find((k) => k !== ATTRS_NODE);
    if (tagName === undefined) continue;

    nodes.push({
      kind: "element",
      tagName,
      attributes: toAttributes(entry[ATTRS_NODE]),
      children: toNodes(entry[tagName]),
    });
  }

  return nodes;
}

function toAttributes(raw: unknown): Record<string, string> {
  const attrs: Record<string, string> = {};
  if (!isRecord(raw)) return attrs;
  for (const [name, value] of Object.entries(raw)) {
    setEntry(attrs, name, String(value));
  }
  return attrs;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
