import type { ElementNode, KeyPath, ParentNode, XmlDocument } from "../types/internal.js";
import type { ResultMap } from "../types/result.js";
import { getAttribute, setEntry } from "../utils/entries.js";
import { deepMerge } from "./DeepMerge.js";
import { ConversionError } from "./Errors.js";
import { mapWithPath } from "./PathMap.js";
import { convertRowset } from "./RowsetConverter.js";
import {
  ATTRIBUTES_KEY,
  ROWSET_KEY_ATTR,
  ROWSET_NAME_ATTR,
  ROWSET_TAG,
  TEXT_KEY,
} from "./vocabulary.js";

export interface ConvertOptions {
  /** Deepest element nesting accepted before giving up. default: 256 */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 256;

/**
 * Convert the whole document. The root element's tag becomes the first key:
 *
 *   <eveapi version="2"><currentTime>2011-08-30 22:36:14</currentTime></eveapi>
 *
 *   -> { eveapi: { attributes: { version: "2" },
 *                  currentTime: { text: "2011-08-30 22:36:14" } } }
 */
export function convertDocument(doc: XmlDocument, opts: ConvertOptions = {}): ResultMap {
  return convertNode(doc, [], opts);
}

/**
 * Convert the children of `node`, which sits at `path` in the overall tree.
 * Keys in the returned map are absolute (they start at the document root), so
 * the caller merges the result straight into its own accumulator.
 *
 * - non-blank text goes under `path.text` (trimmed)
 * - an element's attributes go under `path.<tag>.attributes`
 * - a rowset's attributes go under `path.attributes` and its rows under
 *   `path.<rowset name>`, keyed by the row key attribute
 * - anything else recurses as `path.<tag>`
 */
export function convertNode(
  node: ParentNode,
  path: KeyPath,
  opts: ConvertOptions = {},
): ResultMap {
  return walk(node, path, 0, opts.maxDepth ?? DEFAULT_MAX_DEPTH);
}

function walk(node: ParentNode, path: KeyPath, depth: number, maxDepth: number): ResultMap {
  if (depth > maxDepth) {
    throw new ConversionError(
      "DEPTH_EXCEEDED",
      `Document nesting exceeds ${maxDepth} levels at '${path.join(".")}'`,
      path,
    );
  }

  const result: ResultMap = {};

  for (const child of node.children) {
    if (child.kind === "text") {
      const text = child.value.trim();
      if (text.length > 0) deepMerge(result, mapWithPath([...path, TEXT_KEY], text));
      continue;
    }

    const attrs = attributesOf(child);

    if (child.tagName === ROWSET_TAG) {
      if (attrs) deepMerge(result, mapWithPath([...path, ATTRIBUTES_KEY], attrs));
      const { name, key } = rowsetHeader(child, path);
      deepMerge(result, convertRowset(child, [...path, name], key));
      continue;
    }

    const childPath = [...path, child.tagName];
    if (attrs) deepMerge(result, mapWithPath([...childPath, ATTRIBUTES_KEY], attrs));
    deepMerge(result, walk(child, childPath, depth + 1, maxDepth));
  }

  return result;
}

function attributesOf(el: ElementNode): ResultMap | undefined {
  const entries = Object.entries(el.attributes);
  if (entries.length === 0) return undefined;

  const attrs: ResultMap = {};
  for (const [name, value] of entries) setEntry(attrs, name, value);
  return attrs;
}

function rowsetHeader(rowset: ElementNode, path: KeyPath): { name: string; key: string } {
  const name = getAttribute(rowset.attributes, ROWSET_NAME_ATTR);
  const key = getAttribute(rowset.attributes, ROWSET_KEY_ATTR);
  if (name === undefined || key === undefined) {
    const missing = name === undefined ? ROWSET_NAME_ATTR : ROWSET_KEY_ATTR;
    throw new ConversionError(
      "MALFORMED_ROWSET",
      `<${ROWSET_TAG}> under '${path.join(".")}' is missing its '${missing}' attribute`,
      path,
    );
  }
  return { name, key };
}
