import type { KeyPath } from "../types/internal.js";
import type { ResultMap, ResultValue } from "../types/result.js";
import { setEntry } from "../utils/entries.js";
import { ConversionError } from "./Errors.js";

/**
 * Build a map holding `value` under the nested key path.
 *
 *   mapWithPath(["key1", "key2"], "v")  -> { key1: { key2: "v" } }
 *
 * The path itself is left untouched.
 */
export function mapWithPath(path: KeyPath, value: ResultValue): ResultMap {
  if (path.length === 0) {
    throw new ConversionError("EMPTY_KEY_PATH", "Cannot build a map for an empty key path");
  }

  const root: ResultMap = {};
  let cur = root;
  for (let i = 0; i < path.length - 1; i++) {
    const next: ResultMap = {};
    setEntry(cur, path[i]!, next);
    cur = next;
  }
  setEntry(cur, path[path.length - 1]!, value);
  return root;
}
