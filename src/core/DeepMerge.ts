import type { ResultMap } from "../types/result.js";
import { getEntry, isResultMap, setEntry } from "../utils/entries.js";

/**
 * Fold `src` into `dst`. Unlike Object.assign, sub-maps present on both sides
 * are merged key by key; any other collision is won by `src`.
 *
 *   deepMerge({ a: { b: "1" } }, { a: { c: "2" } })  -> { a: { b: "1", c: "2" } }
 *   deepMerge({ a: "x" }, { a: { b: "1" } })         -> { a: { b: "1" } }
 *
 * `dst` is mutated and returned, so it must be an accumulator the caller owns.
 * Maps from `src` are copied in, never shared.
 */
export function deepMerge(dst: ResultMap, src: ResultMap): ResultMap {
  for (const [key, incoming] of Object.entries(src)) {
    if (isResultMap(incoming)) {
      const existing = getEntry(dst, key);
      const target = isResultMap(existing) ? existing : {};
      setEntry(dst, key, deepMerge(target, incoming));
    } else {
      setEntry(dst, key, incoming);
    }
  }
  return dst;
}
