import type { KeyPath } from "../types/internal.js";
import type { Lookup, ResultMap } from "../types/result.js";
import { ATTRIBUTES_KEY, TEXT_KEY } from "../core/vocabulary.js";
import { getEntry, isResultMap, setEntry } from "./entries.js";

export type DotPath = string;

export function splitPath(path: DotPath | KeyPath): KeyPath {
  return typeof path === "string" ? path.split(".").filter(Boolean) : path;
}

/**
 * Follow a dot-path (or KeyPath) through a ResultMap.
 * An empty path resolves to the map itself.
 */
export function lookupPath(map: ResultMap, path: DotPath | KeyPath): Lookup {
  let cur: ResultMap = map;
  const parts = splitPath(path);

  for (let i = 0; i < parts.length; i++) {
    const v = getEntry(cur, parts[i]!);
    if (v === undefined) return { kind: "absent" };
    if (!isResultMap(v)) {
      return i === parts.length - 1 ? { kind: "leaf", value: v } : { kind: "absent" };
    }
    cur = v;
  }

  return { kind: "node", value: cur };
}

/** `getText(r, "eveapi.currentTime")` reads `eveapi.currentTime.text`. */
export function getText(map: ResultMap, path: DotPath | KeyPath): string | undefined {
  const r = lookupPath(map, [...splitPath(path), TEXT_KEY]);
  return r.kind === "leaf" ? r.value : undefined;
}

/** String-valued attributes recorded for `path`; undefined when there are none. */
export function getAttributes(
  map: ResultMap,
  path: DotPath | KeyPath,
): Record<string, string> | undefined {
  const r = lookupPath(map, [...splitPath(path), ATTRIBUTES_KEY]);
  if (r.kind !== "node") return undefined;

  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(r.value)) {
    if (typeof v === "string") setEntry(out, k, v);
  }
  return out;
}
