import type { ResultMap, ResultValue } from "../types/result.js";

export function isResultMap(v: ResultValue | undefined): v is ResultMap {
  return typeof v === "object" && v !== null;
}

/**
 * Keys come straight from tag and attribute names, so they are defined as own
 * properties: a tag called `__proto__` must not reach the prototype setter.
 */
export function setEntry(map: ResultMap, key: string, value: ResultValue): void {
  Object.defineProperty(map, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}

export function getEntry(map: ResultMap, key: string): ResultValue | undefined {
  return Object.prototype.hasOwnProperty.call(map, key) ? map[key] : undefined;
}

export function getAttribute(
  attributes: Readonly<Record<string, string>>,
  name: string,
): string | undefined {
  return Object.prototype.hasOwnProperty.call(attributes, name) ? attributes[name] : undefined;
}
