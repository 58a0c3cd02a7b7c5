import { readFileSync } from "fs";
import { EveApiMethod } from "../client/EveApiMethod.js";

/** Catalog entries live in data/methods.json as `NAME: "/group/Method"`. */
const catalogFile = new URL("../../data/methods.json", import.meta.url);

function loadCatalog(): Readonly<Record<string, string>> {
  const parsed: unknown = JSON.parse(readFileSync(catalogFile, "utf-8"));
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error("methods.json must be an object of NAME -> path");
  }

  const paths: Record<string, string> = {};
  for (const [name, path] of Object.entries(parsed)) {
    if (typeof path !== "string" || !path.startsWith("/")) {
      throw new Error(`methods.json: '${name}' must map to a path starting with '/'`);
    }
    paths[name] = path;
  }
  return Object.freeze(paths);
}

export const METHOD_PATHS = loadCatalog();

export const METHODS: Readonly<Record<string, EveApiMethod>> = Object.freeze(
  Object.fromEntries(
    Object.entries(METHOD_PATHS).map(([name, path]) => [name, new EveApiMethod(path)]),
  ),
);

export function getMethod(name: string): EveApiMethod | undefined {
  return Object.prototype.hasOwnProperty.call(METHODS, name) ? METHODS[name] : undefined;
}

export function listMethods(): string[] {
  return Object.keys(METHODS);
}
