import type { ElementNode, KeyPath } from "../types/internal.js";
import type { ResultMap } from "../types/result.js";
import { getAttribute, setEntry } from "../utils/entries.js";
import { ConversionError } from "./Errors.js";
import { mapWithPath } from "./PathMap.js";

/**
 * Turn
 *
 *   <rowset name="characters" key="characterID">
 *     <row name="hcydo" characterID="499939401" />
 *   </rowset>
 *
 * into `{ ...path: { "499939401": { name: "hcydo", characterID: "499939401" } } }`.
 *
 * Rows are read in document order; a later row with the same key value
 * replaces the earlier row as a whole. Attribute values stay raw strings.
 * Every element child counts as a row, whatever its tag.
 */
export function convertRowset(
  rowset: ElementNode,
  path: KeyPath,
  keyAttribute: string,
): ResultMap {
  const rows: ResultMap = {};
  let count = 0;

  for (const child of rowset.children) {
    if (child.kind !== "element") continue;

    const keyValue = getAttribute(child.attributes, keyAttribute);
    if (keyValue === undefined) {
      throw new ConversionError(
        "MALFORMED_ROWSET",
        `Row <${child.tagName}> in rowset '${path.join(".")}' has no '${keyAttribute}' attribute`,
        path,
      );
    }

    const row: ResultMap = {};
    for (const [name, value] of Object.entries(child.attributes)) {
      setEntry(row, name, value);
    }
    setEntry(rows, keyValue, row);
    count++;
  }

  // a rowset without rows contributes nothing, not even an empty map
  return count === 0 ? {} : mapWithPath(path, rows);
}
