import fs from "fs";
import { lookupPath, normalizeXml } from "../../src/index.js";

// offline: convert a saved /account/Characters response
const xml = fs.readFileSync(new URL("./Characters.xml", import.meta.url), "utf-8");
const result = normalizeXml(xml);

const characters = lookupPath(result, "eveapi.result.characters");
if (characters.kind === "node") {
  for (const [id, row] of Object.entries(characters.value)) {
    if (typeof row === "string") continue;
    console.log(`${id}: ${String(row.name)} (${String(row.corporationName)})`);
  }
}
