import { createClient, getText, parseEveDateTime } from "../../src/index.js";

const client = createClient({ timeoutMs: 10_000 });
const res = await client.request("SERVER_STATUS", {}, { returnXml: true });

if (!res.ok) {
  console.error(`${res.error.code}: ${res.error.message}`);
  process.exitCode = 1;
} else {
  const players = Number(getText(res.value, "eveapi.result.onlinePlayers"));
  const current = parseEveDateTime(getText(res.value, "eveapi.currentTime"));
  const cachedUntil = parseEveDateTime(getText(res.value, "eveapi.cachedUntil"));

  console.log(`online players: ${players}`);
  if (current && cachedUntil) {
    console.log(`cached for ${(cachedUntil.getTime() - current.getTime()) / 1000}s`);
  }
  // console.log(res.raw);
}
