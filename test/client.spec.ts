import { describe, it, expect, vi } from "vitest";
import { EveApiMethod } from "../src/client/EveApiMethod.js";
import { EveApiClient } from "../src/client/EveApiClient.js";
import { getMethod } from "../src/methods/catalog.js";
import { silentLogger, type Logger } from "../src/utils/logger.js";
import type { Transport } from "../src/client/transport.js";
import { stubTransport } from "./helpers.js";

const SERVER_STATUS_XML = `<?xml version='1.0' encoding='UTF-8'?>
<eveapi version="2">
  <currentTime>2011-08-30 22:36:14</currentTime>
  <result>
    <serverOpen>True</serverOpen>
    <onlinePlayers>30356</onlinePlayers>
  </result>
  <cachedUntil>2011-08-30 22:37:24</cachedUntil>
</eveapi>`;

const SERVER_STATUS_MAP = {
  eveapi: {
    attributes: { version: "2" },
    currentTime: { text: "2011-08-30 22:36:14" },
    result: { serverOpen: { text: "True" }, onlinePlayers: { text: "30356" } },
    cachedUntil: { text: "2011-08-30 22:37:24" },
  },
};

function method(name: string): EveApiMethod {
  const m = getMethod(name);
  if (!m) throw new Error(`missing catalog entry ${name}`);
  return m;
}

describe("EveApiMethod.composeUrl", () => {
  it("appends the query only when there are parameters", () => {
    expect(method("ACCOUNT_CHARACTERS").composeUrl({ key: "value" })).toBe(
      "/account/Characters.xml.aspx?key=value",
    );
    expect(method("SERVER_STATUS").composeUrl()).toBe("/server/ServerStatus.xml.aspx");
  });

  it("form-encodes values in insertion order", () => {
    const m = new EveApiMethod("/char/WalletJournal");
    expect(m.composeUrl({ keyID: 12345, vCode: "a b&c", full: true })).toBe(
      "/char/WalletJournal.xml.aspx?keyID=12345&vCode=a+b%26c&full=true",
    );
  });
});

describe("EveApiMethod.send", () => {
  it("GETs over https and converts the body", async () => {
    const { transport, urls } = stubTransport({ status: 200, body: SERVER_STATUS_XML });
    const res = await new EveApiMethod("/server/ServerStatus").send(
      {},
      { apiHome: "api.test", transport, logger: silentLogger },
    );

    expect(urls).toEqual(["https://api.test/server/ServerStatus.xml.aspx"]);
    expect(res).toEqual({ ok: true, value: SERVER_STATUS_MAP });
  });

  it("uses the method's own host and plain http when asked", async () => {
    const { transport, urls } = stubTransport({ status: 200, body: "<eveapi/>" });
    const custom = new EveApiMethod("/api/CustomMethodName", "example.com");
    await custom.send(
      { param1: "value1", param2: "value2" },
      { apiHome: "ignored.test", useHttps: false, transport, logger: silentLogger },
    );
    expect(urls).toEqual(["http://example.com/api/CustomMethodName.xml.aspx?param1=value1&param2=value2"]);
  });

  it("returns the raw XML alongside the map", async () => {
    const { transport } = stubTransport({ status: 200, body: SERVER_STATUS_XML });
    const res = await method("SERVER_STATUS").send(
      {},
      { apiHome: "api.test", transport, logger: silentLogger, returnXml: true },
    );
    expect(res).toEqual({ ok: true, value: SERVER_STATUS_MAP, raw: SERVER_STATUS_XML });
  });

  it("logs the outgoing request", async () => {
    const { transport } = stubTransport({ status: 200, body: SERVER_STATUS_XML });
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    await new EveApiMethod("/server/ServerStatus").send({}, { apiHome: "api.test", transport, logger });
    expect(logger.info).toHaveBeenCalledWith(
      "Sending request to EVE API (api.test) server: /server/ServerStatus",
    );
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

describe("EveApiClient.request", () => {
  function client(reply: Parameters<typeof stubTransport>[0]) {
    const stub = stubTransport(reply);
    return {
      urls: stub.urls,
      client: new EveApiClient({ apiHome: "api.test", transport: stub.transport, logger: silentLogger }, {}),
    };
  }

  it("resolves catalog names", async () => {
    const { client: c, urls } = client({ status: 200, body: SERVER_STATUS_XML });
    const res = await c.request("SERVER_STATUS");
    expect(urls).toEqual(["https://api.test/server/ServerStatus.xml.aspx"]);
    expect(res.ok).toBe(true);
    if (res.ok) expect(res.value).toEqual(SERVER_STATUS_MAP);
  });

  it("passes parameters through", async () => {
    const { client: c, urls } = client({ status: 200, body: "<eveapi/>" });
    await c.request(method("EVE_CHARACTER_INFO"), { characterID: 499939401 });
    expect(urls).toEqual(["https://api.test/eve/CharacterInfo.xml.aspx?characterID=499939401"]);
  });

  it("unknown catalog name", async () => {
    const { client: c, urls } = client({ status: 200, body: "<eveapi/>" });
    const res = await c.request("NOT_A_METHOD");
    expect(urls).toEqual([]);
    expect(res).toEqual({
      ok: false,
      error: {
        code: "UNKNOWN_METHOD",
        message: "Unknown API method: NOT_A_METHOD",
        details: undefined,
        method: undefined,
      },
    });
  });

  it("non-200 status is an HTTP_STATUS_ERROR", async () => {
    const { client: c } = client({ status: 503, statusText: "Service Unavailable", body: "down" });
    const res = await c.request("SERVER_STATUS");
    expect(res).toEqual({
      ok: false,
      error: {
        code: "HTTP_STATUS_ERROR",
        message:
          "GET https://api.test/server/ServerStatus.xml.aspx answered 503 Service Unavailable",
        details: { status: 503 },
        method: "/server/ServerStatus",
      },
    });
  });

  it("connection failures are NETWORK_ERROR", async () => {
    const { client: c } = client({ networkError: "connect ECONNREFUSED 127.0.0.1:443" });
    const res = await c.request("SERVER_STATUS");
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.code).toBe("NETWORK_ERROR");
      expect(res.error.message).toBe(
        "GET https://api.test/server/ServerStatus.xml.aspx failed: connect ECONNREFUSED 127.0.0.1:443",
      );
    }
  });

  it("malformed XML is a PARSE_ERROR and keeps the raw body", async () => {
    const { client: c } = client({ status: 200, body: "<eveapi><result></eveapi>" });
    const res = await c.request("SERVER_STATUS", {}, { returnXml: true });
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.code).toBe("PARSE_ERROR");
      expect(res.raw).toBe("<eveapi><result></eveapi>");
    }
  });

  it("a rowset without key is a MALFORMED_RESPONSE and no map is returned", async () => {
    const body = '<eveapi><result><rowset name="characters"><row characterID="1"/></rowset></result></eveapi>';
    const { client: c } = client({ status: 200, body });
    const res = await c.request("ACCOUNT_CHARACTERS", { keyID: 1, vCode: "test-secret" });
    expect(res).toEqual({
      ok: false,
      error: {
        code: "MALFORMED_RESPONSE",
        message: "<rowset> under 'eveapi.result' is missing its 'key' attribute",
        details: { reason: "MALFORMED_ROWSET", path: "eveapi.result" },
        method: "/account/Characters",
      },
    });
  });

  it("a document past the parser's nesting cap is a PARSE_ERROR, not a rejection", async () => {
    const body = "<a>".repeat(300) + "x" + "</a>".repeat(300);
    const { client: c } = client({ status: 200, body });
    const res = await c.request("SERVER_STATUS");
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.code).toBe("PARSE_ERROR");
  });

  it("one level past the default depth limit is a MALFORMED_RESPONSE", async () => {
    const body = "<a>".repeat(257) + "x" + "</a>".repeat(257);
    const { client: c } = client({ status: 200, body });
    const res = await c.request("SERVER_STATUS");
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.code).toBe("MALFORMED_RESPONSE");
      expect(res.error.details?.reason).toBe("DEPTH_EXCEEDED");
    }
  });

  it("honours a custom maxDepth", async () => {
    const stub = stubTransport({ status: 200, body: "<a><b><c><d><e><f>x</f></e></d></c></b></a>" });
    const shallow = new EveApiClient(
      { apiHome: "api.test", transport: stub.transport, logger: silentLogger, maxDepth: 5 },
      {},
    );
    const res = await shallow.request("SERVER_STATUS");
    expect(res).toEqual({
      ok: false,
      error: {
        code: "MALFORMED_RESPONSE",
        message: "Document nesting exceeds 5 levels at 'a.b.c.d.e.f'",
        details: { reason: "DEPTH_EXCEEDED", path: "a.b.c.d.e.f" },
        method: "/server/ServerStatus",
      },
    });
  });

  it("a custom transport throwing a plain Error is a NETWORK_ERROR", async () => {
    const failing: Transport = {
      get: async () => {
        throw new Error("boom");
      },
    };
    const c = new EveApiClient({ apiHome: "api.test", transport: failing, logger: silentLogger }, {});
    const res = await c.request("SERVER_STATUS");
    expect(res).toEqual({
      ok: false,
      error: {
        code: "NETWORK_ERROR",
        message: "GET https://api.test/server/ServerStatus.xml.aspx failed: boom",
        details: undefined,
        method: "/server/ServerStatus",
      },
    });
  });
});
