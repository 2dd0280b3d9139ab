import { jest, describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import fs from "fs";
import os from "os";
import path from "path";
import { Readable } from "stream";
import { Response } from "node-fetch";
import fetchWithTimeout from "../src/util/fetchWithTimeout";
import { WebDAVClient } from "../src/services/WebDAVClient";
import { WebDAVReport } from "../src/models/WebDAVReport";
import { MalformedResponseError } from "../src/errorHandler";

jest.mock("../src/util/fetchWithTimeout");
jest.mock("../src/util/logger", () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const mockFetch = jest.mocked(fetchWithTimeout);

const ok = (status = 200, body = "", headers: Record<string, string> = {}) => new Response(body, { status, headers });

const sent = (call: number) => {
  const [url, init] = mockFetch.mock.calls[call];
  return { url, method: init?.method, headers: init?.headers, body: init?.body === undefined ? undefined : String(init.body) };
};

const LISTING = `<D:multistatus xmlns:D="DAV:">
  <D:response>
    <D:href>/dav/</D:href>
    <D:propstat><D:prop><D:resourcetype><D:collection/></D:resourcetype></D:prop><D:status>HTTP/1.1 200 OK</D:status></D:propstat>
  </D:response>
  <D:response>
    <D:href>/dav/a.txt</D:href>
    <D:propstat><D:prop><D:getcontentlength>3</D:getcontentlength><D:resourcetype/></D:prop><D:status>HTTP/1.1 200 OK</D:status></D:propstat>
  </D:response>
</D:multistatus>`;

describe("WebDAVClient", () => {
  let client: WebDAVClient;

  beforeEach(() => {
    client = WebDAVClient.create({ baseUrl: "http://h/dav/" });
  });

  afterEach(() => {
    client.shutdown();
    jest.clearAllMocks();
  });

  describe("configuration", () => {
    it("starts from the given base URL and no authentication", () => {
      expect(client.getBaseUrl()).toBe("http://h/dav/");
      expect(client.getAuthState().mode).toBe("none");
      expect(client.isCompressionEnabled()).toBe(false);
    });

    it("applies credentials passed to create", () => {
      const authed = WebDAVClient.create({ baseUrl: "http://h/", username: "u", password: "test-secret", preemptive: true });
      expect(authed.headersFor("x").Authorization).toBe(`Basic ${Buffer.from("u:test-secret").toString("base64")}`);
      authed.shutdown();
    });

    it("enables and disables compression idempotently", () => {
      client.enableCompression();
      client.enableCompression();
      expect(client.headersFor("a")["Accept-Encoding"]).toBe("gzip, deflate");
      client.disableCompression();
      client.disableCompression();
      expect(client.isCompressionEnabled()).toBe(false);
      expect(client.headersFor("a")).not.toHaveProperty("Accept-Encoding");
    });
  });

  describe("listing", () => {
    it("lists a collection with allprop at depth 1", async () => {
      mockFetch.mockResolvedValueOnce(ok(207, LISTING));

      const resources = await client.list("/");

      expect(resources.map((resource) => [resource.href, resource.isDirectory, resource.contentLength])).toEqual([
        ["/dav/", true, -1],
        ["/dav/a.txt", false, 3],
      ]);
      const request = sent(0);
      expect(request.method).toBe("PROPFIND");
      expect(request.headers).toEqual(expect.objectContaining({ Depth: "1", "Content-Type": "application/xml; charset=utf-8" }));
      expect(request.body).toContain("<D:allprop/>");
    });

    it("always asks for resourcetype with named properties", async () => {
      mockFetch.mockResolvedValueOnce(ok(207, LISTING));
      await client.listWithProps("/", 0, ["getetag"]);
      expect(sent(0).body).toContain("    <D:getetag/>\n    <D:resourcetype/>");
      expect(sent(0).headers).toEqual(expect.objectContaining({ Depth: "0" }));
    });

    it("uses the common property set when allprop is off", async () => {
      mockFetch.mockResolvedValueOnce(ok(207, LISTING));
      await client.listWithAllProp("/", -1, false);
      expect(sent(0).body).toContain("<D:lockdiscovery/>");
      expect(sent(0).headers).toEqual(expect.objectContaining({ Depth: "infinity" }));
    });

    it("collects property names per resource", async () => {
      mockFetch.mockResolvedValueOnce(
        ok(
          207,
          `<D:multistatus xmlns:D="DAV:" xmlns:Z="urn:example:props"><D:response><D:href>/dav/a.txt</D:href><D:propstat><D:prop><D:getetag/><Z:color/></D:prop><D:status>HTTP/1.1 200 OK</D:status></D:propstat></D:response></D:multistatus>`
        )
      );

      const names = await client.listPropertyNames("a.txt");

      expect([...names.entries()]).toEqual([["/dav/a.txt", ["getetag", "color"]]]);
      expect(sent(0).body).toContain("<D:propname/>");
      expect(sent(0).headers).toEqual(expect.objectContaining({ Depth: "0" }));
    });
  });

  describe("reports", () => {
    it("runs a caller-defined report", async () => {
      mockFetch.mockResolvedValueOnce(ok(207, "<count>4</count>"));
      const countReport: WebDAVReport<number> = {
        toXml: () => "<count-request/>",
        parseResponse: (body) => Number.parseInt(body.replace(/\D/g, ""), 10),
        depth: () => "0",
      };

      expect(await client.report("/", 1, countReport)).toBe(4);
      expect(sent(0).headers).toEqual(expect.objectContaining({ Depth: "0" }));
    });

    it("wraps report parse failures", async () => {
      mockFetch.mockResolvedValueOnce(ok(207, "x"));
      const failing: WebDAVReport<string> = {
        toXml: () => "<r/>",
        parseResponse: () => {
          throw new Error("unexpected shape");
        },
      };
      const error = await client.report("/", 1, failing).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(MalformedResponseError);
      expect(error).toMatchObject({ message: "unexpected shape", method: "REPORT", url: "http://h/dav/" });
    });

    it("sends sync-collection with Depth 0 and the requested level", async () => {
      mockFetch.mockResolvedValueOnce(
        ok(
          207,
          `<D:multistatus xmlns:D="DAV:"><D:response><D:href>/dav/old.txt</D:href><D:status>HTTP/1.1 404 Not Found</D:status></D:response><D:sync-token>tok-2</D:sync-token></D:multistatus>`
        )
      );

      const result = await client.syncCollection("/", "tok-1", { depth: -1, limit: 5 });

      expect(result).toEqual({ resources: [], removed: ["/dav/old.txt"], syncToken: "tok-2" });
      expect(sent(0).headers).toEqual(expect.objectContaining({ Depth: "0" }));
      expect(sent(0).body).toContain("<D:sync-level>infinite</D:sync-level>");
      expect(sent(0).body).toContain("<D:nresults>5</D:nresults>");
    });

    it("scopes a basic search to the request path", async () => {
      mockFetch.mockResolvedValueOnce(ok(207, LISTING));
      const found = await client.search("docs/", "davbasic", "invoice");
      expect(found).toHaveLength(2);
      expect(sent(0).method).toBe("SEARCH");
      expect(sent(0).body).toContain("<D:href>/dav/docs/</D:href>");
    });
  });

  describe("content", () => {
    it("uploads bytes with a length and content type", async () => {
      mockFetch.mockResolvedValueOnce(ok(201));
      await client.putWithContentType("a.txt", "héllo", "text/plain");
      expect(sent(0)).toEqual({
        url: "http://h/dav/a.txt",
        method: "PUT",
        headers: expect.objectContaining({ "Content-Type": "text/plain", "Content-Length": "6" }),
        body: "héllo",
      });
    });

    it("sends Expect and If when uploading a file under a lock", async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), "davkit-"));
      const file = path.join(dir, "photo.png");
      fs.writeFileSync(file, Buffer.from([1, 2, 3, 4]));
      mockFetch.mockResolvedValueOnce(ok(204));

      await client.putFileWithLock("photo.png", file, undefined, true, "opaquelocktoken:abc");

      expect(sent(0).headers).toEqual(
        expect.objectContaining({
          "Content-Type": "image/png",
          "Content-Length": "4",
          Expect: "100-continue",
          If: "(<opaquelocktoken:abc>)",
        })
      );
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("returns downloaded bytes", async () => {
      mockFetch.mockResolvedValueOnce(ok(200, "abc"));
      expect((await client.get("a.txt")).toString("utf8")).toBe("abc");
    });

    it("hands the caller's abort signal to streamed transfers", async () => {
      mockFetch
        .mockResolvedValueOnce(new Response(Readable.from([Buffer.from("abc")]), { status: 200 }))
        .mockImplementationOnce(async (_url, init) => {
          const body = init?.body;
          if (body instanceof Readable) body.resume();
          return ok(201);
        });
      const controller = new AbortController();

      const stream = await client.getStream("a.txt", {}, controller.signal);
      stream.resume();
      await client.putStream("b.txt", Readable.from(["xyz"]), 3, "text/plain", undefined, controller.signal);

      expect(mockFetch.mock.calls[0][1]?.signal).toBe(controller.signal);
      expect(mockFetch.mock.calls[1][1]?.signal).toBe(controller.signal);
    });
  });

  describe("namespace", () => {
    it("moves with an absolute Destination and overwrite by default", async () => {
      mockFetch.mockResolvedValueOnce(ok(201));
      await client.move("a.txt", "archive/a.txt");
      expect(sent(0).method).toBe("MOVE");
      expect(sent(0).headers).toEqual(
        expect.objectContaining({ Destination: "http://h/dav/archive/a.txt", Overwrite: "T" })
      );
    });

    it("copies without overwriting when asked", async () => {
      mockFetch.mockResolvedValueOnce(ok(204));
      await client.copyWithOverwrite("a.txt", "http://other/b.txt", false);
      expect(sent(0).headers).toEqual(expect.objectContaining({ Destination: "http://other/b.txt", Overwrite: "F" }));
    });

    it("moves under a lock", async () => {
      mockFetch.mockResolvedValueOnce(ok(201));
      await client.moveWithLock("a.txt", "b.txt", false, "opaquelocktoken:abc");
      expect(sent(0).headers).toEqual(expect.objectContaining({ Overwrite: "F", If: "(<opaquelocktoken:abc>)" }));
    });

    it("creates collections with MKCOL and deletes resources", async () => {
      mockFetch.mockResolvedValueOnce(ok(201)).mockResolvedValueOnce(ok(204));
      await client.createDirectory("new/");
      await client.delete("old.txt");
      expect([sent(0).method, sent(0).url]).toEqual(["MKCOL", "http://h/dav/new/"]);
      expect([sent(1).method, sent(1).url]).toEqual(["DELETE", "http://h/dav/old.txt"]);
    });

    it("reports existence with HEAD", async () => {
      mockFetch
        .mockResolvedValueOnce(ok(200))
        .mockResolvedValueOnce(ok(404))
        .mockRejectedValueOnce(new Error("connect ECONNREFUSED"));

      expect(await client.exists("a.txt")).toBe(true);
      expect(await client.exists("b.txt")).toBe(false);
      expect(await client.exists("c.txt")).toBe(false);
      expect(sent(0).method).toBe("HEAD");
    });

    it("binds into the target's parent collection", async () => {
      mockFetch.mockResolvedValueOnce(ok(201));
      await client.bind("docs/a.txt", "links/alias.txt", true);
      expect(sent(0).url).toBe("http://h/dav/links/");
      expect(sent(0).method).toBe("BIND");
      expect(sent(0).body).toContain("<D:segment>alias.txt</D:segment>");
      expect(sent(0).body).toContain("<D:href>http://h/dav/docs/a.txt</D:href>");
    });

    it("unbinds a segment", async () => {
      mockFetch.mockResolvedValueOnce(ok(200));
      await client.unbind("links/", "alias.txt");
      expect(sent(0).method).toBe("UNBIND");
      expect(sent(0).body).toContain("<D:segment>alias.txt</D:segment>");
    });
  });

  describe("properties", () => {
    it("patches and removes properties", async () => {
      mockFetch.mockResolvedValueOnce(
        ok(
          207,
          `<D:multistatus xmlns:D="DAV:"><D:response><D:href>/dav/a.txt</D:href><D:propstat><D:prop><S:author xmlns:S="SAR:"/></D:prop><D:status>HTTP/1.1 200 OK</D:status></D:propstat></D:response></D:multistatus>`
        )
      );

      const [resource] = await client.patchWithRemove("a.txt", { author: "ann" }, ["draft"]);

      expect(resource.href).toBe("/dav/a.txt");
      expect(sent(0).method).toBe("PROPPATCH");
      expect(sent(0).body).toContain('<S:author xmlns:S="SAR:">ann</S:author>');
      expect(sent(0).body).toContain('<S:draft xmlns:S="SAR:"/>');
    });
  });

  describe("locks", () => {
    it("names the lock owner after the configured user", async () => {
      client.setCredentials("ann", "test-secret");
      mockFetch.mockResolvedValueOnce(ok(200, "", { "Lock-Token": "<opaquelocktoken:1>" }));

      expect(await client.lock("a.txt")).toBe("opaquelocktoken:1");
      expect(sent(0).body).toContain("<D:owner>ann</D:owner>");
      expect(sent(0).headers).toEqual(expect.objectContaining({ Timeout: "Second-3600" }));
    });

    it("falls back to the default owner without credentials", async () => {
      mockFetch.mockResolvedValueOnce(ok(200, "", { "Lock-Token": "<opaquelocktoken:2>" }));
      await client.lockWithTimeout("a.txt", 120);
      expect(sent(0).body).toContain("<D:owner>davkit</D:owner>");
      expect(sent(0).headers).toEqual(expect.objectContaining({ Timeout: "Second-120" }));
    });
  });
});
