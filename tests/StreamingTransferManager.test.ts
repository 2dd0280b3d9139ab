import { jest, describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { once } from "events";
import fs from "fs";
import os from "os";
import path from "path";
import { Readable } from "stream";
import zlib from "zlib";
import { Response } from "node-fetch";
import fetchWithTimeout from "../src/util/fetchWithTimeout";
import { RequestDispatcher } from "../src/services/RequestDispatcher";
import { StreamingTransferManager } from "../src/services/StreamingTransferManager";
import { AuthenticationNegotiator } from "../src/auth/AuthenticationNegotiator";
import { createConfig } from "../src/config";
import { NetworkError, ProtocolError } from "../src/errorHandler";

jest.mock("../src/util/fetchWithTimeout");
jest.mock("../src/util/logger", () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const mockFetch = jest.mocked(fetchWithTimeout);

async function drain(body: unknown): Promise<string> {
  if (!(body instanceof Readable)) return "";
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

describe("StreamingTransferManager", () => {
  let dispatcher: RequestDispatcher;
  let transfers: StreamingTransferManager;
  let workDir: string;

  beforeEach(() => {
    dispatcher = new RequestDispatcher(createConfig({ baseUrl: "http://h/dav/" }), new AuthenticationNegotiator());
    transfers = new StreamingTransferManager(dispatcher);
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "davkit-"));
  });

  afterEach(() => {
    dispatcher.close();
    fs.rmSync(workDir, { recursive: true, force: true });
    jest.clearAllMocks();
  });

  describe("upload", () => {
    it("streams the source and reports progress", async () => {
      let received = "";
      mockFetch.mockImplementationOnce(async (_url, init) => {
        received = await drain(init?.body);
        return new Response("", { status: 201 });
      });
      const progress: Array<[number, number]> = [];

      await transfers.upload("big.bin", Readable.from([Buffer.from("abc"), Buffer.from("de")]), 5, {
        onProgress: (transferred, total) => progress.push([transferred, total]),
      });

      expect(received).toBe("abcde");
      expect(progress).toEqual([
        [3, 5],
        [5, 5],
      ]);
      expect(mockFetch.mock.calls[0][1]?.headers).toEqual(
        expect.objectContaining({ "Content-Length": "5", "Content-Type": "application/octet-stream" })
      );
    });

    it("omits Content-Length for an unknown length", async () => {
      mockFetch.mockImplementationOnce(async (_url, init) => {
        await drain(init?.body);
        return new Response("", { status: 201 });
      });
      await transfers.upload("x", Readable.from(["data"]), -1);
      expect(mockFetch.mock.calls[0][1]?.headers).not.toHaveProperty("Content-Length");
    });

    it("uploads a local file with its MIME type", async () => {
      const source = path.join(workDir, "notes.txt");
      fs.writeFileSync(source, "hello file");
      let received = "";
      mockFetch.mockImplementationOnce(async (_url, init) => {
        received = await drain(init?.body);
        return new Response("", { status: 204 });
      });

      await transfers.uploadFile("notes.txt", source);

      expect(received).toBe("hello file");
      expect(mockFetch.mock.calls[0][1]?.headers).toEqual(
        expect.objectContaining({ "Content-Length": "10", "Content-Type": "text/plain" })
      );
    });

    it("rethrows server rejections", async () => {
      mockFetch.mockResolvedValueOnce(new Response("", { status: 507 }));
      await expect(transfers.upload("x", Readable.from(["data"]), 4)).rejects.toBeInstanceOf(ProtocolError);
    });
  });

  describe("download", () => {
    it("collects the body and reports received bytes", async () => {
      mockFetch.mockResolvedValueOnce(new Response(Readable.from([Buffer.from("hello world")]), { status: 200, headers: { "Content-Length": "11" } }));
      const progress: Array<[number, number]> = [];

      const body = await transfers.downloadBuffer("a.txt", {
        onProgress: (transferred, total) => progress.push([transferred, total]),
      });

      expect(body.toString("utf8")).toBe("hello world");
      expect(progress[progress.length - 1]).toEqual([11, 11]);
    });

    it("writes a decompressed file and counts compressed bytes", async () => {
      const compressed = zlib.gzipSync("payload text");
      mockFetch.mockResolvedValueOnce(
        new Response(Readable.from([compressed]), { status: 200, headers: { "Content-Encoding": "gzip", "Content-Length": String(compressed.length) } })
      );
      const target = path.join(workDir, "out.txt");
      const progress: Array<[number, number]> = [];

      const written = await transfers.downloadToPath("out.txt", target, {
        onProgress: (transferred, total) => progress.push([transferred, total]),
      });

      expect(written).toBe(target);
      expect(fs.readFileSync(target, "utf8")).toBe("payload text");
      expect(progress[progress.length - 1]).toEqual([compressed.length, compressed.length]);
    });

    it("leaves the partial file when the connection drops", async () => {
      const broken = new Readable({ read() {} });
      broken.push("partial");
      setTimeout(() => broken.destroy(new Error("socket hang up")), 50);
      mockFetch.mockResolvedValueOnce(new Response(broken, { status: 200 }));
      const target = path.join(workDir, "partial.bin");

      const error = await transfers.downloadToPath("partial.bin", target).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({ message: "Transfer interrupted during GET: socket hang up", url: "http://h/dav/partial.bin" });
      expect(fs.readFileSync(target, "utf8")).toBe("partial");
    });

    it("stops writing and releases the body when the caller aborts", async () => {
      const live = new Readable({ read() {} });
      live.push("first chunk");
      mockFetch.mockResolvedValueOnce(new Response(live, { status: 200 }));
      const controller = new AbortController();
      const target = path.join(workDir, "aborted.bin");

      const error = await transfers
        .downloadToPath("aborted.bin", target, { signal: controller.signal, onProgress: () => controller.abort() })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({ message: "Transfer aborted during GET", url: "http://h/dav/aborted.bin" });
      expect(live.destroyed).toBe(true);
    });

    it("destroys an open download stream when the caller aborts", async () => {
      const live = new Readable({ read() {} });
      live.push("first chunk");
      mockFetch.mockResolvedValueOnce(new Response(live, { status: 200 }));
      const controller = new AbortController();

      const stream = await transfers.download("live.bin", { signal: controller.signal });
      const failed = once(stream, "error");
      controller.abort();
      const [error] = await failed;

      expect(error).toMatchObject({ name: "AbortError" });
      expect(stream.destroyed).toBe(true);
      expect(live.destroyed).toBe(true);
    });

    it("rethrows local file errors as they are", async () => {
      mockFetch.mockResolvedValueOnce(new Response(Readable.from([Buffer.from("data")]), { status: 200 }));
      const target = path.join(workDir, "no-such-dir", "out.bin");

      const error = await transfers.downloadToPath("out.bin", target).catch((caught: unknown) => caught);

      expect(error).not.toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({ code: "ENOENT", syscall: "open" });
    });

    it("raises the server error before any file is written", async () => {
      mockFetch.mockResolvedValueOnce(new Response("nope", { status: 404 }));
      const target = path.join(workDir, "missing.bin");

      await expect(transfers.downloadToPath("missing.bin", target)).rejects.toBeInstanceOf(ProtocolError);
      expect(fs.existsSync(target)).toBe(false);
    });
  });
});
