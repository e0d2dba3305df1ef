import http from "http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { ControllerRequestError } from "../src/dataset/errors";
import { HttpResourceFetcher } from "../src/utility/httpFetcher";
import { close, listen } from "./listen";

describe("HttpResourceFetcher", () => {
  const seen: { url?: string; authorization?: string }[] = [];
  const server = http.createServer((req, res) => {
    seen.push({ url: req.url, authorization: req.headers.authorization });
    if (req.url === "/rw/system" || req.url === "/rws/rw/system") {
      res.writeHead(200, { "Content-Type": "application/xhtml+xml" });
      res.end("<html><body>ok</body></html>");
    } else if (req.url === "/rw/slow") {
      // never answers; the request is aborted by the client
    } else {
      res.writeHead(404);
      res.end();
    }
  });
  let baseUrl = "";

  beforeAll(async () => {
    baseUrl = await listen(server);
  });

  afterAll(async () => {
    await close(server);
  });

  it("returns the response body and sends credentials", async () => {
    const fetcher = new HttpResourceFetcher({
      baseUrl,
      username: "operator",
      password: "test-secret",
    });

    const body = await fetcher.fetch("/rw/system", new AbortController().signal);

    expect(body).toBe("<html><body>ok</body></html>");
    expect(seen.at(-1)).toEqual({
      url: "/rw/system",
      authorization: `Basic ${Buffer.from("operator:test-secret").toString("base64")}`,
    });
  });

  it("omits the Authorization header without a username", async () => {
    const fetcher = new HttpResourceFetcher({ baseUrl });
    await fetcher.fetch("/rw/system", new AbortController().signal);
    expect(seen.at(-1)?.authorization).toBeUndefined();
  });

  it("keeps the path prefix of the base URL", async () => {
    const fetcher = new HttpResourceFetcher({ baseUrl: `${baseUrl}/rws/` });
    const body = await fetcher.fetch("/rw/system", new AbortController().signal);

    expect(body).toBe("<html><body>ok</body></html>");
    expect(seen.at(-1)?.url).toBe("/rws/rw/system");
  });

  it("rejects on a non-2xx status", async () => {
    const fetcher = new HttpResourceFetcher({ baseUrl });
    const attempt = fetcher.fetch("/rw/missing", new AbortController().signal);

    await expect(attempt).rejects.toBeInstanceOf(ControllerRequestError);
    await expect(attempt).rejects.toThrow("Request to /rw/missing failed with HTTP 404");
  });

  it("rejects when the signal aborts", async () => {
    const fetcher = new HttpResourceFetcher({ baseUrl });
    const controller = new AbortController();
    const attempt = fetcher.fetch("/rw/slow", controller.signal);
    setTimeout(() => controller.abort(), 20);

    await expect(attempt).rejects.toBeInstanceOf(ControllerRequestError);
  });
});
