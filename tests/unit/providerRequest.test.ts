import { errorForStatus, requestJson, toSafeRequestUrl } from "../../src/infrastructure/http/providerRequest";
import {
  RateLimitedError,
  RetryableTransportError,
  TerminalClientError
} from "../../src/shared/errors/provider.errors";
import { AbortedError } from "../../src/shared/retry/retry";
import { sendJson, startServer, type TestServer } from "../support/testServer";

describe("requestJson", () => {
  let server: TestServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it("returns the parsed body and forwards headers", async () => {
    let seenHeader: string | undefined;
    server = await startServer((req, res) => {
      seenHeader = req.headers["user-agent"];
      sendJson(res, 200, { ok: 1 });
    });

    const body = await requestJson({
      provider: "Discogs",
      url: new URL(`${server.baseUrl}/ping`),
      headers: { "User-Agent": "TestAgent/1.0" },
      timeoutMs: 1000
    });

    expect(body).toEqual({ ok: 1 });
    expect(seenHeader).toBe("TestAgent/1.0");
  });

  it("turns a slow answer into a retryable timeout", async () => {
    server = await startServer(() => undefined);

    const err = await requestJson({
      provider: "Discogs",
      url: new URL(`${server.baseUrl}/slow`),
      timeoutMs: 50
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RetryableTransportError);
    expect(err).toMatchObject({ message: "Discogs request timeout after 50ms", isTimeout: true });
  });

  it("maps a 429 with Retry-After onto RateLimitedError", async () => {
    server = await startServer((_req, res) => {
      res.writeHead(429, { "retry-after": "7" });
      res.end("slow down");
    });

    const err = await requestJson({ provider: "Discogs", url: new URL(server.baseUrl), timeoutMs: 1000 }).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(RateLimitedError);
    expect(err).toMatchObject({ status: 429, retryAfterMs: 7000 });
  });

  it("rejects an unparseable body as terminal", async () => {
    server = await startServer((_req, res) => {
      res.writeHead(200, { "content-type": "application/json" });
      res.end("{not json");
    });

    await expect(
      requestJson({ provider: "Last.fm", url: new URL(server.baseUrl), timeoutMs: 1000 })
    ).rejects.toThrow(new TerminalClientError("Last.fm response is not valid JSON", { provider: "Last.fm" }));
  });

  it("reports an outer abort as AbortedError rather than a timeout", async () => {
    server = await startServer(() => undefined);
    const controller = new AbortController();

    const pending = requestJson({
      provider: "Discogs",
      url: new URL(server.baseUrl),
      timeoutMs: 5000,
      signal: controller.signal
    });
    setTimeout(() => controller.abort(), 20);

    await expect(pending).rejects.toBeInstanceOf(AbortedError);
  });

  it("never puts the response body into the error", async () => {
    server = await startServer((_req, res) => {
      res.writeHead(400, { "content-type": "text/plain" });
      res.end("secret-body-content");
    });

    const err = await requestJson({ provider: "Discogs", url: new URL(server.baseUrl), timeoutMs: 1000 }).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(TerminalClientError);
    expect(err).toMatchObject({ message: "Discogs request failed: 400", status: 400 });
  });
});

describe("errorForStatus", () => {
  it.each([
    { status: 500, type: RetryableTransportError },
    { status: 503, type: RetryableTransportError },
    { status: 400, type: TerminalClientError },
    { status: 404, type: TerminalClientError },
    { status: 429, type: RateLimitedError }
  ])("maps $status", ({ status, type }) => {
    expect(errorForStatus("Discogs", status, "http://x")).toBeInstanceOf(type);
  });

  it("flags 401 and 403 as credential failures", () => {
    const denied = errorForStatus("Discogs", 401, "http://x");
    expect(denied).toBeInstanceOf(TerminalClientError);
    expect(denied).toMatchObject({ isCredentialFailure: true });
    expect(errorForStatus("Discogs", 404, "http://x")).toMatchObject({ isCredentialFailure: false });
  });
});

describe("toSafeRequestUrl", () => {
  it("drops credential parameters and keeps the rest", () => {
    const url = new URL("https://ws.example.test/2.0/?method=user.getrecenttracks&api_key=test-secret&page=2");
    expect(toSafeRequestUrl(url, ["api_key"])).toBe("https://ws.example.test/2.0/?method=user.getrecenttracks&page=2");
  });
});
