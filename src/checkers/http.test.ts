import { afterEach, describe, expect, test, vi } from "vitest";
import {
  abortError,
  delayedFetch,
  fetchFailure,
  findClosedPort,
  hangingFetch,
  rejectWith,
  respondWith,
  startTestServer,
  type TestServer,
} from "../test-utils";
import { classifyFetchError, createProbe, findErrorCode, type FetchFn } from "./http";

describe("createProbe", () => {
  const statusCases = [
    { status: 200, state: "up", reason: "HTTP_OK", message: "HTTP 200 OK" },
    { status: 204, state: "up", reason: "HTTP_OK", message: "HTTP 204 OK" },
    { status: 302, state: "up", reason: "HTTP_OK", message: "HTTP 302 OK" },
    { status: 399, state: "up", reason: "HTTP_OK", message: "HTTP 399 OK" },
    { status: 400, state: "down", reason: "HTTP_400", message: "HTTP 400 received" },
    { status: 404, state: "down", reason: "HTTP_404", message: "HTTP 404 received" },
    { status: 500, state: "down", reason: "HTTP_500", message: "HTTP 500 received" },
    { status: 503, state: "down", reason: "HTTP_503", message: "HTTP 503 received" },
  ];

  for (const { status, state, reason, message } of statusCases) {
    test(`returns ${state} for HTTP ${status}`, async () => {
      const probe = createProbe({ fetch: respondWith(status) });
      const result = await probe("https://example.com/", 10);

      expect(result.state).toBe(state);
      expect(result.reason).toBe(reason);
      expect(result.message).toBe(message);
    });
  }

  test("sends one GET with the client header and follows redirects", async () => {
    const fetchFn = vi.fn<FetchFn>(respondWith(200));
    const probe = createProbe({ fetch: fetchFn, userAgent: "SitePulse/test" });

    await probe("https://example.com/health", 10);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [input, init] = fetchFn.mock.calls[0];
    expect(input).toBe("https://example.com/health");
    expect(init?.method).toBe("GET");
    expect(init?.redirect).toBe("follow");
    expect(init?.headers).toEqual({ "User-Agent": "SitePulse/test" });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  test("uses the default client header", async () => {
    const fetchFn = vi.fn<FetchFn>(respondWith(200));
    await createProbe({ fetch: fetchFn })("https://example.com/", 10);

    expect(fetchFn.mock.calls[0][1]?.headers).toEqual({ "User-Agent": "SitePulse/1.0" });
  });

  const errorCases = [
    { code: "ECONNREFUSED", reason: "CONNECTION_REFUSED", message: "Connection refused" },
    { code: "ENOTFOUND", reason: "DNS_NXDOMAIN", message: "DNS resolution failed" },
    { code: "EAI_AGAIN", reason: "DNS_NXDOMAIN", message: "DNS resolution failed" },
    { code: "UND_ERR_CONNECT_TIMEOUT", reason: "TIMEOUT", message: "Connection timeout" },
    { code: "CERT_HAS_EXPIRED", reason: "TLS_ERROR", message: "TLS error: CERT_HAS_EXPIRED" },
    {
      code: "DEPTH_ZERO_SELF_SIGNED_CERT",
      reason: "TLS_ERROR",
      message: "TLS error: DEPTH_ZERO_SELF_SIGNED_CERT",
    },
    {
      code: "ERR_TLS_CERT_ALTNAME_INVALID",
      reason: "TLS_ERROR",
      message: "TLS error: ERR_TLS_CERT_ALTNAME_INVALID",
    },
    { code: "ECONNRESET", reason: "ERROR", message: "fetch failed" },
  ];

  for (const { code, reason, message } of errorCases) {
    test(`returns down with ${reason} for ${code}`, async () => {
      const probe = createProbe({ fetch: rejectWith(fetchFailure(code)) });
      const result = await probe("https://example.com/", 10);

      expect(result.state).toBe("down");
      expect(result.reason).toBe(reason);
      expect(result.message).toBe(message);
    });
  }

  test("returns down with TIMEOUT when the request outlives the bound", async () => {
    const probe = createProbe({ fetch: hangingFetch });
    const result = await probe("https://example.com/", 0.05);

    expect(result).toEqual({
      state: "down",
      latencyMs: 50,
      reason: "TIMEOUT",
      message: "Request timeout after 0.05s",
    });
  });

  test("answers within the bound even when the response is slower", async () => {
    const probe = createProbe({ fetch: delayedFetch(5_000) });
    const startedAt = Date.now();
    const result = await probe("https://example.com/", 0.05);

    expect(result.reason).toBe("TIMEOUT");
    expect(Date.now() - startedAt).toBeLessThan(1_000);
  });

  test("does not throw for non-Error rejections", async () => {
    const probe = createProbe({ fetch: rejectWith("boom") });
    const result = await probe("https://example.com/", 10);

    expect(result.state).toBe("down");
    expect(result.reason).toBe("ERROR");
    expect(result.message).toBe("Unknown error");
  });

  test("returns down without a request for an empty URL", async () => {
    const fetchFn = vi.fn<FetchFn>(respondWith(200));
    const result = await createProbe({ fetch: fetchFn })("  ", 10);

    expect(fetchFn).not.toHaveBeenCalled();
    expect(result).toEqual({
      state: "down",
      latencyMs: 0,
      reason: "INVALID_URL",
      message: "No URL configured",
    });
  });
});

describe("createProbe against a local server", () => {
  let server: TestServer | null = null;

  afterEach(async () => {
    if (server) {
      await server.close();
      server = null;
    }
  });

  test("returns up and sends the client header", async () => {
    let userAgent: string | undefined;
    server = await startTestServer((req, res) => {
      userAgent = req.headers["user-agent"];
      res.writeHead(200, { "Content-Type": "text/plain" });
      res.end("OK");
    });

    const result = await createProbe({ userAgent: "SitePulse/test" })(`${server.url}/`, 5);

    expect(result.state).toBe("up");
    expect(result.reason).toBe("HTTP_OK");
    expect(userAgent).toBe("SitePulse/test");
  });

  test("follows redirects to the final status", async () => {
    const paths: string[] = [];
    server = await startTestServer((req, res) => {
      paths.push(req.url ?? "");
      if (req.url === "/old") {
        res.writeHead(301, { Location: "/new" });
        res.end();
        return;
      }
      res.writeHead(200);
      res.end("moved here");
    });

    const result = await createProbe()(`${server.url}/old`, 5);

    expect(result.state).toBe("up");
    expect(result.message).toBe("HTTP 200 OK");
    expect(paths).toEqual(["/old", "/new"]);
  });

  test("returns down for a server error", async () => {
    server = await startTestServer((_req, res) => {
      res.writeHead(500);
      res.end("Internal Server Error");
    });

    const result = await createProbe()(`${server.url}/`, 5);

    expect(result.state).toBe("down");
    expect(result.reason).toBe("HTTP_500");
  });

  test("returns down when a redirect ends in a 404", async () => {
    server = await startTestServer((req, res) => {
      if (req.url === "/start") {
        res.writeHead(302, { Location: "/missing" });
        res.end();
        return;
      }
      res.writeHead(404);
      res.end();
    });

    const result = await createProbe()(`${server.url}/start`, 5);

    expect(result.state).toBe("down");
    expect(result.reason).toBe("HTTP_404");
  });

  test("returns down with TIMEOUT for a server that never answers", async () => {
    server = await startTestServer(() => {
      // never respond
    });

    const result = await createProbe()(`${server.url}/`, 0.2);

    expect(result.state).toBe("down");
    expect(result.reason).toBe("TIMEOUT");
  });

  test("returns down with CONNECTION_REFUSED when nothing listens", async () => {
    const port = await findClosedPort();

    const result = await createProbe()(`http://127.0.0.1:${port}/`, 5);

    expect(result.state).toBe("down");
    expect(result.reason).toBe("CONNECTION_REFUSED");
    expect(result.message).toBe("Connection refused");
  });
});

describe("findErrorCode", () => {
  test("reads the code from the error itself", () => {
    const error = Object.assign(new Error("refused"), { code: "ECONNREFUSED" });
    expect(findErrorCode(error)).toBe("ECONNREFUSED");
  });

  test("walks the cause chain", () => {
    const inner = Object.assign(new Error("not found"), { code: "ENOTFOUND" });
    const middle = new Error("lookup failed", { cause: inner });
    const outer = new TypeError("fetch failed", { cause: middle });

    expect(findErrorCode(outer)).toBe("ENOTFOUND");
  });

  test("returns undefined when there is no code", () => {
    expect(findErrorCode(new Error("plain"))).toBeUndefined();
    expect(findErrorCode("not an error")).toBeUndefined();
    expect(findErrorCode(null)).toBeUndefined();
  });
});

describe("classifyFetchError", () => {
  test("reports the configured timeout as latency for aborts", () => {
    const abort = abortError();
    const result = classifyFetchError(abort, 10, 9_999);

    expect(result.reason).toBe("TIMEOUT");
    expect(result.latencyMs).toBe(10_000);
  });

  test("treats TimeoutError like an abort", () => {
    const timeout = Object.assign(new Error("The operation timed out"), { name: "TimeoutError" });
    expect(classifyFetchError(timeout, 3, 0).message).toBe("Request timeout after 3s");
  });

  test("maps invalid URLs", () => {
    const cause = Object.assign(new TypeError("Invalid URL"), { code: "ERR_INVALID_URL" });
    const error = new TypeError("Failed to parse URL from not a url", { cause });

    const result = classifyFetchError(error, 10, 1);
    expect(result.reason).toBe("INVALID_URL");
    expect(result.latencyMs).toBe(1);
  });
});
