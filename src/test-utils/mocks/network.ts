/**
 * Mock network operations for testing
 */

import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import type { FetchFn } from "../../checkers/http";

/**
 * fetch that answers every request with `status`
 */
export function respondWith(status: number): FetchFn {
  return async () => new Response(status === 204 ? null : "body", { status });
}

/**
 * Error shaped like the one fetch() throws for socket and DNS failures
 */
export function fetchFailure(code: string): TypeError {
  const cause = Object.assign(new Error(`connect ${code}`), { code });
  return new TypeError("fetch failed", { cause });
}

/**
 * Error shaped like the one fetch() rejects with when its signal aborts
 */
export function abortError(): Error {
  return Object.assign(new Error("This operation was aborted"), { name: "AbortError" });
}

export function rejectWith(error: unknown): FetchFn {
  return async () => {
    throw error;
  };
}

/**
 * fetch that never answers and rejects with an AbortError once its signal aborts
 */
export const hangingFetch: FetchFn = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    signal.addEventListener(
      "abort",
      () => reject(abortError()),
      { once: true },
    );
  });

/**
 * fetch that waits `ms` (or until aborted) before answering with `status`
 */
export function delayedFetch(ms: number, status = 200): FetchFn {
  return (_input, init) =>
    new Promise<Response>((resolve, reject) => {
      const timeoutHandle = setTimeout(() => resolve(new Response(null, { status })), ms);
      init?.signal?.addEventListener(
        "abort",
        () => {
          clearTimeout(timeoutHandle);
          reject(abortError());
        },
        { once: true },
      );
    });
}

export interface TestServer {
  url: string;
  port: number;
  close(): Promise<void>;
}

/**
 * Start an in-process HTTP server on an ephemeral loopback port
 */
export async function startTestServer(
  handler: (req: IncomingMessage, res: ServerResponse) => void,
): Promise<TestServer> {
  const server = createServer(handler);

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Test server is not listening on a TCP port");
  }
  const { port } = address;

  return {
    url: `http://127.0.0.1:${port}`,
    port,
    close: () =>
      new Promise<void>((resolve) => {
        server.closeAllConnections();
        server.close(() => resolve());
      }),
  };
}

/**
 * A loopback port with nothing listening on it
 */
export async function findClosedPort(): Promise<number> {
  const server = await startTestServer((_req, res) => res.end());
  await server.close();
  return server.port;
}
