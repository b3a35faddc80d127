import { childLogger } from "../lib/logger";
import type { CheckedStatus } from "../types/monitor";

const logger = childLogger("probe");

export const DEFAULT_PROBE_TIMEOUT_SECONDS = 10;
export const DEFAULT_USER_AGENT = "SitePulse/1.0";

export type ProbeReason =
  | "HTTP_OK"
  | `HTTP_${number}`
  | "TIMEOUT"
  | "CONNECTION_REFUSED"
  | "DNS_NXDOMAIN"
  | "TLS_ERROR"
  | "INVALID_URL"
  | "ERROR";

export interface ProbeResult {
  state: CheckedStatus;
  latencyMs: number;
  reason: ProbeReason;
  message: string;
}

/**
 * One bounded-time liveness check of a URL. Never rejects.
 */
export type Probe = (url: string, timeoutSeconds: number) => Promise<ProbeResult>;

export type FetchFn = typeof fetch;

export interface ProbeOptions {
  fetch?: FetchFn;
  userAgent?: string;
}

const TLS_CODE_PATTERN =
  /^(CERT_|ERR_TLS_|ERR_SSL_|UNABLE_TO_|DEPTH_ZERO_SELF_SIGNED_CERT|SELF_SIGNED_CERT_IN_CHAIN|HOSTNAME_MISMATCH)/;

/**
 * Find the first string `code` on an error or along its `cause` chain.
 * fetch() wraps socket errors as `TypeError: fetch failed` with the real code on the cause.
 */
export function findErrorCode(error: unknown): string | undefined {
  let current: unknown = error;

  for (let depth = 0; depth < 5; depth++) {
    if (typeof current !== "object" || current === null) return undefined;
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    current = "cause" in current ? current.cause : undefined;
  }

  return undefined;
}

function isAbortError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

/**
 * Collapse any fetch failure into a down result
 */
export function classifyFetchError(
  error: unknown,
  timeoutSeconds: number,
  latencyMs: number,
): ProbeResult {
  if (isAbortError(error)) {
    return {
      state: "down",
      latencyMs: Math.round(timeoutSeconds * 1000),
      reason: "TIMEOUT",
      message: `Request timeout after ${timeoutSeconds}s`,
    };
  }

  const code = findErrorCode(error);

  switch (code) {
    case "ECONNREFUSED":
      return { state: "down", latencyMs, reason: "CONNECTION_REFUSED", message: "Connection refused" };
    case "ENOTFOUND":
    case "EAI_AGAIN":
      return { state: "down", latencyMs, reason: "DNS_NXDOMAIN", message: "DNS resolution failed" };
    case "ETIMEDOUT":
    case "UND_ERR_CONNECT_TIMEOUT":
    case "UND_ERR_HEADERS_TIMEOUT":
      return { state: "down", latencyMs, reason: "TIMEOUT", message: "Connection timeout" };
    case "ERR_INVALID_URL":
      return { state: "down", latencyMs, reason: "INVALID_URL", message: "Invalid URL" };
    default:
      break;
  }

  if (code && TLS_CODE_PATTERN.test(code)) {
    return { state: "down", latencyMs, reason: "TLS_ERROR", message: `TLS error: ${code}` };
  }

  return {
    state: "down",
    latencyMs,
    reason: "ERROR",
    message: error instanceof Error ? error.message : "Unknown error",
  };
}

/**
 * Create an HTTP prober with an injectable fetch (for testing)
 */
export function createProbe(options: ProbeOptions = {}): Probe {
  const fetchFn = options.fetch ?? fetch;
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;

  return async (url, timeoutSeconds) => {
    if (url.trim() === "") {
      return { state: "down", latencyMs: 0, reason: "INVALID_URL", message: "No URL configured" };
    }

    const startTime = Date.now();
    const controller = new AbortController();
    const timeoutHandle = setTimeout(() => controller.abort(), timeoutSeconds * 1000);

    try {
      const response = await fetchFn(url, {
        method: "GET",
        headers: { "User-Agent": userAgent },
        redirect: "follow",
        signal: controller.signal,
      });
      const latencyMs = Date.now() - startTime;

      // Only the status matters; release the connection without reading the body
      if (response.body) {
        response.body.cancel().catch((error: unknown) => {
          logger.debug({ url, error }, "Failed to discard probe response body");
        });
      }

      // Redirects are already followed; any final status below 400 counts as reachable
      if (response.status >= 400) {
        const reason: ProbeReason = `HTTP_${response.status}`;
        return {
          state: "down",
          latencyMs,
          reason,
          message: `HTTP ${response.status} received`,
        };
      }

      return {
        state: "up",
        latencyMs,
        reason: "HTTP_OK",
        message: `HTTP ${response.status} OK`,
      };
    } catch (error) {
      const result = classifyFetchError(error, timeoutSeconds, Date.now() - startTime);
      if (result.reason === "ERROR") {
        logger.warn({ url, error }, "HTTP probe failed with error");
      }
      return result;
    } finally {
      clearTimeout(timeoutHandle);
    }
  };
}
