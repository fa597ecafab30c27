import { ProxyAgent, fetch as undiciFetch } from "undici";
import { config } from "../config";
import { FetchError } from "../errors";
import type { TransportResponse } from "./fetcher";

// Headers desktop Chrome sends on a top-level navigation
export const BROWSER_HEADERS: Record<string, string> = {
  Accept:
    "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
  "Cache-Control": "no-cache",
  Pragma: "no-cache",
  "Sec-Fetch-Dest": "document",
  "Sec-Fetch-Mode": "navigate",
  "Sec-Fetch-Site": "none",
  "Sec-Fetch-User": "?1",
  "Upgrade-Insecure-Requests": "1",
};

const DNS_ERROR_CODES = new Set(["ENOTFOUND", "EAI_AGAIN", "EAI_NODATA", "EAI_NONAME"]);
const TIMEOUT_ERROR_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

function getProxyDispatcher(): ProxyAgent | undefined {
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  if (!proxyUrl) return undefined;
  return new ProxyAgent(proxyUrl);
}

/**
 * Single GET through undici. Transport-level failures (timeout, DNS, refused
 * connection) reject with a FetchError; any HTTP status resolves and is
 * judged by the caller.
 */
export async function fetchPage(
  url: string,
  options: { timeoutMs?: number } = {}
): Promise<TransportResponse> {
  const { timeoutMs = config.fetchTimeoutMs } = options;

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const fetchOptions: Parameters<typeof undiciFetch>[1] = {
      headers: {
        ...BROWSER_HEADERS,
        "User-Agent": config.getRandomUserAgent(),
      },
      redirect: "follow",
      signal: controller.signal,
      dispatcher: getProxyDispatcher(),
    };

    const response = await undiciFetch(url, fetchOptions);
    const html = await response.text();

    return {
      status: response.status,
      html,
      finalUrl: response.url || url,
    };
  } catch (error: unknown) {
    throw classifyNetworkError(error, url, timeoutMs);
  } finally {
    clearTimeout(timeout);
  }
}

export function classifyNetworkError(error: unknown, url: string, timeoutMs: number): FetchError {
  if (error instanceof FetchError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const code = errorCode(error);

  if (
    (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")) ||
    (code && TIMEOUT_ERROR_CODES.has(code))
  ) {
    return new FetchError("TIMEOUT", url, `Timed out after ${timeoutMs}ms fetching ${url}`);
  }
  if (code && DNS_ERROR_CODES.has(code)) {
    return new FetchError("DNS", url, `DNS lookup failed for ${url} (${code})`);
  }
  return new FetchError("HTTP_ERROR", url, `Request failed for ${url}: ${message}`, {
    context: code ? { code } : undefined,
  });
}

/** undici wraps socket errors, so the errno code usually sits on `cause`. */
function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("code" in error && typeof error.code === "string") return error.code;
  if ("cause" in error) return errorCode(error.cause);
  return undefined;
}
