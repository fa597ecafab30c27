import { config } from "../config";
import { FetchError, errorMessage } from "../errors";
import { FetchResult, Transport } from "../types";
import { captureDebugHtml } from "./debug-capture";
import { fetchPage } from "./http";
import { fetchPageWithBrowser } from "./browser";

export interface TransportResponse {
  status: number;
  html: string;
  finalUrl: string;
}

export type PageTransport = (
  url: string,
  options: { timeoutMs: number }
) => Promise<TransportResponse>;

export interface FetchOptions {
  forceBrowser?: boolean;
  timeoutMs?: number;
  debugCapture?: boolean;
  /** Overrides the fetcher's minimum body size; sitemaps pass 0. */
  minBodyBytes?: number;
}

export interface FetcherOptions {
  light?: PageTransport;
  browser?: PageTransport;
  lightTimeoutMs?: number;
  browserTimeoutMs?: number;
  minBodyBytes?: number;
  knownBlockedDomains?: readonly string[];
  debugDir?: string;
  logger?: Pick<Console, "log" | "warn">;
}

// Markers of interstitial bot-check pages
const CHALLENGE_MARKERS = [
  "cf-browser-verification",
  "cf-chl-bypass",
  "<title>just a moment...</title>",
  "attention required! | cloudflare",
  "px-captcha",
  "_incapsula_resource",
  "request unsuccessful. incapsula incident",
  "<title>access denied</title>",
  "are you a robot",
];

const BLOCKED_STATUSES = new Set([403, 429, 503]);

export function detectChallenge(html: string): string | null {
  const lower = html.toLowerCase();
  return CHALLENGE_MARKERS.find((marker) => lower.includes(marker)) ?? null;
}

/**
 * Page fetcher with a single escalation: light HTTP first, headless browser
 * when the light response is blocked, too small, a challenge page, timed out
 * or unresolvable. Known-blocked hosts and `forceBrowser` skip the light step.
 */
export class Fetcher {
  private readonly light: PageTransport;
  private readonly browser: PageTransport;
  private readonly lightTimeoutMs: number;
  private readonly browserTimeoutMs: number;
  private readonly minBodyBytes: number;
  private readonly knownBlockedDomains: readonly string[];
  private readonly debugDir: string;
  private readonly logger: Pick<Console, "log" | "warn">;

  constructor(options: FetcherOptions = {}) {
    this.light = options.light ?? fetchPage;
    this.browser = options.browser ?? fetchPageWithBrowser;
    this.lightTimeoutMs = options.lightTimeoutMs ?? config.fetchTimeoutMs;
    this.browserTimeoutMs = options.browserTimeoutMs ?? config.browserTimeoutMs;
    this.minBodyBytes = options.minBodyBytes ?? config.minBodyBytes;
    this.knownBlockedDomains = options.knownBlockedDomains ?? config.knownBlockedDomains;
    this.debugDir = options.debugDir ?? config.debugHtmlDir;
    this.logger = options.logger ?? console;
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const browserOnly = options.forceBrowser === true || this.isKnownBlocked(url);
    let lightFailure: FetchError | null = null;

    if (!browserOnly) {
      try {
        const response = await this.light(url, {
          timeoutMs: options.timeoutMs ?? this.lightTimeoutMs,
        });
        return this.accept(url, response, Transport.LIGHT, options);
      } catch (error) {
        lightFailure = toFetchError(error, url, "HTTP_ERROR");
        this.logger.warn(
          `[fetcher] Light fetch failed for ${url} (${lightFailure.reason}): ${lightFailure.message}; retrying with browser`
        );
      }
    } else {
      this.logger.log(
        `[fetcher] Using browser for ${url} (${options.forceBrowser ? "forced" : "known blocked domain"})`
      );
    }

    try {
      const response = await this.browser(url, {
        timeoutMs: options.timeoutMs ?? this.browserTimeoutMs,
      });
      return this.accept(url, response, Transport.BROWSER, options);
    } catch (error) {
      const failure = toFetchError(error, url, "RENDER_FAILURE");
      this.logger.warn(`[fetcher] Browser fetch failed for ${url} (${failure.reason}): ${failure.message}`);
      throw new FetchError(failure.reason, url, failure.message, {
        status: failure.status,
        context: { lightFailure: lightFailure ? lightFailure.reason : "skipped" },
      });
    }
  }

  isKnownBlocked(url: string): boolean {
    let host: string;
    try {
      host = new URL(url).hostname.toLowerCase().replace(/^www\./, "");
    } catch {
      return false;
    }
    return this.knownBlockedDomains.some((d) => host === d || host.endsWith(`.${d}`));
  }

  private accept(
    url: string,
    response: TransportResponse,
    transport: Transport,
    options: FetchOptions
  ): FetchResult {
    if (options.debugCapture) {
      captureDebugHtml(url, response.html, transport, { dir: this.debugDir });
    }

    assertUsable(url, response, transport, options.minBodyBytes ?? this.minBodyBytes);

    return {
      html: response.html,
      finalUrl: response.finalUrl || url,
      transportUsed: transport,
      fetchedAt: new Date().toISOString(),
    };
  }
}

function assertUsable(
  url: string,
  response: TransportResponse,
  transport: Transport,
  minBodyBytes: number
): void {
  const { status, html } = response;

  if (BLOCKED_STATUSES.has(status)) {
    throw new FetchError("BLOCKED", url, `HTTP ${status} from ${url}`, { status });
  }
  if (status < 200 || status >= 300) {
    throw new FetchError("HTTP_ERROR", url, `HTTP ${status} from ${url}`, { status });
  }

  const marker = detectChallenge(html);
  if (marker) {
    throw new FetchError("BLOCKED", url, `Bot challenge page from ${url} ("${marker}")`, {
      status,
    });
  }

  const bytes = Buffer.byteLength(html, "utf-8");
  if (bytes < minBodyBytes) {
    throw new FetchError(
      transport === Transport.LIGHT ? "BLOCKED" : "RENDER_FAILURE",
      url,
      `Response body too small (${bytes} bytes) from ${url}`,
      { status }
    );
  }
}

function toFetchError(
  error: unknown,
  url: string,
  fallback: "HTTP_ERROR" | "RENDER_FAILURE"
): FetchError {
  if (error instanceof FetchError) return error;
  return new FetchError(fallback, url, errorMessage(error));
}
