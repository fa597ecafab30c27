import { chromium, errors, type Browser } from "playwright-core";
import { config } from "../config";
import { FetchError } from "../errors";
import type { TransportResponse } from "./fetcher";

let browser: Browser | null = null;
let launching: Promise<Browser> | null = null;
let exitHandlersInstalled = false;

const LAUNCH_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--no-sandbox",
  "--disable-setuid-sandbox",
  "--disable-dev-shm-usage",
];

const HIDE_WEBDRIVER_SCRIPT =
  "Object.defineProperty(navigator, 'webdriver', { get: () => undefined });";

// Concurrent callers share one in-flight launch
function getBrowser(): Promise<Browser> {
  if (browser && browser.isConnected()) return Promise.resolve(browser);
  launching ??= chromium
    .launch({ headless: true, args: LAUNCH_ARGS })
    .then((launched) => {
      browser = launched;
      launching = null;
      launched.on("disconnected", () => {
        if (browser === launched) browser = null;
      });
      installExitHandlers();
      return launched;
    })
    .catch((error: unknown) => {
      launching = null;
      throw error;
    });
  return launching;
}

/**
 * Render `url` in headless Chromium and return the DOM once the network has
 * gone idle (or the idle wait timed out). Each call gets its own browser
 * context, closed before returning on every path; the Chromium process itself
 * is shared until closeBrowser().
 */
export async function fetchPageWithBrowser(
  url: string,
  options: { timeoutMs?: number; networkIdleTimeoutMs?: number } = {}
): Promise<TransportResponse> {
  const {
    timeoutMs = config.browserTimeoutMs,
    networkIdleTimeoutMs = config.networkIdleTimeoutMs,
  } = options;

  let b: Browser;
  try {
    b = await getBrowser();
  } catch (error) {
    throw new FetchError(
      "RENDER_FAILURE",
      url,
      `Could not launch browser: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const context = await b.newContext({
    userAgent: config.getRandomUserAgent(),
    viewport: { width: 1920, height: 1080 },
    locale: "en-US",
  });

  try {
    await context.addInitScript({ content: HIDE_WEBDRIVER_SCRIPT });
    const page = await context.newPage();

    // Block images, fonts, media for speed (keep CSS, challenge pages may need it)
    await page.route("**/*", (route) => {
      const type = route.request().resourceType();
      if (["image", "font", "media"].includes(type)) {
        return route.abort();
      }
      return route.continue();
    });

    const response = await page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });

    try {
      await page.waitForLoadState("networkidle", { timeout: networkIdleTimeoutMs });
    } catch (error) {
      console.warn(
        `[browser] Network did not go idle within ${networkIdleTimeoutMs}ms for ${url}, reading DOM anyway:`,
        error instanceof Error ? error.message : error
      );
    }

    return {
      status: response?.status() ?? 200,
      html: await page.content(),
      finalUrl: page.url(),
    };
  } catch (error) {
    throw classifyBrowserError(error, url, timeoutMs);
  } finally {
    await context.close().catch((error: unknown) => {
      console.warn(
        `[browser] Failed to close context for ${url}:`,
        error instanceof Error ? error.message : error
      );
    });
  }
}

export function classifyBrowserError(error: unknown, url: string, timeoutMs: number): FetchError {
  if (error instanceof FetchError) return error;
  if (error instanceof errors.TimeoutError) {
    return new FetchError("TIMEOUT", url, `Browser timed out after ${timeoutMs}ms loading ${url}`);
  }
  const message = error instanceof Error ? error.message : String(error);
  if (/ERR_NAME_NOT_RESOLVED|ERR_NAME_RESOLUTION_FAILED/.test(message)) {
    return new FetchError("DNS", url, `DNS lookup failed for ${url} in browser`);
  }
  return new FetchError("RENDER_FAILURE", url, `Browser failed to render ${url}: ${message}`);
}

export async function closeBrowser(): Promise<void> {
  // A failed launch already rejected the fetch that started it
  if (launching) await launching.then(noop, noop);
  if (!browser) return;
  const current = browser;
  browser = null;
  await current.close().catch((error: unknown) => {
    console.warn("[browser] Failed to close browser:", error instanceof Error ? error.message : error);
  });
}

function noop(): void {}

// Clean up on signals once a browser exists
function installExitHandlers(): void {
  if (exitHandlersInstalled) return;
  exitHandlersInstalled = true;

  const handleSignal = (signal: NodeJS.Signals) => {
    void closeBrowser().then(() => process.exit(signal === "SIGINT" ? 130 : 143));
  };
  process.once("SIGINT", handleSignal);
  process.once("SIGTERM", handleSignal);
}
