import { config } from "./config";
import { errorMessage } from "./errors";
import type { PageFetcher } from "./pipeline";

const SITEMAP_PATHS = ["/sitemap-index.xml", "/sitemap.xml", "/sitemap_index.xml"];
const MAX_SUB_SITEMAPS = 10;
// Sitemaps are often far smaller than an HTML page
const XML_FETCH_OPTIONS = { minBodyBytes: 0 };

export function extractSitemapLocs(xml: string): string[] {
  const locs: string[] = [];
  for (const m of xml.matchAll(/<loc>\s*([^<\s]+)\s*<\/loc>/gi)) {
    locs.push(m[1].replace(/&amp;/g, "&"));
  }
  return locs;
}

function isLocationPage(url: string): boolean {
  return /\/locations?\//i.test(url) && !/\.xml(?:\.gz)?$/i.test(url);
}

function isLocationSitemap(url: string): boolean {
  return /\.xml$/i.test(url) && /sitemap/i.test(url) && /location/i.test(url);
}

function sameHost(a: string, b: string): boolean {
  try {
    return new URL(a).hostname.replace(/^www\./, "") === new URL(b).hostname.replace(/^www\./, "");
  } catch {
    return false;
  }
}

/**
 * Location detail pages advertised in the site's sitemap: `<loc>` entries
 * under /location(s)/ plus those of location sub-sitemaps, one level deep.
 * Bounded by `limit`; other sitemap entries are ignored.
 */
export async function discoverLocationPages(
  rootUrl: string,
  fetcher: PageFetcher,
  options: { limit?: number; logger?: Pick<Console, "log" | "warn"> } = {}
): Promise<string[]> {
  const { limit = config.sitemapPageLimit, logger = console } = options;
  const origin = new URL(rootUrl).origin;

  let locs: string[] = [];
  for (const path of SITEMAP_PATHS) {
    const sitemapUrl = `${origin}${path}`;
    try {
      const page = await fetcher.fetch(sitemapUrl, XML_FETCH_OPTIONS);
      locs = extractSitemapLocs(page.html);
    } catch (error) {
      logger.warn(`[sitemap] Could not fetch ${sitemapUrl}: ${errorMessage(error)}`);
      continue;
    }
    if (locs.length > 0) {
      logger.log(`[sitemap] ${sitemapUrl} lists ${locs.length} URLs`);
      break;
    }
  }

  const pages = new Set<string>();
  const addPages = (urls: string[]) => {
    for (const url of urls) {
      if (pages.size >= limit) return;
      if (isLocationPage(url) && sameHost(url, rootUrl)) pages.add(url);
    }
  };

  addPages(locs);

  for (const sub of locs.filter(isLocationSitemap).slice(0, MAX_SUB_SITEMAPS)) {
    if (pages.size >= limit) break;
    try {
      const page = await fetcher.fetch(sub, XML_FETCH_OPTIONS);
      addPages(extractSitemapLocs(page.html));
    } catch (error) {
      logger.warn(`[sitemap] Could not fetch ${sub}: ${errorMessage(error)}`);
    }
  }

  logger.log(`[sitemap] Discovered ${pages.size} location pages for ${origin}`);
  return [...pages];
}
