import { describe, it, expect, vi } from "vitest";
import { extractSitemapLocs, discoverLocationPages } from "../lib/sitemap";
import { FetchError } from "../lib/errors";
import { FetchResult, Transport } from "../lib/types";
import type { PageFetcher } from "../lib/pipeline";
import { Fetcher, type FetchOptions, type PageTransport } from "../lib/scraping/fetcher";

const silent = { log: vi.fn(), warn: vi.fn() };

function urlset(urls: string[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${urls.map((u) => `  <url><loc>${u}</loc></url>`).join("\n")}
</urlset>`;
}

function fakeFetcher(pages: Record<string, string>) {
  const fetch = vi.fn(async (url: string, _options?: FetchOptions): Promise<FetchResult> => {
    const html = pages[url];
    if (html === undefined) throw new FetchError("HTTP_ERROR", url, `HTTP 404 from ${url}`, { status: 404 });
    return { html, finalUrl: url, transportUsed: Transport.LIGHT, fetchedAt: "2026-01-15T10:30:00.000Z" };
  });
  return { fetch } satisfies PageFetcher;
}

describe("extractSitemapLocs", () => {
  it("reads <loc> entries and unescapes ampersands", () => {
    const xml = urlset(["https://a.example/locations/one", "https://a.example/search?make=ford&amp;model=f150"]);
    expect(extractSitemapLocs(xml)).toEqual([
      "https://a.example/locations/one",
      "https://a.example/search?make=ford&model=f150",
    ]);
  });
});

describe("discoverLocationPages", () => {
  it("keeps same-host location pages from the first sitemap that lists URLs", async () => {
    const fetcher = fakeFetcher({
      "https://www.group.example/sitemap.xml": urlset([
        "https://www.group.example/",
        "https://www.group.example/locations/smith-ford",
        "https://group.example/locations/smith-kia",
        "https://www.group.example/location/smith-lincoln/",
        "https://www.elsewhere.example/locations/other",
        "https://www.group.example/locations/smith-ford",
      ]),
    });

    const pages = await discoverLocationPages("https://www.group.example/our-stores", fetcher, { logger: silent });

    expect(pages).toEqual([
      "https://www.group.example/locations/smith-ford",
      "https://group.example/locations/smith-kia",
      "https://www.group.example/location/smith-lincoln/",
    ]);
    expect(fetcher.fetch).toHaveBeenCalledWith("https://www.group.example/sitemap-index.xml", { minBodyBytes: 0 });
  });

  it("follows location sub-sitemaps from the index", async () => {
    const fetcher = fakeFetcher({
      "https://www.group.example/sitemap-index.xml": `<sitemapindex>
        <sitemap><loc>https://www.group.example/sitemap-pages.xml</loc></sitemap>
        <sitemap><loc>https://www.group.example/sitemap-locations.xml</loc></sitemap>
      </sitemapindex>`,
      "https://www.group.example/sitemap-locations.xml": urlset([
        "https://www.group.example/locations/a",
        "https://www.group.example/locations/b",
      ]),
    });

    const pages = await discoverLocationPages("https://www.group.example/", fetcher, { logger: silent });

    expect(pages).toEqual(["https://www.group.example/locations/a", "https://www.group.example/locations/b"]);
    expect(fetcher.fetch).not.toHaveBeenCalledWith("https://www.group.example/sitemap-pages.xml", { minBodyBytes: 0 });
  });

  it("caps the result at the limit", async () => {
    const fetcher = fakeFetcher({
      "https://www.group.example/sitemap-index.xml": urlset(
        Array.from({ length: 10 }, (_, i) => `https://www.group.example/locations/store-${i}`)
      ),
    });

    const pages = await discoverLocationPages("https://www.group.example/", fetcher, { limit: 3, logger: silent });

    expect(pages).toHaveLength(3);
    expect(pages[2]).toBe("https://www.group.example/locations/store-2");
  });

  it("returns nothing when no sitemap can be fetched", async () => {
    const pages = await discoverLocationPages("https://www.group.example/", fakeFetcher({}), { logger: silent });
    expect(pages).toEqual([]);
  });

  it("accepts sitemaps smaller than the HTML page minimum without a browser", async () => {
    const sitemap = urlset([
      "https://www.group.example/locations/smith-ford",
      "https://www.group.example/locations/smith-kia",
    ]);
    const light = vi.fn<PageTransport>(async (url) =>
      url === "https://www.group.example/sitemap-index.xml"
        ? { status: 200, html: sitemap, finalUrl: url }
        : { status: 404, html: "", finalUrl: url }
    );
    const browser = vi.fn<PageTransport>(async (url) => {
      throw new FetchError("RENDER_FAILURE", url, "no browser available");
    });
    const fetcher = new Fetcher({ light, browser, minBodyBytes: 1024, logger: silent });

    const pages = await discoverLocationPages("https://www.group.example/", fetcher, { logger: silent });

    expect(Buffer.byteLength(sitemap, "utf-8")).toBeLessThan(1024);
    expect(pages).toEqual([
      "https://www.group.example/locations/smith-ford",
      "https://www.group.example/locations/smith-kia",
    ]);
    expect(browser).not.toHaveBeenCalled();
  });
});
