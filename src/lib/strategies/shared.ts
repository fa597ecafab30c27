/**
 * Shared extraction helpers. Brand- and site-agnostic string transforms
 * composed by the individual strategies.
 */
import * as cheerio from "cheerio";

export const PHONE_PATTERN = /(?:\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}(?!\d)/;

/** "City, ST 12345" anywhere in a line */
export const CITY_STATE_ZIP =
  /([A-Za-z][A-Za-z .'-]*),\s*([A-Za-z]{2})\.?\s+(\d{5}(?:-\d{4})?|[A-Za-z]\d[A-Za-z] ?\d[A-Za-z]\d)\b/;

/** Strip zero-width unicode characters and collapse whitespace */
export function cleanText(s: string | undefined | null): string {
  if (!s) return "";
  return s
    .replace(/[\u200b\u200c\u200d\ufeff\u00ad]/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function extractPhone(text: string | undefined | null): string | undefined {
  if (!text) return undefined;
  return text.match(PHONE_PATTERN)?.[0];
}

/** Phone from a `tel:` href, URL-decoded */
export function phoneFromHref(href: string | undefined): string | undefined {
  if (!href || !/^tel:/i.test(href)) return undefined;
  let decoded = href.replace(/^tel:/i, "");
  try {
    decoded = decodeURIComponent(decoded);
  } catch {
    return extractPhone(decoded);
  }
  return extractPhone(decoded) ?? (cleanText(decoded) || undefined);
}

/** Absolute http(s) URL for a link, or undefined for tel:/mailto:/javascript:/fragments. */
export function absoluteUrl(href: string | undefined, base: string): string | undefined {
  const trimmed = href?.trim();
  if (!trimmed || trimmed.startsWith("#")) return undefined;
  if (/^(?:tel|mailto|javascript|sms):/i.test(trimmed)) return undefined;
  try {
    const url = new URL(trimmed, base);
    return url.protocol === "http:" || url.protocol === "https:" ? url.toString() : undefined;
  } catch {
    return undefined;
  }
}

export function isMapsLink(href: string | undefined): boolean {
  return !!href && /(?:google\.[a-z.]+\/maps|maps\.google\.|maps\.apple\.com|goo\.gl\/maps|bing\.com\/maps)/i.test(href);
}

export function hostOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, "");
  } catch {
    return "";
  }
}

/** Join structured address parts the way AddressParser reads them back. */
export function composeAddress(parts: {
  street?: string;
  city?: string;
  region?: string;
  postalCode?: string;
}): string {
  const street = cleanText(parts.street);
  const city = cleanText(parts.city);
  const regionPostal = [cleanText(parts.region), cleanText(parts.postalCode)]
    .filter(Boolean)
    .join(" ");
  return [street, city, regionPostal].filter(Boolean).join(", ");
}

const BLOCK_TAGS = /<\/(?:p|div|li|h[1-6]|address|tr|dd|dt)>|<br\s*\/?>/gi;

/** Visible text of an HTML fragment, one entry per rendered line. */
export function htmlToLines(html: string | null | undefined): string[] {
  if (!html) return [];
  const $ = cheerio.load(html.replace(BLOCK_TAGS, (m) => `${m}\n`));
  $("script, style, noscript, svg").remove();
  return $.root()
    .text()
    .split("\n")
    .map(cleanText)
    .filter(Boolean);
}

/** Index of the first line holding a "City, ST 12345" fragment, or -1. */
export function findCityStateZipLine(lines: readonly string[]): number {
  return lines.findIndex((line) => CITY_STATE_ZIP.test(line));
}
