import { parseAddress } from "./address-parser";
import { BrandIdentifier } from "./brand-identifier";
import { CanonicalRecord, DealerCategory, RawRecord, StrategyTier } from "./types";
import {
  INVALID_NAMES,
  NON_DEALER_PATTERNS,
  DESCRIPTIVE_PATTERNS,
  MAX_NAME_LENGTH,
  MAX_STREET_LENGTH,
  CORPORATE_SUFFIX_PATTERN,
  CORPORATE_SUFFIX_MAP,
  TRACKING_PARAMS,
  TRACKING_PARAM_PREFIXES,
  CATEGORY_KEYWORDS,
} from "./normalization-maps";

export interface NormalizeContext {
  dealerGroup?: string;
  /** Site is known to sell a single brand, so unlabeled rooftops are franchised. */
  singleBrand?: boolean;
  strategyTier?: StrategyTier;
  /** Rejection and parser notes are appended here. */
  diagnostics?: string[];
}

/**
 * Turn one strategy output into a canonical location, or null when the record
 * is not a real storefront or its address cannot be parsed.
 */
export function normalizeRecord(
  raw: RawRecord,
  context: NormalizeContext = {}
): CanonicalRecord | null {
  const diagnostics = context.diagnostics;

  const name = normalizeName(raw.name);
  const rejection = nonDealerReason(name);
  if (rejection) {
    diagnostics?.push(`[normalize] rejected "${truncate(name)}": ${rejection}`);
    return null;
  }

  const address = parseAddress(raw.rawAddress);
  if (!address) {
    diagnostics?.push(
      `[normalize] rejected "${truncate(name)}": unparseable address "${truncate(raw.rawAddress)}"`
    );
    return null;
  }
  for (const note of address.diagnostics) {
    diagnostics?.push(`[normalize] "${truncate(name)}": ${note}`);
  }

  if (isMangledStreet(address.street)) {
    diagnostics?.push(`[normalize] rejected "${truncate(name)}": mangled street`);
    return null;
  }

  const website = raw.website ? normalizeWebsite(raw.website) : null;
  const brandTags = new BrandIdentifier(name).tags;

  return {
    name,
    dealerGroup: context.dealerGroup?.trim() ?? "",
    street: address.street,
    city: address.city,
    region: address.region,
    postalCode: address.postalCode,
    country: address.country,
    phone: raw.phone ? normalizePhone(raw.phone) : null,
    website,
    websiteDomain: website ? websiteDomain(website) : null,
    brandTags,
    category: inferCategory(name, brandTags, context.singleBrand ?? false),
    sourceUrl: raw.sourceUrl,
    strategyName: raw.strategyName,
    strategyTier: context.strategyTier ?? StrategyTier.GENERIC,
  };
}

/** Serialize a canonical record back into strategy output form. */
export function toRawRecord(record: CanonicalRecord): RawRecord {
  return {
    name: record.name,
    rawAddress: formatAddress(record),
    phone: record.phone ?? undefined,
    website: record.website ?? undefined,
    sourceUrl: record.sourceUrl,
    strategyName: record.strategyName,
  };
}

export function formatAddress(
  record: Pick<CanonicalRecord, "street" | "city" | "region" | "postalCode">
): string {
  const postal = record.postalCode ? ` ${record.postalCode}` : "";
  return `${record.street}, ${record.city}, ${record.region}${postal}`;
}

// ===== Names =====

export function normalizeName(raw: string): string {
  const collapsed = raw
    .replace(/[\u200b\u200c\u200d\ufeff\u00ad]/g, "")
    .replace(/\s+/g, " ")
    .replace(/^[\s\-–—|:,.•*]+/, "")
    .replace(/[\s\-–—|:,•*]+$/, "")
    .trim();

  return collapsed.replace(
    CORPORATE_SUFFIX_PATTERN,
    (_match, separator: string, suffix: string) => {
      const key = suffix.toLowerCase().replace(/\./g, "");
      return `${separator}${CORPORATE_SUFFIX_MAP[key] ?? suffix}`;
    }
  );
}

/** Name with any trailing corporate suffix removed, for identity comparison. */
export function stripCorporateSuffix(name: string): string {
  return name.replace(CORPORATE_SUFFIX_PATTERN, "").trim();
}

export function nonDealerReason(name: string): string | null {
  if (!name) return "empty name";
  if (name.length > MAX_NAME_LENGTH) return "name too long";

  const lower = name.toLowerCase();
  if (INVALID_NAMES.has(lower)) return "navigation label";
  if (NON_DEALER_PATTERNS.some((p) => p.test(name))) return "corporate or administrative entry";
  if (DESCRIPTIVE_PATTERNS.some((p) => p.test(name))) return "descriptive text";
  return null;
}

function isMangledStreet(street: string): boolean {
  if (street.length > MAX_STREET_LENGTH) return true;
  return /directions/i.test(street) && street.includes(",");
}

// ===== Contact Details =====

const PHONE_PATTERN = /(?:\+?1[-.\s]?)?\(?(\d{3})\)?[-.\s]?(\d{3})[-.\s]?(\d{4})(?!\d)/;

export function normalizePhone(raw: string): string | null {
  const m = raw.match(PHONE_PATTERN);
  if (!m) return null;
  return `(${m[1]}) ${m[2]}-${m[3]}`;
}

/**
 * Absolute http(s) URL with tracking parameters and fragment removed.
 * Bare domains ("smithford.com") are accepted; relative paths are not.
 */
export function normalizeWebsite(raw: string): string | null {
  let candidate = raw.trim();
  if (!candidate || candidate.startsWith("#") || candidate.startsWith("/")) return null;
  if (!/^https?:\/\//i.test(candidate)) {
    if (!/^[\w-]+(?:\.[\w-]+)+(?:[/?]|$)/.test(candidate)) return null;
    candidate = `https://${candidate}`;
  }

  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    return null;
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") return null;

  for (const key of [...url.searchParams.keys()]) {
    const lower = key.toLowerCase();
    if (TRACKING_PARAMS.has(lower) || TRACKING_PARAM_PREFIXES.some((p) => lower.startsWith(p))) {
      url.searchParams.delete(key);
    }
  }
  url.hash = "";
  return url.toString();
}

export function websiteDomain(website: string): string | null {
  try {
    return new URL(website).hostname.toLowerCase().replace(/^www\./, "") || null;
  } catch {
    return null;
  }
}

// ===== Category =====

export function inferCategory(
  name: string,
  brandTags: readonly string[],
  singleBrand: boolean
): DealerCategory {
  const lower = name.toLowerCase();
  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    // "Sales & Service" names a full storefront
    if (category === DealerCategory.FIXED_OPS && containsWord(lower, "sales")) continue;
    if (keywords.some((kw) => containsWord(lower, kw))) return category;
  }
  if (brandTags.length > 0 || singleBrand) return DealerCategory.FRANCHISED;
  return DealerCategory.UNKNOWN;
}

function containsWord(haystack: string, word: string): boolean {
  let from = 0;
  for (;;) {
    const idx = haystack.indexOf(word, from);
    if (idx === -1) return false;
    const before = idx === 0 ? "" : haystack[idx - 1];
    const after = haystack[idx + word.length] ?? "";
    if (!/[a-z0-9]/.test(before) && !/[a-z0-9]/.test(after)) return true;
    from = idx + 1;
  }
}

function truncate(text: string, max = 60): string {
  const flat = text.replace(/\s+/g, " ");
  return flat.length > max ? `${flat.slice(0, max)}…` : flat;
}
