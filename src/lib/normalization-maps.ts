import { DealerCategory } from "./types";

// ===== Name Rejection =====
// Navigation labels and widget headings that strategies sometimes pick up as names

export const INVALID_NAMES = new Set([
  "locations",
  "our locations",
  "all locations",
  "view all locations",
  "find a location",
  "saved",
  "community news",
  "essential cookies",
  "sales",
  "service",
  "parts",
  "service phone:",
  "parts phone:",
  "sales phone:",
  "directions",
  "get directions",
  "hours",
  "contact us",
  "about us",
  "home",
]);

// Corporate and administrative entries that are not storefronts
export const NON_DEALER_PATTERNS: RegExp[] = [
  /\bcorporate\b/i,
  /\bheadquarters\b/i,
  /\bhead office\b/i,
  /\bhq\b/i,
  /\bcareers?\b/i,
  /\binvestor relations\b/i,
  /\bprivacy\b/i,
  /\bcookies?\b/i,
  /\bterms of (?:use|service)\b/i,
];

// Marketing copy that ends up in heading slots
export const DESCRIPTIVE_PATTERNS: RegExp[] = [
  /\b(?:treat|needs?|customers?|concerns?|expectations?|standards?|demonstrate|about)\b/i,
  /\bwelcome to\b/i,
  /\bgroup description\b/i,
  /\bour mission\b/i,
];

export const MAX_NAME_LENGTH = 80;
export const MAX_STREET_LENGTH = 100;

// ===== Corporate Suffixes =====
// Normalized in place, never removed from the display name

export const CORPORATE_SUFFIX_PATTERN =
  /(,?\s+)(l\.?l\.?p\.?|l\.?l\.?c\.?|l\.?p\.?|inc\.?|corp\.?|co\.?|ltd\.?)$/i;

export const CORPORATE_SUFFIX_MAP: Record<string, string> = {
  llp: "LLP",
  llc: "LLC",
  lp: "LP",
  inc: "Inc.",
  corp: "Corp.",
  co: "Co.",
  ltd: "Ltd.",
};

// ===== Website Tracking Parameters =====

export const TRACKING_PARAMS = new Set([
  "gclid",
  "fbclid",
  "msclkid",
  "mc_cid",
  "mc_eid",
  "_ga",
  "_gl",
  "yclid",
]);

export const TRACKING_PARAM_PREFIXES = ["utm_"];

// ===== Category Keywords =====
// Checked in order; the first category with a keyword in the name wins

export const CATEGORY_KEYWORDS: [DealerCategory, string[]][] = [
  [
    DealerCategory.COLLISION,
    ["collision", "body shop", "autobody", "auto body", "collision center", "body repair"],
  ],
  [
    DealerCategory.FIXED_OPS,
    ["service", "quick lane", "express service", "maintenance", "tire", "tires", "lube", "parts center"],
  ],
  [
    DealerCategory.USED,
    ["used", "pre-owned", "preowned", "certified pre-owned", "auto sales", "car sales", "auto outlet"],
  ],
];
