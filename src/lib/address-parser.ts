import { lookupRegion, isCanadianRegion, type RegionInfo } from "./regions";

export interface ParsedAddress {
  street: string;
  city: string;
  region: string;
  postalCode: string | null;
  country: string;
  diagnostics: string[];
}

interface Segments {
  street: string;
  city: string;
  region: RegionInfo;
  postal: string | null;
}

// ===== Patterns =====

const POSTAL_SOURCE = String.raw`\d[\d-]{2,9}|[A-Za-z]\d[A-Za-z][ -]?\d[A-Za-z]\d`;
const TRAILING_POSTAL = new RegExp(`^(.*?)[,\\s]+(${POSTAL_SOURCE})$`);
const POSTAL_ONLY = new RegExp(`^(?:${POSTAL_SOURCE})$`);
const TRAILING_COUNTRY =
  /[,\s]+(?:USA|U\.S\.A\.?|US|U\.S\.|United States(?: of America)?|Canada)\.?$/i;
const COUNTRY_ONLY = /^(?:USA|U\.S\.A\.?|US|U\.S\.|United States(?: of America)?|Canada)\.?$/i;

const US_POSTAL = /^\d{5}(?:-\d{4})?$/;
const CA_POSTAL = /^[A-Z]\d[A-Z] \d[A-Z]\d$/;
const CA_POSTAL_LOOSE = /^([A-Za-z]\d[A-Za-z])[ -]?(\d[A-Za-z]\d)$/;

const STREET_TYPES = [
  "street", "st", "avenue", "ave", "boulevard", "blvd", "highway", "hwy",
  "lane", "ln", "drive", "dr", "road", "rd", "parkway", "pkwy", "expressway",
  "expy", "court", "ct", "place", "pl", "circle", "cir", "terrace", "ter",
  "way", "pike", "freeway", "fwy", "trail", "trl", "plaza", "square", "sq",
].join("|");

// "<street ending in a street type, optional unit> <city>"
const INLINE_STREET_CITY = new RegExp(
  `^(.*\\b(?:${STREET_TYPES})\\.?(?:\\s+(?:suite|ste|unit|apt|#)\\s*[\\w-]+)?)\\s+([A-Za-z][A-Za-z .'-]*)$`,
  "i"
);

const STREET_ABBREVIATIONS = new Map<string, string>([
  ["street", "St"],
  ["avenue", "Ave"],
  ["boulevard", "Blvd"],
  ["highway", "Hwy"],
  ["lane", "Ln"],
  ["drive", "Dr"],
  ["road", "Rd"],
  ["parkway", "Pkwy"],
  ["expressway", "Expy"],
  ["court", "Ct"],
  ["place", "Pl"],
  ["circle", "Cir"],
  ["terrace", "Ter"],
]);

const UNIT_WORD = /^(?:suite|ste|unit|apt|bldg|building|floor|fl)\b|^#/i;
const DIRECTIONAL_WORD = /^(?:n|s|e|w|ne|nw|se|sw|north|south|east|west)\.?,?$/i;
const ROUTE_NUMBER = /^\d+[a-z]?,?$/i;

const ABBREVIATION_PERIOD = /\b(St|Ave|Blvd|Hwy|Ln|Dr|Rd|Pkwy|Expy|Ct|Pl|Cir|Ter)\./g;

// ===== Public API =====

/**
 * Split free-form address text into street / city / region / postal code.
 *
 * Tries, in order: comma-delimited "street, city, ST zip", a newline-delimited
 * block ending in a "city, ST zip" line, and an inline form with no comma
 * between street and city. Returns null when no street + region pair can be
 * found. An invalid postal code is kept verbatim and reported in `diagnostics`.
 */
export function parseAddress(text: string): ParsedAddress | null {
  const normalized = text
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/\r/g, "")
    .replace(/[ \t\u00a0]+/g, " ")
    .trim();
  if (!normalized) return null;

  const lines = normalized
    .split("\n")
    .map((l) => l.trim())
    .filter(Boolean);

  let segments: Segments | null;
  if (lines.length === 1) {
    segments = parseCommaDelimited(lines[0]) ?? parseInline(lines[0]);
  } else {
    segments =
      parseLineBlock(lines) ??
      parseCommaDelimited(lines.join(", ")) ??
      parseInline(lines.join(" "));
  }
  if (!segments) return null;

  return finalize(segments);
}

/**
 * Abbreviates the street type only ("500 Court Street" → "500 Court St"),
 * never a type word that is part of the street's name.
 */
export function normalizeStreet(street: string): string {
  const words = street.replace(/\s+/g, " ").trim().split(" ");
  const typeIndex = streetTypeIndex(words);
  if (typeIndex >= 1) words[typeIndex] = abbreviateStreetType(words[typeIndex]);

  return words
    .join(" ")
    .replace(ABBREVIATION_PERIOD, "$1")
    .replace(/^[\s,;:.]+|[\s,;:]+$/g, "")
    .replace(/\.$/, "");
}

// Last word, or the word before a unit, a trailing directional or a route number
function streetTypeIndex(words: readonly string[]): number {
  let end = words.findIndex((word, i) => i > 0 && UNIT_WORD.test(word));
  if (end === -1) end = words.length;
  if (end > 2 && DIRECTIONAL_WORD.test(words[end - 1])) end--;
  if (end > 2 && ROUTE_NUMBER.test(words[end - 1]) && streetTypeOf(words[end - 2])) end--;
  return end - 1;
}

function streetTypeOf(word: string): string | undefined {
  const m = word.match(/^([A-Za-z]+)\W*$/);
  return m ? STREET_ABBREVIATIONS.get(m[1].toLowerCase()) : undefined;
}

function abbreviateStreetType(word: string): string {
  const abbr = streetTypeOf(word);
  return abbr ? word.replace(/^[A-Za-z]+/, abbr) : word;
}

export function formatPostalCode(raw: string): string {
  const trimmed = raw.trim();
  const ca = trimmed.match(CA_POSTAL_LOOSE);
  if (ca) return `${ca[1]} ${ca[2]}`.toUpperCase();
  return trimmed;
}

export function isValidPostalCode(postal: string, regionCode: string): boolean {
  return isCanadianRegion(regionCode) ? CA_POSTAL.test(postal) : US_POSTAL.test(postal);
}

// ===== Patterns, in priority order =====

function parseCommaDelimited(line: string): Segments | null {
  let parts = stripCountry(line)
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
  if (parts.length < 2) return null;

  // "street, city, ST, 78701"
  if (parts.length >= 4 && POSTAL_ONLY.test(parts[parts.length - 1])) {
    parts = [
      ...parts.slice(0, -2),
      `${parts[parts.length - 2]} ${parts[parts.length - 1]}`,
    ];
  }

  const n = parts.length;
  const { rest, postal } = splitPostal(parts[n - 1]);

  const region = lookupRegion(rest);
  if (region && n >= 3) {
    return {
      street: parts.slice(0, n - 2).join(", "),
      city: parts[n - 2],
      region,
      postal,
    };
  }

  // "street, city ST 78701"
  const cityRegion = splitCityRegion(rest);
  if (cityRegion && !/\d/.test(cityRegion.city)) {
    return {
      street: parts.slice(0, n - 1).join(", "),
      city: cityRegion.city,
      region: cityRegion.region,
      postal,
    };
  }
  return null;
}

function parseLineBlock(input: string[]): Segments | null {
  const lines = [...input];
  if (lines.length > 1 && COUNTRY_ONLY.test(lines[lines.length - 1])) lines.pop();

  for (let i = lines.length - 1; i >= 0; i--) {
    const whole = parseCommaDelimited(lines[i]);
    if (whole && /\d/.test(whole.street)) return whole;

    if (i === 0) break;
    const { rest, postal } = splitPostal(stripCountry(lines[i]));
    const cityRegion = splitCityRegion(rest);
    if (!cityRegion || /\d/.test(cityRegion.city)) continue;

    // Street runs from the nearest line that starts with a house number
    let start = i - 1;
    for (let k = i - 1; k >= 0; k--) {
      if (/^\d/.test(lines[k])) {
        start = k;
        break;
      }
    }
    return {
      street: lines.slice(start, i).join(" "),
      city: cityRegion.city,
      region: cityRegion.region,
      postal,
    };
  }
  return null;
}

function parseInline(line: string): Segments | null {
  const { rest, postal } = splitPostal(stripCountry(line));

  const candidates: { before: string; region: RegionInfo }[] = [];
  const lastComma = rest.lastIndexOf(",");
  if (lastComma > 0) {
    const region = lookupRegion(rest.slice(lastComma + 1));
    if (region) candidates.push({ before: rest.slice(0, lastComma).trim(), region });
  } else {
    const split = splitCityRegion(rest);
    if (split) candidates.push({ before: split.city, region: split.region });
  }

  for (const { before, region } of candidates) {
    const m = before.match(INLINE_STREET_CITY);
    if (m) return { street: m[1], city: m[2], region, postal };
  }
  return null;
}

// ===== Helpers =====

function stripCountry(text: string): string {
  return text.replace(TRAILING_COUNTRY, "").trim();
}

function splitPostal(text: string): { rest: string; postal: string | null } {
  const m = text.trim().match(TRAILING_POSTAL);
  if (!m) return { rest: text.trim(), postal: null };
  return { rest: m[1].replace(/[,\s]+$/, ""), postal: m[2] };
}

/** "Salt Lake City UT" or "Salt Lake City, UT" → city + region. */
function splitCityRegion(text: string): { city: string; region: RegionInfo } | null {
  const lastComma = text.lastIndexOf(",");
  if (lastComma > 0) {
    const region = lookupRegion(text.slice(lastComma + 1));
    const city = text.slice(0, lastComma).trim();
    return region && city ? { city, region } : null;
  }

  const words = text.split(" ").filter(Boolean);
  // Longest region name first, so "West Virginia" beats "Virginia"
  for (let k = Math.min(4, words.length - 1); k >= 1; k--) {
    const region = lookupRegion(words.slice(-k).join(" "));
    if (region) return { city: words.slice(0, -k).join(" "), region };
  }
  return null;
}

function finalize(segments: Segments): ParsedAddress | null {
  const street = normalizeStreet(segments.street);
  const city = segments.city.replace(/\s+/g, " ").replace(/^[\s,;:.]+|[\s,;:.]+$/g, "");
  if (!street || !city) return null;

  const diagnostics: string[] = [];
  let postalCode: string | null = null;
  if (segments.postal) {
    postalCode = formatPostalCode(segments.postal);
    if (!isValidPostalCode(postalCode, segments.region.code)) {
      diagnostics.push(
        `postal code "${postalCode}" is not valid for ${segments.region.code}; kept as-is`
      );
    }
  }

  return {
    street,
    city,
    region: segments.region.code,
    postalCode,
    country: segments.region.country,
    diagnostics,
  };
}
