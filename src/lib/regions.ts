import regionTable from "./data/regions.json";

export const US_COUNTRY = "United States of America";
export const CANADA_COUNTRY = "Canada";

export interface RegionInfo {
  code: string;
  name: string;
  country: string;
}

const byCode = new Map<string, RegionInfo>();
const byName = new Map<string, RegionInfo>();

for (const [country, regions] of Object.entries(regionTable)) {
  for (const [code, name] of Object.entries(regions)) {
    const info: RegionInfo = { code, name, country };
    byCode.set(code, info);
    byName.set(name.toLowerCase(), info);
  }
}

/**
 * Resolve a state/province code or full name ("TX", "tx", "Texas", "N.Y.")
 * against the closed US/Canada table.
 */
export function lookupRegion(raw: string): RegionInfo | null {
  const cleaned = raw.replace(/\./g, "").replace(/\s+/g, " ").trim();
  if (!cleaned) return null;
  if (cleaned.length === 2) return byCode.get(cleaned.toUpperCase()) ?? null;
  return byName.get(cleaned.toLowerCase()) ?? null;
}

export function countryForRegion(code: string): string | null {
  return byCode.get(code.toUpperCase())?.country ?? null;
}

export function isCanadianRegion(code: string): boolean {
  return countryForRegion(code) === CANADA_COUNTRY;
}
