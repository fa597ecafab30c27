import { stripCorporateSuffix } from "./normalization";
import { CanonicalRecord, DealerCategory, StrategyTier, TIER_ORDER } from "./types";

// Unit designator and everything after it: "Suite 200", "Ste. B", "Fl 2", "#12"
const UNIT_SUFFIX = /(?:[\s,]+|\b)(?:suite|ste|unit|apt|bldg|building|floor|fl)\b\.?.*$|\s*#.*$/i;

/**
 * Identity of a physical location: corporate-suffix-free name plus the street
 * without unit designators, both case- and punctuation-insensitive.
 */
export function dedupeKey(record: Pick<CanonicalRecord, "name" | "street">): string {
  const name = stripCorporateSuffix(record.name).toLowerCase().replace(/\s+/g, " ").trim();
  const street = record.street
    .toLowerCase()
    .replace(UNIT_SUFFIX, "")
    .replace(/[^a-z0-9]/g, "");
  return `${name}|${street}`;
}

/**
 * Collapse records that describe the same location. The richer record wins
 * (then the better strategy tier, then the earlier record) and the others
 * only fill its missing fields. Output keeps first-seen order.
 */
export function dedupeRecords(records: readonly CanonicalRecord[]): CanonicalRecord[] {
  const groups = new Map<string, CanonicalRecord>();

  for (const record of records) {
    const key = dedupeKey(record);
    const existing = groups.get(key);
    if (!existing) {
      groups.set(key, record);
      continue;
    }
    groups.set(key, mergeRecords(existing, record));
  }

  return [...groups.values()];
}

export function mergeRecords(first: CanonicalRecord, second: CanonicalRecord): CanonicalRecord {
  const [winner, loser] = prefer(first, second) ? [first, second] : [second, first];

  return {
    ...winner,
    postalCode: winner.postalCode ?? loser.postalCode,
    phone: winner.phone ?? loser.phone,
    website: winner.website ?? loser.website,
    websiteDomain: winner.websiteDomain ?? loser.websiteDomain,
    brandTags: winner.brandTags.length > 0 ? winner.brandTags : loser.brandTags,
    category: winner.category !== DealerCategory.UNKNOWN ? winner.category : loser.category,
  };
}

/** True when `a` should win over `b`; ties go to `a`. */
function prefer(a: CanonicalRecord, b: CanonicalRecord): boolean {
  const diff = fieldCount(a) - fieldCount(b);
  if (diff !== 0) return diff > 0;
  return tierRank(a.strategyTier) <= tierRank(b.strategyTier);
}

function fieldCount(record: CanonicalRecord): number {
  let count = 0;
  if (record.postalCode) count++;
  if (record.phone) count++;
  if (record.website) count++;
  if (record.websiteDomain) count++;
  if (record.brandTags.length > 0) count++;
  if (record.category !== DealerCategory.UNKNOWN) count++;
  return count;
}

function tierRank(tier: StrategyTier): number {
  return TIER_ORDER.indexOf(tier);
}
