import * as cheerio from "cheerio";
import { z } from "zod";
import { RawRecord, StrategyTier, type StrategyDescriptor } from "../../types";
import { cleanText, composeAddress } from "../shared";

// Assignments whose right-hand side is a JSON array literal
const ARRAY_ASSIGNMENTS: RegExp[] = [
  /(?:var|let|const)\s+(?:locations|dealers|stores|dealerLocations)\s*=\s*\[/g,
  /window\.(?:dealerData|locations|dealers)\s*=\s*\[/g,
  /\blocationData\s*:\s*\[/g,
];

const FIELD_KEYS = {
  name: ["name", "title", "storeName", "locationName", "dealerName"],
  street: ["address", "street", "streetAddress", "address1"],
  city: ["city", "locality"],
  region: ["state", "province", "region"],
  postalCode: ["zip", "zipCode", "postalCode", "postal"],
  phone: ["phone", "telephone", "phoneNumber", "salesPhone"],
  website: ["url", "website", "link"],
} as const;

const LocationArraySchema = z.array(z.record(z.unknown()));

type LocationObject = Record<string, unknown>;

/**
 * Location arrays dumped into inline scripts by store-locator widgets, e.g.
 * `var dealers = [{"name": ..., "city": ...}];`.
 */
export class ScriptVariablesStrategy implements StrategyDescriptor {
  readonly name = "script-variables";
  readonly tier = StrategyTier.GENERIC;

  canHandle(html: string): boolean {
    return findLocationObjects(html).some(
      (obj) => pick(obj, FIELD_KEYS.name) && (pick(obj, FIELD_KEYS.street) || pick(obj, FIELD_KEYS.city))
    );
  }

  extract(html: string, url: string): RawRecord[] {
    const records: RawRecord[] = [];
    for (const obj of findLocationObjects(html)) {
      const name = pick(obj, FIELD_KEYS.name);
      if (!name) continue;

      const nested = asObject(obj.address);
      const source = nested ? { ...obj, ...nested } : obj;

      records.push({
        name,
        rawAddress: composeAddress({
          street: pick(source, FIELD_KEYS.street),
          city: pick(source, FIELD_KEYS.city),
          region: pick(source, FIELD_KEYS.region),
          postalCode: pick(source, FIELD_KEYS.postalCode),
        }),
        phone: pick(obj, FIELD_KEYS.phone),
        website: pick(obj, FIELD_KEYS.website),
        sourceUrl: url,
        strategyName: this.name,
      });
    }
    return records;
  }
}

function findLocationObjects(html: string): LocationObject[] {
  const $ = cheerio.load(html);
  const objects: LocationObject[] = [];

  $("script:not([src])").each((_, el) => {
    const code = $(el).text();
    for (const pattern of ARRAY_ASSIGNMENTS) {
      for (const match of code.matchAll(pattern)) {
        const start = (match.index ?? 0) + match[0].length - 1;
        const literal = sliceBalanced(code, start);
        if (!literal) continue;

        let data: unknown;
        try {
          data = JSON.parse(literal);
        } catch {
          continue;
        }
        const parsed = LocationArraySchema.safeParse(data);
        if (parsed.success) objects.push(...parsed.data);
      }
    }
  });

  return objects;
}

/** The bracketed literal starting at `start`, honoring strings and nesting. */
export function sliceBalanced(text: string, start: number): string | null {
  const open = text[start];
  if (open !== "[" && open !== "{") return null;

  let depth = 0;
  let quote: string | null = null;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === "[" || ch === "{") depth++;
    else if (ch === "]" || ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

function pick(obj: LocationObject, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = obj[key];
    if (typeof value === "string" && value.trim()) return cleanText(value);
    if (typeof value === "number") return String(value);
  }
  return undefined;
}

function asObject(value: unknown): LocationObject | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return null;
  const parsed = z.record(z.unknown()).safeParse(value);
  return parsed.success ? parsed.data : null;
}
