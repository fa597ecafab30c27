import * as cheerio from "cheerio";
import { z } from "zod";
import { RawRecord, StrategyTier, type StrategyDescriptor } from "../../types";
import { cleanText, composeAddress } from "../shared";

const DEALER_TYPES = new Set([
  "AutoDealer",
  "AutomotiveBusiness",
  "AutoRepair",
  "AutoBodyShop",
  "AutoPartsStore",
  "MotorcycleDealer",
  "LocalBusiness",
]);

const stringish = z.union([z.string(), z.number()]).transform(String);

const PostalAddressSchema = z.object({
  streetAddress: z.union([stringish, z.array(z.string())]).optional(),
  addressLocality: stringish.optional(),
  addressRegion: stringish.optional(),
  postalCode: stringish.optional(),
});

const DealerNodeSchema = z.object({
  name: z.string().min(1),
  address: z.union([z.string(), PostalAddressSchema, z.array(PostalAddressSchema)]),
  telephone: z.union([z.string(), z.array(z.string())]).optional(),
  url: z.string().optional(),
});

type DealerNode = z.infer<typeof DealerNodeSchema>;

/**
 * schema.org AutoDealer / LocalBusiness entries embedded as JSON-LD. Walks
 * @graph arrays and nested values, but not into a dealer's own `department`
 * list (those are the sales/service desks of the same rooftop).
 */
export class JsonLdStrategy implements StrategyDescriptor {
  readonly name = "json-ld";
  readonly tier = StrategyTier.GENERIC;

  canHandle(html: string): boolean {
    if (!html.includes("application/ld+json")) return false;
    return findDealerNodes(html).length > 0;
  }

  extract(html: string, url: string): RawRecord[] {
    return findDealerNodes(html).map((node) => ({
      name: cleanText(node.name),
      rawAddress: addressText(node.address),
      phone: first(node.telephone),
      website: node.url,
      sourceUrl: url,
      strategyName: this.name,
    }));
  }
}

function findDealerNodes(html: string): DealerNode[] {
  const $ = cheerio.load(html);
  const nodes: DealerNode[] = [];

  $('script[type="application/ld+json"]').each((_, el) => {
    let data: unknown;
    try {
      data = JSON.parse($(el).text());
    } catch {
      return;
    }
    collect(data, nodes);
  });

  return nodes;
}

function collect(value: unknown, out: DealerNode[]): void {
  if (Array.isArray(value)) {
    for (const item of value) collect(item, out);
    return;
  }
  if (typeof value !== "object" || value === null) return;

  if (isDealerType("@type" in value ? value["@type"] : undefined)) {
    const parsed = DealerNodeSchema.safeParse(value);
    if (parsed.success) out.push(parsed.data);
    return;
  }

  for (const child of Object.values(value)) collect(child, out);
}

function isDealerType(type: unknown): boolean {
  if (typeof type === "string") return DEALER_TYPES.has(type);
  if (Array.isArray(type)) return type.some((t) => typeof t === "string" && DEALER_TYPES.has(t));
  return false;
}

function addressText(address: DealerNode["address"]): string {
  if (typeof address === "string") return cleanText(address);
  const postal = Array.isArray(address) ? address[0] : address;
  if (!postal) return "";
  const street = Array.isArray(postal.streetAddress)
    ? postal.streetAddress.join(" ")
    : postal.streetAddress;
  return composeAddress({
    street,
    city: postal.addressLocality,
    region: postal.addressRegion,
    postalCode: postal.postalCode,
  });
}

function first(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}
