import { describe, it, expect } from "vitest";
import { dedupeKey, dedupeRecords, mergeRecords } from "../lib/dedupe";
import { CanonicalRecord, DealerCategory, StrategyTier } from "../lib/types";

function record(overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
  return {
    name: "Smith Ford",
    dealerGroup: "Smith Auto Group",
    street: "123 Main St",
    city: "Springfield",
    region: "IL",
    postalCode: "62701",
    country: "United States of America",
    phone: null,
    website: null,
    websiteDomain: null,
    brandTags: ["Ford"],
    category: DealerCategory.FRANCHISED,
    sourceUrl: "https://www.smithauto.example/locations",
    strategyName: "json-ld",
    strategyTier: StrategyTier.GENERIC,
    ...overrides,
  };
}

describe("dedupeKey", () => {
  it("ignores case, punctuation and the corporate suffix", () => {
    expect(dedupeKey({ name: "Smith Ford LLC", street: "123 Main St." })).toBe("smith ford|123mainst");
    expect(dedupeKey({ name: "SMITH FORD", street: "123 main st" })).toBe("smith ford|123mainst");
  });

  it.each([
    ["123 Main St., Ste. 100", "123mainst"],
    ["123 Main St Suite 100", "123mainst"],
    ["123 Main St Unit B", "123mainst"],
    ["123 Main St #4", "123mainst"],
    ["123 Main St Fl 2", "123mainst"],
    ["123 Main St, Floor 3", "123mainst"],
    ["100 Flagler St", "100flaglerst"],
    ["100 Unity Blvd", "100unityblvd"],
  ])("drops the unit designator from %j", (street, expected) => {
    expect(dedupeKey({ name: "Smith Ford", street })).toBe(`smith ford|${expected}`);
  });
});

describe("dedupeRecords", () => {
  it("merges the same rooftop listed twice, richer record first", () => {
    const listed = record({
      website: "https://smithford.example/",
      websiteDomain: "smithford.example",
    });
    const suite = record({
      name: "Smith Ford LLC",
      street: "123 Main St Suite 100",
      phone: "(217) 555-0123",
      strategyTier: StrategyTier.SPECIFIC,
    });

    const result = dedupeRecords([listed, suite]);

    expect(result).toHaveLength(1);
    expect(result[0].name).toBe("Smith Ford");
    expect(result[0].street).toBe("123 Main St");
    expect(result[0].website).toBe("https://smithford.example/");
    expect(result[0].phone).toBe("(217) 555-0123");
  });

  it("merges a floor-numbered listing with the plain street", () => {
    const result = dedupeRecords([record(), record({ street: "123 Main St Fl 2", phone: "(217) 555-0123" })]);
    expect(result).toHaveLength(1);
    expect(result[0].phone).toBe("(217) 555-0123");
  });

  it("keeps different streets apart", () => {
    const result = dedupeRecords([record(), record({ street: "125 Main St" })]);
    expect(result).toHaveLength(2);
  });

  it("keeps different names at the same street apart", () => {
    const result = dedupeRecords([record(), record({ name: "Smith Lincoln" })]);
    expect(result.map((r) => r.name)).toEqual(["Smith Ford", "Smith Lincoln"]);
  });

  it("keeps first-seen order", () => {
    const a = record({ name: "Alpha Kia", street: "1 First St" });
    const b = record({ name: "Bravo Kia", street: "2 Second St" });
    const aAgain = record({ name: "Alpha Kia", street: "1 First St", phone: "(217) 555-0100" });

    const result = dedupeRecords([a, b, aAgain]);
    expect(result.map((r) => r.name)).toEqual(["Alpha Kia", "Bravo Kia"]);
    expect(result[0].phone).toBe("(217) 555-0100");
  });

  it("converges: a second pass changes nothing", () => {
    const input = [
      record(),
      record({ name: "Smith Ford LLC", street: "123 Main St Ste 4", phone: "(217) 555-0123" }),
      record({ name: "Smith Lincoln", street: "200 Oak Ave" }),
    ];
    const once = dedupeRecords(input);
    expect(dedupeRecords(once)).toEqual(once);
  });
});

describe("mergeRecords", () => {
  it("breaks a field-count tie by strategy tier", () => {
    const generic = record({ name: "Smith Ford" });
    const specific = record({ name: "Smith Ford Inc.", strategyTier: StrategyTier.SPECIFIC });

    expect(mergeRecords(generic, specific).name).toBe("Smith Ford Inc.");
    expect(mergeRecords(specific, generic).name).toBe("Smith Ford Inc.");
  });

  it("keeps the earlier record on a full tie", () => {
    const first = record({ sourceUrl: "https://a.example/" });
    const second = record({ sourceUrl: "https://b.example/" });
    expect(mergeRecords(first, second).sourceUrl).toBe("https://a.example/");
  });

  it("fills only missing fields from the losing record", () => {
    const winner = record({ phone: "(217) 555-0123", website: "https://smithford.example/", websiteDomain: "smithford.example" });
    const loser = record({
      city: "Shelbyville",
      postalCode: null,
      brandTags: [],
      category: DealerCategory.UNKNOWN,
      phone: "(217) 555-0999",
    });

    const merged = mergeRecords(loser, winner);
    expect(merged.city).toBe("Springfield");
    expect(merged.phone).toBe("(217) 555-0123");
    expect(merged.postalCode).toBe("62701");
  });

  it("takes brand tags and category from the loser when the winner has none", () => {
    const winner = record({
      brandTags: [],
      category: DealerCategory.UNKNOWN,
      phone: "(217) 555-0123",
      website: "https://smithford.example/",
      websiteDomain: "smithford.example",
    });
    const loser = record({ postalCode: null });

    const merged = mergeRecords(winner, loser);
    expect(merged.phone).toBe("(217) 555-0123");
    expect(merged.brandTags).toEqual(["Ford"]);
    expect(merged.category).toBe(DealerCategory.FRANCHISED);
  });
});
