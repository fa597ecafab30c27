import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { LithiaStrategy } from "../../lib/strategies/specific/lithia";
import { DealerDotComLocationsStrategy } from "../../lib/strategies/specific/dealer-dot-com";
import { OverfuelStrategy } from "../../lib/strategies/specific/overfuel";
import { StrategyTier } from "../../lib/types";

function fixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url)), "utf-8");
}

const LITHIA_HTML = fixture("lithia-locations.html");
const DEALER_DOT_COM_HTML = fixture("dealer-dot-com-locations.html");
const OVERFUEL_HTML = fixture("overfuel-locations.html");

// =============================================================================
// Lithia info-window cards
// =============================================================================

describe("LithiaStrategy", () => {
  const strategy = new LithiaStrategy();
  const url = "https://www.lithia.com/locations";

  it("is a SPECIFIC strategy", () => {
    expect(strategy.tier).toBe(StrategyTier.SPECIFIC);
  });

  it("claims Lithia locator pages", () => {
    expect(strategy.canHandle(LITHIA_HTML, url)).toBe(true);
  });

  it("declines other layouts", () => {
    expect(strategy.canHandle(DEALER_DOT_COM_HTML, url)).toBe(false);
    expect(strategy.canHandle(LITHIA_HTML.replace(/lithia/gi, "acme"), "https://www.acme.example/")).toBe(false);
  });

  it("extracts one record per info window", () => {
    const records = strategy.extract(LITHIA_HTML, url);
    expect(records).toHaveLength(2);
    expect(records[0]).toEqual({
      name: "Lithia Toyota of Springfield",
      rawAddress: "1700 N Glenstone Ave, Springfield, MO 65803",
      phone: "417-555-0101",
      website: "https://www.lithiatoyotaofspringfield.example/?utm_source=lithia&utm_medium=locator",
      sourceUrl: url,
      strategyName: "lithia-info-window",
    });
  });

  it("prefers the sales click-to-call number and falls back to tel links", () => {
    const [first, second] = strategy.extract(LITHIA_HTML, url);
    expect(first.phone).toBe("417-555-0101");
    expect(second.phone).toBe("+14065550102");
    expect(second.rawAddress).toBe("1500 Grand Avenue, Billings, MT 59102");
  });
});

// =============================================================================
// Dealer.com proximity list
// =============================================================================

describe("DealerDotComLocationsStrategy", () => {
  const strategy = new DealerDotComLocationsStrategy();
  const url = "https://www.sonicautomotive.com/locations";

  it("claims the proximity dealer list", () => {
    expect(strategy.canHandle(DEALER_DOT_COM_HTML, url)).toBe(true);
    expect(strategy.canHandle(DEALER_DOT_COM_HTML, "https://www.othergroup.example/")).toBe(true);
  });

  it("declines pages without the list", () => {
    expect(strategy.canHandle(LITHIA_HTML, url)).toBe(false);
  });

  it("extracts vcards with absolute websites", () => {
    const records = strategy.extract(DEALER_DOT_COM_HTML, url);
    expect(records.map((r) => r.name)).toEqual(["Honda of Tysons Corner", "Town BMW"]);
    expect(records[0]).toMatchObject({
      rawAddress: "8584 Leesburg Pike, Vienna, VA 22182",
      phone: "(703) 555-0110",
      website: "https://www.sonicautomotive.com/dealers/honda-of-tysons",
    });
    expect(records[1]).toMatchObject({
      rawAddress: "450 Commerce Street, Alexandria, VA 22314",
      phone: "703.555.0111",
      website: "https://www.townbmw.example/",
    });
  });
});

// =============================================================================
// Overfuel location finder
// =============================================================================

describe("OverfuelStrategy", () => {
  const strategy = new OverfuelStrategy();
  const url = "https://www.summitauto.example/locations";

  it("claims Overfuel pages with mapped street addresses", () => {
    expect(strategy.canHandle(OVERFUEL_HTML, url)).toBe(true);
  });

  it("declines pages without the Overfuel marker", () => {
    expect(strategy.canHandle(OVERFUEL_HTML.replace(/overfuel/gi, "cdn"), url)).toBe(false);
  });

  it("reads the address lines inside the maps link", () => {
    const records = strategy.extract(OVERFUEL_HTML, url);
    expect(records).toEqual([
      {
        name: "Summit Ford",
        rawAddress: "2200 Summit Blvd\nBoise, ID 83702",
        phone: "2085550133",
        website: "https://www.summitford.example/",
        sourceUrl: url,
        strategyName: "overfuel-locations",
      },
      {
        name: "Summit Hyundai",
        rawAddress: "2250 Summit Blvd\nBoise, ID 83702",
        phone: undefined,
        website: undefined,
        sourceUrl: url,
        strategyName: "overfuel-locations",
      },
    ]);
  });
});
