import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { JsonLdStrategy } from "../../lib/strategies/generic/json-ld";
import { ScriptVariablesStrategy, sliceBalanced } from "../../lib/strategies/generic/script-variables";
import { LocationCardsStrategy } from "../../lib/strategies/generic/location-cards";
import { StrategyTier } from "../../lib/types";

function fixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url)), "utf-8");
}

const JSON_LD_HTML = fixture("json-ld-locations.html");
const SCRIPT_HTML = fixture("script-variables-locations.html");
const CARDS_HTML = fixture("location-cards.html");
const HEADING_HTML = fixture("heading-address.html");

// =============================================================================
// JSON-LD
// =============================================================================

describe("JsonLdStrategy", () => {
  const strategy = new JsonLdStrategy();
  const url = "https://www.redwoodauto.example/locations";

  it("is a GENERIC strategy", () => {
    expect(strategy.tier).toBe(StrategyTier.GENERIC);
  });

  it("claims pages with dealer nodes and skips unreadable blocks", () => {
    expect(strategy.canHandle(JSON_LD_HTML)).toBe(true);
  });

  it("declines pages whose structured data names no dealer", () => {
    const html = `<script type="application/ld+json">{"@type":"Organization","name":"Redwood Auto Group"}</script>`;
    expect(strategy.canHandle(html)).toBe(false);
    expect(strategy.canHandle(CARDS_HTML)).toBe(false);
  });

  it("extracts dealers from @graph without descending into departments", () => {
    const records = strategy.extract(JSON_LD_HTML, url);
    expect(records).toEqual([
      {
        name: "Redwood Honda",
        rawAddress: "100 Harbor Dr, Eureka, CA 95501",
        phone: "+1-707-555-0140",
        website: "https://www.redwoodhonda.example/",
        sourceUrl: url,
        strategyName: "json-ld",
      },
      {
        name: "Redwood Used Cars",
        rawAddress: "455 Fifth Street, Eureka, CA 95501",
        phone: "707-555-0141",
        website: undefined,
        sourceUrl: url,
        strategyName: "json-ld",
      },
    ]);
  });

  it("accepts a top-level array of dealers", () => {
    const html = `<script type="application/ld+json">[
      {"@type":"AutoDealer","name":"North Kia","address":{"streetAddress":["12 Elm St","Unit 3"],"addressLocality":"Dover","addressRegion":"DE","postalCode":19901}}
    ]</script>`;
    expect(strategy.extract(html, url)[0].rawAddress).toBe("12 Elm St Unit 3, Dover, DE 19901");
  });
});

// =============================================================================
// Script variables
// =============================================================================

describe("sliceBalanced", () => {
  it("honors brackets inside strings", () => {
    const text = 'x = [1, "a]", {"b": [2]}] ;';
    expect(sliceBalanced(text, 4)).toBe('[1, "a]", {"b": [2]}]');
  });

  it("returns null for an unterminated literal or a non-bracket start", () => {
    expect(sliceBalanced("[1, 2", 0)).toBeNull();
    expect(sliceBalanced("abc", 0)).toBeNull();
  });
});

describe("ScriptVariablesStrategy", () => {
  const strategy = new ScriptVariablesStrategy();
  const url = "https://www.lakesidemotors.example/locations";

  it("claims pages with a dealer array in an inline script", () => {
    expect(strategy.canHandle(SCRIPT_HTML)).toBe(true);
    expect(strategy.canHandle(CARDS_HTML)).toBe(false);
  });

  it("maps alternate field names and nested address objects", () => {
    const records = strategy.extract(SCRIPT_HTML, url);
    expect(records).toEqual([
      {
        name: "Lakeside Chevrolet",
        rawAddress: "12 Shore Rd, Madison, WI 53703",
        phone: "608-555-0150",
        website: "https://lakesidechevy.example",
        sourceUrl: url,
        strategyName: "script-variables",
      },
      {
        name: "Lakeside Collision Center",
        rawAddress: "14 Shore Rd, Madison, WI 53703",
        phone: undefined,
        website: undefined,
        sourceUrl: url,
        strategyName: "script-variables",
      },
    ]);
  });

  it("ignores arrays that are not valid JSON", () => {
    const html = "<script>var locations = [{name: 'Unquoted Keys'}];</script>";
    expect(strategy.canHandle(html)).toBe(false);
    expect(strategy.extract(html, url)).toEqual([]);
  });
});

// =============================================================================
// Location cards
// =============================================================================

describe("LocationCardsStrategy", () => {
  const strategy = new LocationCardsStrategy();
  const url = "https://www.valleyauto.example/locations";

  it("claims repeated cards that carry an address", () => {
    expect(strategy.canHandle(CARDS_HTML)).toBe(true);
  });

  it("declines pages without card layouts", () => {
    expect(strategy.canHandle(HEADING_HTML)).toBe(false);
    expect(strategy.canHandle('<div class="location-card"><h3>Valley Kia</h3><p>Coming soon</p></div>')).toBe(false);
  });

  it("reads address lines from card text", () => {
    const records = strategy.extract(CARDS_HTML, url);
    expect(records).toEqual([
      {
        name: "Valley Kia",
        rawAddress: "789 Camelback Road\nPhoenix, AZ 85013",
        phone: "6025550160",
        website: "https://www.valleykia.example/",
        sourceUrl: url,
        strategyName: "location-cards",
      },
      {
        name: "Valley Mazda",
        rawAddress: "801 Camelback Road\nPhoenix, AZ 85013",
        phone: "602-555-0161",
        website: undefined,
        sourceUrl: url,
        strategyName: "location-cards",
      },
    ]);
  });

  it("composes schema.org microdata fields", () => {
    const html = `
      <div itemscope itemtype="https://schema.org/AutoDealer">
        <span itemprop="name">Northgate Subaru</span>
        <div itemprop="address" itemscope itemtype="https://schema.org/PostalAddress">
          <span itemprop="streetAddress">3000 Northgate Way</span>
          <span itemprop="addressLocality">Seattle</span>
          <span itemprop="addressRegion">WA</span>
          <span itemprop="postalCode">98133</span>
        </div>
        <span itemprop="telephone">206-555-0170</span>
        <a itemprop="url" href="/subaru">Website</a>
      </div>`;

    expect(strategy.extract(html, "https://www.northgate.example/locations")).toEqual([
      {
        name: "Northgate Subaru",
        rawAddress: "3000 Northgate Way, Seattle, WA 98133",
        phone: "206-555-0170",
        website: "https://www.northgate.example/subaru",
        sourceUrl: "https://www.northgate.example/locations",
        strategyName: "location-cards",
      },
    ]);
  });
});
