import { describe, it, expect, vi, beforeEach } from "vitest";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { HeadingAddressStrategy } from "../../lib/strategies/fallback/heading-address";
import {
  LlmExtractionStrategy,
  compactHtml,
  buildPrompt,
  REPORT_LOCATIONS_TOOL,
} from "../../lib/strategies/fallback/llm";
import { StrategyTier } from "../../lib/types";

function fixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url)), "utf-8");
}

const HEADING_HTML = fixture("heading-address.html");

// =============================================================================
// Heading + address heuristic
// =============================================================================

describe("HeadingAddressStrategy", () => {
  const strategy = new HeadingAddressStrategy();
  const url = "https://www.prairieauto.example/";

  it("is a FALLBACK strategy", () => {
    expect(strategy.tier).toBe(StrategyTier.FALLBACK);
  });

  it("claims pages with a heading followed by a city/state/ZIP line", () => {
    expect(strategy.canHandle(HEADING_HTML)).toBe(true);
    expect(strategy.canHandle("<h2>About</h2><p>Family owned since 1962.</p>")).toBe(false);
  });

  it("takes one location per heading, ignoring navigation and footer blocks", () => {
    const records = strategy.extract(HEADING_HTML, url);
    expect(records).toEqual([
      {
        name: "Prairie Ford",
        rawAddress: "Sales & Service\n4100 Main Street\nLincoln, NE 68516",
        phone: "(402) 555-0180",
        sourceUrl: url,
        strategyName: "heading-address",
      },
      {
        name: "Prairie Lincoln",
        rawAddress: "4200 Main Street\nLincoln, NE 68516",
        phone: undefined,
        sourceUrl: url,
        strategyName: "heading-address",
      },
    ]);
  });
});

// =============================================================================
// LLM tool-call extraction
// =============================================================================

describe("compactHtml", () => {
  it("drops scripts and every attribute except href and class", () => {
    const html =
      '<html><body><div id="x" class="c" data-y="1"><a href="/a" onclick="f()">A</a><script>var z = 1;</script></div></body></html>';
    expect(compactHtml(html)).toBe('<div class="c"><a href="/a">A</a></div>');
  });

  it("caps the output length", () => {
    expect(compactHtml(`<body><p>${"x".repeat(100)}</p></body>`, 20)).toHaveLength(20);
  });
});

describe("buildPrompt", () => {
  it("names the page and the tool", () => {
    const prompt = buildPrompt("<body><p>Hi</p></body>", "https://www.bayview.example/");
    expect(prompt).toContain("https://www.bayview.example/");
    expect(prompt).toContain(REPORT_LOCATIONS_TOOL.name);
    expect(prompt.endsWith("<p>Hi</p>")).toBe(true);
  });
});

describe("LlmExtractionStrategy", () => {
  const url = "https://www.bayview.example/locations";
  const html = "<html><body><h1>Bayview Auto</h1><p>Visit our stores in Tampa.</p></body></html>";

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  it("is disabled unless enabled explicitly or given a caller", () => {
    expect(new LlmExtractionStrategy({ enabled: false, callTool: vi.fn() }).canHandle(html)).toBe(false);
    expect(new LlmExtractionStrategy({ enabled: true, callTool: vi.fn() }).canHandle(html)).toBe(true);
  });

  it("declines pages without body text", () => {
    const strategy = new LlmExtractionStrategy({ enabled: true, callTool: vi.fn() });
    expect(strategy.canHandle("<html><body>  </body></html>")).toBe(false);
  });

  it("validates reported locations", async () => {
    const callTool = vi.fn(async (_prompt: string): Promise<unknown> => ({
      locations: [
        {
          name: "Bayview Nissan",
          street: "900 Bay St",
          city: "Tampa",
          state: "fl",
          zip: "33602",
          phone: "813-555-0111",
          website: "https://bayviewnissan.example",
        },
        { name: "Bayview Body Shop", street: "910 Bay St", city: "Tampa", state: "FL", zip: "336", phone: "555-0112" },
        { name: "Bayview Kia", street: "920 Bay St", city: "Tampa", state: "Florida" },
        { name: "", street: "930 Bay St", city: "Tampa", state: "FL" },
        "not an object",
      ],
    }));
    const strategy = new LlmExtractionStrategy({ enabled: true, callTool });

    const records = await strategy.extract(html, url);

    expect(callTool).toHaveBeenCalledTimes(1);
    expect(callTool.mock.calls[0][0]).toContain(url);
    expect(records).toEqual([
      {
        name: "Bayview Nissan",
        rawAddress: "900 Bay St, Tampa, FL 33602",
        phone: "813-555-0111",
        website: "https://bayviewnissan.example",
        sourceUrl: url,
        strategyName: "llm-extraction",
      },
      {
        name: "Bayview Body Shop",
        rawAddress: "910 Bay St, Tampa, FL",
        phone: undefined,
        website: undefined,
        sourceUrl: url,
        strategyName: "llm-extraction",
      },
    ]);
  });

  it("returns no records when the model makes no usable call", async () => {
    const strategy = new LlmExtractionStrategy({ enabled: true, callTool: async () => null });
    expect(await strategy.extract(html, url)).toEqual([]);
  });
});
