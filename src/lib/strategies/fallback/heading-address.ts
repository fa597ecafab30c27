import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { RawRecord, StrategyTier, type StrategyDescriptor } from "../../types";
import { cleanText, extractPhone, findCityStateZipLine, htmlToLines } from "../shared";

// Section headings that introduce a list rather than name a location
const NAVIGATION_TERMS = new Set([
  "explore our locations",
  "our locations",
  "find us",
  "visit us",
  "locations",
  "dealerships",
  "our dealerships",
  "store locations",
  "branches",
  "offices",
  "contact us",
  "where to find us",
  "find a location",
  "location finder",
  "store finder",
]);

const HEADINGS = "h2, h3, h4, h5";

interface HeadingBlock {
  name: string;
  lines: string[];
}

/**
 * Page-text heuristic: a heading followed, before the next heading, by text
 * containing a "City, ST 12345" line is taken as one location.
 */
export class HeadingAddressStrategy implements StrategyDescriptor {
  readonly name = "heading-address";
  readonly tier = StrategyTier.FALLBACK;

  canHandle(html: string): boolean {
    return findBlocks(cheerio.load(html)).length > 0;
  }

  extract(html: string, url: string): RawRecord[] {
    return findBlocks(cheerio.load(html)).map(({ name, lines }) => {
      const cszIndex = findCityStateZipLine(lines);
      const addressLines = lines
        .slice(Math.max(0, cszIndex - 2), cszIndex + 1)
        .filter((line) => !extractPhone(line));

      return {
        name,
        rawAddress: addressLines.join("\n"),
        phone: lines.map(extractPhone).find((p) => p !== undefined),
        sourceUrl: url,
        strategyName: this.name,
      };
    });
  }
}

function findBlocks($: CheerioAPI): HeadingBlock[] {
  $("script, style, noscript, nav, header, footer").remove();
  const blocks: HeadingBlock[] = [];

  $(HEADINGS).each((_, el) => {
    const $heading = $(el);
    const name = cleanText($heading.text());
    if (!name || NAVIGATION_TERMS.has(name.toLowerCase())) return;

    const siblingHtml = $heading
      .nextUntil(HEADINGS)
      .slice(0, 6)
      .toArray()
      .map((sib) => $.html(sib))
      .join("\n");
    const lines = htmlToLines(siblingHtml);
    if (findCityStateZipLine(lines) === -1) return;

    blocks.push({ name, lines });
  });

  return blocks;
}
