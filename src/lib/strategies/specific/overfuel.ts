import * as cheerio from "cheerio";
import { RawRecord, StrategyTier, type StrategyDescriptor } from "../../types";
import { absoluteUrl, cleanText, htmlToLines, isMapsLink, phoneFromHref } from "../shared";

const MAPS_ANCHOR = "a[href*='google.com/maps']";

/**
 * Overfuel-hosted group sites: each location card links its address to a
 * Google Maps search, with the street in a `.street-address` span.
 */
export class OverfuelStrategy implements StrategyDescriptor {
  readonly name = "overfuel-locations";
  readonly tier = StrategyTier.SPECIFIC;

  canHandle(html: string, _url: string): boolean {
    if (!/overfuel/i.test(html)) return false;
    const $ = cheerio.load(html);
    return $(MAPS_ANCHOR).filter((_, el) => $(el).find(".street-address").length > 0).length > 0;
  }

  extract(html: string, url: string): RawRecord[] {
    const $ = cheerio.load(html);
    const records: RawRecord[] = [];

    $(MAPS_ANCHOR).each((_, el) => {
      const $anchor = $(el);
      if ($anchor.find(".street-address").length === 0) return;

      let $card = $anchor.closest("li, article, .card, [class*='location']");
      if ($card.length === 0) $card = $anchor.parent();

      const name = cleanText($card.find(".org, b, strong, h2, h3, h4").first().text());
      if (!name) return;

      const website = $card
        .find("a[href]")
        .toArray()
        .map((a) => $(a).attr("href"))
        .find((href) => !isMapsLink(href) && !/^(?:tel|mailto):/i.test(href ?? ""));

      records.push({
        name,
        rawAddress: htmlToLines($anchor.html()).join("\n"),
        phone: phoneFromHref($card.find("a[href^='tel:']").first().attr("href")),
        website: absoluteUrl(website, url),
        sourceUrl: url,
        strategyName: this.name,
      });
    });

    return records;
  }
}
