import * as cheerio from "cheerio";
import { RawRecord, StrategyTier, type StrategyDescriptor } from "../../types";
import { absoluteUrl, cleanText, composeAddress, extractPhone, hostOf, phoneFromHref } from "../shared";

const LIST_SELECTOR = "div.dealer-list ol#proximity-dealer-list";

/**
 * Dealer.com platform "proximity" locations widget, used by Sonic Automotive
 * and other groups hosted on Dealer.com.
 */
export class DealerDotComLocationsStrategy implements StrategyDescriptor {
  readonly name = "dealer-dot-com-locations";
  readonly tier = StrategyTier.SPECIFIC;

  canHandle(html: string, url: string): boolean {
    if (!html.includes("proximity-dealer-list")) return false;
    const $ = cheerio.load(html);
    const cards = $(`${LIST_SELECTOR} .vcard`).length;
    return cards > 0 && (hostOf(url).endsWith("sonicautomotive.com") || $(`${LIST_SELECTOR} .vcard .org`).length > 0);
  }

  extract(html: string, url: string): RawRecord[] {
    const $ = cheerio.load(html);
    const records: RawRecord[] = [];

    $(`${LIST_SELECTOR} .vcard`).each((_, el) => {
      const $el = $(el);
      const name = cleanText($el.find(".org").first().text());
      if (!name) return;

      const phone =
        phoneFromHref($el.find("a[href^='tel:']").first().attr("href")) ||
        extractPhone($el.find(".tel").first().text());

      records.push({
        name,
        rawAddress: composeAddress({
          street: $el.find(".street-address").first().text(),
          city: $el.find(".locality").first().text(),
          region: $el.find(".region").first().text(),
          postalCode: $el.find(".postal-code").first().text(),
        }),
        phone,
        website: absoluteUrl($el.find("a.url").first().attr("href"), url),
        sourceUrl: url,
        strategyName: this.name,
      });
    });

    return records;
  }
}
