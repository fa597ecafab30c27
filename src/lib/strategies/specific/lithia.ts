import * as cheerio from "cheerio";
import { RawRecord, StrategyTier, type StrategyDescriptor } from "../../types";
import { absoluteUrl, cleanText, composeAddress, extractPhone, phoneFromHref } from "../shared";

/**
 * Lithia Motors store locator: one `li.info-window` hCard per rooftop, with the
 * sales line carried in a click-to-call attribute.
 */
export class LithiaStrategy implements StrategyDescriptor {
  readonly name = "lithia-info-window";
  readonly tier = StrategyTier.SPECIFIC;

  canHandle(html: string, url: string): boolean {
    if (!/lithia/i.test(url) && !/lithia/i.test(html)) return false;
    const $ = cheerio.load(html);
    return $("li.info-window .org").length > 0;
  }

  extract(html: string, url: string): RawRecord[] {
    const $ = cheerio.load(html);
    const records: RawRecord[] = [];

    $("li.info-window").each((_, el) => {
      const $el = $(el);
      const name = cleanText($el.find(".org").first().text());
      if (!name) return;

      const salesTel = $el.find(".tel[data-click-to-call='Sales']").first();
      const phone =
        cleanText(salesTel.attr("data-click-to-call-phone")) ||
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
        phone: phone || undefined,
        website: absoluteUrl($el.find("a.url").first().attr("href"), url),
        sourceUrl: url,
        strategyName: this.name,
      });
    });

    return records;
  }
}
