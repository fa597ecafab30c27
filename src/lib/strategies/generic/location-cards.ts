import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { RawRecord, StrategyTier, type StrategyDescriptor } from "../../types";
import {
  CITY_STATE_ZIP,
  PHONE_PATTERN,
  absoluteUrl,
  cleanText,
  composeAddress,
  extractPhone,
  htmlToLines,
  isMapsLink,
  phoneFromHref,
} from "../shared";

// Card containers seen on dealer group "our locations" pages, most specific first
const CARD_SELECTORS = [
  ".vcard",
  "[itemtype*='schema.org/AutoDealer']",
  "[itemtype*='schema.org/AutomotiveBusiness']",
  "[itemtype*='schema.org/LocalBusiness']",
  ".location-card",
  ".dealer-card",
  ".dealership-card",
  ".location-item",
  ".dealer-location",
  ".store-location",
  ".location-result",
];

const NAME_SELECTOR =
  ".org, .fn, [itemprop='name'], .location-name, .dealer-name, h2, h3, h4, h5, strong, b";

const NOISE_LINE = /^(?:get directions|directions|view (?:inventory|details|website)|visit (?:site|website)|map|call|hours?:?.*)$/i;

/**
 * Repeated location cards: hCard microformats, schema.org microdata, or the
 * usual "location card" class names. Only the first card layout found on the
 * page is used.
 */
export class LocationCardsStrategy implements StrategyDescriptor {
  readonly name = "location-cards";
  readonly tier = StrategyTier.GENERIC;

  canHandle(html: string): boolean {
    const $ = cheerio.load(html);
    return findCardSelector($) !== null;
  }

  extract(html: string, url: string): RawRecord[] {
    const $ = cheerio.load(html);
    const selector = findCardSelector($);
    if (!selector) return [];

    const records: RawRecord[] = [];
    $(selector).each((_, el) => {
      const $card = $(el);
      const name = cleanText($card.find(NAME_SELECTOR).first().text());
      if (!name) return;

      let rawAddress: string;
      const street = $card.find(".street-address, [itemprop='streetAddress']").first().text();
      if (cleanText(street)) {
        rawAddress = composeAddress({
          street,
          city: $card.find(".locality, [itemprop='addressLocality']").first().text(),
          region: $card.find(".region, [itemprop='addressRegion']").first().text(),
          postalCode: $card.find(".postal-code, [itemprop='postalCode']").first().text(),
        });
      } else {
        rawAddress = htmlToLines($card.html())
          .filter((line) => line !== name && !PHONE_PATTERN.test(line) && !NOISE_LINE.test(line))
          .join("\n");
      }

      const phone =
        phoneFromHref($card.find("a[href^='tel:']").first().attr("href")) ||
        extractPhone($card.find(".tel, [itemprop='telephone']").first().text()) ||
        extractPhone($card.text());

      const website =
        $card.find("a.url, [itemprop='url']").first().attr("href") ??
        $card
          .find("a[href]")
          .toArray()
          .map((a) => $(a).attr("href"))
          .find((href) => !isMapsLink(href) && !/^(?:tel|mailto|#)/i.test(href ?? ""));

      records.push({
        name,
        rawAddress,
        phone,
        website: absoluteUrl(website, url),
        sourceUrl: url,
        strategyName: this.name,
      });
    });

    return records;
  }
}

/** First card selector with at least one card that carries an address. */
function findCardSelector($: CheerioAPI): string | null {
  for (const selector of CARD_SELECTORS) {
    const cards = $(selector);
    if (cards.length === 0) continue;
    const withAddress = cards.filter((_, el) => {
      const $card = $(el);
      return (
        $card.find(".street-address, [itemprop='streetAddress']").length > 0 ||
        CITY_STATE_ZIP.test(cleanText($card.text()))
      );
    });
    if (withAddress.length > 0) return selector;
  }
  return null;
}
