import * as cheerio from "cheerio";
import type { LearnedRule, LearnedRuleStore } from "../../rules/rule-store";
import { RawRecord, StrategyTier, type StrategyDescriptor } from "../../types";
import { absoluteUrl, cleanText, extractPhone, hostOf, htmlToLines, phoneFromHref } from "../shared";

/**
 * Operator-curated selectors for sites no built-in strategy understands,
 * looked up by host and path in the learned-rule store.
 */
export class LearnedRuleStrategy implements StrategyDescriptor {
  readonly name = "learned-rule";
  readonly tier = StrategyTier.GENERIC;

  constructor(private readonly store: LearnedRuleStore) {}

  canHandle(html: string, url: string): boolean {
    return this.findRule(html, url) !== null;
  }

  extract(html: string, url: string): RawRecord[] {
    const rule = this.findRule(html, url);
    if (!rule) return [];

    const $ = cheerio.load(html);
    const { fields } = rule;
    const records: RawRecord[] = [];

    $(rule.cardSelector).each((_, el) => {
      const $card = $(el);
      const text = (selector: string | undefined) =>
        selector ? cleanText($card.find(selector).first().text()) : "";

      const name = text(fields.name);
      if (!name) return;

      let rawAddress: string;
      if (fields.address) {
        rawAddress = htmlToLines($card.find(fields.address).first().html()).join("\n");
      } else {
        rawAddress = [text(fields.street), text(fields.cityStateZip)].filter(Boolean).join(", ");
      }

      let phone: string | undefined;
      let website: string | undefined;
      if (fields.phone) {
        const $phone = $card.find(fields.phone).first();
        phone = phoneFromHref($phone.attr("href")) ?? extractPhone($phone.text());
      }
      if (fields.website) {
        website = absoluteUrl($card.find(fields.website).first().attr("href"), url);
      }

      records.push({
        name,
        rawAddress,
        phone,
        website,
        sourceUrl: url,
        strategyName: this.name,
      });
    });

    return records;
  }

  private findRule(html: string, url: string): LearnedRule | null {
    const host = hostOf(url);
    if (!host) return null;

    let pathname: string;
    try {
      pathname = new URL(url).pathname;
    } catch {
      return null;
    }

    const candidates = this.store.getRules(host).filter((rule) => {
      try {
        return new RegExp(rule.pathPattern).test(pathname);
      } catch {
        console.warn(`[rules] Invalid path pattern for ${rule.domain}: ${rule.pathPattern}`);
        return false;
      }
    });
    if (candidates.length === 0) return null;

    const $ = cheerio.load(html);
    return candidates.find((rule) => $(rule.cardSelector).length > 0) ?? null;
  }
}
