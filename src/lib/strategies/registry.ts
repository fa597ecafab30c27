import { ConfigurationError, errorMessage } from "../errors";
import { TIER_ORDER, type StrategyDescriptor } from "../types";
import type { SelectionResult, SelectOptions } from "./types";

/**
 * Ordered, immutable set of extraction strategies.
 *
 * Selection is strict first match: tiers in SPECIFIC → GENERIC → FALLBACK
 * order, registration order within a tier, and only the first strategy whose
 * `canHandle` returns true has `extract` called. FALLBACK strategies are
 * therefore reached only when nothing in the earlier tiers claimed the page.
 */
export class StrategyRegistry {
  private readonly strategies: readonly StrategyDescriptor[];
  private readonly logger: Pick<Console, "log" | "warn">;

  constructor(
    descriptors: readonly StrategyDescriptor[],
    options: { logger?: Pick<Console, "log" | "warn"> } = {}
  ) {
    const seen = new Set<string>();
    for (const d of descriptors) {
      if (!d.name) throw new ConfigurationError("Strategy registered without a name");
      if (!TIER_ORDER.includes(d.tier)) {
        throw new ConfigurationError(`Strategy ${d.name} has unknown tier`, { tier: d.tier });
      }
      if (seen.has(d.name)) {
        throw new ConfigurationError(`Duplicate strategy name: ${d.name}`);
      }
      seen.add(d.name);
    }

    this.strategies = Object.freeze(
      TIER_ORDER.flatMap((tier) => descriptors.filter((d) => d.tier === tier))
    );
    this.logger = options.logger ?? console;
  }

  /** Strategy names in selection order. */
  list(): string[] {
    return this.strategies.map((s) => s.name);
  }

  find(name: string): StrategyDescriptor | undefined {
    return this.strategies.find((s) => s.name === name);
  }

  async select(html: string, url: string, options: SelectOptions = {}): Promise<SelectionResult> {
    const tiers = options.tiers ?? TIER_ORDER;
    const diagnostics: string[] = [];

    for (const strategy of this.strategies) {
      if (!tiers.includes(strategy.tier)) continue;
      const label = `[${strategy.tier}] ${strategy.name}`;

      let handles: boolean;
      try {
        handles = strategy.canHandle(html, url);
      } catch (error) {
        const message = errorMessage(error);
        this.logger.warn(`[registry] ${strategy.name}.canHandle threw for ${url}: ${message}`);
        diagnostics.push(`${label}: canHandle threw (${message}), treated as no match`);
        continue;
      }

      if (!handles) {
        diagnostics.push(`${label}: no match`);
        continue;
      }

      diagnostics.push(`${label}: matched`);
      return this.extractWith(strategy, html, url, diagnostics);
    }

    diagnostics.push(`no strategy matched in tiers ${tiers.join(", ")}`);
    return { kind: "no_strategy", diagnostics };
  }

  private async extractWith(
    strategy: StrategyDescriptor,
    html: string,
    url: string,
    diagnostics: string[]
  ): Promise<SelectionResult> {
    const label = `[${strategy.tier}] ${strategy.name}`;

    let reason: string;
    try {
      const records = await strategy.extract(html, url);
      if (records.length > 0) {
        diagnostics.push(`${label}: extracted ${records.length} records`);
        this.logger.log(`[registry] ${strategy.name} extracted ${records.length} records from ${url}`);
        return {
          kind: "matched",
          strategy: strategy.name,
          tier: strategy.tier,
          records,
          diagnostics,
        };
      }
      reason = "extract returned no records";
    } catch (error) {
      reason = `extract threw: ${errorMessage(error)}`;
      this.logger.warn(`[registry] ${strategy.name}.extract failed for ${url}: ${errorMessage(error)}`);
    }

    diagnostics.push(`${label}: ${reason}`);
    return {
      kind: "matched_empty",
      strategy: strategy.name,
      tier: strategy.tier,
      reason,
      diagnostics,
    };
  }
}
