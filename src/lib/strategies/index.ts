import type { LearnedRuleStore } from "../rules/rule-store";
import { StrategyRegistry } from "./registry";
import { LithiaStrategy } from "./specific/lithia";
import { DealerDotComLocationsStrategy } from "./specific/dealer-dot-com";
import { OverfuelStrategy } from "./specific/overfuel";
import { LearnedRuleStrategy } from "./generic/learned-rule";
import { JsonLdStrategy } from "./generic/json-ld";
import { ScriptVariablesStrategy } from "./generic/script-variables";
import { LocationCardsStrategy } from "./generic/location-cards";
import { LlmExtractionStrategy, type ToolCaller } from "./fallback/llm";
import { HeadingAddressStrategy } from "./fallback/heading-address";
import type { StrategyDescriptor } from "../types";

export { StrategyRegistry } from "./registry";
export type { SelectionResult, SelectOptions } from "./types";

export interface DefaultRegistryOptions {
  ruleStore?: LearnedRuleStore;
  llm?: { callTool?: ToolCaller; enabled?: boolean };
  logger?: Pick<Console, "log" | "warn">;
}

/**
 * Built-in strategies in selection order. The learned-rule strategy is only
 * registered when a rule store is supplied.
 */
export function defaultStrategies(options: DefaultRegistryOptions = {}): StrategyDescriptor[] {
  return [
    // SPECIFIC
    new LithiaStrategy(),
    new DealerDotComLocationsStrategy(),
    new OverfuelStrategy(),
    // GENERIC
    ...(options.ruleStore ? [new LearnedRuleStrategy(options.ruleStore)] : []),
    new JsonLdStrategy(),
    new ScriptVariablesStrategy(),
    new LocationCardsStrategy(),
    // FALLBACK
    new LlmExtractionStrategy(options.llm),
    new HeadingAddressStrategy(),
  ];
}

export function createDefaultRegistry(options: DefaultRegistryOptions = {}): StrategyRegistry {
  return new StrategyRegistry(defaultStrategies(options), { logger: options.logger });
}
