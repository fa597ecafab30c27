import type { RawRecord, StrategyTier } from "../types";

export type { StrategyDescriptor } from "../types";

export interface SelectOptions {
  /** Restrict the round to these tiers (selection order is unchanged). */
  tiers?: readonly StrategyTier[];
}

/**
 * Result of one selection round. `matched_empty` means a strategy claimed the
 * page but produced nothing; it is never followed by another strategy in the
 * same round.
 */
export type SelectionResult =
  | {
      kind: "matched";
      strategy: string;
      tier: StrategyTier;
      records: RawRecord[];
      diagnostics: string[];
    }
  | {
      kind: "matched_empty";
      strategy: string;
      tier: StrategyTier;
      reason: string;
      diagnostics: string[];
    }
  | {
      kind: "no_strategy";
      diagnostics: string[];
    };
