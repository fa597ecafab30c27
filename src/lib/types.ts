// ===== Enums =====

export enum Transport {
  LIGHT = "light",
  BROWSER = "browser",
}

export enum DealerCategory {
  FRANCHISED = "franchised",
  USED = "used",
  COLLISION = "collision",
  FIXED_OPS = "fixed_ops",
  UNKNOWN = "unknown",
}

/** Selection order is the declaration order. */
export enum StrategyTier {
  SPECIFIC = "specific",
  GENERIC = "generic",
  FALLBACK = "fallback",
}

export const TIER_ORDER: readonly StrategyTier[] = [
  StrategyTier.SPECIFIC,
  StrategyTier.GENERIC,
  StrategyTier.FALLBACK,
];

export enum FailureReason {
  FETCH_ERROR = "FETCH_ERROR",
  NO_STRATEGY = "NO_STRATEGY",
  MATCHED_EMPTY = "MATCHED_EMPTY",
  NO_VALID_RECORDS = "NO_VALID_RECORDS",
  INVALID_INPUT = "INVALID_INPUT",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

export enum PipelineState {
  INIT = "INIT",
  FETCH_LIGHT = "FETCH_LIGHT",
  FETCH_BROWSER = "FETCH_BROWSER",
  SELECT_STRATEGY = "SELECT_STRATEGY",
  EXTRACT = "EXTRACT",
  NORMALIZE = "NORMALIZE",
  DEDUPE = "DEDUPE",
  SUCCESS = "SUCCESS",
  FAILED = "FAILED",
}

// ===== Fetch =====

export interface FetchResult {
  readonly html: string;
  readonly finalUrl: string;
  readonly transportUsed: Transport;
  readonly fetchedAt: string;
}

// ===== Records =====

/** Loosely structured output of a single strategy invocation. */
export interface RawRecord {
  readonly name: string;
  readonly rawAddress: string;
  readonly phone?: string;
  readonly website?: string;
  readonly sourceUrl: string;
  readonly strategyName: string;
}

export interface CanonicalRecord {
  name: string;
  dealerGroup: string;
  street: string;
  city: string;
  region: string; // two-letter state/province code
  postalCode: string | null;
  country: string;
  phone: string | null;
  website: string | null;
  websiteDomain: string | null;
  brandTags: readonly string[];
  category: DealerCategory;
  sourceUrl: string;
  strategyName: string;
  strategyTier: StrategyTier;
}

// ===== Strategies =====

export interface StrategyDescriptor {
  readonly name: string;
  readonly tier: StrategyTier;
  canHandle(html: string, url: string): boolean;
  extract(html: string, url: string): RawRecord[] | Promise<RawRecord[]>;
}

// ===== Outcomes =====

export interface ExtractionFailure {
  reason: FailureReason;
  message: string;
  /** True when the failure was transport-level and a later retry may succeed. */
  retryable: boolean;
}

export interface ExtractionOutcome {
  success: boolean;
  dealerGroup: string;
  url: string;
  records: CanonicalRecord[];
  strategyUsed: string | null;
  transportUsed: Transport | null;
  diagnostics: string[];
  failure: ExtractionFailure | null;
}

export interface BatchOutcome {
  success: boolean;
  dealerGroup: string;
  records: CanonicalRecord[];
  outcomes: ExtractionOutcome[];
  diagnostics: string[];
}
