import { z } from "zod";
import { config } from "./config";
import { dedupeRecords } from "./dedupe";
import {
  FetchError,
  NormalizationError,
  ScraperError,
  SelectionError,
  errorMessage,
} from "./errors";
import { normalizeRecord, type NormalizeContext } from "./normalization";
import { discoverLocationPages } from "./sitemap";
import type { FetchOptions } from "./scraping/fetcher";
import type { StrategyRegistry } from "./strategies/registry";
import type { SelectionResult } from "./strategies/types";
import { mapWithConcurrency } from "./worker-pool";
import {
  BatchOutcome,
  CanonicalRecord,
  ExtractionOutcome,
  FailureReason,
  FetchResult,
  PipelineState,
  RawRecord,
  StrategyTier,
  Transport,
} from "./types";

export interface PageFetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>;
}

export interface PipelineDeps {
  fetcher: PageFetcher;
  registry: StrategyRegistry;
  normalize?: (raw: RawRecord, context: NormalizeContext) => CanonicalRecord | null;
  logger?: Pick<Console, "log" | "warn" | "error">;
}

export interface RunOptions {
  forceBrowser?: boolean;
  debugCapture?: boolean;
  timeoutMs?: number;
  /** The group sells a single brand; unlabeled rooftops count as franchised. */
  singleBrand?: boolean;
}

export interface BatchOptions extends RunOptions {
  concurrency?: number;
}

export interface DealerGroupOptions extends BatchOptions {
  /** When the entry page yields nothing, scrape the sitemap's location pages. */
  sitemap?: boolean;
  sitemapLimit?: number;
}

const RunInputSchema = z.object({
  dealerGroup: z.string().trim().min(1, "dealer group name is required"),
  url: z
    .string()
    .url("url must be absolute")
    .refine((u) => /^https?:\/\//i.test(u), "url must use http or https"),
});

/** Per-run bookkeeping: state trail and diagnostics. */
class RunTrace {
  readonly diagnostics: string[] = [];
  state: PipelineState = PipelineState.INIT;
  transportUsed: Transport | null = null;
  strategyUsed: string | null = null;

  constructor() {
    this.diagnostics.push(`state: ${PipelineState.INIT}`);
  }

  enter(state: PipelineState, detail?: string): void {
    this.state = state;
    this.diagnostics.push(detail ? `state: ${state} (${detail})` : `state: ${state}`);
  }

  note(message: string): void {
    this.diagnostics.push(message);
  }
}

/**
 * Fetch → select → extract → normalize → dedupe for one dealer-group URL.
 *
 * A strategy that claims the page but yields nothing on light-transport HTML
 * earns exactly one browser re-fetch; if that is still empty the FALLBACK tier
 * gets a turn. Every run ends in SUCCESS or a typed FAILED outcome; `run`
 * never rejects.
 */
export class ExtractionPipeline {
  private readonly fetcher: PageFetcher;
  private readonly registry: StrategyRegistry;
  private readonly normalize: (raw: RawRecord, context: NormalizeContext) => CanonicalRecord | null;
  private readonly logger: Pick<Console, "log" | "warn" | "error">;

  constructor(deps: PipelineDeps) {
    this.fetcher = deps.fetcher;
    this.registry = deps.registry;
    this.normalize = deps.normalize ?? normalizeRecord;
    this.logger = deps.logger ?? console;
  }

  async run(dealerGroup: string, url: string, options: RunOptions = {}): Promise<ExtractionOutcome> {
    const trace = new RunTrace();

    const input = RunInputSchema.safeParse({ dealerGroup, url });
    if (!input.success) {
      const message = input.error.issues.map((i) => i.message).join("; ");
      return this.fail(trace, dealerGroup, url, FailureReason.INVALID_INPUT, `Invalid input: ${message}`, false);
    }

    try {
      let page = await this.fetchPage(trace, url, options);

      trace.enter(PipelineState.SELECT_STRATEGY);
      let selection = await this.select(trace, page);

      if (selection.kind === "matched_empty" && selection.tier !== StrategyTier.FALLBACK) {
        if (page.transportUsed === Transport.LIGHT) {
          trace.note(`${selection.strategy} matched light HTML but found nothing; re-fetching with browser`);
          const rendered = await this.refetchWithBrowser(trace, url, options);
          if (rendered) {
            page = rendered;
            trace.enter(PipelineState.SELECT_STRATEGY, "rendered HTML");
            selection = await this.select(trace, page);
          }
        }

        if (selection.kind === "matched_empty" && selection.tier !== StrategyTier.FALLBACK) {
          trace.note(`${selection.strategy} still empty; advancing to ${StrategyTier.FALLBACK} tier`);
          const fallback = await this.select(trace, page, [StrategyTier.FALLBACK]);
          if (fallback.kind !== "no_strategy") selection = fallback;
        }
      }

      if (selection.kind === "no_strategy") {
        throw new SelectionError("NO_STRATEGY", `No strategy recognised the page at ${page.finalUrl}`);
      }
      if (selection.kind === "matched_empty") {
        throw new SelectionError(
          "MATCHED_EMPTY",
          `${selection.strategy} matched ${page.finalUrl} but found no locations (${selection.reason})`,
          { strategy: selection.strategy, tier: selection.tier }
        );
      }
      trace.strategyUsed = selection.strategy;

      trace.enter(PipelineState.NORMALIZE);
      const context: NormalizeContext = {
        dealerGroup: input.data.dealerGroup,
        singleBrand: options.singleBrand,
        strategyTier: selection.tier,
        diagnostics: trace.diagnostics,
      };
      const normalized: CanonicalRecord[] = [];
      for (const raw of selection.records) {
        const record = this.normalize(raw, context);
        if (record) normalized.push(record);
      }
      trace.note(`normalized ${normalized.length} of ${selection.records.length} records`);
      if (normalized.length === 0) {
        throw new NormalizationError(
          `All ${selection.records.length} records from ${selection.strategy} were discarded during normalization`,
          { strategy: selection.strategy }
        );
      }

      trace.enter(PipelineState.DEDUPE);
      const records = dedupeRecords(normalized);
      if (records.length < normalized.length) {
        trace.note(`merged ${normalized.length - records.length} duplicate records`);
      }

      trace.enter(PipelineState.SUCCESS);
      this.logger.log(
        `[pipeline] ${input.data.dealerGroup}: ${records.length} locations from ${url} via ${selection.strategy} (${trace.transportUsed})`
      );
      return {
        success: true,
        dealerGroup: input.data.dealerGroup,
        url,
        records,
        strategyUsed: trace.strategyUsed,
        transportUsed: trace.transportUsed,
        diagnostics: trace.diagnostics,
        failure: null,
      };
    } catch (error) {
      return this.failFromError(trace, dealerGroup, url, error);
    }
  }

  /**
   * Run several URLs of one group with bounded concurrency. A failing URL
   * never cancels the others; records are deduplicated across URLs.
   */
  async runBatch(dealerGroup: string, urls: readonly string[], options: BatchOptions = {}): Promise<BatchOutcome> {
    const { concurrency = config.maxConcurrentUrls, ...runOptions } = options;
    this.logger.log(`[pipeline] ${dealerGroup}: processing ${urls.length} URLs with concurrency ${concurrency}`);

    const outcomes = await mapWithConcurrency(
      urls,
      (url) => this.run(dealerGroup, url, runOptions),
      concurrency
    );
    return summarize(dealerGroup, outcomes);
  }

  /**
   * Entry page first; when it ends in "no data" (not a fetch failure) and
   * `sitemap` is set, the location pages listed in the sitemap are scraped.
   */
  async runDealerGroup(dealerGroup: string, url: string, options: DealerGroupOptions = {}): Promise<BatchOutcome> {
    const { sitemap = false, sitemapLimit, ...batchOptions } = options;
    const first = await this.run(dealerGroup, url, batchOptions);
    if (first.success || !sitemap || first.failure?.retryable || first.failure?.reason === FailureReason.INVALID_INPUT) {
      return summarize(dealerGroup, [first]);
    }

    this.logger.log(`[pipeline] ${dealerGroup}: no locations on ${url}, trying sitemap discovery`);
    const pages = await discoverLocationPages(url, this.fetcher, {
      limit: sitemapLimit,
      logger: this.logger,
    });
    const candidates = pages.filter((p) => p !== url);
    if (candidates.length === 0) {
      return summarize(dealerGroup, [first]);
    }

    const batch = await this.runBatch(dealerGroup, candidates, batchOptions);
    return summarize(dealerGroup, [first, ...batch.outcomes]);
  }

  private async fetchPage(trace: RunTrace, url: string, options: RunOptions): Promise<FetchResult> {
    trace.enter(options.forceBrowser ? PipelineState.FETCH_BROWSER : PipelineState.FETCH_LIGHT);
    const page = await this.fetcher.fetch(url, {
      forceBrowser: options.forceBrowser,
      debugCapture: options.debugCapture,
      timeoutMs: options.timeoutMs,
    });
    if (page.transportUsed === Transport.BROWSER && !options.forceBrowser) {
      trace.enter(PipelineState.FETCH_BROWSER, "light transport failed");
    }
    trace.transportUsed = page.transportUsed;
    return page;
  }

  private async refetchWithBrowser(trace: RunTrace, url: string, options: RunOptions): Promise<FetchResult | null> {
    trace.enter(PipelineState.FETCH_BROWSER, "strategy matched but empty");
    try {
      const page = await this.fetcher.fetch(url, {
        forceBrowser: true,
        debugCapture: options.debugCapture,
        timeoutMs: options.timeoutMs,
      });
      trace.transportUsed = page.transportUsed;
      return page;
    } catch (error) {
      const reason = error instanceof FetchError ? error.reason : "unknown";
      trace.note(`browser re-fetch failed (${reason}): ${errorMessage(error)}; keeping light HTML`);
      this.logger.warn(`[pipeline] Browser re-fetch failed for ${url}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async select(
    trace: RunTrace,
    page: FetchResult,
    tiers?: readonly StrategyTier[]
  ): Promise<SelectionResult> {
    const selection = await this.registry.select(page.html, page.finalUrl, { tiers });
    for (const line of selection.diagnostics) trace.note(line);
    if (selection.kind !== "no_strategy") {
      trace.enter(PipelineState.EXTRACT, selection.strategy);
    }
    return selection;
  }

  private failFromError(trace: RunTrace, dealerGroup: string, url: string, error: unknown): ExtractionOutcome {
    if (error instanceof FetchError) {
      return this.fail(trace, dealerGroup, url, FailureReason.FETCH_ERROR, `${error.reason}: ${error.message}`, true);
    }
    if (error instanceof SelectionError) {
      const reason = error.reason === "NO_STRATEGY" ? FailureReason.NO_STRATEGY : FailureReason.MATCHED_EMPTY;
      return this.fail(trace, dealerGroup, url, reason, error.message, false);
    }
    if (error instanceof NormalizationError) {
      return this.fail(trace, dealerGroup, url, FailureReason.NO_VALID_RECORDS, error.message, false);
    }

    const code = error instanceof ScraperError ? error.code : "unexpected";
    this.logger.error(`[pipeline] Unexpected ${code} error for ${url}:`, error);
    return this.fail(trace, dealerGroup, url, FailureReason.INTERNAL_ERROR, errorMessage(error), false);
  }

  private fail(
    trace: RunTrace,
    dealerGroup: string,
    url: string,
    reason: FailureReason,
    message: string,
    retryable: boolean
  ): ExtractionOutcome {
    trace.enter(PipelineState.FAILED, reason);
    this.logger.warn(`[pipeline] ${dealerGroup}: ${url} failed (${reason}): ${message}`);
    return {
      success: false,
      dealerGroup,
      url,
      records: [],
      strategyUsed: trace.strategyUsed,
      transportUsed: trace.transportUsed,
      diagnostics: trace.diagnostics,
      failure: { reason, message, retryable },
    };
  }
}

function summarize(dealerGroup: string, outcomes: ExtractionOutcome[]): BatchOutcome {
  const records = dedupeRecords(outcomes.flatMap((o) => o.records));
  const diagnostics = outcomes.map((o) =>
    o.success
      ? `${o.url}: ${o.records.length} records via ${o.strategyUsed}`
      : `${o.url}: ${o.failure?.reason ?? "FAILED"} - ${o.failure?.message ?? ""}`
  );
  return {
    success: records.length > 0,
    dealerGroup,
    records,
    outcomes,
    diagnostics,
  };
}
