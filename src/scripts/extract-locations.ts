import { config } from "../lib/config";
import { ExtractionPipeline } from "../lib/pipeline";
import { SqliteRuleStore } from "../lib/rules/rule-store";
import { closeBrowser } from "../lib/scraping/browser";
import { Fetcher } from "../lib/scraping/fetcher";
import { createDefaultRegistry } from "../lib/strategies";
import type { BatchOutcome } from "../lib/types";

async function main() {
  const args = process.argv.slice(2);
  const urls: string[] = [];
  let name = "";
  let sitemap = false;
  let debugCapture = false;
  let singleBrand = false;
  let concurrency = config.maxConcurrentUrls;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--name" && args[i + 1]) {
      name = args[++i];
    } else if (arg === "--url" && args[i + 1]) {
      urls.push(args[++i]);
    } else if (arg === "--concurrency" && args[i + 1]) {
      concurrency = parseInt(args[++i], 10) || concurrency;
    } else if (arg === "--sitemap") {
      sitemap = true;
    } else if (arg === "--debug") {
      debugCapture = true;
    } else if (arg === "--single-brand") {
      singleBrand = true;
    }
  }

  if (!name || urls.length === 0) {
    console.error(
      "Usage: extract-locations --name <dealer group> --url <url> [--url <url>] [--sitemap] [--concurrency N] [--debug] [--single-brand]"
    );
    process.exit(1);
  }

  const ruleStore = new SqliteRuleStore();
  const pipeline = new ExtractionPipeline({
    fetcher: new Fetcher(),
    registry: createDefaultRegistry({ ruleStore }),
    logger: console,
  });

  let outcome: BatchOutcome;
  if (urls.length === 1) {
    outcome = await pipeline.runDealerGroup(name, urls[0], {
      sitemap,
      debugCapture,
      singleBrand,
      concurrency,
    });
  } else {
    outcome = await pipeline.runBatch(name, urls, { debugCapture, singleBrand, concurrency });
  }

  console.log(JSON.stringify(outcome, null, 2));
  console.error(`\n=== ${name} ===`);
  for (const line of outcome.diagnostics) console.error(line);
  console.error(`Locations: ${outcome.records.length}`);

  ruleStore.close();
  await closeBrowser();
  process.exit(outcome.success ? 0 : 2);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  closeBrowser().then(() => process.exit(1));
});
