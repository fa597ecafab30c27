export const config = {
  anthropicApiKey: process.env.ANTHROPIC_API_KEY || "",
  llmModel: process.env.LLM_MODEL || "claude-haiku-4-5-20251001",
  enableLlmFallback: process.env.ENABLE_LLM_FALLBACK !== "false",
  rulesDbPath: process.env.RULES_DB_PATH || "data/learned-rules.db",
  debugHtmlDir: process.env.DEBUG_HTML_DIR || ".scrape-debug",
  fetchTimeoutMs: parseInt(process.env.FETCH_TIMEOUT_MS || "20000", 10),
  browserTimeoutMs: parseInt(process.env.BROWSER_TIMEOUT_MS || "45000", 10),
  networkIdleTimeoutMs: parseInt(process.env.NETWORK_IDLE_TIMEOUT_MS || "10000", 10),
  minBodyBytes: parseInt(process.env.MIN_BODY_BYTES || "1024", 10),
  maxConcurrentUrls: parseInt(process.env.MAX_CONCURRENT_URLS || "3", 10),
  sitemapPageLimit: parseInt(process.env.SITEMAP_PAGE_LIMIT || "500", 10),
  // Sites that always answer the light transport with a challenge page
  knownBlockedDomains: [
    "ancira.com",
    "albrechtauto.com",
    "allensamuels.com",
    "baliseauto.com",
    "bakermotorcompany.com",
    "bakerautogroup.com",
  ],
  userAgents: [
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ],
  getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  },
};
