import 'dotenv/config';
import { loadConfig, type ScraperConfig } from './config';
import { createDbClient } from './db/client';
import { playwrightDriverFactory } from './scrapers/browser';
import { FirecrawlClient } from './scrapers/firecrawl';
import { PageScraper } from './scrapers/page-scraper';
import { BrowserPageCountOracle } from './scrapers/pagination';
import { MemoryCacheStore, SupabaseCacheStore, type CacheStore } from './services/result-cache';
import { ScrapeOrchestrator } from './services/search-runner';
import { createTriggerServer } from './server';

function createCacheStore(config: ScraperConfig): CacheStore {
  if (config.supabase) {
    console.log('[Worker] Using Supabase scrape_cache table');
    return new SupabaseCacheStore(createDbClient(config.supabase));
  }
  console.log('[Worker] SUPABASE_URL not set, caching results in memory for this process only');
  return new MemoryCacheStore();
}

function createRunner(config: ScraperConfig): ScrapeOrchestrator {
  const oracle = new BrowserPageCountOracle({
    openDriver: playwrightDriverFactory({
      wsEndpoint: config.browser.wsEndpoint,
      executablePath: config.browser.executablePath,
    }),
    selectors: config.browser.selectors,
    navigationTimeoutMs: config.browser.navigationTimeoutMs,
    renderTimeoutMs: config.browser.renderTimeoutMs,
  });

  const scraper = new PageScraper(new FirecrawlClient(config.extraction));

  return new ScrapeOrchestrator(
    { oracle, scraper, cache: createCacheStore(config) },
    {
      pageRetries: config.runner.pageRetries,
      retryDelayMs: config.runner.retryDelayMs,
      marketplaceBaseUrl: config.marketplaceBaseUrl,
    },
  );
}

function main(): void {
  const config = loadConfig();
  const server = createTriggerServer({
    runner: createRunner(config),
    exportDir: config.exportDir,
    apiKey: config.workerApiKey,
  });

  server.listen(config.port, () => {
    console.log(`[Worker] HTTP server listening on port ${config.port}`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`[Worker] Received ${signal}, shutting down...`);
    server.close(() => process.exit(0));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main();
