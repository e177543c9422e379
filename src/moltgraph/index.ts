#!/usr/bin/env node

import 'dotenv/config';
import { loadConfig } from './core/config.js';
import { createLogger } from './core/logger.js';
import { MoltbookClient } from './lib/api/moltbook-client.js';
import { CrawlOrchestrator } from './lib/crawl/crawl-orchestrator.js';
import { ProfilePageScraper } from './lib/scrape/profile-page-scraper.js';
import { HttpTransport } from './lib/transport/http-transport.js';
import { RateLimiter } from './lib/transport/rate-limiter.js';
import { createStore, formatSummary, parseCliArgs, resolveCrawlId } from './cli.js';

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  const config = loadConfig();
  const logger = createLogger('crawl');

  const store = await createStore(config.store, logger.child('store'));
  await store.initialize();

  try {
    const limiter = new RateLimiter(config.transport.requestsPerMinute);
    const transport = new HttpTransport({ config: config.transport, limiter, logger: logger.child('http') });
    const scraper = config.crawl.scrapeAgentHtml
      ? new ProfilePageScraper({
          webBaseUrl: config.webBaseUrl,
          userAgent: config.transport.userAgent,
          timeoutMs: config.transport.timeoutMs,
          limiter,
        })
      : undefined;

    const orchestrator = new CrawlOrchestrator({
      client: new MoltbookClient(transport),
      store,
      scan: config.scan,
      crawl: config.crawl,
      scraper,
      logger,
    });

    const summary = await orchestrator.run(args.mode, { crawlId: resolveCrawlId(args, config) });
    console.log(formatSummary(summary));
  } finally {
    await store.close();
  }
}

main().catch((error) => {
  console.error("Fatal error in main():", error);
  process.exit(1);
});
