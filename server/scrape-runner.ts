import type { Listing } from "@shared/schema";
import type { ScraperConfig } from "./config";
import { getErrorMessage } from "./errors";
import { log, warn } from "./log";
import { PageCache } from "./services/page-cache";
import { ProxyManager } from "./services/proxy-manager";
import { RequestHandler, type RequestHandlerOptions } from "./services/request-handler";
import { createScraper } from "./services/scraper-factory";
import { formatListing } from "./services/listing-formatter";
import { randomDelay, sleep } from "./services/scraper-utils";
import { RequestQueue } from "./storage";

export interface ScrapeRunOptions {
  config: ScraperConfig;
  requestsFile?: string;
  adapter?: RequestHandlerOptions['adapter'];
  delay?: (ms: number) => Promise<void>;
  print?: (text: string) => void;
}

export interface ScrapeRunSummary {
  scraped: number;
  failed: number;
  listings: Listing[];
}

/**
 * Scrapes every queued url, one at a time.
 *
 * A missing or malformed request file throws before anything is fetched.
 * A listing that fails is logged and skipped; the run continues.
 */
export async function runScrape(options: ScrapeRunOptions): Promise<ScrapeRunSummary> {
  const { config } = options;
  const requestsFile = options.requestsFile ?? config.requestsFile;
  const delay = options.delay ?? sleep;
  const print = options.print ?? ((text: string) => console.log(text));

  const queue = await RequestQueue.open(requestsFile);
  const urls = queue.getUrls();
  log(`Loaded ${urls.length} urls from ${requestsFile}`, 'SCRAPER');

  const proxyManager = new ProxyManager(config.proxyUrls);
  const pageCache = config.cachePages ? new PageCache(config.cacheDir) : null;
  const summary: ScrapeRunSummary = { scraped: 0, failed: 0, listings: [] };

  try {
    for (let i = 0; i < urls.length; i++) {
      const url = urls[i];

      if (i > 0) {
        const waitMs = randomDelay(config.minDelayMs, config.maxDelayMs);
        log(`Waiting ${waitMs}ms before next listing`, 'SCRAPER');
        await delay(waitMs);
      }

      log(`(${i + 1}/${urls.length}) ${url}`, 'SCRAPER');

      // Fresh session per listing
      const requestHandler = new RequestHandler({
        timeoutMs: config.timeoutMs,
        maxAttempts: config.maxAttempts,
        backoffFactor: config.backoffFactor,
        proxyManager,
        adapter: options.adapter,
      });

      try {
        const scraper = createScraper(url, { requestHandler, pageCache });
        const { listing, warnings } = await scraper.getListing();

        print(formatListing(listing));
        summary.listings.push(listing);
        summary.scraped++;
        if (warnings.length > 0) {
          log(`${warnings.length} field(s) degraded for ${url}`, 'SCRAPER');
        }
      } catch (error) {
        summary.failed++;
        warn(`Failed to scrape ${url}: ${getErrorMessage(error)}`, 'SCRAPER');
      } finally {
        requestHandler.close();
      }
    }
  } finally {
    if (proxyManager.isEnabled()) {
      const { totalRequests, perProxy } = proxyManager.getStats();
      const usage = perProxy.map(p => `${p.host}=${p.requests}`).join(', ');
      log(`${totalRequests} proxied requests (${usage})`, 'PROXY');
    }
    proxyManager.destroy();
  }

  log(`Run complete: ${summary.scraped} scraped, ${summary.failed} failed`, 'SCRAPER');
  return summary;
}
