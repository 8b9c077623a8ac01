import { loadConfig } from "./config";
import { getErrorMessage } from "./errors";
import { warn } from "./log";
import { runScrape } from "./scrape-runner";

// Usage: npm start [-- path/to/requests.json]
void (async () => {
  try {
    const config = loadConfig();
    const summary = await runScrape({ config, requestsFile: process.argv[2] });
    if (summary.scraped === 0 && summary.failed > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    // Only configuration and request-file problems get here
    warn(`Aborting run: ${getErrorMessage(error)}`, 'SCRAPER');
    process.exitCode = 1;
  }
})();
