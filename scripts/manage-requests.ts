import { loadConfig } from '../server/config';
import { getErrorMessage } from '../server/errors';
import { RequestQueue } from '../server/storage';
import { isValidUrl } from '../server/services/scraper-utils';

// Usage: npm run requests -- list | add <url> | remove <url>
async function manageRequests() {
  const [command = 'list', url] = process.argv.slice(2);

  try {
    const { requestsFile } = loadConfig();
    const queue = await RequestQueue.open(requestsFile);

    switch (command) {
      case 'list': {
        const urls = queue.getUrls();
        console.log(`📋 ${urls.length} urls in ${requestsFile}`);
        urls.forEach((u, i) => console.log(`  ${i + 1}. ${u}`));
        break;
      }
      case 'add': {
        if (!url || !isValidUrl(url)) {
          console.error(`❌ Not a valid url: ${url ?? '(none)'}`);
          process.exitCode = 1;
          return;
        }
        const added = await queue.addUrl(url);
        console.log(added ? `✅ Added ${url}` : `⚠️ Already queued: ${url}`);
        break;
      }
      case 'remove': {
        if (!url) {
          console.error('❌ Missing url');
          process.exitCode = 1;
          return;
        }
        const removed = await queue.removeUrl(url);
        console.log(removed ? `🗑️ Removed ${url}` : `⚠️ Not queued: ${url}`);
        break;
      }
      default:
        console.error(`❌ Unknown command '${command}' (expected list, add or remove)`);
        process.exitCode = 1;
    }
  } catch (error) {
    console.error('❌ Error:', getErrorMessage(error));
    process.exitCode = 1;
  }
}

void manageRequests();
