import { promises as fs } from 'fs';
import path from 'path';
import { getErrorMessage } from '../errors';
import { log, warn } from '../log';
import { getSafeFilename } from './scraper-utils';

/**
 * Best-effort on-disk copy of every fetched page, one file per URL.
 * A failed write is logged and never aborts the scrape.
 */
export class PageCache {
  constructor(private readonly dir: string = path.join(process.cwd(), 'cached_pages')) {}

  pathFor(url: string): string {
    return path.join(this.dir, getSafeFilename(url));
  }

  async save(url: string, html: string): Promise<string | null> {
    try {
      const cachePath = this.pathFor(url);
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(cachePath, html, 'utf8');
      log(`Saved HTML to: ${cachePath}`, 'CACHE');
      return cachePath;
    } catch (error) {
      warn(`Failed to save HTML file: ${getErrorMessage(error)}`, 'CACHE');
      return null;
    }
  }
}
