import { InvalidUrlError } from '../errors';
import { FundaScraper, type FundaScraperOptions } from './scraper-funda';
import { getWebsite, isValidUrl } from './scraper-utils';

/**
 * Scraper for the site the url belongs to
 */
export function createScraper(url: string, options: FundaScraperOptions = {}): FundaScraper {
  if (!isValidUrl(url)) {
    throw new InvalidUrlError(url);
  }

  const website = getWebsite(url);
  switch (website) {
    case 'funda':
      return new FundaScraper(url, options);
    case 'huislijn':
      // Recognised source, but no page parser yet
      throw new InvalidUrlError(url, `no scraper available for ${website}`);
  }
}
