/**
 * Funda Scraper
 * Reads one funda.nl listing page: JSON-LD for price and region, the
 * "Kenmerken" definition lists for property attributes and status, the
 * <title> for the address and the Nuxt payload for the publication date.
 */

import type {
  Address,
  ExtractionResult,
  ListingStatus,
  PriceInfo,
} from '@shared/schema';
import { parseDocument, type DeepTokenOptions, type ParsedDocument } from './document-parser';
import {
  extractAddress,
  extractListingDate,
  extractPrice,
  extractProperty,
  extractStatus,
  type PropertyFeatures,
} from './extractors';
import { BaseScraper, type ParsedPage, type ScraperDeps } from './scraper-base';

export interface FundaScraperOptions extends ScraperDeps {
  listingDate?: DeepTokenOptions;
}

export class FundaScraper extends BaseScraper<ParsedDocument> {
  private readonly listingDate: DeepTokenOptions;

  constructor(url: string, options: FundaScraperOptions = {}) {
    super(url, options);
    this.listingDate = options.listingDate ?? {};
  }

  protected parsePage(html: string): ParsedPage<ParsedDocument> {
    const doc = parseDocument(html, this.listingDate);
    return { page: doc, warnings: [...doc.warnings] };
  }

  protected getPropertyAddress(doc: ParsedDocument): ExtractionResult<Address> {
    return extractAddress(doc);
  }

  protected getPropertyInformation(doc: ParsedDocument): ExtractionResult<PropertyFeatures> {
    return extractProperty(doc);
  }

  protected getPropertyPrice(doc: ParsedDocument, livingArea: number | null): ExtractionResult<PriceInfo> {
    return extractPrice(doc, livingArea);
  }

  protected getListingStatus(doc: ParsedDocument): ExtractionResult<ListingStatus> {
    return extractStatus(doc);
  }

  protected getListingDate(doc: ParsedDocument): ExtractionResult<string> {
    return extractListingDate(doc);
  }
}
