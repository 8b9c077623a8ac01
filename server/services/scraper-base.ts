import {
  addressSchema,
  priceInfoSchema,
  propertyInfoSchema,
  type Address,
  type ExtractionResult,
  type Listing,
  type ListingStatus,
  type PriceInfo,
  type Website,
} from '@shared/schema';
import type { z } from 'zod';
import { InvalidUrlError, getErrorMessage } from '../errors';
import { warn } from '../log';
import type { PropertyFeatures } from './extractors';
import type { PageCache } from './page-cache';
import { RequestHandler } from './request-handler';
import { getWebsite, isValidUrl } from './scraper-utils';

// ============================================
// INTERFACES
// ============================================

export interface ScraperDeps {
  requestHandler?: RequestHandler;
  pageCache?: PageCache | null;
  onLog?: (msg: string) => void;
}

export interface ParsedPage<TPage> {
  page: TPage;
  warnings: string[];
}

export interface ScrapeResult {
  listing: Listing;
  warnings: string[];
}

/**
 * Base class for one-listing scrapers.
 *
 * Subclasses parse a page and implement the field extractors; the base class
 * validates the url, fetches (and caches) the page, runs every extractor
 * behind its own guard and assembles the Listing.
 */
export abstract class BaseScraper<TPage> {
  readonly url: string;
  readonly website: Website;
  protected readonly requestHandler: RequestHandler;
  private readonly ownsRequestHandler: boolean;
  private readonly pageCache: PageCache | null;
  private readonly onLog: (msg: string) => void;

  constructor(url: string, deps: ScraperDeps = {}) {
    if (!isValidUrl(url)) {
      throw new InvalidUrlError(url);
    }
    this.url = url;
    this.website = getWebsite(url);

    this.ownsRequestHandler = !deps.requestHandler;
    this.requestHandler = deps.requestHandler ?? new RequestHandler();
    this.pageCache = deps.pageCache ?? null;
    this.onLog = deps.onLog ?? (msg => warn(msg, 'SCRAPER'));
  }

  protected abstract parsePage(html: string): ParsedPage<TPage>;
  protected abstract getPropertyAddress(page: TPage): ExtractionResult<Address>;
  protected abstract getPropertyInformation(page: TPage): ExtractionResult<PropertyFeatures>;
  protected abstract getPropertyPrice(page: TPage, livingArea: number | null): ExtractionResult<PriceInfo>;
  protected abstract getListingStatus(page: TPage): ExtractionResult<ListingStatus>;
  protected abstract getListingDate(page: TPage): ExtractionResult<string>;

  /**
   * Fetches the page; the cached copy on disk is written best-effort
   */
  async getHtml(): Promise<string> {
    const html = await this.requestHandler.get(this.url);
    if (this.pageCache) {
      await this.pageCache.save(this.url, html);
    }
    return html;
  }

  async getListing(): Promise<ScrapeResult> {
    const html = await this.getHtml();
    return this.assemble(html);
  }

  /**
   * Builds the Listing from already fetched html
   */
  assemble(html: string): ScrapeResult {
    const { page, warnings } = this.parsePage(html);

    const guard = <T>(label: string, run: () => ExtractionResult<T>): T | null => {
      try {
        const result = run();
        warnings.push(...result.warnings);
        return result.value;
      } catch (error) {
        warnings.push(`${label}: ${getErrorMessage(error)}`);
        return null;
      }
    };

    // An extracted value that breaks the data model is dropped with a warning
    const validate = <S extends z.ZodTypeAny>(label: string, schema: S, value: z.input<S> | null): z.output<S> | null => {
      if (value === null) return null;
      const parsed = schema.safeParse(value);
      if (parsed.success) return parsed.data;
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')} (${issue.message})`);
      warnings.push(`${label}: invalid ${issues.join('; ')}`);
      return null;
    };

    // Property before price: price per m² needs the living area
    const features = guard('Property', () => this.getPropertyInformation(page));
    const property = validate('Property', propertyInfoSchema, features?.property ?? null);
    const livingArea = property?.living_area ?? null;

    const listing: Listing = {
      address: validate('Address', addressSchema, guard('Address', () => this.getPropertyAddress(page))),
      property,
      price: validate('Price', priceInfoSchema, guard('Price', () => this.getPropertyPrice(page, livingArea))),
      status: guard('Status', () => this.getListingStatus(page)),
      listing_date: guard('Listing date', () => this.getListingDate(page)),
      house_type: features?.houseType ?? null,
      source: this.website,
      url: this.url,
    };

    for (const warning of warnings) {
      this.onLog(`${this.url}: ${warning}`);
    }

    return { listing, warnings };
  }

  close(): void {
    if (this.ownsRequestHandler) {
      this.requestHandler.close();
    }
  }
}
