import {
  DEFAULT_COUNTRY,
  type Address,
  type ExtractionResult,
  type FeatureTable,
  type HouseType,
  type ListingStatus,
  type PriceInfo,
  type PropertyInfo,
} from '@shared/schema';
import { AddressParseError, getErrorMessage } from '../errors';
import type { ParsedDocument } from './document-parser';
import { parseListingStatus } from './listing-status';
import { mergeStructuredData } from './structured-data';

/**
 * Field extractors over a parsed listing page.
 *
 * Every extractor returns { value, warnings } and never throws, so one broken
 * field leaves the others intact.
 */

// Labels of the listing page's feature table ("Kenmerken")
export const FEATURE_LABELS = {
  livingArea: 'Wonen',
  rooms: 'Aantal kamers',
  buildYear: 'Bouwjaar',
  energyLabel: 'Energielabel',
  houseType: 'Soort woonhuis',
  apartmentType: 'Soort appartement',
  status: 'Status',
} as const;

export interface PropertyFeatures {
  property: PropertyInfo;
  houseType: HouseType | null;
}

function ok<T>(value: T, warnings: string[] = []): ExtractionResult<T> {
  return { value, warnings };
}

function fail<T>(warning: string): ExtractionResult<T> {
  return { value: null, warnings: [warning] };
}

// ============================================
// ADDRESS
// ============================================

// "<prefix>: <street> <number> <zip> <city> [funda]", e.g.
// "Huis te koop: Vondellaan 26 2332 AA Leiden [funda]"
// The city is a run of words; ' and - only join letters ('s-Hertogenbosch),
// so a trailing " - funda" is not part of it
const ADDRESS_PATTERN = /:\s*([\p{L}\p{N}_\s]+)\s+(\d+)\s*(\d{4}\s*[A-Z]{2})\s*('?\p{L}+(?:[\s'-]\p{L}+)*)(?:\s*\[funda\])?/u;

export type AddressLine = Pick<Address, 'street' | 'number' | 'zip_code' | 'city'>;

export function parseAddressLine(title: string): AddressLine {
  const match = ADDRESS_PATTERN.exec(title);
  if (!match) {
    throw new AddressParseError(title);
  }

  const [, street, number, zip, city] = match;
  const address = {
    street: street.trim(),
    number,
    zip_code: zip.replace(/\s+/g, ''),
    city: city.trim(),
  };

  if (!address.street || !address.city) {
    throw new AddressParseError(title);
  }
  return address;
}

export function extractAddress(doc: ParsedDocument): ExtractionResult<Address> {
  if (doc.title === null) {
    return fail('Address: page has no <title>');
  }

  let line: AddressLine;
  try {
    line = parseAddressLine(doc.title);
  } catch (error) {
    return fail(`Address: ${getErrorMessage(error)}`);
  }

  const { province, neighbourhood } = mergeStructuredData(doc.structuredData);
  return ok({
    ...line,
    neighbourhood,
    province,
    country: DEFAULT_COUNTRY,
  });
}

// ============================================
// PRICE
// ============================================

function toPrice(raw: unknown): number | null {
  let value: number;
  if (typeof raw === 'number') {
    value = raw;
  } else if (typeof raw === 'string' && raw.trim() !== '') {
    value = Number(raw.trim());
  } else {
    return null;
  }
  return Number.isFinite(value) && value > 0 ? value : null;
}

/**
 * Asking price from the JSON-LD offer. Price per m² needs the living area,
 * so the property extractor has to run first.
 */
export function extractPrice(doc: ParsedDocument, livingArea: number | null): ExtractionResult<PriceInfo> {
  const { price: raw } = mergeStructuredData(doc.structuredData);
  if (raw === null) {
    return fail('Price: no offers.price in structured data');
  }

  const askingPrice = toPrice(raw);
  if (askingPrice === null) {
    return fail(`Price: '${String(raw)}' is not a price`);
  }

  return ok({
    asking_price: askingPrice,
    asking_price_per_square_meter: livingArea ? askingPrice / livingArea : null,
    sale_price: null,
  });
}

// ============================================
// PROPERTY ATTRIBUTES
// ============================================

/**
 * Leading integer of a feature value: "83 m²" → 83, "83m²" → 83,
 * "4 kamers (3 slaapkamers)" → 4, "1.250 m²" → 1250 (dots are thousands separators)
 */
export function parseLeadingInteger(text: string | undefined): number | null {
  if (!text) return null;
  const match = /^\s*(\d[\d.]*)/.exec(text);
  if (!match) return null;
  const value = parseInt(match[1].replace(/\./g, ''), 10);
  return value > 0 ? value : null;
}

export function parseBuildYear(text: string | undefined): number | null {
  if (!text) return null;
  const trimmed = text.trim();
  return /^\d{4}$/.test(trimmed) ? parseInt(trimmed, 10) : null;
}

export function parseEnergyLabel(text: string | undefined): string | null {
  if (!text) return null;
  const match = text.trim().toUpperCase().match(/^[A-G]\+*/);
  return match ? match[0] : null;
}

/**
 * "Eengezinswoning, tussenwoning" → "Eengezinswoning"
 * "Bovenwoning (appartement)" → "Bovenwoning"
 */
export function cleanPropertyType(text: string | undefined): string | null {
  if (!text) return null;
  const cleaned = text
    .replace(/\([^)]*\)/g, '')
    .split(',')[0]
    .replace(/\s+/g, ' ')
    .trim();
  return cleaned || null;
}

function checkParsed(
  table: FeatureTable,
  label: string,
  parsed: unknown,
  warnings: string[],
): void {
  const raw = table[label];
  if (raw !== undefined && parsed === null) {
    warnings.push(`Property: could not read ${label} from '${raw}'`);
  }
}

export function extractProperty(doc: ParsedDocument): ExtractionResult<PropertyFeatures> {
  const table = doc.featureTable;
  if (Object.keys(table).length === 0) {
    return fail('Property: feature table is empty');
  }

  const warnings: string[] = [];

  const livingArea = parseLeadingInteger(table[FEATURE_LABELS.livingArea]);
  const numRooms = parseLeadingInteger(table[FEATURE_LABELS.rooms]);
  const buildYear = parseBuildYear(table[FEATURE_LABELS.buildYear]);
  const energyLabel = parseEnergyLabel(table[FEATURE_LABELS.energyLabel]);

  checkParsed(table, FEATURE_LABELS.livingArea, livingArea, warnings);
  checkParsed(table, FEATURE_LABELS.rooms, numRooms, warnings);
  checkParsed(table, FEATURE_LABELS.buildYear, buildYear, warnings);
  checkParsed(table, FEATURE_LABELS.energyLabel, energyLabel, warnings);

  // House label first, apartment label as fallback
  const houseKind = cleanPropertyType(table[FEATURE_LABELS.houseType]);
  const apartmentKind = cleanPropertyType(table[FEATURE_LABELS.apartmentType]);
  const houseType: HouseType | null = houseKind ? 'House' : apartmentKind ? 'Apartment' : null;

  return ok({
    property: {
      energy_label: energyLabel,
      living_area: livingArea,
      num_rooms: numRooms,
      build_year: buildYear,
      property_type: houseKind ?? apartmentKind,
    },
    houseType,
  }, warnings);
}

// ============================================
// STATUS & DATE
// ============================================

export function extractStatus(doc: ParsedDocument): ExtractionResult<ListingStatus> {
  const raw = doc.featureTable[FEATURE_LABELS.status];
  if (raw === undefined) {
    return fail(`Status: no '${FEATURE_LABELS.status}' entry in feature table`);
  }

  try {
    return ok(parseListingStatus(raw));
  } catch (error) {
    return fail(`Status: ${getErrorMessage(error)}`);
  }
}

export function extractListingDate(doc: ParsedDocument): ExtractionResult<string> {
  if (doc.listingDate === null) {
    return fail('Listing date: no publication date in app data');
  }
  return ok(doc.listingDate);
}
